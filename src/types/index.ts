/**
 * Core type definitions for the EDA pipeline.
 */

export * from "./dataset.js";
export * from "./pipeline.js";
