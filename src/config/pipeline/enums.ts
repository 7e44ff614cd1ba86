/**
 * Domain enumerations for pipeline configuration.
 *
 * The stage list is the fixed topology of every run: stages execute in
 * exactly this order and the Progress Tracker reports them in this order.
 */

import { z } from "zod";

/**
 * Pipeline stages, in execution order.
 *
 * @readonly
 * @enum {string}
 */
export const StageId = z.enum([
  "profiling",
  "cleaning",
  "visualization",
  "statistics",
  "recommendation",
  "training",
  "explainability",
  "reporting",
]);
export type StageId = z.infer<typeof StageId>;

/** Execution order of the stages. */
export const STAGE_ORDER: readonly StageId[] = StageId.options;

/**
 * How the cleaning stage treats missing values.
 *
 *   auto   → mean for numeric columns, mode for everything else
 *   mean   → mean for numeric columns, mode for everything else
 *   median → median for numeric columns, mode for everything else
 *   mode   → most frequent value for every column
 *   drop   → delete rows holding a missing value
 */
export const CleaningStrategy = z.enum(["auto", "mean", "median", "mode", "drop"]);
export type CleaningStrategy = z.infer<typeof CleaningStrategy>;

export const ProblemType = z.enum(["classification", "regression"]);
export type ProblemType = z.infer<typeof ProblemType>;
