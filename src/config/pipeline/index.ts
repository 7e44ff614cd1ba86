/**
 * Pipeline configuration module.
 *
 * Usage:
 *   import { loadPipelineConfig, DEFAULT_PIPELINE_CONFIG } from "./config/pipeline/index.js";
 *
 *   const config = loadPipelineConfig({
 *     ...DEFAULT_PIPELINE_CONFIG,
 *     cleaning: { strategy: "median" },
 *   });
 */

export { StageId, STAGE_ORDER, CleaningStrategy, ProblemType } from "./enums.js";

export type {
  PipelineConfig,
  StageDefinition,
  RetryPolicy,
} from "./schema.js";

export {
  PipelineConfigSchema,
  StageDefinitionSchema,
  RetryPolicySchema,
} from "./schema.js";

export {
  loadPipelineConfig,
  loadPipelineConfigFile,
  validatePipelineConfig,
  resolvePipelineConfig,
  formatZodIssues,
  PipelineConfigError,
  type ConfigValidationIssue,
  type PipelineEnvOverrides,
} from "./loader.js";

export { DEFAULT_PIPELINE_CONFIG } from "./defaults.js";
