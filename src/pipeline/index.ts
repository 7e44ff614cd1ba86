/**
 * Pipeline orchestration: stage sequencing, retry, fallback repair and the
 * single-flight service.
 */

export {
  PipelineOrchestrator,
  ORCHESTRATOR_ACTOR,
  type OrchestratorOptions,
  type RunResult,
} from "./orchestrator.js";

export {
  PipelineService,
  type PipelineServiceOptions,
  type StartResult,
  type RunOutcome,
} from "./service.js";

export {
  TransientError,
  isTransientError,
  withRetry,
  sleep,
  type Sleep,
  type RetryOptions,
  type RetryEvent,
  type RetryResult,
} from "./retry.js";

export { runFallbackPass, FALLBACK_STAGE } from "./fallback.js";
export { validateStageTopology, getStageDefinition } from "./definition.js";
