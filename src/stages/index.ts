/**
 * Stage handler contracts and the default deterministic handlers.
 */

import { profilingStage } from "./profiler.js";
import { cleaningStage } from "./cleaner.js";
import { visualizationStage } from "./visualizer.js";
import { statisticsStage } from "./statistician.js";
import { recommendationStage } from "./recommender.js";
import { trainingStage } from "./trainer.js";
import { explainabilityStage } from "./explainer.js";
import { reportingStage } from "./reporter.js";
import type { StageHandlers } from "./types.js";

export {
  STAGE_DEPENDENCIES,
  type DependencyOf,
  type StageContext,
  type StageHandler,
  type StageHandlers,
  type StageOutputBase,
  type StageOutputMap,
  type ProfilingOutput,
  type CleaningOutput,
  type VisualizationOutput,
  type StatisticsOutput,
  type RecommendationOutput,
  type TrainingOutput,
  type ExplainabilityOutput,
  type ReportingOutput,
} from "./types.js";

export { UpstreamOutputs, MissingDependencyError } from "./context.js";

export {
  profilingStage,
  cleaningStage,
  visualizationStage,
  statisticsStage,
  recommendationStage,
  trainingStage,
  explainabilityStage,
  reportingStage,
};

/**
 * The default handler for every stage. Override entries to plug in other
 * implementations.
 */
export function createDefaultHandlers(overrides: Partial<StageHandlers> = {}): StageHandlers {
  return {
    profiling: overrides.profiling ?? profilingStage,
    cleaning: overrides.cleaning ?? cleaningStage,
    visualization: overrides.visualization ?? visualizationStage,
    statistics: overrides.statistics ?? statisticsStage,
    recommendation: overrides.recommendation ?? recommendationStage,
    training: overrides.training ?? trainingStage,
    explainability: overrides.explainability ?? explainabilityStage,
    reporting: overrides.reporting ?? reportingStage,
  };
}
