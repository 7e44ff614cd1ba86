/**
 * Stage handler contract.
 *
 * A stage handler is a pluggable unit that reads the Dataset Store, the Model
 * Registry and the outputs of the stages it depends on, writes its results
 * back to the stores, and returns a typed output. The topology is fixed:
 * STAGE_DEPENDENCIES lists, per stage, the earlier stages whose full output
 * it may read.
 */

import type { StageId } from "../config/pipeline/enums.js";
import type { PipelineConfig, StageDefinition } from "../config/pipeline/schema.js";
import type { ChangeLogEntry } from "../dataset/changelog.js";
import type {
  ChartRef,
  CleaningSummary,
  ModelRecommendation,
  OutlierReport,
  ProfilingSummary,
  QualityFlags,
  StatisticsReport,
  TrainingSummary,
  XaiSummary,
} from "../dataset/metadata.js";
import type { DatasetStore } from "../dataset/store.js";
import type { Logger } from "../logging/logger.js";
import type { ModelRegistry } from "../models/registry.js";
import type { OutputPaths } from "../output/paths.js";
import type { ReportDocument } from "../report/document.js";
import type { UpstreamOutputs } from "./context.js";

export const STAGE_DEPENDENCIES = {
  profiling: [],
  cleaning: ["profiling"],
  visualization: ["cleaning"],
  statistics: ["cleaning"],
  recommendation: ["profiling", "statistics"],
  training: ["recommendation"],
  explainability: ["training"],
  reporting: [
    "profiling",
    "cleaning",
    "visualization",
    "statistics",
    "recommendation",
    "training",
    "explainability",
  ],
} as const satisfies Record<StageId, readonly StageId[]>;

export type DependencyOf<K extends StageId> = (typeof STAGE_DEPENDENCIES)[K][number];

export interface StageOutputBase {
  /** One-line result, recorded in the activity log */
  readonly summary: string;
  /** True when the stage had nothing to act on and degraded gracefully */
  readonly skipped: boolean;
}

export interface ProfilingOutput extends StageOutputBase {
  readonly profile: ProfilingSummary;
  readonly qualityFlags: QualityFlags;
}

export interface CleaningOutput extends StageOutputBase {
  readonly cleaning: CleaningSummary;
  readonly outliers: OutlierReport;
  readonly entries: readonly ChangeLogEntry[];
}

export interface VisualizationOutput extends StageOutputBase {
  readonly charts: readonly ChartRef[];
}

export interface StatisticsOutput extends StageOutputBase {
  readonly report: StatisticsReport;
}

export interface RecommendationOutput extends StageOutputBase {
  readonly recommendation: ModelRecommendation;
}

export interface TrainingOutput extends StageOutputBase {
  readonly training: TrainingSummary;
}

export interface ExplainabilityOutput extends StageOutputBase {
  readonly xai: XaiSummary;
  readonly charts: readonly ChartRef[];
}

export interface ReportingOutput extends StageOutputBase {
  readonly document: ReportDocument;
}

export interface StageOutputMap {
  profiling: ProfilingOutput;
  cleaning: CleaningOutput;
  visualization: VisualizationOutput;
  statistics: StatisticsOutput;
  recommendation: RecommendationOutput;
  training: TrainingOutput;
  explainability: ExplainabilityOutput;
  reporting: ReportingOutput;
}

export interface StageContext<K extends StageId> {
  readonly runId: string;
  readonly stage: StageDefinition;
  readonly config: Readonly<PipelineConfig>;
  readonly store: DatasetStore;
  readonly models: ModelRegistry;
  readonly upstream: UpstreamOutputs<K>;
  readonly paths: OutputPaths;
  readonly logger: Logger;
}

export interface StageHandler<K extends StageId> {
  run(context: StageContext<K>): Promise<StageOutputMap[K]>;
}

export type StageHandlers = { [K in StageId]: StageHandler<K> };
