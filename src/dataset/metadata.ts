/**
 * Typed metadata bag.
 *
 * Stages publish their structured results under a closed set of keys. Each
 * key has a schema, and a value is validated against it when written, so a
 * later stage reading a key gets exactly the declared shape. Last write wins.
 */

import { z } from "zod";
import { CleaningStrategy, ProblemType } from "../config/pipeline/enums.js";

const ColumnTypeSchema = z.enum(["numeric", "categorical", "datetime", "boolean"]);

const NumericProfileSchema = z.object({
  min: z.number().nullable(),
  max: z.number().nullable(),
  mean: z.number().nullable(),
  median: z.number().nullable(),
  std: z.number().nullable(),
});

export const ColumnProfileSchema = z.object({
  type: ColumnTypeSchema,
  missingCount: z.number().int().min(0),
  missingPercent: z.number().min(0).max(100),
  uniqueCount: z.number().int().min(0),
  stats: NumericProfileSchema.optional(),
  topValues: z.record(z.number().int()).optional(),
});
export type ColumnProfile = z.infer<typeof ColumnProfileSchema>;

export const ProfilingSummarySchema = z.object({
  rows: z.number().int().min(0),
  columns: z.number().int().min(1),
  columnProfiles: z.record(ColumnProfileSchema),
  potentialIssues: z.array(z.string()),
});
export type ProfilingSummary = z.infer<typeof ProfilingSummarySchema>;

export const QualityFlagsSchema = z.record(z.array(z.string().min(1)));
export type QualityFlags = z.infer<typeof QualityFlagsSchema>;

export const OutlierReportSchema = z.record(
  z.object({
    count: z.number().int().min(0),
    percent: z.number().min(0).max(100),
    lowerBound: z.number(),
    upperBound: z.number(),
    minOutlier: z.number(),
    maxOutlier: z.number(),
  })
);
export type OutlierReport = z.infer<typeof OutlierReportSchema>;

export const CleaningSummarySchema = z.object({
  strategy: CleaningStrategy,
  changes: z.array(z.string()),
  rowsBefore: z.number().int().min(0),
  rowsAfter: z.number().int().min(0),
  remainingMissing: z.number().int().min(0),
});
export type CleaningSummary = z.infer<typeof CleaningSummarySchema>;

export const ChartKind = z.enum([
  "distribution",
  "categorical",
  "impact",
  "missing_values",
  "feature_importance",
  "local_explanation",
]);
export type ChartKind = z.infer<typeof ChartKind>;

export const ChartRefSchema = z.object({
  kind: ChartKind,
  /** Path relative to the output directory, e.g. charts/dist_age.svg */
  path: z.string().min(1),
  column: z.string().optional(),
  title: z.string().min(1),
});
export type ChartRef = z.infer<typeof ChartRefSchema>;

export const ChartIndexSchema = z.array(ChartRefSchema);

export const DescriptiveStatsSchema = z.object({
  count: z.number().int().min(0),
  mean: z.number().nullable(),
  median: z.number().nullable(),
  std: z.number().nullable(),
  min: z.number().nullable(),
  max: z.number().nullable(),
  q1: z.number().nullable(),
  q3: z.number().nullable(),
  skewness: z.number().nullable(),
  kurtosis: z.number().nullable(),
});
export type DescriptiveStats = z.infer<typeof DescriptiveStatsSchema>;

export const CorrelationSchema = z.object({
  left: z.string(),
  right: z.string(),
  r: z.number().min(-1).max(1),
  strong: z.boolean(),
});
export type Correlation = z.infer<typeof CorrelationSchema>;

export const NormalitySchema = z.object({
  test: z.literal("jarque-bera"),
  statistic: z.number().min(0),
  pValue: z.number().min(0).max(1),
  normal: z.boolean(),
});
export type Normality = z.infer<typeof NormalitySchema>;

export const AnalysisErrorSchema = z.object({
  step: z.string(),
  message: z.string(),
});
export type AnalysisError = z.infer<typeof AnalysisErrorSchema>;

export const StatisticsReportSchema = z.object({
  descriptive: z.record(DescriptiveStatsSchema),
  correlations: z.array(CorrelationSchema),
  categorical: z.record(
    z.object({
      uniqueCount: z.number().int().min(0),
      topValues: z.record(z.number().int()),
    })
  ),
  patterns: z.object({
    duplicateRows: z.number().int().min(0),
    constantColumns: z.array(z.string()),
  }),
  normality: z.record(NormalitySchema),
  /** Sub-steps that failed; the remaining results are still valid */
  errors: z.array(AnalysisErrorSchema),
});
export type StatisticsReport = z.infer<typeof StatisticsReportSchema>;

export const ModelSuggestionSchema = z.object({
  name: z.string().min(1),
  rationale: z.string().min(1),
});

export const ModelRecommendationSchema = z.object({
  targetColumn: z.string().nullable(),
  problemType: ProblemType.nullable(),
  reason: z.string(),
  models: z.array(ModelSuggestionSchema),
  dataCharacteristics: z.object({
    samples: z.number().int().min(0),
    features: z.number().int().min(0),
    numericFeatures: z.number().int().min(0),
    categoricalFeatures: z.number().int().min(0),
    missingValues: z.number().int().min(0),
  }),
});
export type ModelRecommendation = z.infer<typeof ModelRecommendationSchema>;

export const TrainingSummarySchema = z.object({
  status: z.enum(["trained", "skipped"]),
  reason: z.string().optional(),
  modelType: z.string().optional(),
  problemType: ProblemType.optional(),
  targetColumn: z.string().optional(),
  features: z.array(z.string()).optional(),
  headlineMetric: z
    .object({ name: z.enum(["accuracy", "r2"]), value: z.number() })
    .optional(),
  topFeatures: z.array(z.object({ feature: z.string(), importance: z.number() })).optional(),
});
export type TrainingSummary = z.infer<typeof TrainingSummarySchema>;

export const LocalExplanationSchema = z.object({
  rowIndex: z.number().int().min(0),
  prediction: z.union([z.string(), z.number()]),
  contributions: z.record(z.number()),
});
export type LocalExplanation = z.infer<typeof LocalExplanationSchema>;

export const XaiSummarySchema = z.object({
  status: z.enum(["completed", "skipped"]),
  reason: z.string().optional(),
  globalImportance: z.record(z.number()),
  localExplanation: LocalExplanationSchema.optional(),
  charts: z.array(z.string()),
});
export type XaiSummary = z.infer<typeof XaiSummarySchema>;

/**
 * Schema per metadata key. Adding a key here makes it writable.
 */
export const METADATA_SCHEMAS = {
  profiling_summary: ProfilingSummarySchema,
  quality_flags: QualityFlagsSchema,
  outlier_report: OutlierReportSchema,
  cleaning_summary: CleaningSummarySchema,
  chart_index: ChartIndexSchema,
  statistics: StatisticsReportSchema,
  model_recommendation: ModelRecommendationSchema,
  training_summary: TrainingSummarySchema,
  xai_summary: XaiSummarySchema,
} as const;

export type MetadataKey = keyof typeof METADATA_SCHEMAS;

export type MetadataBag = {
  [K in MetadataKey]: z.infer<(typeof METADATA_SCHEMAS)[K]>;
};

export const METADATA_KEYS = Object.keys(METADATA_SCHEMAS).filter(
  (key): key is MetadataKey => key in METADATA_SCHEMAS
);

export function isMetadataKey(key: string): key is MetadataKey {
  return key in METADATA_SCHEMAS;
}
