/**
 * Default pipeline configuration.
 *
 * Retry and activity-log settings are overridden from the environment by
 * resolvePipelineConfig(); everything else is meant to be overridden per run.
 */

import type { PipelineConfig } from "./schema.js";

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  stages: [
    { id: "profiling", name: "Data Profiling", actor: "Data Profiler", progressStart: 10, progressEnd: 20 },
    { id: "cleaning", name: "Data Cleaning", actor: "Data Cleaner", progressStart: 20, progressEnd: 35 },
    { id: "visualization", name: "Visualization", actor: "Visualizer", progressStart: 35, progressEnd: 50 },
    { id: "statistics", name: "Statistical Analysis", actor: "Statistician", progressStart: 50, progressEnd: 60 },
    { id: "recommendation", name: "Model Recommendation", actor: "Model Recommender", progressStart: 60, progressEnd: 68 },
    { id: "training", name: "Model Training", actor: "Model Trainer", progressStart: 68, progressEnd: 76 },
    { id: "explainability", name: "XAI Analysis", actor: "XAI Analyst", progressStart: 76, progressEnd: 85 },
    { id: "reporting", name: "Report Generation", actor: "Report Writer", progressStart: 85, progressEnd: 100 },
  ],

  // 30s, 60s between the three attempts of a failing stage
  retry: {
    maxAttempts: 3,
    backoffMs: 30_000,
  },

  activityLogLimit: 20,

  cleaning: {
    strategy: "auto",
  },

  visualization: {
    maxDistributionColumns: 10,
    maxCategories: 10,
  },

  training: {
    testFraction: 0.2,
    seed: 42,
  },

  explainability: {
    required: false,
    localRowIndex: 0,
  },

  report: {
    title: "Explainable EDA Report",
  },
};
