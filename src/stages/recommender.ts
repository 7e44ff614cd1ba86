/**
 * Model recommendation stage.
 *
 * Chooses the target column (the configured one, else a likely label column)
 * and the problem type, and ranks candidate model families. The first
 * suggestion is the one the training stage fits.
 */

import type { ProblemType } from "../config/pipeline/enums.js";
import type { Column, Dataset } from "../types/dataset.js";
import { findColumn, rowCount, totalMissing } from "../dataset/frame.js";
import type { ModelRecommendation, QualityFlags, StatisticsReport } from "../dataset/metadata.js";
import { uniqueCount } from "./profiler.js";
import type { StageHandler } from "./types.js";

/** Numeric targets with more distinct values than this are regressed */
export const REGRESSION_UNIQUE_THRESHOLD = 10;
const MAX_CLASSES = 10;
const LABEL_NAMES = /^(target|label|class|outcome|y)$/i;

export function inferProblemType(column: Column): ProblemType {
  return column.type === "numeric" && uniqueCount(column) > REGRESSION_UNIQUE_THRESHOLD
    ? "regression"
    : "classification";
}

/**
 * Likely label column: a conventionally named column, else the last
 * low-cardinality categorical or boolean column that is neither constant nor
 * an identifier.
 */
export function findTargetCandidate(dataset: Dataset, flags: QualityFlags): Column | undefined {
  const named = dataset.columns.find((column) => LABEL_NAMES.test(column.name));
  if (named) {
    return named;
  }
  const eligible = dataset.columns.filter((column) => {
    const columnFlags = flags[column.name] ?? [];
    const distinct = uniqueCount(column);
    return (
      (column.type === "categorical" || column.type === "boolean") &&
      distinct >= 2 &&
      distinct <= MAX_CLASSES &&
      !columnFlags.includes("ID_CANDIDATE")
    );
  });
  return eligible[eligible.length - 1];
}

function suggestions(problemType: ProblemType | null, statistics: StatisticsReport): ModelRecommendation["models"] {
  const strong = statistics.correlations.filter((c) => c.strong).length;
  switch (problemType) {
    case "classification":
      return [
        { name: "Nearest Centroid Classifier", rationale: "Transparent baseline; per-class centroids explain each prediction" },
        { name: "Logistic Regression", rationale: "Linear decision boundary with interpretable coefficients" },
        { name: "Random Forest Classifier", rationale: "Captures non-linear interactions between features" },
      ];
    case "regression":
      return [
        {
          name: "Least Squares Regression",
          rationale:
            strong > 0
              ? `${strong} strong linear correlations found among numeric features`
              : "Transparent baseline with one coefficient per feature",
        },
        { name: "Random Forest Regressor", rationale: "Captures non-linear effects without scaling" },
        { name: "Gradient Boosting Regressor", rationale: "Usually the most accurate tabular regressor" },
      ];
    case null:
      return [{ name: "K-Means Clustering", rationale: "No target column; groups similar rows for exploration" }];
  }
}

export const recommendationStage: StageHandler<"recommendation"> = {
  async run({ store, config, upstream }) {
    const dataset = store.current();
    const flags = upstream.get("profiling").qualityFlags;
    const statistics = upstream.get("statistics").report;
    const configured = config.training.targetColumn;

    const target = configured === undefined ? findTargetCandidate(dataset, flags) : findColumn(dataset, configured);
    const targetColumn = configured ?? target?.name ?? null;
    const problemType = target ? inferProblemType(target) : null;

    let reason: string;
    if (configured !== undefined) {
      reason = target
        ? `Target column "${configured}" was configured`
        : `Configured target column "${configured}" is not in the dataset`;
    } else {
      reason = target
        ? `"${target.name}" looks like a label column (${target.type}, ${uniqueCount(target)} distinct values)`
        : "No suitable target column found; unsupervised exploration only";
    }

    const features = dataset.columns.filter((column) => column.name !== targetColumn);
    const recommendation: ModelRecommendation = {
      targetColumn,
      problemType,
      reason,
      models: suggestions(problemType, statistics),
      dataCharacteristics: {
        samples: rowCount(dataset),
        features: features.length,
        numericFeatures: features.filter((column) => column.type === "numeric").length,
        categoricalFeatures: features.filter((column) => column.type === "categorical").length,
        missingValues: totalMissing(dataset),
      },
    };
    store.setMetadata("model_recommendation", recommendation);

    return {
      summary: problemType
        ? `Recommended ${recommendation.models[0]?.name ?? "a model"} for ${problemType} on "${targetColumn}"`
        : "No target column; no supervised model recommended",
      skipped: problemType === null,
      recommendation,
    };
  },
};
