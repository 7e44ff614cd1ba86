/**
 * Model training stage.
 *
 * Fits the baseline model for the recommended problem type on a seeded
 * train/test split and registers it in the Model Registry.
 */

import { MISSING, type Column, type Dataset } from "../types/dataset.js";
import { ValidationError } from "../dataset/errors.js";
import { cells, formatCell, getColumn } from "../dataset/frame.js";
import type { QualityFlags, TrainingSummary } from "../dataset/metadata.js";
import { mean, round } from "../dataset/stats.js";
import {
  type BaselineModel,
  encodeFeatures,
  featureImportance,
  fitEncoders,
  predict,
  seededShuffle,
  trainLeastSquares,
  trainNearestCentroid,
} from "../models/baseline.js";
import type { ConfusionMatrix, ModelMetrics } from "../models/registry.js";
import type { StageHandler, TrainingOutput } from "./types.js";

const MIN_TRAINING_ROWS = 4;
const EXCLUDED_FLAGS = ["ID_CANDIDATE", "CONSTANT_COLUMN"];

export function selectFeatures(dataset: Dataset, target: string, flags: QualityFlags): string[] {
  return dataset.columns
    .filter((column) => column.name !== target)
    .filter((column) => !(flags[column.name] ?? []).some((flag) => EXCLUDED_FLAGS.includes(flag)))
    .map((column) => column.name);
}

/**
 * Train/test row indices over the rows whose target is present.
 */
export function splitRows(
  target: Column,
  testFraction: number,
  seed: number
): { train: number[]; test: number[] } {
  const usable = cells(target)
    .map((value, index) => (value === MISSING ? -1 : index))
    .filter((index) => index >= 0);
  const shuffled = seededShuffle(usable, seed);
  const testCount = Math.max(1, Math.floor(usable.length * testFraction));
  return { test: shuffled.slice(0, testCount), train: shuffled.slice(testCount) };
}

export function classificationMetrics(
  actual: readonly string[],
  predicted: readonly string[]
): Pick<ModelMetrics, "accuracy" | "precision" | "recall" | "f1" | "confusion"> {
  const labels = [...new Set([...actual, ...predicted])].sort();
  const matrix = labels.map(() => labels.map(() => 0));
  actual.forEach((label, i) => {
    const row = matrix[labels.indexOf(label)];
    const column = labels.indexOf(predicted[i] ?? "");
    if (row && column >= 0) {
      row[column] = (row[column] ?? 0) + 1;
    }
  });

  const correct = actual.filter((label, i) => label === predicted[i]).length;
  const perClass = labels.map((_, k) => {
    const tp = matrix[k]?.[k] ?? 0;
    const predictedK = matrix.reduce((sum, row) => sum + (row[k] ?? 0), 0);
    const actualK = (matrix[k] ?? []).reduce((sum, value) => sum + value, 0);
    const precision = predictedK === 0 ? 0 : tp / predictedK;
    const recall = actualK === 0 ? 0 : tp / actualK;
    const f1 = precision + recall === 0 ? 0 : (2 * precision * recall) / (precision + recall);
    return { precision, recall, f1 };
  });

  const confusion: ConfusionMatrix = { labels, matrix };
  return {
    accuracy: actual.length === 0 ? 0 : round(correct / actual.length),
    precision: round(mean(perClass.map((c) => c.precision)) ?? 0),
    recall: round(mean(perClass.map((c) => c.recall)) ?? 0),
    f1: round(mean(perClass.map((c) => c.f1)) ?? 0),
    confusion,
  };
}

export function regressionMetrics(
  actual: readonly number[],
  predicted: readonly number[]
): Pick<ModelMetrics, "r2" | "mae"> {
  const avg = mean(actual) ?? 0;
  const ssTot = actual.reduce((sum, value) => sum + (value - avg) ** 2, 0);
  const ssRes = actual.reduce((sum, value, i) => sum + (value - (predicted[i] ?? avg)) ** 2, 0);
  const mae = mean(actual.map((value, i) => Math.abs(value - (predicted[i] ?? avg)))) ?? 0;
  return {
    r2: ssTot === 0 ? 0 : round(1 - ssRes / ssTot),
    mae: round(mae),
  };
}

function skip(reason: string): TrainingOutput {
  return { summary: `Training skipped: ${reason}`, skipped: true, training: { status: "skipped", reason } };
}

export const trainingStage: StageHandler<"training"> = {
  async run({ store, models, config, upstream, logger }) {
    const { recommendation } = upstream.get("recommendation");
    const dataset = store.current();

    const configured = config.training.targetColumn;
    if (configured !== undefined) {
      getColumn(dataset, configured);
    }

    const finish = (result: TrainingOutput): TrainingOutput => {
      store.setMetadata("training_summary", result.training);
      return result;
    };

    const { targetColumn, problemType } = recommendation;
    if (targetColumn === null || problemType === null) {
      return finish(skip("no target column"));
    }

    const target = getColumn(dataset, targetColumn);
    const features = selectFeatures(dataset, targetColumn, store.getMetadata("quality_flags") ?? {});
    if (features.length === 0) {
      return finish(skip("no usable feature columns"));
    }
    if (problemType === "regression" && target.type !== "numeric") {
      throw new ValidationError(`Regression target "${targetColumn}" must be numeric, got ${target.type}`);
    }

    const { train, test } = splitRows(target, config.training.testFraction, config.training.seed);
    if (train.length < MIN_TRAINING_ROWS) {
      return finish(skip(`only ${train.length} training rows`));
    }

    const encoders = fitEncoders(dataset, features);
    const matrix = encodeFeatures(dataset, features, encoders);
    const rowsOf = (indices: readonly number[]): number[][] => indices.map((i) => matrix[i] ?? []);
    const targetCells = cells(target);

    let metrics: ModelMetrics;
    let artifact: BaselineModel;
    if (problemType === "classification") {
      const labelOf = (i: number): string => formatCell(targetCells[i] ?? MISSING);
      const trainLabels = train.map(labelOf);
      if (new Set(trainLabels).size < 2) {
        return finish(skip("target has a single class in the training rows"));
      }
      const model = trainNearestCentroid(rowsOf(train), trainLabels, features.length);
      artifact = model;
      const predictions = rowsOf(test).map((row) => String(predict(model, row)));
      metrics = {
        ...classificationMetrics(test.map(labelOf), predictions),
        featureImportances: {},
        trainRows: train.length,
        testRows: test.length,
      };
    } else {
      const valueOf = (i: number): number => {
        const value = targetCells[i];
        return typeof value === "number" ? value : 0;
      };
      const model = trainLeastSquares(rowsOf(train), train.map(valueOf), features.length);
      artifact = model;
      const predictions = rowsOf(test).map((row) => Number(predict(model, row)));
      metrics = {
        ...regressionMetrics(test.map(valueOf), predictions),
        featureImportances: {},
        trainRows: train.length,
        testRows: test.length,
      };
    }

    const importance = featureImportance(artifact);
    const featureImportances = Object.fromEntries(
      features.map((name, j) => [name, round(importance[j] ?? 0)])
    );
    const record = models.setModel({
      artifact,
      problemType,
      targetColumn,
      featureColumns: features,
      encoders,
      metrics: { ...metrics, featureImportances },
    });

    const headline =
      problemType === "classification"
        ? { name: "accuracy" as const, value: record.metrics.accuracy ?? 0 }
        : { name: "r2" as const, value: record.metrics.r2 ?? 0 };
    const topFeatures = Object.entries(featureImportances)
      .sort(([, a], [, b]) => b - a)
      .slice(0, 5)
      .map(([feature, value]) => ({ feature, importance: value }));

    logger.info("Model trained", { model: artifact.kind, target: targetColumn, [headline.name]: headline.value });

    return finish({
      summary: `Trained ${artifact.kind} (${problemType}) on "${targetColumn}", ${headline.name}=${headline.value}`,
      skipped: false,
      training: {
        status: "trained",
        modelType: artifact.kind,
        problemType,
        targetColumn,
        features,
        headlineMetric: headline,
        topFeatures,
      },
    });
  },
};
