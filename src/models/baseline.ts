/**
 * Baseline predictive models used by the training stage.
 *
 * Classification uses a nearest-centroid classifier and regression uses
 * ridge-stabilised least squares, both over standardised features. Models
 * are plain JSON-serialisable values so the registry can export them as is.
 */

import { MISSING, type Column, type Dataset } from "../types/dataset.js";
import { getColumn, rowCount } from "../dataset/frame.js";
import { compareStrings, mean, std } from "../dataset/stats.js";

export interface FeatureScaling {
  readonly mean: number;
  readonly std: number;
}

export interface NearestCentroidModel {
  readonly kind: "nearest-centroid";
  readonly classes: readonly string[];
  /** One standardised centroid per class, in `classes` order */
  readonly centroids: readonly (readonly number[])[];
  readonly scaling: readonly FeatureScaling[];
}

export interface LeastSquaresModel {
  readonly kind: "least-squares";
  readonly intercept: number;
  readonly coefficients: readonly number[];
  readonly scaling: readonly FeatureScaling[];
}

export type BaselineModel = NearestCentroidModel | LeastSquaresModel;

/** Class labels per categorical column; a value's code is its index. */
export type Encoders = Record<string, readonly string[]>;

const RIDGE = 1e-6;
const MS_PER_DAY = 86_400_000;

/**
 * Build label encoders for every categorical column among `columns`.
 */
export function fitEncoders(dataset: Dataset, columns: readonly string[]): Encoders {
  const encoders: Encoders = {};
  for (const name of columns) {
    const column = getColumn(dataset, name);
    if (column.type === "categorical") {
      const classes = new Set<string>();
      for (const value of column.values) {
        if (value !== MISSING) {
          classes.add(value);
        }
      }
      encoders[name] = [...classes].sort(compareStrings);
    }
  }
  return encoders;
}

function encodeCell(column: Column, index: number, encoders: Encoders): number {
  switch (column.type) {
    case "numeric":
      return column.values[index] ?? Number.NaN;
    case "boolean": {
      const value = column.values[index];
      return value === undefined || value === MISSING ? Number.NaN : Number(value);
    }
    case "datetime": {
      const value = column.values[index];
      return value === undefined || value === MISSING
        ? Number.NaN
        : value.getTime() / MS_PER_DAY;
    }
    case "categorical": {
      const value = column.values[index];
      if (value === undefined || value === MISSING) {
        return Number.NaN;
      }
      const code = (encoders[column.name] ?? []).indexOf(value);
      return code === -1 ? Number.NaN : code;
    }
  }
}

/**
 * Encode feature columns as a row-major numeric matrix. Missing or unknown
 * cells are NaN and standardise to 0.
 */
export function encodeFeatures(
  dataset: Dataset,
  features: readonly string[],
  encoders: Encoders
): number[][] {
  const columns = features.map((name) => getColumn(dataset, name));
  const rows: number[][] = [];
  for (let i = 0; i < rowCount(dataset); i++) {
    rows.push(columns.map((column) => encodeCell(column, i, encoders)));
  }
  return rows;
}

export function fitScaling(matrix: readonly (readonly number[])[], width: number): FeatureScaling[] {
  const scaling: FeatureScaling[] = [];
  for (let j = 0; j < width; j++) {
    const present = matrix
      .map((row) => row[j] ?? Number.NaN)
      .filter((value) => !Number.isNaN(value));
    const deviation = std(present);
    scaling.push({
      mean: mean(present) ?? 0,
      std: deviation === undefined || deviation === 0 ? 1 : deviation,
    });
  }
  return scaling;
}

export function standardize(row: readonly number[], scaling: readonly FeatureScaling[]): number[] {
  return scaling.map((scale, j) => {
    const value = row[j] ?? Number.NaN;
    return Number.isNaN(value) ? 0 : (value - scale.mean) / scale.std;
  });
}

function squaredDistance(a: readonly number[], b: readonly number[]): number {
  return a.reduce((sum, value, j) => sum + (value - (b[j] ?? 0)) ** 2, 0);
}

export function trainNearestCentroid(
  matrix: readonly (readonly number[])[],
  labels: readonly string[],
  width: number
): NearestCentroidModel {
  const scaling = fitScaling(matrix, width);
  const classes = [...new Set(labels)].sort(compareStrings);
  const centroids = classes.map((label) => {
    const members = matrix
      .filter((_, i) => labels[i] === label)
      .map((row) => standardize(row, scaling));
    return scaling.map((_, j) => mean(members.map((row) => row[j] ?? 0)) ?? 0);
  });
  return { kind: "nearest-centroid", classes, centroids, scaling };
}

/**
 * Solve A·x = b by Gaussian elimination with partial pivoting.
 */
function solve(a: number[][], b: number[]): number[] {
  const n = b.length;
  const m = a.map((row, i) => [...row, b[i] ?? 0]);

  for (let col = 0; col < n; col++) {
    let pivot = col;
    for (let r = col + 1; r < n; r++) {
      if (Math.abs(m[r]?.[col] ?? 0) > Math.abs(m[pivot]?.[col] ?? 0)) {
        pivot = r;
      }
    }
    const pivotRow = m[pivot];
    const currentRow = m[col];
    if (!pivotRow || !currentRow) {
      break;
    }
    m[col] = pivotRow;
    m[pivot] = currentRow;

    const lead = pivotRow[col] ?? 0;
    if (lead === 0) {
      continue;
    }
    for (let r = 0; r < n; r++) {
      const row = m[r];
      if (r === col || !row) {
        continue;
      }
      const factor = (row[col] ?? 0) / lead;
      for (let c = col; c <= n; c++) {
        row[c] = (row[c] ?? 0) - factor * (pivotRow[c] ?? 0);
      }
    }
  }

  return m.map((row, i) => {
    const lead = row[i] ?? 0;
    return lead === 0 ? 0 : (row[n] ?? 0) / lead;
  });
}

export function trainLeastSquares(
  matrix: readonly (readonly number[])[],
  targets: readonly number[],
  width: number
): LeastSquaresModel {
  const scaling = fitScaling(matrix, width);
  const z = matrix.map((row) => standardize(row, scaling));
  const intercept = mean(targets) ?? 0;

  const gram = scaling.map((_, a) =>
    scaling.map((__, b) => z.reduce((sum, row) => sum + (row[a] ?? 0) * (row[b] ?? 0), 0) + (a === b ? RIDGE : 0))
  );
  const moment = scaling.map((_, a) =>
    z.reduce((sum, row, i) => sum + (row[a] ?? 0) * ((targets[i] ?? intercept) - intercept), 0)
  );

  return {
    kind: "least-squares",
    intercept,
    coefficients: solve(gram, moment),
    scaling,
  };
}

export function predict(model: BaselineModel, row: readonly number[]): string | number {
  const z = standardize(row, model.scaling);
  if (model.kind === "least-squares") {
    return model.coefficients.reduce((sum, coefficient, j) => sum + coefficient * (z[j] ?? 0), model.intercept);
  }

  let best = 0;
  let bestDistance = Number.POSITIVE_INFINITY;
  model.centroids.forEach((centroid, k) => {
    const distance = squaredDistance(z, centroid);
    if (distance < bestDistance) {
      best = k;
      bestDistance = distance;
    }
  });
  return model.classes[best] ?? "";
}

/**
 * Global importance per feature, normalised to sum to 1.
 *
 * Least squares: absolute standardised coefficient. Nearest centroid:
 * spread of the class centroids along the feature.
 */
export function featureImportance(model: BaselineModel): number[] {
  const raw =
    model.kind === "least-squares"
      ? model.coefficients.map(Math.abs)
      : model.scaling.map((_, j) => std(model.centroids.map((centroid) => centroid[j] ?? 0)) ?? 0);
  const total = raw.reduce((sum, value) => sum + value, 0);
  return raw.map((value) => (total === 0 ? 0 : value / total));
}

/**
 * Per-feature contribution to one row's prediction.
 *
 * Least squares: coefficient × standardised value. Nearest centroid: how much
 * closer the feature puts the row to the predicted class than to the average
 * of the other classes.
 */
export function localContributions(model: BaselineModel, row: readonly number[]): number[] {
  const z = standardize(row, model.scaling);
  if (model.kind === "least-squares") {
    return model.coefficients.map((coefficient, j) => coefficient * (z[j] ?? 0));
  }

  const predicted = predict(model, row);
  const k = model.classes.indexOf(String(predicted));
  const own = model.centroids[k] ?? [];
  const others = model.centroids.filter((_, index) => index !== k);

  return z.map((value, j) => {
    const ownGap = (value - (own[j] ?? 0)) ** 2;
    const otherGap = mean(others.map((centroid) => (value - (centroid[j] ?? 0)) ** 2)) ?? ownGap;
    return otherGap - ownGap;
  });
}

/**
 * Deterministic shuffle for train/test splitting (mulberry32).
 */
export function seededShuffle<T>(items: readonly T[], seed: number): T[] {
  let state = seed >>> 0;
  const random = (): number => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };

  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    const a = result[i];
    const b = result[j];
    if (a !== undefined && b !== undefined) {
      result[i] = b;
      result[j] = a;
    }
  }
  return result;
}
