/**
 * Descriptive statistics over plain number arrays and typed columns.
 *
 * Functions return undefined rather than NaN when a statistic is not
 * defined for the input (empty input, zero variance, too few values).
 */

import { MISSING, type Column } from "../types/dataset.js";
import { countMissing, formatCell, presentNumbers } from "./frame.js";

export function mean(values: readonly number[]): number | undefined {
  if (values.length === 0) {
    return undefined;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Smallest and largest value in one pass; safe for columns of any length.
 */
export function extent(values: readonly number[]): { min: number; max: number } | undefined {
  const first = values[0];
  if (first === undefined) {
    return undefined;
  }
  let min = first;
  let max = first;
  for (const value of values) {
    if (value < min) {
      min = value;
    }
    if (value > max) {
      max = value;
    }
  }
  return { min, max };
}

/**
 * Linear-interpolated quantile, q in [0, 1].
 */
export function quantile(values: readonly number[], q: number): number | undefined {
  if (values.length === 0) {
    return undefined;
  }
  const sorted = [...values].sort((a, b) => a - b);
  const position = (sorted.length - 1) * q;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  const lowerValue = sorted[lower];
  const upperValue = sorted[upper];
  if (lowerValue === undefined || upperValue === undefined) {
    return undefined;
  }
  return lowerValue + (upperValue - lowerValue) * (position - lower);
}

export function median(values: readonly number[]): number | undefined {
  return quantile(values, 0.5);
}

/**
 * Sample standard deviation (n - 1 denominator).
 */
export function std(values: readonly number[]): number | undefined {
  const avg = mean(values);
  if (avg === undefined || values.length < 2) {
    return undefined;
  }
  const squared = values.reduce((sum, value) => sum + (value - avg) ** 2, 0);
  return Math.sqrt(squared / (values.length - 1));
}

function centralMoment(values: readonly number[], order: number): number | undefined {
  const avg = mean(values);
  if (avg === undefined) {
    return undefined;
  }
  return values.reduce((sum, value) => sum + (value - avg) ** order, 0) / values.length;
}

/**
 * Population skewness (g1).
 */
export function skewness(values: readonly number[]): number | undefined {
  const m2 = centralMoment(values, 2);
  const m3 = centralMoment(values, 3);
  if (m2 === undefined || m3 === undefined || m2 === 0) {
    return undefined;
  }
  return m3 / m2 ** 1.5;
}

/**
 * Excess kurtosis (g2).
 */
export function kurtosis(values: readonly number[]): number | undefined {
  const m2 = centralMoment(values, 2);
  const m4 = centralMoment(values, 4);
  if (m2 === undefined || m4 === undefined || m2 === 0) {
    return undefined;
  }
  return m4 / m2 ** 2 - 3;
}

/**
 * Pearson correlation over paired values.
 */
export function pearson(xs: readonly number[], ys: readonly number[]): number | undefined {
  const n = Math.min(xs.length, ys.length);
  if (n < 2) {
    return undefined;
  }
  const x = xs.slice(0, n);
  const y = ys.slice(0, n);
  const mx = mean(x);
  const my = mean(y);
  if (mx === undefined || my === undefined) {
    return undefined;
  }

  let covariance = 0;
  let varianceX = 0;
  let varianceY = 0;
  for (let i = 0; i < n; i++) {
    const dx = (x[i] ?? mx) - mx;
    const dy = (y[i] ?? my) - my;
    covariance += dx * dy;
    varianceX += dx * dx;
    varianceY += dy * dy;
  }

  if (varianceX === 0 || varianceY === 0) {
    return undefined;
  }
  return covariance / Math.sqrt(varianceX * varianceY);
}

/**
 * Most frequent value. Ties go to the smallest value under `compare`.
 */
export function mode<V>(
  values: readonly V[],
  compare: (a: V, b: V) => number
): V | undefined {
  const counts = new Map<V, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }

  let best: V | undefined;
  let bestCount = 0;
  for (const [value, count] of counts) {
    if (
      best === undefined ||
      count > bestCount ||
      (count === bestCount && compare(value, best) < 0)
    ) {
      best = value;
      bestCount = count;
    }
  }
  return best;
}

export const compareNumbers = (a: number, b: number): number => a - b;

export const compareStrings = (a: string, b: string): number =>
  a < b ? -1 : a > b ? 1 : 0;

export const compareBooleans = (a: boolean, b: boolean): number =>
  Number(a) - Number(b);

/**
 * Mode of a column's present values, rendered as text.
 */
export function columnMode(column: Column): string | undefined {
  switch (column.type) {
    case "numeric": {
      const value = mode(presentNumbers(column), compareNumbers);
      return value === undefined ? undefined : String(value);
    }
    case "categorical": {
      const present = column.values.filter((value): value is string => value !== MISSING);
      return mode(present, compareStrings);
    }
    case "datetime": {
      const times = column.values
        .filter((value): value is Date => value !== MISSING)
        .map((value) => value.getTime());
      const value = mode(times, compareNumbers);
      return value === undefined ? undefined : formatCell(new Date(value));
    }
    case "boolean": {
      const present = column.values.filter((value): value is boolean => value !== MISSING);
      const value = mode(present, compareBooleans);
      return value === undefined ? undefined : String(value);
    }
  }
}

/**
 * Before/after statistics recorded with every change log entry.
 */
export interface ColumnSummary {
  missing: number;
  mean?: number | null;
  median?: number | null;
  std?: number | null;
  mode?: string | null;
  rowsRemaining?: number;
}

export function summarizeColumn(column: Column): ColumnSummary {
  if (column.type === "numeric") {
    const present = presentNumbers(column);
    return {
      missing: countMissing(column),
      mean: mean(present) ?? null,
      median: median(present) ?? null,
      std: std(present) ?? null,
    };
  }
  return {
    missing: countMissing(column),
    mode: columnMode(column) ?? null,
  };
}

/**
 * Round for display and persisted summaries.
 */
export function round(value: number, digits = 4): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}
