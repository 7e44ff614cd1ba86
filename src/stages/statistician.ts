/**
 * Statistics stage.
 *
 * Each analysis runs as an isolated sub-step: a failing sub-step is recorded
 * in the report's `errors` and the remaining sub-steps still run.
 */

import { MISSING, type Dataset, type NumericColumn } from "../types/dataset.js";
import { cells, formatCell, presentNumbers, rowCount } from "../dataset/frame.js";
import type {
  AnalysisError,
  Correlation,
  DescriptiveStats,
  Normality,
  StatisticsReport,
} from "../dataset/metadata.js";
import { extent, kurtosis, mean, median, pearson, quantile, round, skewness, std } from "../dataset/stats.js";
import { topValues, uniqueCount } from "./profiler.js";
import type { StageHandler } from "./types.js";

/** |r| at or above this is reported as a strong correlation */
export const STRONG_CORRELATION = 0.5;
const NORMALITY_ALPHA = 0.05;
const MIN_NORMALITY_SAMPLES = 3;

function nullable(value: number | undefined): number | null {
  return value === undefined ? null : round(value);
}

/**
 * Run one analysis sub-step. A thrown error is appended to `errors` and the
 * fallback value is returned instead.
 */
export function runAnalysisStep<T>(
  step: string,
  errors: AnalysisError[],
  analysis: () => T,
  fallback: T
): T {
  try {
    return analysis();
  } catch (err) {
    errors.push({ step, message: err instanceof Error ? err.message : String(err) });
    return fallback;
  }
}

function numericColumns(dataset: Dataset): NumericColumn[] {
  return dataset.columns.filter((column): column is NumericColumn => column.type === "numeric");
}

export function describeNumeric(dataset: Dataset): Record<string, DescriptiveStats> {
  const result: Record<string, DescriptiveStats> = {};
  for (const column of numericColumns(dataset)) {
    const values = presentNumbers(column);
    const range = extent(values);
    result[column.name] = {
      count: values.length,
      mean: nullable(mean(values)),
      median: nullable(median(values)),
      std: nullable(std(values)),
      min: range?.min ?? null,
      max: range?.max ?? null,
      q1: nullable(quantile(values, 0.25)),
      q3: nullable(quantile(values, 0.75)),
      skewness: nullable(skewness(values)),
      kurtosis: nullable(kurtosis(values)),
    };
  }
  return result;
}

/**
 * Pairwise Pearson correlations over rows where both values are present.
 */
export function correlations(dataset: Dataset): Correlation[] {
  const columns = numericColumns(dataset);
  const result: Correlation[] = [];

  for (let a = 0; a < columns.length; a++) {
    for (let b = a + 1; b < columns.length; b++) {
      const left = columns[a];
      const right = columns[b];
      if (!left || !right) {
        continue;
      }
      const xs: number[] = [];
      const ys: number[] = [];
      left.values.forEach((x, i) => {
        const y = right.values[i];
        if (x !== MISSING && y !== undefined && y !== MISSING) {
          xs.push(x);
          ys.push(y);
        }
      });
      const r = pearson(xs, ys);
      if (r === undefined) {
        continue;
      }
      const clamped = Math.max(-1, Math.min(1, round(r)));
      result.push({
        left: left.name,
        right: right.name,
        r: clamped,
        strong: Math.abs(clamped) >= STRONG_CORRELATION,
      });
    }
  }
  return result;
}

export function countDuplicateRows(dataset: Dataset): number {
  const seen = new Set<string>();
  let duplicates = 0;
  for (let i = 0; i < rowCount(dataset); i++) {
    const key = JSON.stringify(
      dataset.columns.map((column) => {
        const value = cells(column)[i];
        return value === undefined || value === MISSING ? null : formatCell(value);
      })
    );
    if (seen.has(key)) {
      duplicates += 1;
    } else {
      seen.add(key);
    }
  }
  return duplicates;
}

/**
 * Jarque–Bera test. The statistic is χ² with two degrees of freedom under
 * normality, whose survival function is exp(-x/2).
 */
export function jarqueBera(values: readonly number[]): Normality | undefined {
  const s = skewness(values);
  const k = kurtosis(values);
  if (values.length < MIN_NORMALITY_SAMPLES || s === undefined || k === undefined) {
    return undefined;
  }
  const statistic = (values.length / 6) * (s ** 2 + k ** 2 / 4);
  const pValue = Math.exp(-statistic / 2);
  return {
    test: "jarque-bera",
    statistic: round(statistic),
    pValue: round(pValue),
    normal: pValue > NORMALITY_ALPHA,
  };
}

export const statisticsStage: StageHandler<"statistics"> = {
  async run({ store, logger }) {
    const dataset = store.current();
    const errors: AnalysisError[] = [];

    const descriptive = runAnalysisStep("descriptive", errors, () => describeNumeric(dataset), {});
    const correlated = runAnalysisStep("correlation", errors, () => correlations(dataset), []);
    const categorical = runAnalysisStep(
      "categorical",
      errors,
      () =>
        Object.fromEntries(
          dataset.columns
            .filter((column) => column.type === "categorical")
            .map((column) => [column.name, { uniqueCount: uniqueCount(column), topValues: topValues(column) }])
        ),
      {}
    );
    const patterns = runAnalysisStep(
      "patterns",
      errors,
      () => ({
        duplicateRows: countDuplicateRows(dataset),
        constantColumns: dataset.columns
          .filter((column) => uniqueCount(column) <= 1)
          .map((column) => column.name),
      }),
      { duplicateRows: 0, constantColumns: [] }
    );

    const normality: Record<string, Normality> = {};
    for (const column of numericColumns(dataset)) {
      const result = runAnalysisStep(
        `normality:${column.name}`,
        errors,
        () => jarqueBera(presentNumbers(column)),
        undefined
      );
      if (result) {
        normality[column.name] = result;
      }
    }

    const report: StatisticsReport = {
      descriptive,
      correlations: correlated,
      categorical,
      patterns,
      normality,
      errors,
    };
    store.setMetadata("statistics", report);

    if (errors.length > 0) {
      logger.warn("Some statistical analyses failed", { errors });
    }

    const strong = correlated.filter((c) => c.strong).length;
    return {
      summary: `Analysed ${Object.keys(descriptive).length} numeric columns, ${strong} strong correlations${errors.length > 0 ? `, ${errors.length} analyses failed` : ""}`,
      skipped: false,
      report,
    };
  },
};
