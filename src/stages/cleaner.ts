/**
 * Cleaning stage.
 *
 * Detects IQR outliers (reported, never altered) and removes missing values
 * according to the configured strategy. Every action is recorded as a Change
 * Log Entry with before/after statistics, and the per-column statistics
 * history gets its pre- and post-cleaning points.
 */

import type { CleaningStrategy } from "../config/pipeline/enums.js";
import type { Column, Dataset } from "../types/dataset.js";
import { MAX_SAMPLED_INDICES, describeChange, type ChangeLogEntry } from "../dataset/changelog.js";
import {
  dropRows,
  missingIndices,
  presentNumbers,
  replaceColumn,
  rowCount,
  totalMissing,
} from "../dataset/frame.js";
import { imputeColumn, type ImputationMethod } from "../dataset/impute.js";
import type { OutlierReport } from "../dataset/metadata.js";
import { extent, quantile, round, summarizeColumn } from "../dataset/stats.js";
import type { DatasetStore } from "../dataset/store.js";
import type { StageHandler } from "./types.js";

const IQR_FACTOR = 1.5;

export function detectOutliers(dataset: Dataset): OutlierReport {
  const report: OutlierReport = {};
  const rows = rowCount(dataset);

  for (const column of dataset.columns) {
    const values = presentNumbers(column);
    const q1 = quantile(values, 0.25);
    const q3 = quantile(values, 0.75);
    if (q1 === undefined || q3 === undefined) {
      continue;
    }
    const iqr = q3 - q1;
    const lowerBound = q1 - IQR_FACTOR * iqr;
    const upperBound = q3 + IQR_FACTOR * iqr;
    const outliers = values.filter((value) => value < lowerBound || value > upperBound);
    const range = extent(outliers);
    if (range === undefined) {
      continue;
    }
    report[column.name] = {
      count: outliers.length,
      percent: round((outliers.length / rows) * 100, 2),
      lowerBound: round(lowerBound),
      upperBound: round(upperBound),
      minOutlier: range.min,
      maxOutlier: range.max,
    };
  }
  return report;
}

/**
 * Imputation method for a column under a strategy. `auto` uses the mean for
 * numeric columns; non-numeric columns always use the mode.
 */
export function methodFor(column: Column, strategy: Exclude<CleaningStrategy, "drop">): ImputationMethod {
  if (column.type !== "numeric") {
    return "mode";
  }
  return strategy === "auto" ? "mean" : strategy;
}

function missingReason(missing: number, rows: number): string {
  const percent = rows === 0 ? 0 : round((missing / rows) * 100, 1);
  return `${missing} of ${rows} values missing (${percent}%)`;
}

function imputeAll(
  store: DatasetStore,
  dataset: Dataset,
  strategy: Exclude<CleaningStrategy, "drop">
): { dataset: Dataset; entries: ChangeLogEntry[] } {
  const rows = rowCount(dataset);
  const entries: ChangeLogEntry[] = [];
  let cleaned = dataset;

  for (const column of dataset.columns) {
    const missing = missingIndices(column);
    if (missing.length === 0) {
      continue;
    }

    const result = imputeColumn(column, methodFor(column, strategy));
    const reason = result.placeholder
      ? `${missingReason(missing.length, rows)}; no present value, placeholder used`
      : missingReason(missing.length, rows);

    entries.push(
      store.recordChange({
        stage: "cleaning",
        column: column.name,
        action: "impute",
        method: result.method,
        fillValue: result.fillValue,
        reason,
        affectedRowsCount: result.affected.length,
        affectedIndices: result.affected.slice(0, MAX_SAMPLED_INDICES),
        preStats: summarizeColumn(column),
        postStats: summarizeColumn(result.column),
      })
    );
    cleaned = replaceColumn(cleaned, result.column);
  }

  return { dataset: cleaned, entries };
}

function dropAll(store: DatasetStore, dataset: Dataset): { dataset: Dataset; entries: ChangeLogEntry[] } {
  const rows = rowCount(dataset);
  const doomed = new Set<number>();
  for (const column of dataset.columns) {
    missingIndices(column).forEach((index) => doomed.add(index));
  }
  if (doomed.size === 0) {
    return { dataset, entries: [] };
  }

  const cleaned = dropRows(dataset, doomed);
  const entries: ChangeLogEntry[] = [];

  dataset.columns.forEach((column, position) => {
    const missing = missingIndices(column);
    const after = cleaned.columns[position];
    if (missing.length === 0 || after === undefined) {
      return;
    }
    entries.push(
      store.recordChange({
        stage: "cleaning",
        column: column.name,
        action: "drop",
        reason: missingReason(missing.length, rows),
        affectedRowsCount: missing.length,
        affectedIndices: missing.slice(0, MAX_SAMPLED_INDICES),
        preStats: summarizeColumn(column),
        postStats: { ...summarizeColumn(after), rowsRemaining: rowCount(cleaned) },
      })
    );
  });

  return { dataset: cleaned, entries };
}

export const cleaningStage: StageHandler<"cleaning"> = {
  async run({ store, config, upstream, logger }) {
    const profile = upstream.get("profiling").profile;
    const before = store.current();
    const strategy = config.cleaning.strategy;

    for (const column of before.columns) {
      store.recordColumnStats(column.name, "pre_cleaning", summarizeColumn(column));
    }

    const outliers = detectOutliers(before);
    store.setMetadata("outlier_report", outliers);

    const { dataset: after, entries } =
      strategy === "drop" ? dropAll(store, before) : imputeAll(store, before, strategy);

    if (entries.length > 0) {
      store.replaceCurrent(after, entries.map(describeChange).join("; "));
    }
    for (const column of after.columns) {
      store.recordColumnStats(column.name, "post_cleaning", summarizeColumn(column));
    }

    const cleaning = {
      strategy,
      changes: entries.map(describeChange),
      rowsBefore: profile.rows,
      rowsAfter: rowCount(after),
      remainingMissing: totalMissing(after),
    };
    store.setMetadata("cleaning_summary", cleaning);

    logger.debug("Cleaning finished", { strategy, changes: entries.length, outlierColumns: Object.keys(outliers).length });

    return {
      summary:
        entries.length > 0
          ? `Applied ${entries.length} cleaning actions (${strategy})`
          : "No missing values to clean",
      skipped: entries.length === 0,
      cleaning,
      outliers,
      entries,
    };
  },
};
