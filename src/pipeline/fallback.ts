/**
 * Fallback consistency pass.
 *
 * Runs after the last stage and fills every cell that is still missing,
 * whatever the cleaning stage did: numeric columns with the column mean,
 * other columns with the mode (or the type's placeholder when the column has
 * no present value). Only cells missing at this point are touched, so a cell
 * is never counted by both the cleaning stage and this pass. Running it on a
 * complete dataset records nothing.
 */

import { MAX_SAMPLED_INDICES, describeChange, type ChangeLogEntry } from "../dataset/changelog.js";
import { missingIndices, replaceColumn } from "../dataset/frame.js";
import { imputeColumn } from "../dataset/impute.js";
import { summarizeColumn } from "../dataset/stats.js";
import type { DatasetStore } from "../dataset/store.js";

export const FALLBACK_STAGE = "fallback";

export function runFallbackPass(store: DatasetStore): ChangeLogEntry[] {
  const dataset = store.current();
  const entries: ChangeLogEntry[] = [];
  let repaired = dataset;

  for (const column of dataset.columns) {
    const missing = missingIndices(column);
    if (missing.length === 0) {
      continue;
    }

    const result = imputeColumn(column, column.type === "numeric" ? "mean" : "mode");
    entries.push(
      store.recordChange({
        stage: FALLBACK_STAGE,
        column: column.name,
        action: "fallback-impute",
        method: result.method,
        fillValue: result.fillValue,
        reason: result.placeholder
          ? `${missing.length} values still missing after cleaning; column has no present value, placeholder used`
          : `${missing.length} values still missing after cleaning`,
        affectedRowsCount: missing.length,
        affectedIndices: missing.slice(0, MAX_SAMPLED_INDICES),
        preStats: summarizeColumn(column),
        postStats: summarizeColumn(result.column),
      })
    );
    repaired = replaceColumn(repaired, result.column);
  }

  if (entries.length > 0) {
    store.replaceCurrent(repaired, entries.map(describeChange).join("; "));
    for (const column of repaired.columns) {
      store.recordColumnStats(column.name, "post_fallback", summarizeColumn(column));
    }
  }
  return entries;
}
