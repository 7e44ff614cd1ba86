/**
 * Profiling stage.
 *
 * Describes every column of the ingested dataset and raises quality flags
 * the cleaning and recommendation stages act on:
 *
 *   MISSING_VALUES(p%)  column has missing cells
 *   CONSTANT_COLUMN     at most one distinct present value
 *   ID_CANDIDATE        every present value is distinct (likely an identifier)
 */

import type { Column } from "../types/dataset.js";
import { MISSING } from "../types/dataset.js";
import { cells, countMissing, formatCell, presentNumbers, rowCount } from "../dataset/frame.js";
import type { ColumnProfile, ProfilingSummary, QualityFlags } from "../dataset/metadata.js";
import { extent, mean, median, round, std } from "../dataset/stats.js";
import type { StageHandler } from "./types.js";

const TOP_VALUES = 5;

function nullableRound(value: number | undefined): number | null {
  return value === undefined ? null : round(value);
}

/**
 * Frequencies of the most common present values, ties broken by value.
 */
export function topValues(column: Column, limit = TOP_VALUES): Record<string, number> {
  const counts = new Map<string, number>();
  for (const value of cells(column)) {
    if (value !== MISSING) {
      const key = formatCell(value);
      counts.set(key, (counts.get(key) ?? 0) + 1);
    }
  }
  const ranked = [...counts.entries()]
    .sort(([a, ca], [b, cb]) => cb - ca || (a < b ? -1 : a > b ? 1 : 0))
    .slice(0, limit);
  return Object.fromEntries(ranked);
}

export function uniqueCount(column: Column): number {
  return new Set(
    cells(column)
      .filter((value) => value !== MISSING)
      .map((value) => formatCell(value))
  ).size;
}

export function profileColumn(column: Column, rows: number): ColumnProfile {
  const missingCount = countMissing(column);
  const profile: ColumnProfile = {
    type: column.type,
    missingCount,
    missingPercent: rows === 0 ? 0 : round((missingCount / rows) * 100, 2),
    uniqueCount: uniqueCount(column),
  };

  if (column.type === "numeric") {
    const present = presentNumbers(column);
    const range = extent(present);
    return {
      ...profile,
      stats: {
        min: range?.min ?? null,
        max: range?.max ?? null,
        mean: nullableRound(mean(present)),
        median: nullableRound(median(present)),
        std: nullableRound(std(present)),
      },
    };
  }
  return { ...profile, topValues: topValues(column) };
}

export function qualityFlagsFor(profile: ColumnProfile, rows: number): string[] {
  const flags: string[] = [];
  if (profile.missingCount > 0) {
    flags.push(`MISSING_VALUES(${profile.missingPercent}%)`);
  }
  if (profile.uniqueCount <= 1) {
    flags.push("CONSTANT_COLUMN");
  }
  const present = rows - profile.missingCount;
  if (rows > 1 && present > 1 && profile.uniqueCount === present && profile.type !== "numeric") {
    flags.push("ID_CANDIDATE");
  }
  return flags;
}

export const profilingStage: StageHandler<"profiling"> = {
  async run({ store, logger }) {
    const dataset = store.current();
    const rows = rowCount(dataset);

    const columnProfiles: Record<string, ColumnProfile> = {};
    const qualityFlags: QualityFlags = {};
    const potentialIssues: string[] = [];

    for (const column of dataset.columns) {
      const profile = profileColumn(column, rows);
      columnProfiles[column.name] = profile;

      const flags = qualityFlagsFor(profile, rows);
      if (flags.length > 0) {
        qualityFlags[column.name] = flags;
        potentialIssues.push(`${column.name}: ${flags.join(", ")}`);
      }
    }

    const profile: ProfilingSummary = {
      rows,
      columns: dataset.columns.length,
      columnProfiles,
      potentialIssues,
    };
    store.setMetadata("profiling_summary", profile);
    store.setMetadata("quality_flags", qualityFlags);

    logger.debug("Dataset profiled", { rows, columns: profile.columns, flagged: Object.keys(qualityFlags).length });

    return {
      summary: `Profiled ${rows} rows × ${profile.columns} columns, ${Object.keys(qualityFlags).length} flagged`,
      skipped: false,
      profile,
      qualityFlags,
    };
  },
};
