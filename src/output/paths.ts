/**
 * Artifact locations inside a run's output directory. Names are fixed.
 */

import { join } from "node:path";

export const ARTIFACT_NAMES = {
  cleanedData: "cleaned_data.csv",
  reportMarkdown: "report.md",
  reportHtml: "report.html",
  chartsDir: "charts",
  modelsDir: "models",
  model: "trained_model.json",
} as const;

export interface OutputPaths {
  readonly outputDir: string;
  readonly chartsDir: string;
  readonly modelsDir: string;
  readonly cleanedData: string;
  readonly reportMarkdown: string;
  readonly reportHtml: string;
  readonly model: string;
}

export function resolveOutputPaths(outputDir: string): OutputPaths {
  const modelsDir = join(outputDir, ARTIFACT_NAMES.modelsDir);
  return {
    outputDir,
    chartsDir: join(outputDir, ARTIFACT_NAMES.chartsDir),
    modelsDir,
    cleanedData: join(outputDir, ARTIFACT_NAMES.cleanedData),
    reportMarkdown: join(outputDir, ARTIFACT_NAMES.reportMarkdown),
    reportHtml: join(outputDir, ARTIFACT_NAMES.reportHtml),
    model: join(modelsDir, ARTIFACT_NAMES.model),
  };
}

/**
 * Make a column name safe to embed in a file name.
 */
export function sanitizeFileComponent(name: string): string {
  const cleaned = name.trim().replace(/[^A-Za-z0-9_-]+/g, "_").replace(/^_+|_+$/g, "");
  return cleaned.length > 0 ? cleaned : "column";
}

/**
 * Chart file name relative to the charts directory, e.g. `dist_age.svg`.
 */
export function chartFileName(prefix: string, column?: string): string {
  return column === undefined
    ? `${prefix}.svg`
    : `${prefix}_${sanitizeFileComponent(column)}.svg`;
}

/**
 * Per-column chart file names for one prefix. Columns whose sanitized names
 * collide get `_2`, `_3`, ... in column order, so every column keeps its own
 * file and repeated calls over the same columns return the same names.
 */
export function chartFileNames(prefix: string, columns: readonly string[]): Map<string, string> {
  const names = new Map<string, string>();
  const taken = new Set<string>();
  for (const column of columns) {
    const base = `${prefix}_${sanitizeFileComponent(column)}`;
    let candidate = base;
    for (let n = 2; taken.has(candidate); n++) {
      candidate = `${base}_${n}`;
    }
    taken.add(candidate);
    names.set(column, `${candidate}.svg`);
  }
  return names;
}

/**
 * Chart path relative to the output directory, as referenced by the report.
 */
export function chartRelativePath(fileName: string): string {
  return `${ARTIFACT_NAMES.chartsDir}/${fileName}`;
}
