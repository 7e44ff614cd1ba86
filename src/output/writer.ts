/**
 * Artifact persistence.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { Dataset } from "../types/dataset.js";
import type { ChartRef } from "../dataset/metadata.js";
import { toCsv } from "../dataset/csv.js";
import type { SerializedModel } from "../models/registry.js";
import { renderHtml, renderMarkdown, type ReportDocument } from "../report/document.js";
import { chartRelativePath, type OutputPaths } from "./paths.js";

export interface ArtifactPaths {
  readonly cleanedData: string;
  readonly reportMarkdown: string;
  readonly reportHtml: string;
  /** Absent when no model was trained */
  readonly model?: string;
  readonly charts: readonly string[];
}

/**
 * Write one SVG chart, replacing any file of the same name.
 * Returns the path relative to the output directory.
 */
export async function writeChart(paths: OutputPaths, fileName: string, svg: string): Promise<string> {
  await mkdir(paths.chartsDir, { recursive: true });
  await writeFile(join(paths.chartsDir, fileName), svg, "utf-8");
  return chartRelativePath(fileName);
}

export interface ArtifactInput {
  readonly dataset: Dataset;
  readonly document: ReportDocument;
  readonly model: SerializedModel | null;
  /** Charts this run produced; files left in charts/ by earlier runs are not listed */
  readonly charts: readonly ChartRef[];
}

/**
 * Write the cleaned dataset, the report in both formats and the model record.
 */
export async function writeArtifacts(paths: OutputPaths, input: ArtifactInput): Promise<ArtifactPaths> {
  await mkdir(paths.outputDir, { recursive: true });

  await writeFile(paths.cleanedData, toCsv(input.dataset), "utf-8");
  await writeFile(paths.reportMarkdown, renderMarkdown(input.document), "utf-8");
  await writeFile(paths.reportHtml, renderHtml(input.document), "utf-8");

  let model: string | undefined;
  if (input.model) {
    await mkdir(paths.modelsDir, { recursive: true });
    await writeFile(paths.model, JSON.stringify(input.model, null, 2), "utf-8");
    model = paths.model;
  }

  return {
    cleanedData: paths.cleanedData,
    reportMarkdown: paths.reportMarkdown,
    reportHtml: paths.reportHtml,
    ...(model ? { model } : {}),
    charts: [...new Set(input.charts.map((chart) => join(paths.outputDir, chart.path)))],
  };
}
