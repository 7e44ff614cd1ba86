/**
 * Explainability stage: global feature importance and a single-row local
 * explanation of the registered model.
 *
 * Without a trained model the stage is skipped, unless explainability is
 * configured as required.
 */

import { renderBarChart } from "../charts/svg.js";
import { ValidationError } from "../dataset/errors.js";
import { rowCount } from "../dataset/frame.js";
import type { ChartRef, LocalExplanation, XaiSummary } from "../dataset/metadata.js";
import { round } from "../dataset/stats.js";
import { encodeFeatures, localContributions, predict } from "../models/baseline.js";
import { chartFileName } from "../output/paths.js";
import { writeChart } from "../output/writer.js";
import type { StageHandler } from "./types.js";

export const explainabilityStage: StageHandler<"explainability"> = {
  async run({ store, models, config, upstream, paths }) {
    const { training } = upstream.get("training");
    const state = models.getModel();

    if (state.status === "none") {
      if (config.explainability.required) {
        throw new ValidationError(
          `Explainability is required but no model was trained (${training.reason ?? "training skipped"})`
        );
      }
      const xai: XaiSummary = {
        status: "skipped",
        reason: training.reason ?? "no trained model",
        globalImportance: {},
        charts: [],
      };
      store.setMetadata("xai_summary", xai);
      return { summary: "Explainability skipped: no trained model", skipped: true, xai, charts: [] };
    }

    const { record } = state;
    const dataset = store.current();
    const rowIndex = config.explainability.localRowIndex;
    if (rowIndex >= rowCount(dataset)) {
      throw new ValidationError(
        `Row index ${rowIndex} is out of range for a dataset of ${rowCount(dataset)} rows`,
        [{ path: ["explainability", "localRowIndex"], message: "Row index out of range", code: "too_big" }]
      );
    }

    const row = encodeFeatures(dataset, record.featureColumns, record.encoders)[rowIndex] ?? [];
    const contributions = localContributions(record.artifact, row);
    const prediction = predict(record.artifact, row);
    const localExplanation: LocalExplanation = {
      rowIndex,
      prediction: typeof prediction === "number" ? round(prediction) : prediction,
      contributions: Object.fromEntries(
        record.featureColumns.map((name, j) => [name, round(contributions[j] ?? 0)])
      ),
    };

    const importance = Object.entries(record.metrics.featureImportances).sort(([, a], [, b]) => b - a);
    const importanceTitle = `Global feature importance (${record.artifact.kind})`;
    const localTitle = `Local explanation for row ${rowIndex} (prediction: ${localExplanation.prediction})`;
    const charts: ChartRef[] = [
      {
        kind: "feature_importance",
        path: await writeChart(
          paths,
          chartFileName("feature_importance"),
          renderBarChart(importance.map(([label, value]) => ({ label, value })), { title: importanceTitle })
        ),
        title: importanceTitle,
      },
      {
        kind: "local_explanation",
        path: await writeChart(
          paths,
          chartFileName("local_explanation"),
          renderBarChart(
            Object.entries(localExplanation.contributions).map(([label, value]) => ({ label, value })),
            { title: localTitle }
          )
        ),
        title: localTitle,
      },
    ];

    const xai: XaiSummary = {
      status: "completed",
      globalImportance: Object.fromEntries(importance),
      localExplanation,
      charts: charts.map((chart) => chart.path),
    };
    store.setMetadata("xai_summary", xai);

    const top = importance[0];
    return {
      summary: top ? `Top feature: ${top[0]} (${top[1]})` : "Explained model",
      skipped: false,
      xai,
      charts,
    };
  },
};
