/**
 * Reporting stage: assembles the report document from every upstream output.
 *
 * The audit sections rendered here reflect the change log at reporting time;
 * the orchestrator re-renders them after the fallback pass.
 */

import type { ChartRef } from "../dataset/metadata.js";
import {
  createReportDocument,
  markdownTable,
  renderAuditTrail,
  renderCleaningImpact,
} from "../report/document.js";
import type { StageHandler, StageOutputMap } from "./types.js";

function chartsOf(charts: readonly ChartRef[], kinds: readonly ChartRef["kind"][]): ChartRef[] {
  return charts.filter((chart) => kinds.includes(chart.kind));
}

function bullets(items: readonly string[], empty: string): string {
  return items.length > 0 ? items.map((item) => `- ${item}`).join("\n") : empty;
}

type ReportInputs = Pick<
  StageOutputMap,
  "profiling" | "cleaning" | "visualization" | "statistics" | "recommendation" | "training" | "explainability"
>;

export function nextSteps(inputs: ReportInputs): string[] {
  const steps: string[] = [];
  const { profile } = inputs.profiling;
  const flagged = Object.entries(inputs.profiling.qualityFlags);

  if (inputs.cleaning.cleaning.changes.length > 0) {
    steps.push("Review the imputed columns in the Decision Audit Trail before using the cleaned data for inference");
  }
  if (Object.keys(inputs.cleaning.outliers).length > 0) {
    steps.push(`Investigate outliers in ${Object.keys(inputs.cleaning.outliers).join(", ")}`);
  }
  for (const [column, flags] of flagged) {
    if (flags.includes("ID_CANDIDATE")) {
      steps.push(`Confirm that "${column}" is an identifier and exclude it from modelling`);
    }
  }
  if (inputs.statistics.report.patterns.duplicateRows > 0) {
    steps.push(`Decide whether the ${inputs.statistics.report.patterns.duplicateRows} duplicate rows should be removed`);
  }
  if (inputs.training.training.status === "trained") {
    const others = inputs.recommendation.recommendation.models.slice(1).map((model) => model.name);
    if (others.length > 0) {
      steps.push(`Compare the baseline against ${others.join(" and ")}`);
    }
  } else {
    steps.push("Configure a target column to enable supervised modelling");
  }
  if (profile.rows < 100) {
    steps.push("Collect more rows; results on small samples are unstable");
  }
  return steps;
}

export const reportingStage: StageHandler<"reporting"> = {
  async run({ runId, store, config, upstream }) {
    const inputs: ReportInputs = {
      profiling: upstream.get("profiling"),
      cleaning: upstream.get("cleaning"),
      visualization: upstream.get("visualization"),
      statistics: upstream.get("statistics"),
      recommendation: upstream.get("recommendation"),
      training: upstream.get("training"),
      explainability: upstream.get("explainability"),
    };
    const { profile, qualityFlags } = inputs.profiling;
    const { cleaning, outliers } = inputs.cleaning;
    const { report: statistics } = inputs.statistics;
    const { recommendation } = inputs.recommendation;
    const { training } = inputs.training;
    const { xai } = inputs.explainability;
    const charts = [...inputs.visualization.charts, ...inputs.explainability.charts];
    const changeLog = store.changeLog();

    const modelLine =
      training.status === "trained" && training.headlineMetric
        ? `A ${training.modelType} ${training.problemType} model predicting "${training.targetColumn}" reached ${training.headlineMetric.name} ${training.headlineMetric.value}.`
        : `No model was trained (${training.reason ?? "skipped"}).`;
    const strong = statistics.correlations.filter((c) => c.strong);

    const document = createReportDocument(config.report.title, runId, new Date().toISOString(), {
      "Executive Summary": {
        body: [
          `The dataset has ${profile.rows} rows and ${profile.columns} columns.`,
          `${changeLog.length} cleaning actions were applied; ${cleaning.remainingMissing} missing values remained after the cleaning stage.`,
          `${strong.length} strong correlations were found.`,
          modelLine,
        ].join(" "),
      },
      "Dataset Overview": {
        body: markdownTable(
          ["Column", "Type", "Missing", "Missing %", "Unique", "Flags"],
          Object.entries(profile.columnProfiles).map(([name, column]) => [
            name,
            column.type,
            column.missingCount,
            column.missingPercent,
            column.uniqueCount,
            (qualityFlags[name] ?? []).join(", "),
          ])
        ),
        charts: chartsOf(charts, ["missing_values"]),
      },
      "Data Quality & Cleaning": {
        body: [
          `Strategy: ${cleaning.strategy}. Rows before: ${cleaning.rowsBefore}, after: ${cleaning.rowsAfter}.`,
          "",
          bullets(cleaning.changes, "No cleaning was needed."),
          "",
          Object.keys(outliers).length > 0
            ? markdownTable(
                ["Column", "Outliers", "%", "Lower bound", "Upper bound"],
                Object.entries(outliers).map(([name, o]) => [name, o.count, o.percent, o.lowerBound, o.upperBound])
              )
            : "No IQR outliers detected.",
          "",
          bullets(profile.potentialIssues, "No data quality issues flagged."),
        ].join("\n"),
        charts: chartsOf(charts, ["impact"]),
      },
      "Decision Audit Trail": { body: renderAuditTrail(changeLog) },
      "Cleaning Impact": { body: renderCleaningImpact(changeLog, store.columnStatsHistory()) },
      "Statistical Analysis": {
        body: [
          markdownTable(
            ["Column", "Mean", "Median", "Std", "Min", "Max", "Skewness"],
            Object.entries(statistics.descriptive).map(([name, d]) => [name, d.mean, d.median, d.std, d.min, d.max, d.skewness])
          ),
          "",
          bullets(
            strong.map((c) => `${c.left} ~ ${c.right}: r = ${c.r}`),
            "No strong correlations."
          ),
          "",
          bullets(
            Object.entries(statistics.normality).map(
              ([name, n]) => `${name}: Jarque-Bera p = ${n.pValue} (${n.normal ? "consistent with normal" : "not normal"})`
            ),
            "Normality was not tested."
          ),
          ...(statistics.errors.length > 0
            ? ["", bullets(statistics.errors.map((e) => `${e.step} failed: ${e.message}`), "")]
            : []),
        ].join("\n"),
        charts: chartsOf(charts, ["distribution", "categorical"]),
      },
      "Model Recommendation": {
        body: [
          `Target: ${recommendation.targetColumn ?? "none"}. Problem type: ${recommendation.problemType ?? "none"}.`,
          recommendation.reason,
          "",
          recommendation.models.map((model, i) => `${i + 1}. **${model.name}**: ${model.rationale}`).join("\n"),
          "",
          modelLine,
        ].join("\n"),
      },
      "XAI Insights": {
        body:
          xai.status === "skipped"
            ? `Explainability was skipped: ${xai.reason ?? "no trained model"}.`
            : [
                markdownTable(
                  ["Feature", "Importance"],
                  Object.entries(xai.globalImportance).map(([feature, value]) => [feature, value])
                ),
                "",
                xai.localExplanation
                  ? `Row ${xai.localExplanation.rowIndex} is predicted as ${xai.localExplanation.prediction}.`
                  : "",
              ].join("\n"),
        charts: chartsOf(charts, ["feature_importance", "local_explanation"]),
      },
      "Next Steps": { body: bullets(nextSteps(inputs), "No further action suggested.") },
    });

    return {
      summary: `Report assembled with ${document.sections.length} sections`,
      skipped: false,
      document,
    };
  },
};
