/**
 * Report document tests.
 *
 * Run with: node --import tsx --test src/report/document.test.ts
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { createDataset } from "../dataset/frame.js";
import { DatasetStore } from "../dataset/store.js";
import {
  REPORT_SECTIONS,
  createReportDocument,
  finalizeReport,
  getSection,
  markdownTable,
  renderAuditTrail,
  renderCleaningImpact,
  renderHtml,
  renderMarkdown,
  type ReportDocument,
} from "./document.js";

function sampleDocument(): ReportDocument {
  return createReportDocument("Quarterly <Sales>", "20250601-abc123", "2025-06-01T00:00:00.000Z", {
    "Executive Summary": { body: "All good." },
    "Dataset Overview": {
      body: "Two columns.",
      charts: [{ kind: "missing_values", path: "charts/missing_values.svg", title: "Missing values" }],
    },
    "Data Quality & Cleaning": { body: "Nothing to clean." },
    "Decision Audit Trail": { body: "pending" },
    "Cleaning Impact": { body: "pending" },
    "Statistical Analysis": { body: "x < y" },
    "Model Recommendation": { body: "None." },
    "XAI Insights": { body: "Skipped." },
    "Next Steps": { body: "- Collect more rows" },
  });
}

describe("markdownTable", () => {
  it("escapes pipes and renders empty cells as a dash", () => {
    assert.equal(
      markdownTable(["Name", "Value"], [["a|b", null], ["c", 0]]),
      ["| Name | Value |", "| --- | --- |", "| a\\|b | - |", "| c | 0 |"].join("\n")
    );
  });
});

describe("createReportDocument", () => {
  it("keeps the fixed section order", () => {
    const document = sampleDocument();
    assert.deepEqual(
      document.sections.map((section) => section.title),
      [...REPORT_SECTIONS]
    );
    assert.equal(getSection(document, "Dataset Overview").charts.length, 1);
  });
});

describe("audit rendering", () => {
  it("explains an empty change log", () => {
    assert.equal(renderAuditTrail([]), "No cleaning actions were recorded. The dataset was used as ingested.");
    assert.equal(renderCleaningImpact([], {}), "No column was modified.");
  });

  it("re-renders audit sections from the final change log", () => {
    const store = new DatasetStore(() => new Date("2025-06-01T00:00:00.000Z"));
    store.initialize(createDataset([{ name: "qty", type: "numeric", values: [4, null, 6] }]));
    store.recordChange({
      stage: "fallback",
      column: "qty",
      action: "fallback-impute",
      method: "mean",
      fillValue: 5,
      reason: "1 values still missing after cleaning",
      affectedRowsCount: 1,
      affectedIndices: [1],
      preStats: { missing: 1, mean: 5, median: 5, std: 1.4142 },
      postStats: { missing: 0, mean: 5, median: 5, std: 1 },
    });

    const document = finalizeReport(sampleDocument(), store.changeLog(), {});

    assert.equal(
      getSection(document, "Decision Audit Trail").body.split("\n")[2],
      "| 1 | fallback | qty | fallback-impute | mean | 5 | 1 | 1 | 1 values still missing after cleaning |"
    );
    assert.equal(
      getSection(document, "Cleaning Impact").body.split("\n")[2],
      "| qty | missing=1, mean=5.00, std=1.41 | - | missing=0, mean=5.00, std=1.00 | 1 |"
    );
    assert.equal(getSection(document, "Executive Summary").body, "All good.");
  });
});

describe("renderMarkdown", () => {
  it("writes a heading per section and links its charts", () => {
    const lines = renderMarkdown(sampleDocument()).split("\n");
    assert.equal(lines[0], "# Quarterly <Sales>");
    assert.equal(lines[2], "Run: 20250601-abc123  ");
    assert.equal(lines.filter((line) => line.startsWith("## ")).length, 9);
    assert.ok(lines.includes("![Missing values](charts/missing_values.svg)"));
  });
});

describe("renderHtml", () => {
  it("escapes titles and bodies", () => {
    const html = renderHtml(sampleDocument());
    assert.ok(html.includes("<title>Quarterly &lt;Sales&gt;</title>"));
    assert.ok(html.includes("<pre>x &lt; y</pre>"));
    assert.ok(html.includes('<img src="charts/missing_values.svg" alt="Missing values"/>'));
  });
});
