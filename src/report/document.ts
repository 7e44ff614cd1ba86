/**
 * Report document model.
 *
 * A report is an ordered list of sections with fixed titles. Sections hold
 * Markdown bodies plus the charts they reference by path relative to the
 * output directory. Rendering to Markdown and HTML happens at export time.
 */

import type { ChangeLogEntry } from "../dataset/changelog.js";
import type { ChartRef } from "../dataset/metadata.js";
import type { ColumnSummary } from "../dataset/stats.js";
import type { ColumnStatsHistory } from "../dataset/store.js";
import { escapeXml } from "../charts/svg.js";

export const REPORT_SECTIONS = [
  "Executive Summary",
  "Dataset Overview",
  "Data Quality & Cleaning",
  "Decision Audit Trail",
  "Cleaning Impact",
  "Statistical Analysis",
  "Model Recommendation",
  "XAI Insights",
  "Next Steps",
] as const;

export type ReportSectionTitle = (typeof REPORT_SECTIONS)[number];

export interface ReportSection {
  readonly title: ReportSectionTitle;
  /** Markdown */
  readonly body: string;
  readonly charts: readonly ChartRef[];
}

export interface ReportDocument {
  readonly title: string;
  readonly runId: string;
  readonly generatedAt: string;
  readonly sections: readonly ReportSection[];
}

export type SectionContent = Pick<ReportSection, "body"> & {
  readonly charts?: readonly ChartRef[];
};

/**
 * Assemble a document with every section in the fixed order.
 */
export function createReportDocument(
  title: string,
  runId: string,
  generatedAt: string,
  content: Readonly<Record<ReportSectionTitle, SectionContent>>
): ReportDocument {
  return {
    title,
    runId,
    generatedAt,
    sections: REPORT_SECTIONS.map((section) => ({
      title: section,
      body: content[section].body,
      charts: content[section].charts ?? [],
    })),
  };
}

export function getSection(document: ReportDocument, title: ReportSectionTitle): ReportSection {
  const section = document.sections.find((candidate) => candidate.title === title);
  return section ?? { title, body: "", charts: [] };
}

/** Copy of the document with one section's body replaced. */
export function withSectionBody(
  document: ReportDocument,
  title: ReportSectionTitle,
  body: string
): ReportDocument {
  return {
    ...document,
    sections: document.sections.map((section) =>
      section.title === title ? { ...section, body } : section
    ),
  };
}

function cell(value: unknown): string {
  if (value === undefined || value === null || value === "") {
    return "-";
  }
  return String(value).replace(/\|/g, "\\|").replace(/\r?\n/g, " ");
}

export function markdownTable(
  headers: readonly string[],
  rows: readonly (readonly unknown[])[]
): string {
  const lines = [
    `| ${headers.map(cell).join(" | ")} |`,
    `| ${headers.map(() => "---").join(" | ")} |`,
    ...rows.map((row) => `| ${row.map(cell).join(" | ")} |`),
  ];
  return lines.join("\n");
}

/**
 * Every change log entry, in recorded order, one table row each.
 */
export function renderAuditTrail(entries: readonly ChangeLogEntry[]): string {
  if (entries.length === 0) {
    return "No cleaning actions were recorded. The dataset was used as ingested.";
  }
  return markdownTable(
    ["#", "Stage", "Column", "Action", "Method", "Value", "Rows affected", "Sample rows", "Reason"],
    entries.map((entry) => [
      entry.sequence,
      entry.stage,
      entry.column,
      entry.action,
      entry.method,
      entry.fillValue,
      entry.affectedRowsCount,
      entry.affectedIndices.join(", "),
      entry.reason,
    ])
  );
}

function describeStats(summary: ColumnSummary | undefined): string {
  if (!summary) {
    return "-";
  }
  const parts = [`missing=${summary.missing}`];
  if (summary.mean !== undefined && summary.mean !== null) {
    parts.push(`mean=${summary.mean.toFixed(2)}`);
  }
  if (summary.std !== undefined && summary.std !== null) {
    parts.push(`std=${summary.std.toFixed(2)}`);
  }
  if (summary.mode !== undefined && summary.mode !== null) {
    parts.push(`mode=${summary.mode}`);
  }
  if (summary.rowsRemaining !== undefined) {
    parts.push(`rows=${summary.rowsRemaining}`);
  }
  return parts.join(", ");
}

/**
 * Before/after statistics for every column a change touched.
 */
export function renderCleaningImpact(
  entries: readonly ChangeLogEntry[],
  statsHistory: Readonly<Record<string, ColumnStatsHistory>>
): string {
  const columns = [...new Set(entries.map((entry) => entry.column))];
  if (columns.length === 0) {
    return "No column was modified.";
  }

  const rows = columns.map((column) => {
    const history = statsHistory[column] ?? {};
    const touched = entries.filter((entry) => entry.column === column);
    const first = touched[0];
    const last = touched[touched.length - 1];
    return [
      column,
      describeStats(history.pre_cleaning ?? first?.preStats),
      describeStats(history.post_cleaning),
      describeStats(history.post_fallback ?? last?.postStats),
      touched.reduce((sum, entry) => sum + entry.affectedRowsCount, 0),
    ];
  });

  return markdownTable(
    ["Column", "Before cleaning", "After cleaning", "Final", "Cells or rows changed"],
    rows
  );
}

/**
 * Re-render the audit sections from the final change log so entries recorded
 * after the reporting stage (the fallback pass) appear in the export.
 */
export function finalizeReport(
  document: ReportDocument,
  changeLog: readonly ChangeLogEntry[],
  statsHistory: Readonly<Record<string, ColumnStatsHistory>>
): ReportDocument {
  const audited = withSectionBody(document, "Decision Audit Trail", renderAuditTrail(changeLog));
  return withSectionBody(audited, "Cleaning Impact", renderCleaningImpact(changeLog, statsHistory));
}

export function renderMarkdown(document: ReportDocument): string {
  const lines = [
    `# ${document.title}`,
    "",
    `Run: ${document.runId}  `,
    `Generated: ${document.generatedAt}`,
    "",
  ];
  for (const section of document.sections) {
    lines.push(`## ${section.title}`, "", section.body.trim(), "");
    for (const chart of section.charts) {
      lines.push(`![${chart.title}](${chart.path})`, "");
    }
  }
  return lines.join("\n");
}

export function renderHtml(document: ReportDocument): string {
  const body = document.sections
    .map((section) => {
      const charts = section.charts
        .map(
          (chart) =>
            `<figure><img src="${escapeXml(chart.path)}" alt="${escapeXml(chart.title)}"/><figcaption>${escapeXml(chart.title)}</figcaption></figure>`
        )
        .join("\n");
      return `<section>\n<h2>${escapeXml(section.title)}</h2>\n<pre>${escapeXml(section.body.trim())}</pre>\n${charts}\n</section>`;
    })
    .join("\n");

  return [
    "<!DOCTYPE html>",
    '<html lang="en">',
    "<head>",
    '<meta charset="utf-8"/>',
    `<title>${escapeXml(document.title)}</title>`,
    "<style>body{font-family:sans-serif;max-width:960px;margin:auto}pre{white-space:pre-wrap}</style>",
    "</head>",
    "<body>",
    `<h1>${escapeXml(document.title)}</h1>`,
    `<p>Run ${escapeXml(document.runId)}, generated ${escapeXml(document.generatedAt)}</p>`,
    body,
    "</body>",
    "</html>",
    "",
  ].join("\n");
}
