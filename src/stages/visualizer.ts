/**
 * Visualization stage: distribution, category, missing-value and cleaning
 * impact charts written as SVG under charts/.
 */

import { renderBarChart, renderHistogram, renderImpactChart } from "../charts/svg.js";
import { columnNames, countMissing, findColumn, presentNumbers } from "../dataset/frame.js";
import type { ChartRef } from "../dataset/metadata.js";
import { chartFileName, chartFileNames } from "../output/paths.js";
import { writeChart } from "../output/writer.js";
import { topValues } from "./profiler.js";
import type { StageHandler } from "./types.js";

export const visualizationStage: StageHandler<"visualization"> = {
  async run({ store, config, upstream, paths, logger }) {
    const current = store.current();
    const original = store.original();
    const { maxDistributionColumns, maxCategories } = config.visualization;
    const charts: ChartRef[] = [];
    const names = columnNames(current);
    const fileNameFor = (prefix: string): ((column: string) => string) => {
      const files = chartFileNames(prefix, names);
      return (column) => files.get(column) ?? chartFileName(prefix, column);
    };
    const distFile = fileNameFor("dist");
    const barFile = fileNameFor("bar");
    const impactFile = fileNameFor("impact");

    const missingCounts = original.columns
      .map((column) => ({ label: column.name, value: countMissing(column) }))
      .filter((datum) => datum.value > 0);
    if (missingCounts.length > 0) {
      const fileName = chartFileName("missing_values");
      const title = "Missing values per column (before cleaning)";
      charts.push({
        kind: "missing_values",
        path: await writeChart(paths, fileName, renderBarChart(missingCounts, { title })),
        title,
      });
    }

    const numeric = current.columns.filter((column) => column.type === "numeric");
    for (const column of numeric.slice(0, maxDistributionColumns)) {
      const title = `Distribution of ${column.name}`;
      const svg = renderHistogram(presentNumbers(column), { title });
      charts.push({
        kind: "distribution",
        path: await writeChart(paths, distFile(column.name), svg),
        column: column.name,
        title,
      });
    }

    const categorical = current.columns.filter((column) => column.type === "categorical");
    for (const column of categorical.slice(0, maxDistributionColumns)) {
      const title = `Top values of ${column.name}`;
      const data = Object.entries(topValues(column, maxCategories)).map(([label, value]) => ({ label, value }));
      charts.push({
        kind: "categorical",
        path: await writeChart(paths, barFile(column.name), renderBarChart(data, { title })),
        column: column.name,
        title,
      });
    }

    const cleanedColumns = new Set(upstream.get("cleaning").entries.map((entry) => entry.column));
    for (const name of cleanedColumns) {
      const before = findColumn(original, name);
      const after = findColumn(current, name);
      if (before?.type !== "numeric" || after?.type !== "numeric") {
        continue;
      }
      const title = `Cleaning impact on ${name}`;
      const svg = renderImpactChart(
        { before: presentNumbers(before), after: presentNumbers(after) },
        { title }
      );
      charts.push({
        kind: "impact",
        path: await writeChart(paths, impactFile(name), svg),
        column: name,
        title,
      });
    }

    store.setMetadata("chart_index", charts);
    logger.debug("Charts written", { count: charts.length, dir: paths.chartsDir });

    return {
      summary: `Generated ${charts.length} charts`,
      skipped: charts.length === 0,
      charts,
    };
  },
};
