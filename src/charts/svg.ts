/**
 * Minimal SVG chart rendering for report figures.
 */

import { extent } from "../dataset/stats.js";

export interface BarDatum {
  readonly label: string;
  readonly value: number;
}

export interface BarChartOptions {
  readonly title: string;
  readonly width?: number;
  readonly height?: number;
  /** Fill colour for positive bars */
  readonly color?: string;
  /** Fill colour for negative bars */
  readonly negativeColor?: string;
}

const MARGIN = { top: 40, right: 20, bottom: 70, left: 60 };

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

function formatTick(value: number): string {
  return Math.abs(value) >= 1000 || Number.isInteger(value)
    ? String(Math.round(value))
    : value.toFixed(2);
}

/**
 * Vertical bar chart. Negative values grow downwards from the zero line.
 */
export function renderBarChart(data: readonly BarDatum[], options: BarChartOptions): string {
  const width = options.width ?? 640;
  const height = options.height ?? 400;
  const color = options.color ?? "#4c72b0";
  const negativeColor = options.negativeColor ?? "#c44e52";
  const plotWidth = width - MARGIN.left - MARGIN.right;
  const plotHeight = height - MARGIN.top - MARGIN.bottom;

  const { min, max } = extent([0, ...data.map((d) => d.value)]) ?? { min: 0, max: 0 };
  const span = max - min || 1;
  const y = (value: number): number => MARGIN.top + ((max - value) / span) * plotHeight;
  const zero = y(0);
  const slot = data.length > 0 ? plotWidth / data.length : plotWidth;
  const barWidth = Math.max(1, slot * 0.8);

  const parts: string[] = [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
    `<rect width="${width}" height="${height}" fill="#ffffff"/>`,
    `<text x="${width / 2}" y="24" text-anchor="middle" font-family="sans-serif" font-size="16">${escapeXml(options.title)}</text>`,
    `<line x1="${MARGIN.left}" y1="${zero}" x2="${width - MARGIN.right}" y2="${zero}" stroke="#333333"/>`,
    `<text x="${MARGIN.left - 6}" y="${y(max) + 4}" text-anchor="end" font-family="sans-serif" font-size="11">${formatTick(max)}</text>`,
    `<text x="${MARGIN.left - 6}" y="${y(min) + 4}" text-anchor="end" font-family="sans-serif" font-size="11">${formatTick(min)}</text>`,
  ];

  data.forEach((d, i) => {
    const x = MARGIN.left + i * slot + (slot - barWidth) / 2;
    const top = Math.min(y(d.value), zero);
    const barHeight = Math.abs(y(d.value) - zero);
    const labelX = x + barWidth / 2;
    const labelY = height - MARGIN.bottom + 14;
    parts.push(
      `<rect x="${x.toFixed(2)}" y="${top.toFixed(2)}" width="${barWidth.toFixed(2)}" height="${barHeight.toFixed(2)}" fill="${d.value < 0 ? negativeColor : color}"><title>${escapeXml(`${d.label}: ${formatTick(d.value)}`)}</title></rect>`,
      `<text x="${labelX.toFixed(2)}" y="${labelY}" text-anchor="end" font-family="sans-serif" font-size="10" transform="rotate(-35 ${labelX.toFixed(2)} ${labelY})">${escapeXml(d.label)}</text>`
    );
  });

  parts.push("</svg>");
  return parts.join("\n");
}

export interface HistogramBin {
  readonly lower: number;
  readonly upper: number;
  readonly count: number;
}

/**
 * Equal-width bins over [min, max]. A constant series yields one bin.
 */
export function histogramBins(values: readonly number[], binCount = 10): HistogramBin[] {
  const range = extent(values);
  if (range === undefined) {
    return [];
  }
  const { min, max } = range;
  if (min === max) {
    return [{ lower: min, upper: max, count: values.length }];
  }

  const size = (max - min) / binCount;
  const bins = Array.from({ length: binCount }, (_, i) => ({
    lower: min + i * size,
    upper: min + (i + 1) * size,
    count: 0,
  }));
  for (const value of values) {
    const index = Math.min(binCount - 1, Math.floor((value - min) / size));
    const bin = bins[index];
    if (bin) {
      bin.count += 1;
    }
  }
  return bins;
}

export function renderHistogram(
  values: readonly number[],
  options: BarChartOptions & { readonly bins?: number }
): string {
  const bins = histogramBins(values, options.bins);
  return renderBarChart(
    bins.map((bin) => ({ label: formatTick(bin.lower), value: bin.count })),
    options
  );
}

export interface ImpactSeries {
  readonly before: readonly number[];
  readonly after: readonly number[];
}

/**
 * Side-by-side before/after histogram over a shared range.
 */
export function renderImpactChart(series: ImpactSeries, options: BarChartOptions): string {
  const combined = [...series.before, ...series.after];
  const bins = histogramBins(combined);
  const count = (values: readonly number[], lower: number, upper: number, last: boolean): number =>
    values.filter((v) => v >= lower && (last ? v <= upper : v < upper)).length;

  const data: BarDatum[] = [];
  bins.forEach((bin, i) => {
    const last = i === bins.length - 1;
    data.push(
      { label: `${formatTick(bin.lower)} before`, value: count(series.before, bin.lower, bin.upper, last) },
      { label: `${formatTick(bin.lower)} after`, value: count(series.after, bin.lower, bin.upper, last) }
    );
  });
  return renderBarChart(data, { color: "#55a868", ...options });
}
