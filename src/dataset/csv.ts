/**
 * CSV ingestion and export.
 *
 * Values are read as text and every column's type is inferred from its
 * present values: numeric, then boolean, then datetime, else categorical.
 */

import Papa from "papaparse";
import {
  MISSING,
  type Column,
  type Dataset,
} from "../types/dataset.js";
import { InvalidInputError } from "./errors.js";
import { cells, createDataset, formatCell, rowCount } from "./frame.js";

const MISSING_TOKENS = new Set(["", "na", "n/a", "nan", "null", "none"]);
const NUMBER_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;
const BOOLEAN_TOKENS = new Map<string, boolean>([
  ["true", true],
  ["false", false],
  ["yes", true],
  ["no", false],
]);
const DATE_PATTERN =
  /^\d{4}-\d{2}-\d{2}([T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

export function isMissingToken(raw: string | undefined): boolean {
  return raw === undefined || MISSING_TOKENS.has(raw.trim().toLowerCase());
}

function parseDate(text: string): Date | undefined {
  if (!DATE_PATTERN.test(text)) {
    return undefined;
  }
  const date = new Date(text.includes(" ") ? text.replace(" ", "T") : text);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

/**
 * Infer a typed column from raw text cells.
 */
export function inferColumn(name: string, raw: readonly (string | undefined)[]): Column {
  const present = raw
    .filter((value): value is string => !isMissingToken(value))
    .map((value) => value.trim());
  const read = <V>(convert: (text: string) => V): (V | null)[] =>
    raw.map((value) => (value === undefined || isMissingToken(value) ? MISSING : convert(value.trim())));

  if (present.length === 0) {
    return { name, type: "categorical", values: raw.map(() => MISSING) };
  }

  if (present.every((value) => NUMBER_PATTERN.test(value))) {
    return { name, type: "numeric", values: read((text) => Number(text)) };
  }

  if (present.every((value) => BOOLEAN_TOKENS.has(value.toLowerCase()))) {
    return {
      name,
      type: "boolean",
      values: read((text) => BOOLEAN_TOKENS.get(text.toLowerCase()) ?? false),
    };
  }

  if (present.every((value) => parseDate(value) !== undefined)) {
    return {
      name,
      type: "datetime",
      values: read((text) => parseDate(text) ?? new Date(Number.NaN)),
    };
  }

  return { name, type: "categorical", values: read((text) => text) };
}

/**
 * Parse CSV text with a header row into a typed dataset.
 *
 * @throws InvalidInputError if the text has no header columns
 */
export function parseCsv(text: string): Dataset {
  const parsed = Papa.parse<Record<string, string | undefined>>(text, {
    header: true,
    skipEmptyLines: true,
    dynamicTyping: false,
  });

  const fields = (parsed.meta.fields ?? []).filter((field) => field.trim() !== "");
  if (fields.length === 0) {
    throw new InvalidInputError("CSV input has no header columns");
  }

  return createDataset(
    fields.map((field) => inferColumn(field, parsed.data.map((row) => row[field])))
  );
}

/**
 * Render a dataset as CSV. Missing cells are empty, dates are ISO-8601.
 */
export function toCsv(dataset: Dataset): string {
  const fields = dataset.columns.map((column) => column.name);
  const data: string[][] = [];
  for (let i = 0; i < rowCount(dataset); i++) {
    data.push(dataset.columns.map((column) => formatCell(cells(column)[i] ?? MISSING)));
  }
  return Papa.unparse({ fields, data });
}
