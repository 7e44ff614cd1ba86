/**
 * Spreadsheet ingestion (.xlsx and .xls).
 *
 * The first sheet is read with its first row as the header. Cells are turned
 * back into text so that column types are inferred exactly as for CSV.
 */

import * as XLSX from "xlsx";
import type { Dataset } from "../types/dataset.js";
import { inferColumn } from "./csv.js";
import { InvalidInputError } from "./errors.js";
import { createDataset } from "./frame.js";

function cellText(value: unknown): string | undefined {
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return undefined;
}

/**
 * Parse a workbook held in memory into a typed dataset.
 *
 * @throws InvalidInputError if the workbook has no sheet or no header columns
 */
export function parseWorkbook(data: Buffer): Dataset {
  const workbook = XLSX.read(data, { type: "buffer", cellDates: true });
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) {
    throw new InvalidInputError("Spreadsheet has no sheets");
  }

  const [header = [], ...rows] = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    raw: true,
    defval: null,
    blankrows: false,
  });

  const fields = header
    .map((value, index) => ({ name: cellText(value)?.trim() ?? "", index }))
    .filter((field) => field.name !== "");
  if (fields.length === 0) {
    throw new InvalidInputError("Spreadsheet has no header columns");
  }

  return createDataset(
    fields.map((field) => inferColumn(field.name, rows.map((row) => cellText(row[field.index]))))
  );
}
