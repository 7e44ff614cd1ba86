/**
 * Load a tabular file from disk, picking the reader by extension.
 */

import { existsSync } from "node:fs";
import { readFile, stat } from "node:fs/promises";
import { extname } from "node:path";
import type { Dataset } from "../types/dataset.js";
import { parseCsv } from "./csv.js";
import { parseWorkbook } from "./excel.js";
import { InvalidInputError } from "./errors.js";

const READERS: Record<string, (path: string) => Promise<Dataset>> = {
  ".csv": async (path) => parseCsv(await readFile(path, "utf-8")),
  ".xlsx": async (path) => parseWorkbook(await readFile(path)),
  ".xls": async (path) => parseWorkbook(await readFile(path)),
};

export const SUPPORTED_EXTENSIONS = Object.keys(READERS);

/**
 * @throws InvalidInputError for a missing path, a directory or an unsupported extension
 */
export async function loadDatasetFile(path: string): Promise<Dataset> {
  if (!existsSync(path)) {
    throw new InvalidInputError(`File not found: ${path}`);
  }
  if (!(await stat(path)).isFile()) {
    throw new InvalidInputError(`Path is not a file: ${path}`);
  }
  const extension = extname(path).toLowerCase();
  const reader = READERS[extension];
  if (!reader) {
    throw new InvalidInputError(
      `Unsupported file format: ${extension || "(none)"}. Supported: ${SUPPORTED_EXTENSIONS.join(", ")}`
    );
  }
  return reader(path);
}
