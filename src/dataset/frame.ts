/**
 * Dataset construction and column helpers.
 *
 * Datasets are treated as immutable values: every helper returns a new
 * dataset or column and leaves its input untouched.
 */

import {
  MISSING,
  type CellValue,
  type Column,
  type Dataset,
  type Missing,
} from "../types/dataset.js";
import { InvalidInputError, ValidationError } from "./errors.js";

/**
 * A values-array transformation that preserves the cell type.
 */
export type ValuesTransform = <V>(values: readonly (V | Missing)[]) => (V | Missing)[];

export function transformValues(column: Column, transform: ValuesTransform): Column {
  switch (column.type) {
    case "numeric":
      return { ...column, values: transform(column.values) };
    case "categorical":
      return { ...column, values: transform(column.values) };
    case "datetime":
      return { ...column, values: transform(column.values) };
    case "boolean":
      return { ...column, values: transform(column.values) };
  }
}

/**
 * Build a dataset, rejecting empty, ragged or ambiguously named input.
 */
export function createDataset(columns: readonly Column[]): Dataset {
  if (columns.length === 0) {
    throw new InvalidInputError("Dataset must contain at least one column");
  }

  const seen = new Set<string>();
  const expectedRows = columns[0]?.values.length ?? 0;

  for (const column of columns) {
    if (seen.has(column.name)) {
      throw new InvalidInputError(`Duplicate column name: "${column.name}"`);
    }
    seen.add(column.name);

    if (column.values.length !== expectedRows) {
      throw new InvalidInputError(
        `Column "${column.name}" has ${column.values.length} rows, expected ${expectedRows}`
      );
    }
  }

  return { columns: [...columns] };
}

export function rowCount(dataset: Dataset): number {
  return dataset.columns[0]?.values.length ?? 0;
}

export function columnNames(dataset: Dataset): string[] {
  return dataset.columns.map((column) => column.name);
}

/**
 * Copy a dataset so that no array or date is shared with the source.
 */
export function cloneDataset(dataset: Dataset): Dataset {
  return {
    columns: dataset.columns.map((column) =>
      column.type === "datetime"
        ? {
            ...column,
            values: column.values.map((value) =>
              value === MISSING ? MISSING : new Date(value.getTime())
            ),
          }
        : transformValues(column, (values) => [...values])
    ),
  };
}

export function findColumn(dataset: Dataset, name: string): Column | undefined {
  return dataset.columns.find((column) => column.name === name);
}

/**
 * @throws ValidationError when the column does not exist
 */
export function getColumn(dataset: Dataset, name: string): Column {
  const column = findColumn(dataset, name);
  if (!column) {
    throw new ValidationError(
      `Unknown column "${name}". Available columns: ${columnNames(dataset).join(", ")}`,
      [{ path: ["column"], message: `Unknown column "${name}"`, code: "unknown_column" }]
    );
  }
  return column;
}

/**
 * Swap in a column with the same name, keeping column order.
 */
export function replaceColumn(dataset: Dataset, column: Column): Dataset {
  const index = dataset.columns.findIndex((existing) => existing.name === column.name);
  if (index === -1) {
    throw new ValidationError(`Cannot replace unknown column "${column.name}"`);
  }
  if (column.values.length !== rowCount(dataset)) {
    throw new ValidationError(
      `Replacement column "${column.name}" has ${column.values.length} rows, expected ${rowCount(dataset)}`
    );
  }
  const columns = [...dataset.columns];
  columns[index] = column;
  return { columns };
}

export function dropRows(dataset: Dataset, rows: ReadonlySet<number>): Dataset {
  return {
    columns: dataset.columns.map((column) =>
      transformValues(column, (values) => values.filter((_, index) => !rows.has(index)))
    ),
  };
}

/**
 * The column's values widened to the common cell type.
 */
export function cells(column: Column): readonly CellValue[] {
  return column.values;
}

export function missingIndices(column: Column): number[] {
  const indices: number[] = [];
  cells(column).forEach((value, index) => {
    if (value === MISSING) {
      indices.push(index);
    }
  });
  return indices;
}

export function countMissing(column: Column): number {
  return cells(column).filter((value) => value === MISSING).length;
}

export function totalMissing(dataset: Dataset): number {
  return dataset.columns.reduce((sum, column) => sum + countMissing(column), 0);
}

/**
 * Present (non-missing) values of a numeric column.
 */
export function presentNumbers(column: Column): number[] {
  if (column.type !== "numeric") {
    return [];
  }
  return column.values.filter((value): value is number => value !== MISSING);
}

/**
 * Render a cell for reports, CSV export and change log entries.
 */
export function formatCell(value: CellValue): string {
  if (value === MISSING) {
    return "";
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value);
}
