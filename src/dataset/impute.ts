/**
 * Missing-value imputation shared by the cleaning stage and the fallback pass.
 */

import { MISSING, type Column, type Missing } from "../types/dataset.js";
import { missingIndices, presentNumbers } from "./frame.js";
import {
  compareBooleans,
  compareNumbers,
  compareStrings,
  mean,
  median,
  mode,
} from "./stats.js";

export type ImputationMethod = "mean" | "median" | "mode";

/**
 * Values substituted when a column has no present value to derive a fill from.
 */
export const PLACEHOLDERS = {
  numeric: 0,
  categorical: "Unknown",
  datetime: new Date(0),
  boolean: false,
} as const;

export interface Imputation {
  readonly column: Column;
  /** Method actually applied; non-numeric columns always use mode */
  readonly method: ImputationMethod;
  readonly fillValue: number | string | boolean;
  /** Row indices that were missing before the fill */
  readonly affected: readonly number[];
  /** True when the column had no present values and a placeholder was used */
  readonly placeholder: boolean;
}

function fill<V>(values: readonly (V | Missing)[], value: V): V[] {
  return values.map((existing) => (existing === MISSING ? value : existing));
}

function numericFill(values: readonly number[], method: ImputationMethod): number | undefined {
  switch (method) {
    case "mean":
      return mean(values);
    case "median":
      return median(values);
    case "mode":
      return mode(values, compareNumbers);
  }
}

/**
 * Fill every missing cell of a column.
 *
 * Numeric columns use the requested method; categorical, datetime and boolean
 * columns always use their mode. A column without any present value is
 * filled with its type's placeholder.
 */
export function imputeColumn(column: Column, method: ImputationMethod): Imputation {
  const affected = missingIndices(column);

  switch (column.type) {
    case "numeric": {
      const computed = numericFill(presentNumbers(column), method);
      const value = computed ?? PLACEHOLDERS.numeric;
      return {
        column: { ...column, values: fill(column.values, value) },
        method,
        fillValue: value,
        affected,
        placeholder: computed === undefined,
      };
    }
    case "categorical": {
      const computed = mode(
        column.values.filter((value): value is string => value !== MISSING),
        compareStrings
      );
      const value = computed ?? PLACEHOLDERS.categorical;
      return {
        column: { ...column, values: fill(column.values, value) },
        method: "mode",
        fillValue: value,
        affected,
        placeholder: computed === undefined,
      };
    }
    case "datetime": {
      const computed = mode(
        column.values
          .filter((value): value is Date => value !== MISSING)
          .map((value) => value.getTime()),
        compareNumbers
      );
      const time = computed ?? PLACEHOLDERS.datetime.getTime();
      return {
        column: {
          ...column,
          values: column.values.map((value) => (value === MISSING ? new Date(time) : value)),
        },
        method: "mode",
        fillValue: new Date(time).toISOString(),
        affected,
        placeholder: computed === undefined,
      };
    }
    case "boolean": {
      const computed = mode(
        column.values.filter((value): value is boolean => value !== MISSING),
        compareBooleans
      );
      const value = computed ?? PLACEHOLDERS.boolean;
      return {
        column: { ...column, values: fill(column.values, value) },
        method: "mode",
        fillValue: value,
        affected,
        placeholder: computed === undefined,
      };
    }
  }
}
