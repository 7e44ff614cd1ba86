/**
 * Tabular dataset definitions.
 * A dataset is an ordered list of named, typed columns of equal length.
 * `null` is the explicit missing marker in every column type.
 */

export type ColumnType = "numeric" | "categorical" | "datetime" | "boolean";

/** Explicit missing-value marker. */
export const MISSING = null;
export type Missing = typeof MISSING;

interface TypedColumn<T extends ColumnType, V> {
  readonly name: string;
  readonly type: T;
  readonly values: readonly (V | Missing)[];
}

export type NumericColumn = TypedColumn<"numeric", number>;
export type CategoricalColumn = TypedColumn<"categorical", string>;
export type DatetimeColumn = TypedColumn<"datetime", Date>;
export type BooleanColumn = TypedColumn<"boolean", boolean>;

export type Column =
  | NumericColumn
  | CategoricalColumn
  | DatetimeColumn
  | BooleanColumn;

export type CellValue = number | string | boolean | Date | Missing;

export interface Dataset {
  readonly columns: readonly Column[];
}
