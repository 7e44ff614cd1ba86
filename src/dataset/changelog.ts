/**
 * Change log entry schema.
 *
 * One entry records one cleaning action on one column. Entries are
 * append-only audit records: the store assigns the sequence number and
 * timestamp, freezes the entry and never edits or removes it.
 */

import { z } from "zod";

export const ChangeAction = z.enum(["impute", "drop", "fallback-impute"]);
export type ChangeAction = z.infer<typeof ChangeAction>;

export const ChangeMethod = z.enum(["mean", "median", "mode"]);

export const ColumnSummarySchema = z
  .object({
    missing: z.number().int().min(0),
    mean: z.number().nullable().optional(),
    median: z.number().nullable().optional(),
    std: z.number().nullable().optional(),
    mode: z.string().nullable().optional(),
    rowsRemaining: z.number().int().min(0).optional(),
  })
  .strict();

/** Most affected row indices kept per entry */
export const MAX_SAMPLED_INDICES = 10;

export const ChangeLogEntryInputSchema = z
  .object({
    /** Stage that performed the action */
    stage: z.string().min(1),
    column: z.string().min(1),
    action: ChangeAction,
    method: ChangeMethod.optional(),
    fillValue: z.union([z.string(), z.number(), z.boolean()]).optional(),
    reason: z.string().min(1),
    affectedRowsCount: z.number().int().min(0),
    affectedIndices: z.array(z.number().int().min(0)).max(MAX_SAMPLED_INDICES),
    preStats: ColumnSummarySchema,
    postStats: ColumnSummarySchema,
  })
  .strict()
  .superRefine((entry, ctx) => {
    if (entry.action !== "drop" && entry.method === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["method"],
        message: `Action "${entry.action}" requires an imputation method`,
      });
    }
    if (entry.action !== "drop" && entry.fillValue === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["fillValue"],
        message: `Action "${entry.action}" requires the value used`,
      });
    }
    if (entry.affectedIndices.length > entry.affectedRowsCount) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["affectedIndices"],
        message: "More sampled indices than affected rows",
      });
    }
  });

export type ChangeLogEntryInput = z.infer<typeof ChangeLogEntryInputSchema>;

export interface ChangeLogEntry extends ChangeLogEntryInput {
  /** 1-based position in the run's change log */
  readonly sequence: number;
  /** ISO-8601 timestamp */
  readonly recordedAt: string;
}

/**
 * Human-readable one-liner for an entry, used by reports and summaries.
 */
export function describeChange(entry: ChangeLogEntryInput): string {
  switch (entry.action) {
    case "drop":
      return `Dropped ${entry.affectedRowsCount} rows with missing '${entry.column}'`;
    case "impute":
      return `Filled ${entry.affectedRowsCount} missing values in '${entry.column}' with ${entry.method} (${entry.fillValue})`;
    case "fallback-impute":
      return `Fallback filled ${entry.affectedRowsCount} missing values in '${entry.column}' with ${entry.method} (${entry.fillValue})`;
  }
}
