/**
 * Dataset Store.
 *
 * Owns one run's working dataset: the `original` snapshot captured at
 * ingestion, the `current` snapshot that cleaning replaces, the structured
 * change log, a human-readable history of replacements, per-column
 * statistics history and the typed metadata bag.
 *
 * Snapshots are copied and frozen when they enter the store, and Date cells
 * are copied again on every read. `replaceCurrent` swaps the reference, so a
 * dataset obtained from `current()` before a replacement is stale afterwards
 * but never changes underneath its holder.
 */

import type { z } from "zod";
import { MISSING, type Dataset } from "../types/dataset.js";
import { deepFreeze } from "../utils/freeze.js";
import { formatZodIssues } from "../config/pipeline/loader.js";
import {
  ChangeLogEntryInputSchema,
  type ChangeLogEntry,
  type ChangeLogEntryInput,
} from "./changelog.js";
import { cloneDataset, createDataset, rowCount } from "./frame.js";
import { InvalidInputError, ValidationError } from "./errors.js";
import {
  METADATA_SCHEMAS,
  type MetadataBag,
  type MetadataKey,
} from "./metadata.js";
import type { ColumnSummary } from "./stats.js";

export type StatsPhase = "pre_cleaning" | "post_cleaning" | "post_fallback";

export type ColumnStatsHistory = Partial<Record<StatsPhase, ColumnSummary>>;

/**
 * Opaque capture of the store's mutable state, used to roll back a failed
 * stage attempt.
 */
export interface StoreCheckpoint {
  readonly current: Dataset;
  readonly changeLogLength: number;
  readonly historyLength: number;
  readonly metadata: Partial<MetadataBag>;
  readonly stats: Map<string, ColumnStatsHistory>;
  readonly dropsSinceReplace: number;
}

function freezeDataset(dataset: Dataset): Dataset {
  for (const column of dataset.columns) {
    Object.freeze(column.values);
    Object.freeze(column);
  }
  Object.freeze(dataset.columns);
  return Object.freeze(dataset);
}

/**
 * Freezing does not stop `setTime` on a Date cell, so readers of a snapshot
 * with datetime columns get their own Date objects.
 */
function detachDates(dataset: Dataset): Dataset {
  if (!dataset.columns.some((column) => column.type === "datetime")) {
    return dataset;
  }
  return freezeDataset({
    columns: dataset.columns.map((column) =>
      column.type === "datetime"
        ? {
            ...column,
            values: column.values.map((value) => (value === MISSING ? MISSING : new Date(value.getTime()))),
          }
        : column
    ),
  });
}

export class DatasetStore {
  private originalSnapshot: Dataset | undefined;
  private currentSnapshot: Dataset | undefined;
  private entries: ChangeLogEntry[] = [];
  private descriptions: string[] = [];
  private metadata: Partial<MetadataBag> = {};
  private stats = new Map<string, ColumnStatsHistory>();
  private dropsSinceReplace = 0;

  constructor(private readonly clock: () => Date = () => new Date()) {}

  /**
   * Load a dataset into both snapshots and clear every log and the metadata bag.
   *
   * @throws InvalidInputError if the dataset has no columns or is ragged
   */
  initialize(dataset: Dataset): void {
    const validated = createDataset(dataset.columns);
    this.reset();
    this.originalSnapshot = freezeDataset(cloneDataset(validated));
    this.currentSnapshot = freezeDataset(cloneDataset(validated));
  }

  isInitialized(): boolean {
    return this.currentSnapshot !== undefined;
  }

  /** Discard snapshots, logs and metadata. */
  reset(): void {
    this.originalSnapshot = undefined;
    this.currentSnapshot = undefined;
    this.entries = [];
    this.descriptions = [];
    this.metadata = {};
    this.stats = new Map();
    this.dropsSinceReplace = 0;
  }

  current(): Dataset {
    if (!this.currentSnapshot) {
      throw new InvalidInputError("No dataset loaded");
    }
    return detachDates(this.currentSnapshot);
  }

  original(): Dataset {
    if (!this.originalSnapshot) {
      throw new InvalidInputError("No dataset loaded");
    }
    return detachDates(this.originalSnapshot);
  }

  /**
   * Swap the current snapshot and append a description to the history.
   *
   * Rows may only disappear when a `drop` change was recorded since the
   * previous replacement; rows may never appear.
   */
  replaceCurrent(dataset: Dataset, description: string): void {
    const validated = createDataset(dataset.columns);
    const before = rowCount(this.current());
    const after = rowCount(validated);

    if (after > before) {
      throw new ValidationError(
        `Replacement dataset has ${after} rows, more than the current ${before}`
      );
    }
    if (after < before && this.dropsSinceReplace === 0) {
      throw new ValidationError(
        `Replacement dataset removes ${before - after} rows without a recorded drop`
      );
    }

    this.currentSnapshot = freezeDataset(cloneDataset(validated));
    this.descriptions.push(description);
    this.dropsSinceReplace = 0;
  }

  /**
   * Append one structured change log entry.
   *
   * @throws ValidationError if the entry is malformed
   */
  recordChange(entry: ChangeLogEntryInput): ChangeLogEntry {
    const result = ChangeLogEntryInputSchema.safeParse(entry);
    if (!result.success) {
      throw new ValidationError(
        `Invalid change log entry for column "${entry.column}"`,
        formatZodIssues(result.error.issues)
      );
    }

    const recorded: ChangeLogEntry = deepFreeze({
      ...result.data,
      sequence: this.entries.length + 1,
      recordedAt: this.clock().toISOString(),
    });
    this.entries.push(recorded);

    if (recorded.action === "drop") {
      this.dropsSinceReplace += 1;
    }
    return recorded;
  }

  changeLog(): readonly ChangeLogEntry[] {
    return [...this.entries];
  }

  history(): readonly string[] {
    return [...this.descriptions];
  }

  /**
   * Write a metadata key after validating the value against its schema.
   *
   * @throws ValidationError if the value does not match the key's shape
   */
  setMetadata<K extends MetadataKey>(key: K, value: MetadataBag[K]): void {
    const schema: z.ZodTypeAny = METADATA_SCHEMAS[key];
    const result = schema.safeParse(value);
    if (!result.success) {
      throw new ValidationError(
        `Invalid value for metadata key "${key}"`,
        formatZodIssues(result.error.issues)
      );
    }

    const stored = structuredClone(value);
    deepFreeze(stored);
    this.metadata[key] = stored;
  }

  /** Whole bag, or one key; an unset key reads as undefined. */
  getMetadata(): Readonly<Partial<MetadataBag>>;
  getMetadata<K extends MetadataKey>(key: K): MetadataBag[K] | undefined;
  getMetadata<K extends MetadataKey>(
    key?: K
  ): Readonly<Partial<MetadataBag>> | MetadataBag[K] | undefined {
    if (key === undefined) {
      return { ...this.metadata };
    }
    return this.metadata[key];
  }

  recordColumnStats(column: string, phase: StatsPhase, summary: ColumnSummary): void {
    const history = this.stats.get(column) ?? {};
    this.stats.set(column, { ...history, [phase]: { ...summary } });
  }

  columnStatsHistory(): Record<string, ColumnStatsHistory>;
  columnStatsHistory(column: string): ColumnStatsHistory | undefined;
  columnStatsHistory(
    column?: string
  ): Record<string, ColumnStatsHistory> | ColumnStatsHistory | undefined {
    if (column === undefined) {
      return Object.fromEntries(this.stats);
    }
    return this.stats.get(column);
  }

  checkpoint(): StoreCheckpoint {
    return {
      current: this.current(),
      changeLogLength: this.entries.length,
      historyLength: this.descriptions.length,
      metadata: { ...this.metadata },
      stats: new Map(this.stats),
      dropsSinceReplace: this.dropsSinceReplace,
    };
  }

  /**
   * Roll back to a checkpoint taken earlier in the same run. Entries recorded
   * after the checkpoint are discarded.
   */
  restore(checkpoint: StoreCheckpoint): void {
    this.currentSnapshot = checkpoint.current;
    this.entries = this.entries.slice(0, checkpoint.changeLogLength);
    this.descriptions = this.descriptions.slice(0, checkpoint.historyLength);
    this.metadata = { ...checkpoint.metadata };
    this.stats = new Map(checkpoint.stats);
    this.dropsSinceReplace = checkpoint.dropsSinceReplace;
  }
}
