/**
 * Run and stage status definitions shared by the Progress Tracker and the
 * status-query interface.
 */

import type { StageId } from "../config/pipeline/enums.js";

export enum RunStatus {
  Idle = "idle",
  Running = "running",
  Completed = "completed",
  Error = "error",
}

export enum StageStatus {
  Pending = "pending",
  Running = "running",
  Completed = "completed",
}

export enum ActivityStatus {
  Started = "started",
  Retrying = "retrying",
  Completed = "completed",
  Skipped = "skipped",
  Failed = "failed",
}

export interface StageProgress {
  readonly id: StageId;
  readonly name: string;
  readonly status: StageStatus;
}

export interface ActivityEntry {
  /** ISO-8601 timestamp */
  readonly timestamp: string;
  readonly actor: string;
  readonly action: string;
  readonly status: ActivityStatus;
}

/**
 * Snapshot returned by the status-query interface.
 */
export interface PipelineStatus {
  readonly runId: string | null;
  readonly status: RunStatus;
  readonly message: string;
  /** Overall completion, 0-100 */
  readonly percentage: number;
  readonly currentStage: StageId | null;
  readonly stages: readonly StageProgress[];
  /** Most recent first */
  readonly activityLog: readonly ActivityEntry[];
}
