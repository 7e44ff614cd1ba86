/**
 * Progress Tracker.
 *
 * State machine over the fixed stage list:
 *
 *   idle ──start()──▶ running ──complete()──▶ completed
 *                        │
 *                        └──error()──▶ error        (error() is legal from any state)
 *
 *   reset() returns any state to idle.
 *
 * The tracker is read by a status poller while a run mutates it. Every
 * transition builds a complete new state object and publishes it with a
 * single assignment inside one synchronous call, so a reader can never
 * observe a half-applied transition (for example a new current stage whose
 * status is still pending). Published states are frozen and handed out
 * as-is; readers never need a copy and never block a writer.
 */

import type { StageId } from "../config/pipeline/enums.js";
import type { StageDefinition } from "../config/pipeline/schema.js";
import {
  ActivityStatus,
  RunStatus,
  StageStatus,
  type ActivityEntry,
  type PipelineStatus,
  type StageProgress,
} from "../types/pipeline.js";
import { deepFreeze } from "../utils/freeze.js";

export class IllegalTransitionError extends Error {
  constructor(
    public readonly from: RunStatus,
    public readonly operation: string
  ) {
    super(`Cannot ${operation} while the pipeline is ${from}`);
    this.name = "IllegalTransitionError";
  }
}

export interface ProgressTrackerOptions {
  stages: readonly StageDefinition[];
  /** Activity entries kept, newest first */
  activityLogLimit?: number;
  clock?: () => Date;
}

export type StatusListener = (status: PipelineStatus) => void;

/** Percentage reported as soon as a run starts */
export const START_PERCENTAGE = 5;

const DEFAULT_ACTIVITY_LOG_LIMIT = 20;

export class ProgressTracker {
  private readonly definitions: readonly StageDefinition[];
  private readonly activityLogLimit: number;
  private readonly clock: () => Date;
  private readonly listeners = new Set<StatusListener>();
  private state: PipelineStatus;

  constructor(options: ProgressTrackerOptions) {
    this.definitions = options.stages;
    this.activityLogLimit = options.activityLogLimit ?? DEFAULT_ACTIVITY_LOG_LIMIT;
    this.clock = options.clock ?? (() => new Date());
    this.state = this.idleState();
  }

  /** Current snapshot; immutable. */
  getStatus(): PipelineStatus {
    return this.state;
  }

  /**
   * Receive every published state. Returns an unsubscribe function.
   */
  onChange(listener: StatusListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  reset(): void {
    this.publish(this.idleState());
  }

  start(runId: string | null = null): void {
    if (this.state.status !== RunStatus.Idle) {
      throw new IllegalTransitionError(this.state.status, "start a run");
    }
    this.publish({
      ...this.state,
      runId,
      status: RunStatus.Running,
      message: "Starting EDA pipeline...",
      percentage: START_PERCENTAGE,
      currentStage: null,
      activityLog: [],
    });
  }

  /** Percentages only move forward, whatever the stage window says. */
  startStage(id: StageId): void {
    const definition = this.requireRunningStage(id, "start a stage");
    const order = this.stageIndex(id);
    const currentOrder = this.state.currentStage === null ? -1 : this.stageIndex(this.state.currentStage);
    if (order < currentOrder) {
      throw new IllegalTransitionError(
        this.state.status,
        `start stage "${id}" after "${this.state.currentStage}"`
      );
    }

    this.publish({
      ...this.state,
      currentStage: id,
      message: `Running ${definition.name}...`,
      percentage: Math.max(this.state.percentage, definition.progressStart),
      stages: this.withStageStatus(id, StageStatus.Running),
    });
  }

  /**
   * Mark a stage completed. The current stage is left in place; the
   * orchestrator decides which stage runs next.
   */
  completeStage(id: StageId): void {
    const definition = this.requireRunningStage(id, "complete a stage");
    this.publish({
      ...this.state,
      message: `${definition.name} complete`,
      percentage: Math.max(this.state.percentage, definition.progressEnd),
      stages: this.withStageStatus(id, StageStatus.Completed),
    });
  }

  logActivity(actor: string, action: string, status: ActivityStatus = ActivityStatus.Completed): void {
    const entry: ActivityEntry = {
      timestamp: this.clock().toISOString(),
      actor,
      action,
      status,
    };
    this.publish({
      ...this.state,
      activityLog: [entry, ...this.state.activityLog].slice(0, this.activityLogLimit),
    });
  }

  /**
   * Finish the run. Forces every stage to completed; calling it again on a
   * completed run changes nothing.
   */
  complete(): void {
    if (this.state.status === RunStatus.Completed) {
      return;
    }
    if (this.state.status !== RunStatus.Running) {
      throw new IllegalTransitionError(this.state.status, "complete the run");
    }
    this.publish({
      ...this.state,
      status: RunStatus.Completed,
      message: "Analysis complete!",
      percentage: 100,
      currentStage: null,
      stages: this.state.stages.map((stage) => ({ ...stage, status: StageStatus.Completed })),
    });
  }

  error(message: string): void {
    this.publish({
      ...this.state,
      status: RunStatus.Error,
      message,
      percentage: 0,
    });
  }

  private idleState(): PipelineStatus {
    return {
      runId: null,
      status: RunStatus.Idle,
      message: "",
      percentage: 0,
      currentStage: null,
      stages: this.definitions.map((stage) => ({
        id: stage.id,
        name: stage.name,
        status: StageStatus.Pending,
      })),
      activityLog: [],
    };
  }

  private publish(next: PipelineStatus): void {
    this.state = deepFreeze(next);
    for (const listener of this.listeners) {
      listener(this.state);
    }
  }

  private stageIndex(id: StageId): number {
    return this.definitions.findIndex((stage) => stage.id === id);
  }

  private requireRunningStage(id: StageId, operation: string): StageDefinition {
    if (this.state.status !== RunStatus.Running) {
      throw new IllegalTransitionError(this.state.status, operation);
    }
    const definition = this.definitions.find((stage) => stage.id === id);
    if (!definition) {
      throw new IllegalTransitionError(this.state.status, `${operation} "${id}" that is not configured`);
    }
    return definition;
  }

  private withStageStatus(id: StageId, status: StageStatus): StageProgress[] {
    return this.state.stages.map((stage) => (stage.id === id ? { ...stage, status } : stage));
  }
}
