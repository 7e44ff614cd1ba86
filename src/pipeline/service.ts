/**
 * Single-flight pipeline service.
 *
 * At most one run is active. Starting while a run is `running` returns the
 * active run's id instead of creating a second run. Each started run gets a
 * fresh Dataset Store, Model Registry and Progress Tracker, so nothing leaks
 * from one run into the next.
 */

import type { PipelineConfig } from "../config/pipeline/schema.js";
import { DatasetStore } from "../dataset/store.js";
import type { Dataset } from "../types/dataset.js";
import { RunStatus, type PipelineStatus } from "../types/pipeline.js";
import type { Logger } from "../logging/logger.js";
import { generateRunId } from "../logging/run-id.js";
import { ModelRegistry } from "../models/registry.js";
import { ProgressTracker, type StatusListener } from "../progress/tracker.js";
import type { StageHandlers } from "../stages/types.js";
import { PipelineOrchestrator, type RunResult } from "./orchestrator.js";
import type { Sleep } from "./retry.js";

export type StartResult =
  | { readonly status: "started"; readonly runId: string }
  | { readonly status: "already_running"; readonly runId: string };

export type RunOutcome =
  | { readonly status: "completed"; readonly result: RunResult }
  | { readonly status: "error"; readonly runId: string; readonly error: unknown };

export interface PipelineServiceOptions {
  config: Readonly<PipelineConfig>;
  logger: Logger;
  outputDir: string;
  handlers?: StageHandlers;
  sleep?: Sleep;
  /** Subscribed to every run's tracker */
  onStatus?: StatusListener;
}

interface ActiveRun {
  readonly runId: string;
  readonly tracker: ProgressTracker;
  readonly outcome: Promise<RunOutcome>;
}

export class PipelineService {
  private readonly idleTracker: ProgressTracker;
  private active: ActiveRun | undefined;

  constructor(private readonly options: PipelineServiceOptions) {
    this.idleTracker = this.createTracker();
  }

  start(dataset: Dataset): StartResult {
    if (this.active && this.active.tracker.getStatus().status === RunStatus.Running) {
      return { status: "already_running", runId: this.active.runId };
    }

    const runId = generateRunId();
    const tracker = this.createTracker();
    if (this.options.onStatus) {
      tracker.onChange(this.options.onStatus);
    }

    const orchestrator = new PipelineOrchestrator({
      config: this.options.config,
      store: new DatasetStore(),
      models: new ModelRegistry(),
      tracker,
      logger: this.options.logger,
      outputDir: this.options.outputDir,
      ...(this.options.handlers ? { handlers: this.options.handlers } : {}),
      ...(this.options.sleep ? { sleep: this.options.sleep } : {}),
    });

    const outcome = orchestrator.run(dataset, runId).then(
      (result): RunOutcome => ({ status: "completed", result }),
      (error: unknown): RunOutcome => ({ status: "error", runId, error })
    );
    this.active = { runId, tracker, outcome };
    return { status: "started", runId };
  }

  /** Status of the latest run, or an idle snapshot before the first one. */
  getStatus(): PipelineStatus {
    return (this.active?.tracker ?? this.idleTracker).getStatus();
  }

  /**
   * Settled outcome of the latest run.
   *
   * @throws Error if no run was ever started
   */
  async waitForCompletion(): Promise<RunOutcome> {
    if (!this.active) {
      throw new Error("No pipeline run has been started");
    }
    return this.active.outcome;
  }

  private createTracker(): ProgressTracker {
    return new ProgressTracker({
      stages: this.options.config.stages,
      activityLogLimit: this.options.config.activityLogLimit,
    });
  }
}
