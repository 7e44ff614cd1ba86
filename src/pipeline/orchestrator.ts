/**
 * Pipeline Orchestrator.
 *
 * Runs the fixed stage sequence over one run's Dataset Store, Model Registry
 * and Progress Tracker:
 *
 *   reset stores ─▶ for each stage: start ─▶ run (retry on transient) ─▶ complete
 *                ─▶ fallback pass ─▶ finalize report ─▶ write artifacts ─▶ complete
 *
 * Retries are scoped to the failing stage. The store and registry are
 * checkpointed before every attempt and rolled back when it fails, so a
 * retried stage starts from the same state and leaves no duplicate change
 * log entries behind. Any error that escapes a stage (non-transient, or
 * transient after the last attempt) moves the tracker to `error` and aborts
 * the run.
 */

import { STAGE_ORDER, type StageId } from "../config/pipeline/enums.js";
import type { PipelineConfig } from "../config/pipeline/schema.js";
import type { ChangeLogEntry } from "../dataset/changelog.js";
import type { DatasetStore } from "../dataset/store.js";
import type { Dataset } from "../types/dataset.js";
import { ActivityStatus, RunStatus } from "../types/pipeline.js";
import type { Logger } from "../logging/logger.js";
import { generateRunId } from "../logging/run-id.js";
import type { ModelRegistry } from "../models/registry.js";
import { resolveOutputPaths, type OutputPaths } from "../output/paths.js";
import { writeArtifacts, type ArtifactPaths } from "../output/writer.js";
import type { ProgressTracker } from "../progress/tracker.js";
import { finalizeReport, type ReportDocument } from "../report/document.js";
import { UpstreamOutputs } from "../stages/context.js";
import { createDefaultHandlers } from "../stages/index.js";
import type { StageHandlers, StageOutputMap } from "../stages/types.js";
import { getStageDefinition, validateStageTopology } from "./definition.js";
import { runFallbackPass } from "./fallback.js";
import { withRetry, type Sleep } from "./retry.js";

export interface OrchestratorOptions {
  config: Readonly<PipelineConfig>;
  store: DatasetStore;
  models: ModelRegistry;
  tracker: ProgressTracker;
  logger: Logger;
  /** Directory receiving cleaned data, report, charts and model */
  outputDir: string;
  /** Defaults to the built-in handler for every stage */
  handlers?: StageHandlers;
  /** Backoff wait; tests inject a no-op */
  sleep?: Sleep;
}

export interface RunResult {
  runId: string;
  outputs: Readonly<StageOutputMap>;
  /** Final change log, cleaning and fallback entries included */
  changeLog: readonly ChangeLogEntry[];
  fallbackEntries: readonly ChangeLogEntry[];
  /** Attempts each stage needed, 1 when it succeeded first time */
  attempts: Readonly<Record<StageId, number>>;
  document: ReportDocument;
  artifacts: ArtifactPaths;
}

/** Actor recorded for orchestrator-level activity */
export const ORCHESTRATOR_ACTOR = "Orchestrator";

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function completeOutputs(outputs: Partial<StageOutputMap>): StageOutputMap {
  const {
    profiling,
    cleaning,
    visualization,
    statistics,
    recommendation,
    training,
    explainability,
    reporting,
  } = outputs;
  if (
    !profiling ||
    !cleaning ||
    !visualization ||
    !statistics ||
    !recommendation ||
    !training ||
    !explainability ||
    !reporting
  ) {
    const missing = STAGE_ORDER.filter((id) => outputs[id] === undefined);
    throw new Error(`Pipeline finished without output from: ${missing.join(", ")}`);
  }
  return { profiling, cleaning, visualization, statistics, recommendation, training, explainability, reporting };
}

export class PipelineOrchestrator {
  private readonly config: Readonly<PipelineConfig>;
  private readonly store: DatasetStore;
  private readonly models: ModelRegistry;
  private readonly tracker: ProgressTracker;
  private readonly logger: Logger;
  private readonly handlers: StageHandlers;
  private readonly paths: OutputPaths;
  private readonly sleep: Sleep | undefined;

  constructor(options: OrchestratorOptions) {
    validateStageTopology(options.config.stages.map((stage) => stage.id));
    this.config = options.config;
    this.store = options.store;
    this.models = options.models;
    this.tracker = options.tracker;
    this.logger = options.logger;
    this.handlers = options.handlers ?? createDefaultHandlers();
    this.paths = resolveOutputPaths(options.outputDir);
    this.sleep = options.sleep;
  }

  /**
   * Run every stage over `dataset`.
   *
   * @throws the first non-transient error, or the last transient error once a
   * stage has used all its attempts; the tracker is in `error` either way
   */
  async run(dataset: Dataset, runId: string = generateRunId()): Promise<RunResult> {
    const logger = this.logger.withRunId(runId);

    const previous = this.tracker.getStatus().status;
    if (previous === RunStatus.Completed || previous === RunStatus.Error) {
      this.tracker.reset();
    }
    this.tracker.start(runId);
    logger.info("Pipeline started", { outputDir: this.paths.outputDir });

    try {
      this.models.reset();
      this.store.initialize(dataset);

      const outputs: Partial<StageOutputMap> = {};
      const attempts: Partial<Record<StageId, number>> = {};
      for (const id of STAGE_ORDER) {
        attempts[id] = await this.executeStage(id, runId, outputs, logger);
      }
      const completed = completeOutputs(outputs);

      const fallbackEntries = runFallbackPass(this.store);
      const filled = fallbackEntries.reduce((sum, entry) => sum + entry.affectedRowsCount, 0);
      this.tracker.logActivity(
        ORCHESTRATOR_ACTOR,
        fallbackEntries.length > 0
          ? `Fallback pass filled ${filled} missing values in ${fallbackEntries.length} columns`
          : "Fallback pass found no missing values",
        ActivityStatus.Completed
      );
      if (fallbackEntries.length > 0) {
        logger.warn("Fallback pass repaired missing values", {
          columns: fallbackEntries.map((entry) => entry.column),
          cells: filled,
        });
      }

      const changeLog = this.store.changeLog();
      const document = finalizeReport(
        completed.reporting.document,
        changeLog,
        this.store.columnStatsHistory()
      );
      const artifacts = await writeArtifacts(this.paths, {
        dataset: this.store.current(),
        document,
        model: this.models.toJSON(),
        charts: [...completed.visualization.charts, ...completed.explainability.charts],
      });

      this.tracker.complete();
      logger.info("Pipeline completed", {
        changes: changeLog.length,
        fallback: fallbackEntries.length,
        charts: artifacts.charts.length,
      });

      return {
        runId,
        outputs: completed,
        changeLog,
        fallbackEntries,
        attempts: {
          profiling: attempts.profiling ?? 0,
          cleaning: attempts.cleaning ?? 0,
          visualization: attempts.visualization ?? 0,
          statistics: attempts.statistics ?? 0,
          recommendation: attempts.recommendation ?? 0,
          training: attempts.training ?? 0,
          explainability: attempts.explainability ?? 0,
          reporting: attempts.reporting ?? 0,
        },
        document,
        artifacts,
      };
    } catch (err) {
      const message = errorMessage(err);
      this.tracker.error(message);
      logger.error("Pipeline failed", { error: message });
      throw err;
    }
  }

  /**
   * Run one stage with retry; returns the number of attempts it took.
   */
  private async executeStage<K extends StageId>(
    id: K,
    runId: string,
    outputs: Partial<StageOutputMap>,
    logger: Logger
  ): Promise<number> {
    const stage = getStageDefinition(this.config, id);
    const handler = this.handlers[id];

    this.tracker.startStage(id);
    this.tracker.logActivity(stage.actor, `Started ${stage.name}`, ActivityStatus.Started);
    logger.info(`Stage ${id} started`);

    const attempt = async (): Promise<StageOutputMap[K]> => {
      const storeCheckpoint = this.store.checkpoint();
      const modelCheckpoint = this.models.checkpoint();
      try {
        return await handler.run({
          runId,
          stage,
          config: this.config,
          store: this.store,
          models: this.models,
          upstream: new UpstreamOutputs(id, outputs),
          paths: this.paths,
          logger: logger,
        });
      } catch (err) {
        this.store.restore(storeCheckpoint);
        this.models.restore(modelCheckpoint);
        throw err;
      }
    };

    try {
      const { value, attempts } = await withRetry(attempt, {
        maxAttempts: this.config.retry.maxAttempts,
        backoffMs: this.config.retry.backoffMs,
        ...(this.sleep ? { sleep: this.sleep } : {}),
        onRetry: ({ attempt: failed, maxAttempts, delayMs, error }) => {
          const message = errorMessage(error);
          this.tracker.logActivity(
            stage.actor,
            `Attempt ${failed}/${maxAttempts} failed: ${message}. Retrying in ${Math.round(delayMs / 1000)}s`,
            ActivityStatus.Retrying
          );
          logger.warn(`Stage ${id} failed with a transient error, retrying`, {
            attempt: failed,
            maxAttempts,
            delayMs,
            error: message,
          });
        },
      });

      outputs[id] = value;
      this.tracker.completeStage(id);
      this.tracker.logActivity(
        stage.actor,
        value.summary,
        value.skipped ? ActivityStatus.Skipped : ActivityStatus.Completed
      );
      logger.info(`Stage ${id} completed`, { attempts, summary: value.summary });
      return attempts;
    } catch (err) {
      this.tracker.logActivity(stage.actor, `Failed: ${errorMessage(err)}`, ActivityStatus.Failed);
      throw err;
    }
  }
}
