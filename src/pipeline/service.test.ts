/**
 * Pipeline service tests.
 *
 * Run with: node --import tsx --test src/pipeline/service.test.ts
 */

import { describe, it, before, after } from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { DEFAULT_PIPELINE_CONFIG } from "../config/pipeline/defaults.js";
import { loadPipelineConfig } from "../config/pipeline/loader.js";
import { createDataset } from "../dataset/frame.js";
import type { Dataset } from "../types/dataset.js";
import { RunStatus, StageStatus, type PipelineStatus } from "../types/pipeline.js";
import { createSilentLogger } from "../logging/logger.js";
import { createDefaultHandlers } from "../stages/index.js";
import { PipelineService, type PipelineServiceOptions } from "./service.js";

let root = "";

before(async () => {
  root = await mkdtemp(join(tmpdir(), "eda-service-"));
});

after(async () => {
  await rm(root, { recursive: true, force: true });
});

function sample(): Dataset {
  return createDataset([
    { name: "score", type: "numeric", values: [3, null, 5, 8, 2, 7] },
    { name: "team", type: "categorical", values: ["red", "blue", "red", "blue", "red", "blue"] },
  ]);
}

function service(name: string, extra: Partial<PipelineServiceOptions> = {}): PipelineService {
  return new PipelineService({
    config: loadPipelineConfig(DEFAULT_PIPELINE_CONFIG),
    logger: createSilentLogger(),
    outputDir: join(root, name),
    sleep: async () => {},
    ...extra,
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// STATUS
// ═══════════════════════════════════════════════════════════════════════════

describe("PipelineService.getStatus", () => {
  it("reports an idle pipeline before the first run", () => {
    const status = service("idle").getStatus();
    assert.equal(status.status, RunStatus.Idle);
    assert.equal(status.runId, null);
    assert.equal(status.percentage, 0);
    assert.equal(status.stages.length, 8);
    assert.ok(status.stages.every((stage) => stage.status === StageStatus.Pending));
  });

  it("refuses to wait when nothing was started", async () => {
    await assert.rejects(service("never").waitForCompletion(), {
      message: "No pipeline run has been started",
    });
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// SINGLE FLIGHT
// ═══════════════════════════════════════════════════════════════════════════

describe("PipelineService.start", () => {
  it("returns the active run instead of starting a second one", async () => {
    const pipeline = service("single-flight");

    const first = pipeline.start(sample());
    const second = pipeline.start(sample());

    assert.equal(first.status, "started");
    assert.deepEqual(second, { status: "already_running", runId: first.runId });
    assert.equal(pipeline.getStatus().status, RunStatus.Running);
    assert.equal(pipeline.getStatus().runId, first.runId);

    const outcome = await pipeline.waitForCompletion();
    assert.equal(outcome.status, "completed");
    if (outcome.status === "completed") {
      assert.equal(outcome.result.runId, first.runId);
    }
    assert.equal(pipeline.getStatus().status, RunStatus.Completed);
  });

  it("starts a fresh run once the previous one finished", async () => {
    const pipeline = service("sequential");

    const first = pipeline.start(sample());
    await pipeline.waitForCompletion();
    const second = pipeline.start(sample());

    assert.equal(second.status, "started");
    assert.notEqual(second.runId, first.runId);
    const outcome = await pipeline.waitForCompletion();
    assert.equal(outcome.status, "completed");
  });

  it("settles a failed run as an error outcome", async () => {
    const pipeline = service("failing", {
      handlers: createDefaultHandlers({
        profiling: {
          async run() {
            throw new Error("profiler crashed");
          },
        },
      }),
    });

    const started = pipeline.start(sample());
    const outcome = await pipeline.waitForCompletion();

    assert.equal(outcome.status, "error");
    if (outcome.status === "error") {
      assert.equal(outcome.runId, started.runId);
      assert.ok(outcome.error instanceof Error);
      assert.equal(outcome.error.message, "profiler crashed");
    }
    assert.equal(pipeline.getStatus().status, RunStatus.Error);
    assert.equal(pipeline.start(sample()).status, "started");
    await pipeline.waitForCompletion();
  });

  it("publishes every status change to the listener", async () => {
    const seen: PipelineStatus[] = [];
    const pipeline = service("listener", { onStatus: (status) => seen.push(status) });

    const { runId } = pipeline.start(sample());
    await pipeline.waitForCompletion();

    assert.equal(seen[0]?.status, RunStatus.Running);
    assert.equal(seen[0]?.runId, runId);
    assert.equal(seen[seen.length - 1]?.status, RunStatus.Completed);
  });
});
