/**
 * Pipeline configuration loader tests.
 *
 * Run with: node --import tsx --test src/config/pipeline/loader.test.ts
 */

import { describe, it, before, after } from "node:test";
import assert from "node:assert/strict";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  loadPipelineConfig,
  loadPipelineConfigFile,
  validatePipelineConfig,
  resolvePipelineConfig,
  PipelineConfigError,
} from "./loader.js";
import { DEFAULT_PIPELINE_CONFIG } from "./defaults.js";
import { STAGE_ORDER } from "./enums.js";

// ═══════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════

function expectConfigError(input: unknown): PipelineConfigError {
  try {
    loadPipelineConfig(input);
  } catch (err) {
    if (err instanceof PipelineConfigError) {
      return err;
    }
    throw err;
  }
  assert.fail("expected PipelineConfigError");
}

function stagesWith(index: number, patch: Record<string, unknown>): unknown[] {
  return DEFAULT_PIPELINE_CONFIG.stages.map((stage, i) => (i === index ? { ...stage, ...patch } : stage));
}

// ═══════════════════════════════════════════════════════════════════════════
// VALID CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════

describe("loadPipelineConfig", () => {
  it("accepts the defaults and freezes the result", () => {
    const config = loadPipelineConfig(DEFAULT_PIPELINE_CONFIG);

    assert.deepEqual(
      config.stages.map((stage) => stage.id),
      [...STAGE_ORDER]
    );
    assert.equal(config.retry.maxAttempts, 3);
    assert.equal(config.retry.backoffMs, 30_000);
    assert.ok(Object.isFrozen(config));
    assert.ok(Object.isFrozen(config.stages[0]));
  });

  it("does not freeze the defaults object it was given", () => {
    loadPipelineConfig(DEFAULT_PIPELINE_CONFIG);
    assert.equal(Object.isFrozen(DEFAULT_PIPELINE_CONFIG), false);
  });

  // ═════════════════════════════════════════════════════════════════════════
  // INVALID CONFIGURATION
  // ═════════════════════════════════════════════════════════════════════════

  it("rejects stages out of the fixed order", () => {
    const [first, second, ...rest] = DEFAULT_PIPELINE_CONFIG.stages;
    const err = expectConfigError({ ...DEFAULT_PIPELINE_CONFIG, stages: [second, first, ...rest] });

    const issue = err.issues.find((i) => i.path.join(".") === "stages");
    assert.ok(issue);
    assert.match(issue.message, /^Stages must be exactly \[profiling, cleaning/);
  });

  it("rejects a stage whose start bound is not below its end bound", () => {
    const err = expectConfigError({
      ...DEFAULT_PIPELINE_CONFIG,
      stages: stagesWith(1, { progressStart: 35, progressEnd: 20 }),
    });

    assert.ok(err.issues.some((i) => i.path.join(".") === "stages.1.progressEnd"));
  });

  it("rejects overlapping stage windows", () => {
    const err = expectConfigError({
      ...DEFAULT_PIPELINE_CONFIG,
      stages: stagesWith(2, { progressStart: 30 }),
    });

    const issue = err.issues.find((i) => i.path.join(".") === "stages.2.progressStart");
    assert.ok(issue);
    assert.equal(
      issue.message,
      'Stage "visualization" starts at 30% before "cleaning" ends at 35%'
    );
  });

  it("rejects zero retry attempts", () => {
    const err = expectConfigError({
      ...DEFAULT_PIPELINE_CONFIG,
      retry: { maxAttempts: 0, backoffMs: 0 },
    });
    assert.ok(err.issues.some((i) => i.path.join(".") === "retry.maxAttempts"));
  });

  it("rejects unknown keys", () => {
    const err = expectConfigError({ ...DEFAULT_PIPELINE_CONFIG, parallel: true });
    assert.ok(err.issues.some((i) => i.code === "unrecognized_keys"));
  });

  it("formats issues one per line", () => {
    const err = expectConfigError({ ...DEFAULT_PIPELINE_CONFIG, activityLogLimit: 0 });
    assert.equal(
      err.format().split("\n")[0],
      "Pipeline configuration validation failed:"
    );
    assert.match(err.format(), /^ {2}- activityLogLimit: /m);
  });
});

describe("validatePipelineConfig", () => {
  it("returns issues instead of throwing", () => {
    const result = validatePipelineConfig({ ...DEFAULT_PIPELINE_CONFIG, cleaning: { strategy: "zero" } });
    assert.equal(result.success, false);
    assert.ok(result.errors?.some((i) => i.path.join(".") === "cleaning.strategy"));
  });
});

describe("resolvePipelineConfig", () => {
  it("layers environment settings over the defaults", () => {
    const config = resolvePipelineConfig({ retryMaxAttempts: 5, retryBackoffMs: 250, activityLogLimit: 8 });

    assert.deepEqual(config.retry, { maxAttempts: 5, backoffMs: 250 });
    assert.equal(config.activityLogLimit, 8);
    assert.equal(config.cleaning.strategy, "auto");
  });

  it("validates the overridden values", () => {
    assert.throws(
      () => resolvePipelineConfig({ retryMaxAttempts: 11, retryBackoffMs: 0, activityLogLimit: 20 }),
      PipelineConfigError
    );
  });
});

describe("loadPipelineConfigFile", () => {
  let dir = "";

  before(() => {
    dir = mkdtempSync(join(tmpdir(), "eda-config-"));
  });

  after(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function write(name: string, content: string): string {
    const path = join(dir, name);
    writeFileSync(path, content, "utf-8");
    return path;
  }

  it("replaces only the sections present in the file", () => {
    const path = write(
      "pipeline.json",
      JSON.stringify({ cleaning: { strategy: "median" }, training: { targetColumn: "churn", testFraction: 0.25, seed: 7 } })
    );

    const config = loadPipelineConfigFile(path);

    assert.equal(config.cleaning.strategy, "median");
    assert.equal(config.training.targetColumn, "churn");
    assert.deepEqual(config.retry, DEFAULT_PIPELINE_CONFIG.retry);
    assert.ok(Object.isFrozen(config.training));
  });

  it("rejects a missing file", () => {
    assert.throws(() => loadPipelineConfigFile(join(dir, "absent.json")), {
      name: "PipelineConfigError",
      message: `Pipeline config file not found: ${join(dir, "absent.json")}`,
    });
  });

  it("rejects a file that is not a JSON object", () => {
    const path = write("list.json", "[1, 2]");
    assert.throws(() => loadPipelineConfigFile(path), {
      message: `Pipeline config file must contain a JSON object: ${path}`,
    });
  });

  it("reports schema issues from the merged configuration", () => {
    const path = write("bad.json", JSON.stringify({ activityLogLimit: 0 }));
    try {
      loadPipelineConfigFile(path);
      assert.fail("expected PipelineConfigError");
    } catch (err) {
      assert.ok(err instanceof PipelineConfigError);
      assert.deepEqual(
        err.issues.map((issue) => issue.path.join(".")),
        ["activityLogLimit"]
      );
    }
  });
});
