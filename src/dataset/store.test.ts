/**
 * Dataset Store tests.
 *
 * Run with: node --import tsx --test src/dataset/store.test.ts
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { DatasetStore } from "./store.js";
import type { ChangeLogEntryInput } from "./changelog.js";
import { createDataset, dropRows, getColumn, replaceColumn } from "./frame.js";
import { InvalidInputError, ValidationError } from "./errors.js";
import type { Dataset } from "../types/dataset.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

const FIXED_NOW = new Date("2025-06-01T12:00:00.000Z");

function sampleDataset(): Dataset {
  return createDataset([
    { name: "age", type: "numeric", values: [30, null, 40] },
    { name: "region", type: "categorical", values: ["north", "south", "north"] },
  ]);
}

function imputeEntry(overrides: Partial<ChangeLogEntryInput> = {}): ChangeLogEntryInput {
  return {
    stage: "cleaning",
    column: "age",
    action: "impute",
    method: "mean",
    fillValue: 35,
    reason: "1 of 3 values missing",
    affectedRowsCount: 1,
    affectedIndices: [1],
    preStats: { missing: 1, mean: 35 },
    postStats: { missing: 0, mean: 35 },
    ...overrides,
  };
}

function newStore(): DatasetStore {
  const store = new DatasetStore(() => FIXED_NOW);
  store.initialize(sampleDataset());
  return store;
}

// ═══════════════════════════════════════════════════════════════════════════
// SNAPSHOTS
// ═══════════════════════════════════════════════════════════════════════════

describe("DatasetStore snapshots", () => {
  it("rejects a dataset without columns", () => {
    const store = new DatasetStore();
    assert.throws(() => store.initialize({ columns: [] }), InvalidInputError);
    assert.equal(store.isInitialized(), false);
  });

  it("throws when read before initialisation", () => {
    assert.throws(() => new DatasetStore().current(), { message: "No dataset loaded" });
  });

  it("copies the input so later edits to it are not seen", () => {
    const values: (number | null)[] = [1, 2];
    const store = new DatasetStore();
    store.initialize({ columns: [{ name: "x", type: "numeric", values }] });
    values[0] = 99;
    assert.deepEqual(getColumn(store.current(), "x").values, [1, 2]);
  });

  it("keeps the original untouched when current is replaced", () => {
    const store = newStore();
    const stale = store.current();
    const filled = replaceColumn(stale, { name: "age", type: "numeric", values: [30, 35, 40] });

    store.replaceCurrent(filled, "Filled age");

    assert.deepEqual(getColumn(store.original(), "age").values, [30, null, 40]);
    assert.deepEqual(getColumn(store.current(), "age").values, [30, 35, 40]);
    assert.deepEqual(getColumn(stale, "age").values, [30, null, 40]);
    assert.deepEqual(store.history(), ["Filled age"]);
  });

  it("freezes snapshots", () => {
    const store = newStore();
    assert.ok(Object.isFrozen(store.original().columns));
    assert.ok(Object.isFrozen(getColumn(store.current(), "age").values));
  });

  it("keeps Date cells unchanged when a reader mutates its copy", () => {
    const store = new DatasetStore();
    store.initialize(
      createDataset([{ name: "joined", type: "datetime", values: [new Date("2024-01-05T00:00:00.000Z"), null] }])
    );

    const joined = getColumn(store.original(), "joined");
    const first = joined.type === "datetime" ? joined.values[0] : undefined;
    first?.setTime(0);

    assert.deepEqual(getColumn(store.original(), "joined").values, [new Date("2024-01-05T00:00:00.000Z"), null]);
    assert.deepEqual(getColumn(store.current(), "joined").values, [new Date("2024-01-05T00:00:00.000Z"), null]);
    assert.ok(Object.isFrozen(getColumn(store.original(), "joined").values));
  });

  it("rejects a replacement with more rows", () => {
    const store = newStore();
    const bigger = createDataset([
      { name: "age", type: "numeric", values: [1, 2, 3, 4] },
      { name: "region", type: "categorical", values: ["a", "b", "c", "d"] },
    ]);
    assert.throws(() => store.replaceCurrent(bigger, "grow"), ValidationError);
  });

  it("allows fewer rows only after a recorded drop", () => {
    const store = newStore();
    const smaller = dropRows(store.current(), new Set([1]));

    assert.throws(() => store.replaceCurrent(smaller, "drop"), {
      message: "Replacement dataset removes 1 rows without a recorded drop",
    });

    store.recordChange({
      stage: "cleaning",
      column: "age",
      action: "drop",
      reason: "1 of 3 values missing",
      affectedRowsCount: 1,
      affectedIndices: [1],
      preStats: { missing: 1 },
      postStats: { missing: 0, rowsRemaining: 2 },
    });
    store.replaceCurrent(smaller, "Dropped rows");
    assert.deepEqual(getColumn(store.current(), "age").values, [30, 40]);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// CHANGE LOG
// ═══════════════════════════════════════════════════════════════════════════

describe("DatasetStore change log", () => {
  it("numbers and timestamps entries in order", () => {
    const store = newStore();
    store.recordChange(imputeEntry());
    store.recordChange(imputeEntry({ column: "region", method: "mode", fillValue: "north" }));

    const log = store.changeLog();
    assert.deepEqual(
      log.map((entry) => [entry.sequence, entry.column, entry.recordedAt]),
      [
        [1, "age", "2025-06-01T12:00:00.000Z"],
        [2, "region", "2025-06-01T12:00:00.000Z"],
      ]
    );
  });

  it("freezes recorded entries", () => {
    const store = newStore();
    const entry = store.recordChange(imputeEntry());
    assert.ok(Object.isFrozen(entry));
    assert.ok(Object.isFrozen(entry.affectedIndices));
  });

  it("rejects an imputation without a method", () => {
    const store = newStore();
    const { method: _method, ...withoutMethod } = imputeEntry();
    try {
      store.recordChange(withoutMethod);
      assert.fail("expected ValidationError");
    } catch (err) {
      assert.ok(err instanceof ValidationError);
      assert.deepEqual(err.issues.map((issue) => issue.path.join(".")), ["method"]);
    }
    assert.equal(store.changeLog().length, 0);
  });

  it("rejects more than ten sampled indices", () => {
    const store = newStore();
    assert.throws(
      () =>
        store.recordChange(
          imputeEntry({ affectedRowsCount: 11, affectedIndices: [0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10] })
        ),
      ValidationError
    );
  });

  it("returns a copy of the log", () => {
    const store = newStore();
    store.recordChange(imputeEntry());
    const log = store.changeLog();
    assert.notEqual(store.changeLog(), log);
    assert.equal(store.changeLog().length, 1);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// METADATA AND CHECKPOINTS
// ═══════════════════════════════════════════════════════════════════════════

describe("DatasetStore metadata", () => {
  it("reads an unset key as undefined", () => {
    assert.equal(newStore().getMetadata("statistics"), undefined);
  });

  it("validates values against the key's schema", () => {
    const store = newStore();
    assert.throws(
      () =>
        store.setMetadata("quality_flags", { age: [""] }),
      ValidationError
    );
  });

  it("keeps the last write per key", () => {
    const store = newStore();
    store.setMetadata("quality_flags", { age: ["MISSING_VALUES(33.33%)"] });
    store.setMetadata("quality_flags", { region: ["CONSTANT_COLUMN"] });
    assert.deepEqual(store.getMetadata("quality_flags"), { region: ["CONSTANT_COLUMN"] });
    assert.deepEqual(Object.keys(store.getMetadata()), ["quality_flags"]);
  });

  it("is cleared by initialize", () => {
    const store = newStore();
    store.setMetadata("quality_flags", {});
    store.recordChange(imputeEntry());
    store.initialize(sampleDataset());
    assert.deepEqual(store.getMetadata(), {});
    assert.equal(store.changeLog().length, 0);
  });

  it("restores a checkpoint", () => {
    const store = newStore();
    const checkpoint = store.checkpoint();

    store.recordChange(imputeEntry());
    store.replaceCurrent(
      replaceColumn(store.current(), { name: "age", type: "numeric", values: [30, 35, 40] }),
      "Filled age"
    );
    store.setMetadata("quality_flags", {});
    store.recordColumnStats("age", "post_cleaning", { missing: 0 });

    store.restore(checkpoint);

    assert.equal(store.changeLog().length, 0);
    assert.deepEqual(store.history(), []);
    assert.deepEqual(getColumn(store.current(), "age").values, [30, null, 40]);
    assert.equal(store.getMetadata("quality_flags"), undefined);
    assert.equal(store.columnStatsHistory("age"), undefined);
  });

  it("tracks column statistics by phase", () => {
    const store = newStore();
    store.recordColumnStats("age", "pre_cleaning", { missing: 1, mean: 35 });
    store.recordColumnStats("age", "post_cleaning", { missing: 0, mean: 35 });
    assert.deepEqual(store.columnStatsHistory("age"), {
      pre_cleaning: { missing: 1, mean: 35 },
      post_cleaning: { missing: 0, mean: 35 },
    });
  });
});
