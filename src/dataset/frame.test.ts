/**
 * Dataset frame and statistics helper tests.
 *
 * Run with: node --import tsx --test src/dataset/frame.test.ts
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import type { Column } from "../types/dataset.js";
import {
  cloneDataset,
  countMissing,
  createDataset,
  dropRows,
  formatCell,
  getColumn,
  missingIndices,
  replaceColumn,
  rowCount,
  totalMissing,
} from "./frame.js";
import { InvalidInputError, ValidationError } from "./errors.js";
import { imputeColumn } from "./impute.js";
import { mean, median, mode, compareStrings, quantile, std, summarizeColumn } from "./stats.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

const AGE: Column = { name: "age", type: "numeric", values: [30, null, 40, null] };
const CITY: Column = { name: "city", type: "categorical", values: ["Oslo", "Bergen", null, "Oslo"] };

// ═══════════════════════════════════════════════════════════════════════════
// CONSTRUCTION
// ═══════════════════════════════════════════════════════════════════════════

describe("createDataset", () => {
  it("rejects a dataset without columns", () => {
    assert.throws(() => createDataset([]), InvalidInputError);
  });

  it("rejects duplicate column names", () => {
    assert.throws(() => createDataset([AGE, AGE]), {
      name: "InvalidInputError",
      message: 'Duplicate column name: "age"',
    });
  });

  it("rejects ragged columns", () => {
    const short: Column = { name: "short", type: "numeric", values: [1] };
    assert.throws(() => createDataset([AGE, short]), {
      message: 'Column "short" has 1 rows, expected 4',
    });
  });

  it("counts rows and missing cells", () => {
    const dataset = createDataset([AGE, CITY]);
    assert.equal(rowCount(dataset), 4);
    assert.equal(countMissing(AGE), 2);
    assert.equal(totalMissing(dataset), 3);
    assert.deepEqual(missingIndices(AGE), [1, 3]);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// TRANSFORMATIONS
// ═══════════════════════════════════════════════════════════════════════════

describe("column helpers", () => {
  it("reports unknown columns as validation errors with the available names", () => {
    const dataset = createDataset([AGE, CITY]);
    try {
      getColumn(dataset, "income");
      assert.fail("expected ValidationError");
    } catch (err) {
      assert.ok(err instanceof ValidationError);
      assert.equal(err.message, 'Unknown column "income". Available columns: age, city');
      assert.equal(err.issues[0]?.code, "unknown_column");
    }
  });

  it("drops rows across every column", () => {
    const dataset = dropRows(createDataset([AGE, CITY]), new Set([1, 3]));
    assert.deepEqual(getColumn(dataset, "age").values, [30, 40]);
    assert.deepEqual(getColumn(dataset, "city").values, ["Oslo", null]);
  });

  it("replaces a column in place without touching the source", () => {
    const dataset = createDataset([AGE, CITY]);
    const replaced = replaceColumn(dataset, { name: "age", type: "numeric", values: [1, 2, 3, 4] });
    assert.deepEqual(getColumn(replaced, "age").values, [1, 2, 3, 4]);
    assert.deepEqual(getColumn(dataset, "age").values, [30, null, 40, null]);
    assert.equal(replaced.columns[1]?.name, "city");
  });

  it("clones dates instead of sharing them", () => {
    const when = new Date("2024-03-01T00:00:00.000Z");
    const dataset = createDataset([{ name: "when", type: "datetime", values: [when] }]);
    const copy = cloneDataset(dataset);
    const cloned = getColumn(copy, "when").values[0];
    assert.ok(cloned instanceof Date);
    assert.notEqual(cloned, when);
    assert.equal(cloned.getTime(), when.getTime());
  });

  it("formats cells for export", () => {
    assert.equal(formatCell(null), "");
    assert.equal(formatCell(new Date("2024-03-01T00:00:00.000Z")), "2024-03-01T00:00:00.000Z");
    assert.equal(formatCell(false), "false");
    assert.equal(formatCell(2.5), "2.5");
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// STATISTICS AND IMPUTATION
// ═══════════════════════════════════════════════════════════════════════════

describe("statistics", () => {
  it("computes central tendency and spread", () => {
    assert.equal(mean([1, 2, 3, 4]), 2.5);
    assert.equal(median([4, 1, 3]), 3);
    assert.equal(quantile([1, 2, 3, 4, 5], 0.25), 2);
    assert.equal(std([2, 4, 4, 4, 5, 5, 7, 9])?.toFixed(4), "2.1381");
    assert.equal(mean([]), undefined);
    assert.equal(std([1]), undefined);
  });

  it("breaks mode ties towards the smallest value", () => {
    assert.equal(mode(["b", "a", "b", "a"], compareStrings), "a");
  });

  it("summarises numeric and categorical columns differently", () => {
    const age = summarizeColumn(AGE);
    assert.equal(age.missing, 2);
    assert.equal(age.mean, 35);
    assert.equal(age.median, 35);
    assert.equal(age.std?.toFixed(4), "7.0711");
    assert.equal(age.mode, undefined);
    assert.deepEqual(summarizeColumn(CITY), { missing: 1, mode: "Oslo" });
  });
});

describe("imputeColumn", () => {
  it("fills numeric gaps with the requested statistic", () => {
    const result = imputeColumn(AGE, "mean");
    assert.deepEqual(result.column.values, [30, 35, 40, 35]);
    assert.equal(result.fillValue, 35);
    assert.deepEqual(result.affected, [1, 3]);
    assert.equal(result.placeholder, false);
  });

  it("always uses the mode for categorical columns", () => {
    const result = imputeColumn(CITY, "median");
    assert.equal(result.method, "mode");
    assert.deepEqual(result.column.values, ["Oslo", "Bergen", "Oslo", "Oslo"]);
  });

  it("falls back to a placeholder when nothing is present", () => {
    const empty: Column = { name: "note", type: "categorical", values: [null, null] };
    const result = imputeColumn(empty, "mode");
    assert.deepEqual(result.column.values, ["Unknown", "Unknown"]);
    assert.equal(result.fillValue, "Unknown");
    assert.equal(result.placeholder, true);
  });

  it("writes datetime fill values as ISO strings", () => {
    const when: Column = {
      name: "when",
      type: "datetime",
      values: [new Date("2024-01-02T00:00:00.000Z"), null],
    };
    const result = imputeColumn(when, "mode");
    assert.equal(result.fillValue, "2024-01-02T00:00:00.000Z");
  });
});
