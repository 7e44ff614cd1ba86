/**
 * Descriptive statistics tests.
 *
 * Run with: node --import tsx --test src/dataset/stats.test.ts
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { histogramBins } from "../charts/svg.js";
import { extent, mean, median, quantile } from "./stats.js";

describe("extent", () => {
  it("finds the smallest and largest value", () => {
    assert.deepEqual(extent([3, -2, 7, 0]), { min: -2, max: 7 });
    assert.equal(extent([]), undefined);
  });

  it("handles columns too long to spread into one call", () => {
    const values = Array.from({ length: 300_000 }, (_, i) => i % 1000);
    assert.deepEqual(extent(values), { min: 0, max: 999 });

    const bins = histogramBins(values, 10);
    assert.equal(bins.length, 10);
    assert.equal(bins[0]?.lower, 0);
    assert.equal(bins.reduce((sum, bin) => sum + bin.count, 0), 300_000);
  });
});

describe("central tendency", () => {
  it("computes mean, median and interpolated quartiles", () => {
    assert.equal(mean([1, 2, 3, 4]), 2.5);
    assert.equal(median([4, 1, 3, 2]), 2.5);
    assert.equal(quantile([1, 2, 3, 4, 5], 0.25), 2);
    assert.equal(mean([]), undefined);
  });
});
