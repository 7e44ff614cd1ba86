/**
 * Output path tests.
 *
 * Run with: node --import tsx --test src/output/paths.test.ts
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { join } from "node:path";
import { chartFileName, chartFileNames, chartRelativePath, resolveOutputPaths, sanitizeFileComponent } from "./paths.js";

// ═══════════════════════════════════════════════════════════════════════════
// FILE NAMES
// ═══════════════════════════════════════════════════════════════════════════

describe("chart file names", () => {
  it("sanitizes column names", () => {
    assert.equal(sanitizeFileComponent(" price (€) "), "price");
    assert.equal(sanitizeFileComponent("%%"), "column");
    assert.equal(chartFileName("dist", "a b"), "dist_a_b.svg");
    assert.equal(chartFileName("missing_values"), "missing_values.svg");
  });

  it("suffixes columns whose sanitized names collide", () => {
    const names = chartFileNames("dist", ["a b", "a_b", "a-b", "a/b", "a_b_2"]);

    assert.deepEqual(
      [...names.entries()],
      [
        ["a b", "dist_a_b.svg"],
        ["a_b", "dist_a_b_2.svg"],
        ["a-b", "dist_a-b.svg"],
        ["a/b", "dist_a_b_3.svg"],
        ["a_b_2", "dist_a_b_2_2.svg"],
      ]
    );
  });

  it("returns the same names for the same columns", () => {
    const columns = ["x y", "x_y"];
    assert.deepEqual([...chartFileNames("bar", columns)], [...chartFileNames("bar", columns)]);
  });
});

describe("resolveOutputPaths", () => {
  it("places artifacts under the output directory", () => {
    const paths = resolveOutputPaths("out");
    assert.equal(paths.chartsDir, join("out", "charts"));
    assert.equal(paths.model, join("out", "models", "trained_model.json"));
    assert.equal(chartRelativePath("dist_age.svg"), "charts/dist_age.svg");
  });
});
