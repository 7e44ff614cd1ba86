/**
 * Model Registry and baseline model tests.
 *
 * Run with: node --import tsx --test src/models/registry.test.ts
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { ModelRegistry, type TrainedModelInput } from "./registry.js";
import {
  featureImportance,
  predict,
  seededShuffle,
  trainLeastSquares,
  trainNearestCentroid,
  type LeastSquaresModel,
} from "./baseline.js";
import { ValidationError } from "../dataset/errors.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

const FIXED_NOW = new Date("2025-06-01T12:00:00.000Z");

const LINEAR: LeastSquaresModel = {
  kind: "least-squares",
  intercept: 10,
  coefficients: [2],
  scaling: [{ mean: 0, std: 1 }],
};

function modelInput(overrides: Partial<TrainedModelInput> = {}): TrainedModelInput {
  return {
    artifact: LINEAR,
    problemType: "regression",
    targetColumn: "price",
    featureColumns: ["size"],
    encoders: {},
    metrics: { r2: 0.9, mae: 1.5, featureImportances: { size: 1 }, trainRows: 8, testRows: 2 },
    ...overrides,
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// REGISTRY
// ═══════════════════════════════════════════════════════════════════════════

describe("ModelRegistry", () => {
  it("starts with no model", () => {
    const registry = new ModelRegistry();
    assert.deepEqual(registry.getModel(), { status: "none" });
    assert.deepEqual(registry.getMetadata(), { status: "none" });
    assert.equal(registry.hasModel(), false);
    assert.equal(registry.toJSON(), null);
  });

  it("stores a frozen copy of the model", () => {
    const registry = new ModelRegistry(() => FIXED_NOW);
    const input = modelInput();
    registry.setModel(input);

    const state = registry.getModel();
    assert.equal(state.status, "trained");
    if (state.status === "trained") {
      assert.equal(state.record.trainedAt, "2025-06-01T12:00:00.000Z");
      assert.notEqual(state.record.artifact, input.artifact);
      assert.ok(Object.isFrozen(state.record.artifact));
    }
  });

  it("reports metadata without the artifact", () => {
    const registry = new ModelRegistry();
    registry.setModel(modelInput());
    assert.deepEqual(registry.getMetadata(), {
      status: "trained",
      modelType: "least-squares",
      problemType: "regression",
      targetColumn: "price",
      featureColumns: ["size"],
      metrics: { r2: 0.9, mae: 1.5, featureImportances: { size: 1 }, trainRows: 8, testRows: 2 },
    });
  });

  it("replaces the previous model wholesale", () => {
    const registry = new ModelRegistry();
    registry.setModel(modelInput());
    registry.setModel(modelInput({ targetColumn: "rent" }));
    assert.equal(registry.toJSON()?.targetColumn, "rent");
    assert.equal(registry.toJSON()?.formatVersion, 1);
  });

  it("rejects a target that is also a feature", () => {
    const registry = new ModelRegistry();
    assert.throws(() => registry.setModel(modelInput({ featureColumns: ["price"] })), {
      name: "ValidationError",
      message: 'Target column "price" cannot also be a feature',
    });
    assert.equal(registry.hasModel(), false);
  });

  it("rejects a feature list that does not match the model", () => {
    const registry = new ModelRegistry();
    assert.throws(
      () => registry.setModel(modelInput({ featureColumns: ["size", "rooms"] })),
      ValidationError
    );
  });

  it("rolls back to a checkpoint", () => {
    const registry = new ModelRegistry();
    const checkpoint = registry.checkpoint();
    registry.setModel(modelInput());
    registry.restore(checkpoint);
    assert.equal(registry.hasModel(), false);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// BASELINE MODELS
// ═══════════════════════════════════════════════════════════════════════════

describe("baseline models", () => {
  it("predicts with a linear model", () => {
    assert.equal(predict(LINEAR, [3]), 16);
  });

  it("recovers a linear relationship", () => {
    const matrix = [[1], [2], [3], [4], [5]];
    const model = trainLeastSquares(matrix, [3, 5, 7, 9, 11], 1);
    const prediction = predict(model, [6]);
    assert.equal(typeof prediction, "number");
    assert.equal(Number(prediction).toFixed(3), "13.000");
  });

  it("assigns rows to the nearest class centroid", () => {
    const matrix = [[0, 0], [0, 1], [10, 10], [10, 11]];
    const model = trainNearestCentroid(matrix, ["low", "low", "high", "high"], 2);
    assert.deepEqual(model.classes, ["high", "low"]);
    assert.equal(predict(model, [1, 0]), "low");
    assert.equal(predict(model, [9, 12]), "high");
  });

  it("normalises feature importance", () => {
    const model: LeastSquaresModel = { ...LINEAR, coefficients: [3, -1], scaling: [{ mean: 0, std: 1 }, { mean: 0, std: 1 }] };
    assert.deepEqual(featureImportance(model), [0.75, 0.25]);
  });

  it("shuffles deterministically", () => {
    const items = [1, 2, 3, 4, 5, 6];
    assert.deepEqual(seededShuffle(items, 42), seededShuffle(items, 42));
    assert.deepEqual([...seededShuffle(items, 42)].sort(), items);
  });
});
