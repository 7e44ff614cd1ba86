/**
 * Model Registry.
 *
 * Holds at most one trained model per run together with its feature and
 * target schema, encoders and metrics. Its lifecycle is independent of the
 * Dataset Store: the training stage sets it, explainability reads it.
 */

import type { ProblemType } from "../config/pipeline/enums.js";
import { ValidationError } from "../dataset/errors.js";
import { deepFreeze } from "../utils/freeze.js";
import type { BaselineModel, Encoders } from "./baseline.js";

export interface ConfusionMatrix {
  readonly labels: readonly string[];
  /** rows = actual, columns = predicted */
  readonly matrix: readonly (readonly number[])[];
}

export interface ModelMetrics {
  readonly accuracy?: number;
  readonly precision?: number;
  readonly recall?: number;
  readonly f1?: number;
  readonly r2?: number;
  readonly mae?: number;
  readonly confusion?: ConfusionMatrix;
  readonly featureImportances: Readonly<Record<string, number>>;
  readonly trainRows: number;
  readonly testRows: number;
}

export interface TrainedModelInput {
  readonly artifact: BaselineModel;
  readonly problemType: ProblemType;
  readonly targetColumn: string;
  readonly featureColumns: readonly string[];
  readonly encoders: Encoders;
  readonly metrics: ModelMetrics;
}

export interface TrainedModelRecord extends TrainedModelInput {
  readonly trainedAt: string;
}

export type ModelState =
  | { readonly status: "none" }
  | { readonly status: "trained"; readonly record: TrainedModelRecord };

export type ModelMetadata =
  | { readonly status: "none" }
  | {
      readonly status: "trained";
      readonly modelType: BaselineModel["kind"];
      readonly problemType: ProblemType;
      readonly targetColumn: string;
      readonly featureColumns: readonly string[];
      readonly metrics: ModelMetrics;
    };

/** Shape written to models/trained_model.json */
export interface SerializedModel extends TrainedModelRecord {
  readonly formatVersion: 1;
}

const NONE: { readonly status: "none" } = Object.freeze({ status: "none" });

export class ModelRegistry {
  private record: TrainedModelRecord | undefined;

  constructor(private readonly clock: () => Date = () => new Date()) {}

  /**
   * Replace any existing model wholesale.
   *
   * @throws ValidationError if the feature/target schema is inconsistent
   */
  setModel(input: TrainedModelInput): TrainedModelRecord {
    if (input.featureColumns.length === 0) {
      throw new ValidationError("A trained model needs at least one feature column");
    }
    if (input.featureColumns.includes(input.targetColumn)) {
      throw new ValidationError(
        `Target column "${input.targetColumn}" cannot also be a feature`
      );
    }
    if (input.artifact.scaling.length !== input.featureColumns.length) {
      throw new ValidationError(
        `Model expects ${input.artifact.scaling.length} features, ${input.featureColumns.length} were declared`
      );
    }

    const record: TrainedModelRecord = structuredClone({
      ...input,
      trainedAt: this.clock().toISOString(),
    });
    deepFreeze(record);
    this.record = record;
    return record;
  }

  getModel(): ModelState {
    return this.record ? { status: "trained", record: this.record } : NONE;
  }

  hasModel(): boolean {
    return this.record !== undefined;
  }

  getMetadata(): ModelMetadata {
    if (!this.record) {
      return NONE;
    }
    return {
      status: "trained",
      modelType: this.record.artifact.kind,
      problemType: this.record.problemType,
      targetColumn: this.record.targetColumn,
      featureColumns: this.record.featureColumns,
      metrics: this.record.metrics,
    };
  }

  toJSON(): SerializedModel | null {
    return this.record ? { formatVersion: 1, ...this.record } : null;
  }

  checkpoint(): TrainedModelRecord | undefined {
    return this.record;
  }

  restore(checkpoint: TrainedModelRecord | undefined): void {
    this.record = checkpoint;
  }

  reset(): void {
    this.record = undefined;
  }
}
