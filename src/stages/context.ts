/**
 * Read access to the outputs of a stage's declared dependencies.
 */

import type { StageId } from "../config/pipeline/enums.js";
import type { DependencyOf, StageOutputMap } from "./types.js";

/**
 * A stage asked for an upstream output that was never produced.
 */
export class MissingDependencyError extends Error {
  constructor(
    public readonly stage: StageId,
    public readonly dependency: StageId
  ) {
    super(`Stage "${stage}" requires the output of "${dependency}", which is not available`);
    this.name = "MissingDependencyError";
  }
}

export class UpstreamOutputs<K extends StageId> {
  constructor(
    private readonly stage: K,
    private readonly outputs: Partial<StageOutputMap>
  ) {}

  /**
   * @throws MissingDependencyError if the dependency has not produced output
   */
  get<D extends DependencyOf<K> & StageId>(dependency: D): StageOutputMap[D] {
    const output = this.outputs[dependency];
    if (output === undefined) {
      throw new MissingDependencyError(this.stage, dependency);
    }
    return output;
  }

  has(dependency: DependencyOf<K> & StageId): boolean {
    return this.outputs[dependency] !== undefined;
  }
}
