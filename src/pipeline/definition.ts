/**
 * Stage sequence and dependency checks.
 */

import { STAGE_ORDER, type StageId } from "../config/pipeline/enums.js";
import type { PipelineConfig, StageDefinition } from "../config/pipeline/schema.js";
import { ValidationError } from "../dataset/errors.js";
import type { ValidationIssue } from "../dataset/errors.js";
import { STAGE_DEPENDENCIES } from "../stages/types.js";

/**
 * Every declared dependency must be a stage that runs earlier.
 *
 * @throws ValidationError listing each dependency that points forward or
 * to itself
 */
export function validateStageTopology(order: readonly StageId[] = STAGE_ORDER): void {
  const issues: ValidationIssue[] = [];

  order.forEach((stage, index) => {
    const dependencies: readonly StageId[] = STAGE_DEPENDENCIES[stage];
    for (const dependency of dependencies) {
      const position = order.indexOf(dependency);
      if (position === -1 || position >= index) {
        issues.push({
          path: ["stages", stage],
          message: `"${stage}" depends on "${dependency}", which does not run before it`,
          code: "invalid_dependency",
        });
      }
    }
  });

  if (issues.length > 0) {
    throw new ValidationError("Invalid stage topology", issues);
  }
}

export function getStageDefinition(config: Readonly<PipelineConfig>, id: StageId): StageDefinition {
  const definition = config.stages.find((stage) => stage.id === id);
  if (!definition) {
    throw new ValidationError(`Stage "${id}" is not configured`);
  }
  return definition;
}
