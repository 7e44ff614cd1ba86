/**
 * Pipeline configuration schema definition.
 *
 * The configuration is validated once when a run is created and then frozen.
 * Stage progress bounds are fixed configuration rather than computed values:
 * the Progress Tracker moves the overall percentage to a stage's start bound
 * when the stage begins and to its end bound when it completes, so bounds
 * must be ordered for progress to stay monotonic.
 */

import { z } from "zod";
import { CleaningStrategy, STAGE_ORDER, StageId } from "./enums.js";

/**
 * A stage descriptor with its display name and progress window.
 */
export const StageDefinitionSchema = z
  .object({
    id: StageId,
    name: z.string().min(1).describe("Display name shown in status responses"),
    actor: z
      .string()
      .min(1)
      .describe("Worker name recorded in the activity log"),
    progressStart: z.number().int().min(0).max(100),
    progressEnd: z.number().int().min(0).max(100),
  })
  .strict()
  .refine((stage) => stage.progressStart < stage.progressEnd, {
    message: "progressStart must be lower than progressEnd",
    path: ["progressEnd"],
  });

export type StageDefinition = z.infer<typeof StageDefinitionSchema>;

export const RetryPolicySchema = z
  .object({
    /** Attempts per stage, including the first one */
    maxAttempts: z.number().int().min(1).max(10),

    /** Linear backoff unit: the wait after attempt n is n × backoffMs */
    backoffMs: z.number().int().min(0),
  })
  .strict();

export type RetryPolicy = z.infer<typeof RetryPolicySchema>;

export const CleaningOptionsSchema = z
  .object({
    strategy: CleaningStrategy,
  })
  .strict();

export const VisualizationOptionsSchema = z
  .object({
    maxDistributionColumns: z.number().int().min(1),
    maxCategories: z.number().int().min(1),
  })
  .strict();

export const TrainingOptionsSchema = z
  .object({
    /** Column to predict; chosen by the recommendation stage when absent */
    targetColumn: z.string().min(1).optional(),
    testFraction: z.number().gt(0).lt(1),
    seed: z.number().int(),
  })
  .strict();

export const ExplainabilityOptionsSchema = z
  .object({
    /** When true, a run without a trained model fails instead of skipping */
    required: z.boolean(),
    localRowIndex: z.number().int().min(0),
  })
  .strict();

export const ReportOptionsSchema = z
  .object({
    title: z.string().min(1),
  })
  .strict();

/**
 * Complete pipeline configuration schema.
 */
export const PipelineConfigSchema = z
  .object({
    stages: z.array(StageDefinitionSchema),
    retry: RetryPolicySchema,
    activityLogLimit: z.number().int().min(1),
    cleaning: CleaningOptionsSchema,
    visualization: VisualizationOptionsSchema,
    training: TrainingOptionsSchema,
    explainability: ExplainabilityOptionsSchema,
    report: ReportOptionsSchema,
  })
  .strict()
  .superRefine((config, ctx) => {
    const ids = config.stages.map((stage) => stage.id);
    if (ids.join(",") !== STAGE_ORDER.join(",")) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["stages"],
        message: `Stages must be exactly [${STAGE_ORDER.join(", ")}] in that order`,
      });
      return;
    }

    config.stages.forEach((stage, index) => {
      const previous = index > 0 ? config.stages[index - 1] : undefined;
      if (previous && stage.progressStart < previous.progressEnd) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["stages", index, "progressStart"],
          message: `Stage "${stage.id}" starts at ${stage.progressStart}% before "${previous.id}" ends at ${previous.progressEnd}%`,
        });
      }
    });
  });

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
