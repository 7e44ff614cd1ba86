/**
 * Pipeline configuration loader and validator.
 *
 * Responsible for:
 * - Validating configuration against the schema with fail-fast behavior
 * - Producing structured error messages
 * - Freezing configuration so a run cannot change it midway
 */

import { existsSync, readFileSync } from "node:fs";
import type { ZodIssue } from "zod";
import { PipelineConfigSchema, type PipelineConfig } from "./schema.js";
import { DEFAULT_PIPELINE_CONFIG } from "./defaults.js";
import { deepFreeze } from "../../utils/freeze.js";

/**
 * Individual validation issue.
 */
export interface ConfigValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  message: string;
  /** Zod error code */
  code: string;
}

/**
 * Structured validation error for pipeline configuration.
 */
export class PipelineConfigError extends Error {
  public readonly issues: ConfigValidationIssue[];

  constructor(message: string, issues: ConfigValidationIssue[]) {
    super(message);
    this.name = "PipelineConfigError";
    this.issues = issues;
  }

  format(): string {
    const lines = ["Pipeline configuration validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

export function formatZodIssues(zodIssues: ZodIssue[]): ConfigValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Validate and load pipeline configuration.
 *
 * @param input - Raw configuration object to validate
 * @returns Validated and frozen PipelineConfig
 * @throws PipelineConfigError if validation fails
 */
export function loadPipelineConfig(input: unknown): Readonly<PipelineConfig> {
  const result = PipelineConfigSchema.safeParse(input);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new PipelineConfigError(
      `Invalid pipeline configuration: ${issues.length} validation error(s)`,
      issues
    );
  }

  return deepFreeze(result.data);
}

/**
 * Validate pipeline configuration without throwing.
 */
export function validatePipelineConfig(input: unknown): {
  success: boolean;
  config?: PipelineConfig;
  errors?: ConfigValidationIssue[];
} {
  const result = PipelineConfigSchema.safeParse(input);

  if (result.success) {
    return { success: true, config: result.data };
  }

  return {
    success: false,
    errors: formatZodIssues(result.error.issues),
  };
}

/**
 * Settings the application layer may override from the environment.
 */
export interface PipelineEnvOverrides {
  retryMaxAttempts: number;
  retryBackoffMs: number;
  activityLogLimit: number;
}

/**
 * Layer environment-driven settings over a base configuration and load it.
 */
export function resolvePipelineConfig(
  overrides: PipelineEnvOverrides,
  base: PipelineConfig = DEFAULT_PIPELINE_CONFIG
): Readonly<PipelineConfig> {
  return loadPipelineConfig({
    ...base,
    retry: {
      maxAttempts: overrides.retryMaxAttempts,
      backoffMs: overrides.retryBackoffMs,
    },
    activityLogLimit: overrides.activityLogLimit,
  });
}

/**
 * Load a pipeline configuration from a JSON file.
 *
 * Top-level sections present in the file replace the matching sections of
 * `base`; sections the file leaves out keep their base values.
 *
 * @throws PipelineConfigError if the file is missing, is not a JSON object,
 * or the merged configuration is invalid
 */
export function loadPipelineConfigFile(
  path: string,
  base: PipelineConfig = DEFAULT_PIPELINE_CONFIG
): Readonly<PipelineConfig> {
  if (!existsSync(path)) {
    throw new PipelineConfigError(`Pipeline config file not found: ${path}`, []);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new PipelineConfigError(`Pipeline config file is not valid JSON: ${path}`, [
      { path: [], message: err instanceof Error ? err.message : String(err), code: "invalid_json" },
    ]);
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new PipelineConfigError(`Pipeline config file must contain a JSON object: ${path}`, [
      { path: [], message: "Expected an object", code: "invalid_type" },
    ]);
  }

  return loadPipelineConfig({ ...base, ...parsed });
}
