#!/usr/bin/env node
/**
 * CLI command to validate the pipeline configuration stack.
 *
 * Validates:
 * - Environment settings (NODE_ENV, LOG_LEVEL, retry and activity-log limits)
 * - PipelineConfig, from the defaults or a JSON file layered over them
 * - Stage topology and progress windows
 *
 * Usage:
 *   npx tsx src/cli/validate-config.ts [options]
 *   npm run validate-config
 *
 * Options:
 *   --config <path>     Pipeline configuration JSON (default: built-in defaults)
 *   --verbose           Show the resolved stage table
 *   --json              Output the report as JSON (for CI parsing)
 *   -h, --help          Show help
 *
 * Exit codes:
 *   0 - All validations passed
 *   1 - One or more validations failed
 */

import { parseArgs } from "node:util";

import {
  config,
  validateConfig,
  ConfigError,
  PipelineConfigError,
  loadPipelineConfigFile,
  resolvePipelineConfig,
  type PipelineConfig,
} from "../config/index.js";
import { validateStageTopology } from "../pipeline/definition.js";

// ============================================================
// Types
// ============================================================

interface StepResult {
  success: boolean;
  component: string;
  message: string;
  details?: string[];
}

interface ValidationReport {
  timestamp: string;
  configPath: string | null;
  steps: StepResult[];
  stages?: Array<{ id: string; name: string; actor: string; window: string }>;
  summary: {
    stepsPassed: number;
    stepsFailed: number;
    stepsTotal: number;
  };
}

// ============================================================
// CLI Parsing
// ============================================================

function parseCliArgs() {
  const { values } = parseArgs({
    options: {
      config: { type: "string" },
      verbose: { type: "boolean", default: false },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(`
Usage: validate-config [options]

Options:
  --config <path>     Pipeline configuration JSON (default: built-in defaults)
  --verbose           Show the resolved stage table
  --json              Output the report as JSON (for CI parsing)
  -h, --help          Show this help message
`);
    process.exit(0);
  }

  return values;
}

// ============================================================
// Output Formatting
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
};

const useColors = process.stdout.isTTY && !process.env.NO_COLOR;

function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

function printStep(step: StepResult): void {
  const mark = step.success ? c("green", "✓") : c("red", "✗");
  console.log(`${mark} ${c("bold", step.component)}: ${step.message}`);
  for (const detail of step.details ?? []) {
    console.log(`    ${c(step.success ? "dim" : "red", "•")} ${detail}`);
  }
}

function printFooter(passed: number, failed: number): void {
  console.log("");
  console.log("─".repeat(60));
  if (failed === 0) {
    console.log(c("green", `✓ All validations passed (${passed}/${passed})`));
  } else {
    console.log(c("red", `✗ Validation failed: ${failed} error(s)`));
  }
  console.log("─".repeat(60));
  console.log("");
}

// ============================================================
// Validation Steps
// ============================================================

function failure(component: string, err: unknown): StepResult {
  if (err instanceof PipelineConfigError) {
    return {
      success: false,
      component,
      message: err.message,
      details: err.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
    };
  }
  return {
    success: false,
    component,
    message: err instanceof Error ? err.message : String(err),
  };
}

function validateEnvironment(): { step: StepResult; base?: Readonly<PipelineConfig> } {
  try {
    validateConfig();
    const base = resolvePipelineConfig(config);
    return {
      step: {
        success: true,
        component: "Environment",
        message: `${config.env}, log level ${config.logLevel}`,
        details: [
          `retry: ${base.retry.maxAttempts} attempts, ${base.retry.backoffMs}ms backoff unit`,
          `activity log: ${base.activityLogLimit} entries`,
          `output: ${config.outputDir}`,
        ],
      },
      base,
    };
  } catch (err) {
    if (err instanceof ConfigError || err instanceof PipelineConfigError) {
      return { step: failure("Environment", err) };
    }
    throw err;
  }
}

function validatePipeline(
  base: Readonly<PipelineConfig>,
  path: string | undefined
): { step: StepResult; pipeline?: Readonly<PipelineConfig> } {
  try {
    const pipeline = path ? loadPipelineConfigFile(path, base) : base;
    return {
      step: {
        success: true,
        component: "PipelineConfig",
        message: path ? `loaded from ${path}` : "built-in defaults",
        details: [
          `cleaning strategy: ${pipeline.cleaning.strategy}`,
          `target column: ${pipeline.training.targetColumn ?? "(inferred)"}`,
          `explainability required: ${pipeline.explainability.required}`,
        ],
      },
      pipeline,
    };
  } catch (err) {
    if (err instanceof PipelineConfigError) {
      return { step: failure("PipelineConfig", err) };
    }
    throw err;
  }
}

function validateTopology(pipeline: Readonly<PipelineConfig>): StepResult {
  try {
    validateStageTopology(pipeline.stages.map((stage) => stage.id));
    return {
      success: true,
      component: "Stage topology",
      message: `${pipeline.stages.length} stages in fixed order`,
    };
  } catch (err) {
    return failure("Stage topology", err);
  }
}

// ============================================================
// Main
// ============================================================

function main(): number {
  const args = parseCliArgs();
  const steps: StepResult[] = [];
  let stages: ValidationReport["stages"];

  const environment = validateEnvironment();
  steps.push(environment.step);

  if (environment.base) {
    const pipeline = validatePipeline(environment.base, args.config);
    steps.push(pipeline.step);

    if (pipeline.pipeline) {
      steps.push(validateTopology(pipeline.pipeline));
      stages = pipeline.pipeline.stages.map((stage) => ({
        id: stage.id,
        name: stage.name,
        actor: stage.actor,
        window: `${stage.progressStart}-${stage.progressEnd}%`,
      }));
    }
  }

  const passed = steps.filter((step) => step.success).length;
  const report: ValidationReport = {
    timestamp: new Date().toISOString(),
    configPath: args.config ?? null,
    steps,
    ...(stages ? { stages } : {}),
    summary: {
      stepsPassed: passed,
      stepsFailed: steps.length - passed,
      stepsTotal: steps.length,
    },
  };

  if (args.json) {
    console.log(JSON.stringify(report, null, 2));
    return report.summary.stepsFailed === 0 ? 0 : 1;
  }

  console.log("");
  console.log(c("bold", "═".repeat(60)));
  console.log(c("bold", " Pipeline Configuration Validation"));
  console.log(c("bold", "═".repeat(60)));
  console.log("");

  steps.forEach(printStep);

  if (args.verbose && stages) {
    console.log("");
    for (const stage of stages) {
      console.log(`  ${stage.id.padEnd(16)} ${stage.window.padEnd(8)} ${stage.name} (${stage.actor})`);
    }
  }

  printFooter(passed, report.summary.stepsFailed);
  return report.summary.stepsFailed === 0 ? 0 : 1;
}

process.exitCode = main();
