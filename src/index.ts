/**
 * Entry point for the EDA pipeline.
 *
 * Usage:
 *   tsx src/index.ts <dataset.csv|.xlsx|.xls> [options]
 *
 * Options:
 *   --config <path>      Pipeline configuration JSON (sections override the defaults)
 *   --target <column>    Column to predict
 *   --strategy <name>    Cleaning strategy: auto, mean, median, mode or drop
 *   --output <dir>       Output directory (default: OUTPUT_DIR or output)
 *   -h, --help           Show this help message
 *
 * Exit codes:
 *   0 - Run completed and artifacts were written
 *   1 - Invalid configuration or input, or the run failed
 */

import { parseArgs } from "node:util";

import {
  config,
  validateConfig,
  ConfigError,
  PipelineConfigError,
  loadPipelineConfig,
  loadPipelineConfigFile,
  resolvePipelineConfig,
  type PipelineConfig,
} from "./config/index.js";
import { InvalidInputError, ValidationError } from "./dataset/errors.js";
import { loadDatasetFile } from "./dataset/load.js";
import { describeChange } from "./dataset/changelog.js";
import { createLogger, isLogLevel } from "./logging/index.js";
import { PipelineService } from "./pipeline/index.js";

const USAGE = `
Usage: eda-pipeline <dataset.csv|.xlsx|.xls> [options]

Options:
  --config <path>      Pipeline configuration JSON (sections override the defaults)
  --target <column>    Column to predict
  --strategy <name>    Cleaning strategy: auto, mean, median, mode or drop
  --output <dir>       Output directory (default: OUTPUT_DIR or output)
  -h, --help           Show this help message
`;

interface CliOptions {
  input: string | undefined;
  config: string | undefined;
  target: string | undefined;
  strategy: string | undefined;
  output: string | undefined;
  help: boolean;
}

function parseCli(args: readonly string[]): CliOptions {
  const { values, positionals } = parseArgs({
    args: [...args],
    allowPositionals: true,
    options: {
      config: { type: "string" },
      target: { type: "string" },
      strategy: { type: "string" },
      output: { type: "string" },
      help: { type: "boolean", short: "h", default: false },
    },
  });
  return {
    input: positionals[0],
    config: values.config,
    target: values.target,
    strategy: values.strategy,
    output: values.output,
    help: values.help ?? false,
  };
}

/**
 * Environment settings, then the config file, then command-line flags.
 */
function buildPipelineConfig(options: CliOptions): Readonly<PipelineConfig> {
  const fromEnv = resolvePipelineConfig(config);
  const base = options.config ? loadPipelineConfigFile(options.config, fromEnv) : fromEnv;
  return loadPipelineConfig({
    ...base,
    ...(options.strategy !== undefined ? { cleaning: { strategy: options.strategy } } : {}),
    ...(options.target !== undefined ? { training: { ...base.training, targetColumn: options.target } } : {}),
  });
}

async function main(): Promise<number> {
  const logger = createLogger({
    level: isLogLevel(config.logLevel) ? config.logLevel : "info",
    logDir: config.logDir,
  });

  let options: CliOptions;
  try {
    options = parseCli(process.argv.slice(2));
  } catch (err) {
    logger.error(err instanceof Error ? err.message : String(err));
    console.log(USAGE);
    return 1;
  }

  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  try {
    validateConfig();

    if (!options.input) {
      logger.error("Missing dataset path");
      console.log(USAGE);
      return 1;
    }

    const pipelineConfig = buildPipelineConfig(options);
    const outputDir = options.output ?? config.outputDir;
    logger.info("Configuration loaded", {
      env: config.env,
      logLevel: config.logLevel,
      outputDir,
      strategy: pipelineConfig.cleaning.strategy,
      target: pipelineConfig.training.targetColumn ?? null,
      retry: pipelineConfig.retry,
    });

    const dataset = await loadDatasetFile(options.input);
    const service = new PipelineService({
      config: pipelineConfig,
      logger,
      outputDir,
      onStatus: (status) => {
        if (config.debug) {
          logger.debug(`${status.percentage}% ${status.message}`);
        }
      },
    });

    const started = service.start(dataset);
    logger.info("Pipeline run started", { runId: started.runId, input: options.input });

    const outcome = await service.waitForCompletion();
    if (outcome.status === "error") {
      const err = outcome.error;
      logger.error("Pipeline run failed", {
        runId: outcome.runId,
        message: err instanceof ValidationError ? err.format() : err instanceof Error ? err.message : String(err),
      });
      return 1;
    }

    const { result } = outcome;
    logger.info("Generated files", {
      cleanedData: result.artifacts.cleanedData,
      report: result.artifacts.reportMarkdown,
      html: result.artifacts.reportHtml,
      model: result.artifacts.model ?? null,
      charts: result.artifacts.charts.length,
    });
    for (const entry of result.changeLog) {
      logger.info(`Change ${entry.sequence}: ${describeChange(entry)}`);
    }
    return 0;
  } catch (err) {
    if (err instanceof ConfigError || err instanceof InvalidInputError) {
      logger.error("Cannot start pipeline", { message: err.message });
      return 1;
    }
    if (err instanceof PipelineConfigError) {
      logger.error(err.issues.length > 0 ? err.format() : err.message);
      return 1;
    }
    throw err;
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  }
);
