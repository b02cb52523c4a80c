#!/usr/bin/env node
/**
 * judge-align CLI entry point.
 *
 * CRITICAL: env.js must be the FIRST import to ensure
 * environment variables are loaded before any other module.
 */
import { readApiKey } from "./env.js";

import chalk from "chalk";
import { Command } from "commander";

import { formatComparison } from "./comparison/format.js";
import {
  CorrelationMethodSchema,
  KappaWeightingSchema,
  OutputFormatSchema,
  loadConfigWithOverrides,
  type CLIOptions,
} from "./config/index.js";
import { RunCancelledError } from "./errors.js";
import { consoleProgress, verboseProgress } from "./judge/progress-reporters.js";
import { formatAlignmentResult } from "./metrics/format.js";
import {
  exportPromptWorkflow,
  runAlignmentWorkflow,
  runComparisonWorkflow,
  runMetricsWorkflow,
} from "./pipeline.js";
import { logger } from "./utils/index.js";

import type { AlignConfig } from "./types/index.js";

const program = new Command();

// Configure styled help output (Commander v13+ feature)
program.configureHelp({
  styleTitle: (str) => chalk.bold.cyan(str),
  styleCommandText: (str) => chalk.green(str),
  styleCommandDescription: (str) => chalk.dim(str),
  styleDescriptionText: (str) => str,
  styleOptionText: (str) => chalk.yellow(str),
  styleArgumentText: (str) => chalk.magenta(str),
  styleSubcommandText: (str) => chalk.green(str),
});

program
  .name("judge-align")
  .description("Measure how well an LLM judge agrees with human scores")
  .version("0.1.0");

/**
 * Extract CLI options from commander options object.
 */
function extractCLIOptions(
  options: Record<string, unknown>,
): Partial<CLIOptions> {
  const cliOptions: Partial<CLIOptions> = {};

  if (typeof options["data"] === "string") {
    cliOptions.data = options["data"];
  }
  if (typeof options["judgeColumn"] === "string") {
    cliOptions.judgeColumn = options["judgeColumn"];
  }
  if (typeof options["prompt"] === "string") {
    cliOptions.prompt = options["prompt"];
  }
  if (typeof options["model"] === "string") {
    cliOptions.model = options["model"];
  }
  if (typeof options["temperature"] === "number") {
    cliOptions.temperature = options["temperature"];
  }
  if (typeof options["concurrency"] === "number") {
    cliOptions.concurrency = options["concurrency"];
  }
  if (typeof options["tolerance"] === "number") {
    cliOptions.tolerance = options["tolerance"];
  }

  const weighting = KappaWeightingSchema.safeParse(options["weighting"]);
  if (weighting.success) {
    cliOptions.weighting = weighting.data;
  }
  const correlation = CorrelationMethodSchema.safeParse(options["correlation"]);
  if (correlation.success) {
    cliOptions.correlation = correlation.data;
  }
  const output = OutputFormatSchema.safeParse(options["output"]);
  if (output.success) {
    cliOptions.output = output.data;
  }

  if (typeof options["verbose"] === "boolean") {
    cliOptions.verbose = options["verbose"];
  }
  if (typeof options["debug"] === "boolean") {
    cliOptions.debug = options["debug"];
  }

  return cliOptions;
}

/**
 * Load configuration for a command and apply logging flags.
 */
function loadCommandConfig(options: Record<string, unknown>): AlignConfig {
  const configPath =
    typeof options["config"] === "string" ? options["config"] : undefined;
  const config = loadConfigWithOverrides(configPath, extractCLIOptions(options));

  if (config.debug || config.verbose) {
    logger.configure({ level: "debug" });
  }

  return config;
}

/**
 * Abort signal tied to Ctrl+C.
 */
function createInterruptSignal(): AbortSignal {
  const controller = new AbortController();
  process.once("SIGINT", () => {
    logger.warn("Interrupted - cancelling the current run...");
    controller.abort();
  });
  return controller.signal;
}

/**
 * Report a command failure and exit.
 */
function fail(err: unknown): never {
  if (err instanceof RunCancelledError) {
    logger.warn(err.message);
  } else {
    logger.error(err instanceof Error ? err.message : String(err));
  }
  process.exit(1);
}

const apiKey = readApiKey();

// =============================================================================
// Judge Commands Group
// =============================================================================

program.commandsGroup("Judge Commands:");

program
  .command("run")
  .description("Run one judge configuration and measure its alignment")
  // Input Options Group
  .optionsGroup("Input Options:")
  .option("-c, --config <path>", "Path to config file")
  .option("-d, --data <path>", "CSV file with human scores")
  // Judge Options Group
  .optionsGroup("Judge Options:")
  .option("-j, --judge <name>", "Configured judge to run (default: first)")
  .option("--prompt <text>", "Judge prompt (replaces configured judges)")
  .option("-m, --model <model>", "Judge model (alias or full ID)")
  .option("-t, --temperature <n>", "Judge temperature", parseFloat)
  .option("--concurrency <n>", "Maximum concurrent judge calls", parseInt)
  // Metrics Options Group
  .optionsGroup("Metrics Options:")
  .option("-w, --weighting <kind>", "Kappa weighting: none|linear|quadratic")
  .option("--correlation <method>", "Correlation: pearson|spearman")
  .option("--tolerance <n>", "Agreement tolerance in score units", parseFloat)
  // Output Options Group
  .optionsGroup("Output Options:")
  .option("-o, --output <format>", "Output format: json|yaml")
  .option("-v, --verbose", "Detailed progress output")
  .option("--debug", "Enable debug output")
  .action(async (options: Record<string, unknown>) => {
    try {
      const config = loadCommandConfig(options);
      const judgeName =
        typeof options["judge"] === "string" ? options["judge"] : undefined;

      logger.info("Starting alignment run...");

      const { result, outputPath } = await runAlignmentWorkflow(
        config,
        {
          apiKey,
          progress: config.verbose ? verboseProgress : consoleProgress,
          signal: createInterruptSignal(),
        },
        judgeName,
      );

      console.log(`\n${formatAlignmentResult(result)}`);
      logger.success(`Result saved to ${outputPath}`);
    } catch (err) {
      fail(err);
    }
  });

program
  .command("compare")
  .description("Run every configured judge and rank them by alignment")
  .optionsGroup("Input Options:")
  .option("-c, --config <path>", "Path to config file")
  .option("-d, --data <path>", "CSV file with human scores")
  .optionsGroup("Judge Options:")
  .option("-m, --model <model>", "Default judge model (alias or full ID)")
  .option("-t, --temperature <n>", "Default judge temperature", parseFloat)
  .option("--concurrency <n>", "Maximum concurrent judge calls", parseInt)
  .optionsGroup("Metrics Options:")
  .option("-w, --weighting <kind>", "Kappa weighting: none|linear|quadratic")
  .option("--correlation <method>", "Correlation: pearson|spearman")
  .option("--tolerance <n>", "Agreement tolerance in score units", parseFloat)
  .option(
    "--threshold <n>",
    "Judge score spread that counts as a disagreement",
    parseFloat,
  )
  .optionsGroup("Output Options:")
  .option("-o, --output <format>", "Output format: json|yaml")
  .option("-v, --verbose", "Detailed progress output")
  .option("--debug", "Enable debug output")
  .action(async (options: Record<string, unknown>) => {
    try {
      const config = loadCommandConfig(options);
      const threshold =
        typeof options["threshold"] === "number" ? options["threshold"] : 1;

      logger.info(
        `Comparing ${String(config.judges.length)} judge configurations...`,
      );

      const { results, disagreements, outputPath } = await runComparisonWorkflow(
        config,
        {
          apiKey,
          progress: config.verbose ? verboseProgress : consoleProgress,
          signal: createInterruptSignal(),
        },
        threshold,
      );

      console.log(`\n${formatComparison(results)}`);
      console.log(
        `Disagreements (spread >= ${String(threshold)}): ${String(disagreements.length)}`,
      );
      logger.success(`Comparison saved to ${outputPath}`);
    } catch (err) {
      fail(err);
    }
  });

// =============================================================================
// Offline Commands Group
// =============================================================================

program.commandsGroup("Offline Commands:");

program
  .command("metrics")
  .description("Measure alignment of judge scores already in the CSV")
  .option("-c, --config <path>", "Path to config file")
  .option("-d, --data <path>", "CSV file with human and judge scores")
  .option("--judge-column <name>", "Column holding the judge scores")
  .option("-w, --weighting <kind>", "Kappa weighting: none|linear|quadratic")
  .option("--correlation <method>", "Correlation: pearson|spearman")
  .option("--tolerance <n>", "Agreement tolerance in score units", parseFloat)
  .option("-o, --output <format>", "Output format: json|yaml")
  .option("--debug", "Enable debug output")
  .action(async (options: Record<string, unknown>) => {
    try {
      const config = loadCommandConfig(options);
      const { result, outputPath } = await runMetricsWorkflow(config);

      console.log(formatAlignmentResult(result));
      logger.success(`Result saved to ${outputPath}`);
    } catch (err) {
      fail(err);
    }
  });

program
  .command("export-prompt")
  .description("Write a judge prompt to a file")
  .requiredOption("-f, --file <path>", "Destination file")
  .option("-c, --config <path>", "Path to config file")
  .option("-j, --judge <name>", "Configured judge to export (default: first)")
  .option("-r, --results <path>", "Saved comparison; exports its best prompt")
  .action((options: Record<string, unknown>) => {
    try {
      const destination =
        typeof options["file"] === "string" ? options["file"] : "prompt.txt";
      const resultsPath =
        typeof options["results"] === "string" ? options["results"] : undefined;
      const judgeName =
        typeof options["judge"] === "string" ? options["judge"] : undefined;

      // A saved comparison is enough on its own; no config needed
      const config =
        resultsPath !== undefined && options["config"] === undefined
          ? null
          : loadCommandConfig(options);

      exportPromptWorkflow(config, destination, {
        ...(resultsPath !== undefined ? { resultsPath } : {}),
        ...(judgeName !== undefined ? { judgeName } : {}),
      });
      logger.success(`Prompt written to ${destination}`);
    } catch (err) {
      fail(err);
    }
  });

program.parse();
