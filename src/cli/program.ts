import { Command } from "commander";

import { ENGINE_MODES, type EngineMode, isEngineMode } from "../config/env";
import {
  computeReport,
  parseGenerationArgument,
  parseTermCountArgument,
  type ReportedTerm,
  type Row,
  rowAt,
} from "../sequence";
import { getSequenceConfig, type SequenceConfig } from "../types/config";
import { InputError } from "../utils/errors";
import { initializeLogger, log, logError } from "../utils/logger";

type CliOptions = {
  engine?: string;
  verbose?: boolean;
};

export function formatReportedTerm(term: ReportedTerm): string {
  return `a(${term.index})=${term.value}`;
}

export function formatRow(generation: number, row: Row): string {
  return `b(${generation})=[${row.join(", ")}]`;
}

export function resolveEngineMode(optionValue: string | undefined, fallback: EngineMode): EngineMode {
  if (optionValue === undefined) {
    return fallback;
  }

  if (!isEngineMode(optionValue)) {
    throw new InputError(
      `Invalid --engine value: ${optionValue}. Expected: ${ENGINE_MODES.join(" | ")}`
    );
  }
  return optionValue;
}

function applyRuntimeOptions(config: SequenceConfig, options: CliOptions): void {
  config.engine = resolveEngineMode(options.engine, config.engine);

  if (options.verbose) {
    config.verbose = true;
  }
}

function reportFatalError(error: unknown): void {
  logError(error instanceof Error ? error.message : String(error), error);
}

export function runCli(argv: readonly string[] = process.argv): void {
  const program = new Command();

  // Options after "row" belong to the subcommand, not the root program.
  program
    .enablePositionalOptions()
    .name("a300793")
    .description("Compute OEIS A300793 and cross-check the proven and conjectured recurrences")
    .version("0.1.0");

  program
    .argument("<count>", "Number of terms to compute")
    .option("-e, --engine <mode>", `Recurrence to use: ${ENGINE_MODES.join(" | ")}`)
    .option("-v, --verbose", "Verbose output")
    .action((rawCount: string, options: CliOptions) => {
      try {
        const config = getSequenceConfig();
        applyRuntimeOptions(config, options);
        initializeLogger(config);

        const count = parseTermCountArgument(rawCount);
        if (count > config.maxTerms) {
          throw new InputError(
            `Term count ${count} exceeds the configured limit of ${config.maxTerms} (A300793_MAX_TERMS)`
          );
        }

        log(`Computing ${count} terms with engine "${config.engine}"`);
        for (const term of computeReport(count, config.engine)) {
          console.log(formatReportedTerm(term));
        }
      } catch (error) {
        reportFatalError(error);
        process.exitCode = 1;
      }
    });

  program
    .command("row")
    .description("Print the auxiliary b row of a generation")
    .argument("<generation>", "Generation of the row, starting at 1")
    .option("-v, --verbose", "Verbose output")
    .action((rawGeneration: string, options: CliOptions) => {
      try {
        const config = getSequenceConfig();
        applyRuntimeOptions(config, options);
        initializeLogger(config);

        const generation = parseGenerationArgument(rawGeneration);
        if (generation > config.maxTerms) {
          throw new InputError(
            `Generation ${generation} exceeds the configured limit of ${config.maxTerms} (A300793_MAX_TERMS)`
          );
        }

        console.log(formatRow(generation, rowAt(generation)));
      } catch (error) {
        reportFatalError(error);
        process.exitCode = 1;
      }
    });

  program.parse(argv);
}
