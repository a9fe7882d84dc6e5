#!/usr/bin/env node
import { existsSync } from "fs";

import chalk from "chalk";

import { USAGE, parseCliArgs } from "./cli/args.js";
import { label, renderBox } from "./cli/banner.js";
import { createExampleConfig, loadConfig } from "./config.js";
import { createEngine } from "./engine/index.js";
import { isTranslationJobError, toErrorMessage } from "./errors/jobErrors.js";
import { formatProgressLine, logger } from "./logging/index.js";
import { buildRunSettings } from "./services/settingsService.js";
import { translateDocument } from "./services/translationJobService.js";

import type { ProgressUpdateEvent } from "./types/events.js";
import type { TranslationResult } from "./types/result.js";
import type { RunSettings } from "./types/settings.js";

function printLines(lines: string[]): void {
  for (const line of lines) {
    logger.info(line);
  }
}

function renderProgress(event: ProgressUpdateEvent): void {
  const line = formatProgressLine(event);
  if (process.stdout.isTTY) {
    process.stdout.write(`\r\x1b[2K${chalk.cyan(line)}`);
  } else {
    logger.info(line);
  }
}

function endProgressLine(): void {
  if (process.stdout.isTTY) {
    process.stdout.write("\n");
  }
}

function printRunHeader(settings: Readonly<RunSettings>, configPath: string): void {
  logger.info("");
  printLines(
    renderBox([
      [chalk.bold.green("docshift") + chalk.dim(" - document translation")],
      [
        label("Input:", settings.inputPath),
        label("Output:", settings.outputDir),
        label("Languages:", `${settings.langIn} -> ${settings.langOut}`),
        label("Model:", settings.engine.model),
        label("Config:", configPath),
      ],
    ])
  );
}

function printSummary(result: TranslationResult): void {
  const artifacts: Array<[string, string | null]> = [
    ["Mono:", result.monoPdfPath],
    ["Dual:", result.dualPdfPath],
    ["Mono (clean):", result.noWatermarkMonoPdfPath],
    ["Dual (clean):", result.noWatermarkDualPdfPath],
    ["Glossary:", result.autoExtractedGlossaryPath],
  ];

  printLines(
    renderBox(
      [
        [chalk.bold.green("Translation finished")],
        artifacts.flatMap(([name, path]) => (path === null ? [] : [label(name, path)])),
        [
          label("Time:", `${result.totalSeconds.toFixed(2)}s`),
          label("Peak memory:", `${result.peakMemoryUsage.toFixed(2)} MiB`),
        ],
      ],
      chalk.bold.green
    )
  );
}

function printFailure(error: unknown): void {
  const lines = renderBox(
    [
      [chalk.bold.red("Translation failed")],
      [isTranslationJobError(error) ? `${error.code}: ${error.message}` : toErrorMessage(error)],
    ],
    chalk.bold.red
  );
  for (const line of lines) {
    logger.error(line);
  }
  const cause = error instanceof Error ? error.cause : undefined;
  if (cause !== undefined) {
    logger.error(chalk.dim(`Cause: ${toErrorMessage(cause)}`));
  }
  if (error instanceof Error) {
    logger.debug(error);
  }
}

async function main(argv: string[]): Promise<number> {
  const options = parseCliArgs(argv);

  if (options.help) {
    logger.info(USAGE);
    return 0;
  }

  if (options.createConfig) {
    createExampleConfig(options.configPath);
    logger.info(chalk.green(`Example config written to ${options.configPath}`));
    logger.info("Fill in openai_api_key (or set OPENAI_API_KEY) and run again.");
    return 0;
  }

  if (options.run === null) {
    logger.error(chalk.red("No input document given."));
    logger.error(`Run ${chalk.cyan("docshift -i <document>")}, or ${chalk.cyan("docshift --help")} for all options.`);
    return 1;
  }

  if (!existsSync(options.configPath)) {
    logger.error(chalk.red(`Config file not found: ${options.configPath}`));
    logger.error(`Create one with ${chalk.cyan(`docshift --create-config -c ${options.configPath}`)}`);
    return 1;
  }

  const config = loadConfig(options.configPath);
  logger.setDebugMode(config.debug || logger.isDebugEnabled());

  const settings = buildRunSettings(config, options.run);
  const engine = createEngine(settings);
  printRunHeader(settings, options.configPath);

  const controller = new AbortController();
  const onSignal = (): void => {
    controller.abort("interrupted");
  };
  process.once("SIGINT", onSignal);

  try {
    const result = await translateDocument(settings, {
      engine,
      signal: controller.signal,
      onProgress: renderProgress,
      // The job service logs chunk errors itself.
      onError: endProgressLine,
    });
    endProgressLine();
    printSummary(result);
    return 0;
  } finally {
    process.removeListener("SIGINT", onSignal);
  }
}

void main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    endProgressLine();
    printFailure(error);
    process.exitCode = 1;
  }
);
