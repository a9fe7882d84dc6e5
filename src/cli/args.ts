import { parseArgs } from "util";

import { DEFAULT_CONFIG_PATH } from "../config.js";
import { InvalidConfigError, toErrorMessage } from "../errors/jobErrors.js";
import { DEFAULT_LANG_IN, DEFAULT_LANG_OUT } from "../services/settingsService.js";
import { WATERMARK_OUTPUT_MODES, type RunRequest, type WatermarkOutputMode } from "../types/settings.js";

export interface CliOptions {
  help: boolean;
  createConfig: boolean;
  configPath: string;
  /** null when no input document was given. */
  run: RunRequest | null;
}

export const USAGE = `Usage: docshift -i <document> [options]

Options:
  -i, --input <path>            Document to translate
  -o, --output <dir>            Output directory (default: next to the input)
  -c, --config <path>           Config file (default: ${DEFAULT_CONFIG_PATH})
      --lang-in <code>          Source language (default: ${DEFAULT_LANG_IN})
      --lang-out <code>         Target language (default: ${DEFAULT_LANG_OUT})
      --no-dual                 Do not write the bilingual output
      --no-mono                 Do not write the translated-only output
      --watermark <mode>        ${WATERMARK_OUTPUT_MODES.join(" | ")} (default: watermarked)
      --pages <ranges>          Pages to translate, e.g. 1,3-5,8-
      --max-pages-per-part <n>  Translate in parts of at most n pages
      --enhance-compatibility   Normalise output for older viewers
      --create-config           Write an example config file and exit
  -h, --help                    Show this help`;

function isWatermarkMode(value: string): value is WatermarkOutputMode {
  return WATERMARK_OUTPUT_MODES.some((mode) => mode === value);
}

function parsePositiveInteger(flag: string, value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(parsed) || parsed < 1) {
    throw new InvalidConfigError(`${flag} expects a positive integer (got "${value}")`);
  }
  return parsed;
}

const OPTIONS = {
  input: { type: "string", short: "i" },
  output: { type: "string", short: "o" },
  config: { type: "string", short: "c" },
  "lang-in": { type: "string" },
  "lang-out": { type: "string" },
  "no-dual": { type: "boolean" },
  "no-mono": { type: "boolean" },
  watermark: { type: "string" },
  pages: { type: "string" },
  "max-pages-per-part": { type: "string" },
  "enhance-compatibility": { type: "boolean" },
  "create-config": { type: "boolean" },
  help: { type: "boolean", short: "h" },
} as const;

function readArgs(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: OPTIONS, strict: true, allowPositionals: false }).values;
  } catch (error: unknown) {
    throw new InvalidConfigError(toErrorMessage(error), { cause: error });
  }
}

function parseWatermark(value: string | undefined): WatermarkOutputMode | undefined {
  if (value === undefined || isWatermarkMode(value)) {
    return value;
  }
  throw new InvalidConfigError(
    `--watermark expects one of ${WATERMARK_OUTPUT_MODES.join(", ")} (got "${value}")`
  );
}

/**
 * Parse command-line arguments (without the node and script entries).
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const values = readArgs(argv);
  const input = values.input;
  const maxPagesPerPart = values["max-pages-per-part"];

  return {
    help: values.help ?? false,
    createConfig: values["create-config"] ?? false,
    configPath: values.config ?? DEFAULT_CONFIG_PATH,
    run: input === undefined || input.trim() === ""
      ? null
      : {
          inputPath: input,
          outputDir: values.output,
          langIn: values["lang-in"],
          langOut: values["lang-out"],
          noDual: values["no-dual"],
          noMono: values["no-mono"],
          watermarkOutputMode: parseWatermark(values.watermark),
          pages: values.pages,
          maxPagesPerPart: maxPagesPerPart === undefined
            ? undefined
            : parsePositiveInteger("--max-pages-per-part", maxPagesPerPart),
          enhanceCompatibility: values["enhance-compatibility"],
        },
  };
}
