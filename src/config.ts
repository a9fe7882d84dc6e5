import "dotenv/config";
import { mkdirSync, readFileSync, writeFileSync } from "fs";
import { dirname } from "path";

import { InvalidConfigError, toErrorMessage } from "./errors/jobErrors.js";
import { isBoolean, isNonEmptyString, isNullish, isNumber, isRecord, isString, type UnknownRecord } from "./utils/typeGuards.js";

import type { EngineVendor } from "./types/settings.js";

// ============================================================================
// CONFIGURATION (SSOT: config file)
// The config file carries engine selection, model and throttling options.
// Environment variables are ONLY used for secrets and to force debug output.
// ============================================================================

/**
 * On-disk shape of the config file.
 */
export interface ConfigFile {
  translation_engine?: string;
  openai_api_key?: string;
  openai_base_url?: string;
  openai_model?: string;
  qps?: number;
  min_text_length?: number;
  debug?: boolean;
  custom_system_prompt?: string | null;
}

export interface DocshiftConfig {
  translationEngine: string;
  openai: {
    apiKey: string;
    baseUrl: string;
    model: string;
  };
  /** Model requests per second. */
  qps: number;
  /** Paragraphs shorter than this are copied through untranslated. */
  minTextLength: number;
  debug: boolean;
  customSystemPrompt: string | null;
}

export const DEFAULT_CONFIG_PATH = "config/config.json";
export const PLACEHOLDER_API_KEY = "your-api-key-here";
export const SUPPORTED_ENGINES: readonly EngineVendor[] = ["openai"];

export const DEFAULT_CONFIG: DocshiftConfig = {
  translationEngine: "openai",
  openai: {
    apiKey: "",
    baseUrl: "https://api.openai.com/v1",
    model: "gpt-4o-mini",
  },
  qps: 4,
  minTextLength: 5,
  debug: false,
  customSystemPrompt: null,
};

type Env = Record<string, string | undefined>;

function getEnv(env: Env, key: string): string | undefined {
  const value = env[key];
  if (value === undefined || value === "") {
    return undefined;
  }
  return value;
}

function coalesceEnv(env: Env, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = getEnv(env, key);
    if (value !== undefined) {
      return value;
    }
  }
  return undefined;
}

function readField<T>(
  file: UnknownRecord,
  key: keyof ConfigFile,
  guard: (value: unknown) => value is T,
  expected: string
): T | undefined {
  const value = file[key];
  if (isNullish(value)) {
    return undefined;
  }
  if (!guard(value)) {
    throw new InvalidConfigError(`Config field "${key}" must be ${expected}`);
  }
  return value;
}

/**
 * Read and parse a config file. The file must exist and hold a JSON object.
 */
export function loadConfigFile(configPath: string): UnknownRecord {
  let contents: string;
  try {
    contents = readFileSync(configPath, "utf8");
  } catch (error: unknown) {
    throw new InvalidConfigError(`Unable to read config file ${configPath}: ${toErrorMessage(error)}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error: unknown) {
    throw new InvalidConfigError(`Config file ${configPath} is not valid JSON: ${toErrorMessage(error)}`, { cause: error });
  }

  if (!isRecord(parsed)) {
    throw new InvalidConfigError(`Config file ${configPath} must contain a JSON object`);
  }
  return parsed;
}

/**
 * Apply defaults and environment secrets to a parsed config file.
 *
 * The API key from the file wins unless it is empty or still the
 * placeholder, in which case OPENAI_API_KEY (or BACKEND_LLM_API_KEY) is used.
 */
export function resolveConfig(file: UnknownRecord, env: Env = process.env): DocshiftConfig {
  const fileApiKey = readField(file, "openai_api_key", isString, "a string");
  const envApiKey = coalesceEnv(env, "OPENAI_API_KEY", "BACKEND_LLM_API_KEY");
  const apiKey = fileApiKey !== undefined && fileApiKey !== "" && fileApiKey !== PLACEHOLDER_API_KEY
    ? fileApiKey
    : envApiKey ?? fileApiKey ?? DEFAULT_CONFIG.openai.apiKey;

  const customSystemPrompt = readField(file, "custom_system_prompt", isString, "a string or null");

  return {
    translationEngine:
      readField(file, "translation_engine", isString, "a string") ?? DEFAULT_CONFIG.translationEngine,
    openai: {
      apiKey,
      baseUrl: readField(file, "openai_base_url", isString, "a string") ?? DEFAULT_CONFIG.openai.baseUrl,
      model: readField(file, "openai_model", isString, "a string") ?? DEFAULT_CONFIG.openai.model,
    },
    qps: readField(file, "qps", isNumber, "a number") ?? DEFAULT_CONFIG.qps,
    minTextLength: readField(file, "min_text_length", isNumber, "a number") ?? DEFAULT_CONFIG.minTextLength,
    debug: getEnv(env, "DOCSHIFT_DEBUG") === "true"
      || (readField(file, "debug", isBoolean, "a boolean") ?? DEFAULT_CONFIG.debug),
    customSystemPrompt: customSystemPrompt === undefined || customSystemPrompt === ""
      ? DEFAULT_CONFIG.customSystemPrompt
      : customSystemPrompt,
  };
}

/**
 * Validate a resolved config. Throws InvalidConfigError on the first problem.
 */
export function validateConfig(config: DocshiftConfig): void {
  if (!SUPPORTED_ENGINES.some((engine) => engine === config.translationEngine)) {
    throw new InvalidConfigError(
      `Unsupported translation engine: ${config.translationEngine} (supported: ${SUPPORTED_ENGINES.join(", ")})`
    );
  }

  if (!isNonEmptyString(config.openai.apiKey) || config.openai.apiKey === PLACEHOLDER_API_KEY) {
    throw new InvalidConfigError(
      "Missing OpenAI API key: set openai_api_key in the config file or OPENAI_API_KEY in the environment"
    );
  }
  if (!isNonEmptyString(config.openai.baseUrl)) {
    throw new InvalidConfigError("openai_base_url must not be empty");
  }
  if (!isNonEmptyString(config.openai.model)) {
    throw new InvalidConfigError("openai_model must not be empty");
  }

  if (config.qps <= 0) {
    throw new InvalidConfigError(`qps must be greater than 0 (got ${config.qps})`);
  }
  if (config.minTextLength < 0) {
    throw new InvalidConfigError(`min_text_length must not be negative (got ${config.minTextLength})`);
  }
}

/**
 * Load, resolve and validate a config file in one step.
 */
export function loadConfig(configPath: string = DEFAULT_CONFIG_PATH, env: Env = process.env): DocshiftConfig {
  const config = resolveConfig(loadConfigFile(configPath), env);
  validateConfig(config);
  return config;
}

export const EXAMPLE_CONFIG: Required<ConfigFile> = {
  translation_engine: "openai",
  openai_api_key: PLACEHOLDER_API_KEY,
  openai_base_url: DEFAULT_CONFIG.openai.baseUrl,
  openai_model: DEFAULT_CONFIG.openai.model,
  qps: DEFAULT_CONFIG.qps,
  min_text_length: DEFAULT_CONFIG.minTextLength,
  debug: DEFAULT_CONFIG.debug,
  custom_system_prompt: DEFAULT_CONFIG.customSystemPrompt,
};

/**
 * Write the example config file, creating parent directories as needed.
 */
export function createExampleConfig(outputPath: string = DEFAULT_CONFIG_PATH): void {
  mkdirSync(dirname(outputPath), { recursive: true });
  writeFileSync(outputPath, `${JSON.stringify(EXAMPLE_CONFIG, null, 2)}\n`, "utf8");
}
