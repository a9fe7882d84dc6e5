/**
 * docshift public API
 */

export { translateDocument, streamTranslation, ensureInputExists } from "./services/translationJobService.js";
export type { TranslationJobOptions } from "./services/translationJobService.js";
export { translateDocumentSync } from "./services/syncTranslation.js";
export type { SyncTranslationRequest } from "./services/syncTranslation.js";
export { buildRunSettings, parsePageRanges, DEFAULT_LANG_IN, DEFAULT_LANG_OUT } from "./services/settingsService.js";
export { WATERMARK_OUTPUT_MODES } from "./types/settings.js";
export { decodeTranslationResult, formatTranslationResult } from "./services/resultDecoder.js";
export { decodeEngineEvent } from "./services/eventDecoder.js";

export {
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_PATH,
  createExampleConfig,
  loadConfig,
  loadConfigFile,
  resolveConfig,
  validateConfig,
} from "./config.js";
export type { ConfigFile, DocshiftConfig } from "./config.js";

export { createEngine, installSanitizer, PlainTextEngine, OpenAICompatibleBackend } from "./engine/index.js";
export type { ChatBackend, SanitizerAware, SanitizerInstallOutcome, TranslationEngine } from "./engine/index.js";

export { cleanJsonOutput, cleanJsonOutputMethod, stripControlCharacters } from "./parsers/json/index.js";
export type { JsonSanitizer } from "./parsers/json/index.js";

export * from "./errors/jobErrors.js";
export type * from "./types/index.js";
