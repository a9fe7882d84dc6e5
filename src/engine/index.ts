/**
 * Engine Module
 *
 * Engines are resolved through `createEngine`; the CLI and the blocking
 * facade both go through it so the sanitizer is installed the same way.
 */

import { installSanitizer } from './sanitizerInstall.js';
import { PlainTextEngine } from './text/plainTextEngine.js';

import type { EngineFactory, TranslationEngine } from './contracts.js';

export const createEngine: EngineFactory = (): TranslationEngine => {
  const engine = new PlainTextEngine();
  installSanitizer(engine);
  return engine;
};

export { installSanitizer, isSanitizerAware } from './sanitizerInstall.js';
export type { SanitizerInstallOutcome } from './sanitizerInstall.js';
export { PlainTextEngine } from './text/plainTextEngine.js';
export { BatchTranslator, nativeJsonCleaning } from './llm/batchTranslator.js';
export { OpenAICompatibleBackend } from './llm/openaiBackend.js';
export { RateLimiter } from './llm/rateLimiter.js';
export type { ChatBackend, EngineFactory, SanitizerAware, TranslationEngine } from './contracts.js';
