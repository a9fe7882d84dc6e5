/**
 * Engine Contracts
 *
 * The job controller treats the translation engine as an opaque capability:
 * given settings and a document, it yields raw events in order. Engines that
 * parse model output accept a replacement sanitizer through `SanitizerAware`.
 */

import type { JsonSanitizer } from '../parsers/json/jsonCleaning.js';
import type { ChatMessage } from '../types/chat.js';
import type { RunSettings } from '../types/settings.js';

export interface TranslationEngine {
  /** Engine name used in log lines. */
  readonly name: string;

  /**
   * Start a run. The returned iterable is consumed exactly once; events are
   * wire-shaped mappings (`{ type: "progress_update" | "error" | "finish", ... }`).
   */
  translateStream(
    settings: Readonly<RunSettings>,
    inputPath: string,
    signal?: AbortSignal
  ): AsyncIterable<unknown>;
}

/**
 * Sanitizer injection point.
 */
export interface SanitizerAware {
  useSanitizer(sanitizer: JsonSanitizer): void;
}

/**
 * Model boundary used by engines that talk to a chat-completion endpoint.
 */
export interface ChatBackend {
  complete(messages: ChatMessage[], signal?: AbortSignal): Promise<string>;
}

/**
 * Builds an engine for a run. The blocking facade resolves one of these
 * inside its worker thread.
 */
export type EngineFactory = (settings: Readonly<RunSettings>) => TranslationEngine;
