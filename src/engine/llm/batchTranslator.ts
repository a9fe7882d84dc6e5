/**
 * Batch paragraph translator
 *
 * Sends paragraphs to the model as a JSON array and reads a JSON array back.
 * Every reply goes through the configured sanitizer before `JSON.parse`.
 * When a batch reply cannot be used, each affected paragraph is translated
 * on its own; a paragraph that still fails keeps its source text and is
 * reported as a failure.
 */

import { z } from "zod";

import { CancelledError, toErrorMessage } from "../../errors/jobErrors.js";
import { logger } from "../../logging/index.js";

import { buildBatchSystemPrompt, buildSingleSystemPrompt, type PromptContext } from "./prompts.js";

import type { JsonSanitizer } from "../../parsers/json/jsonCleaning.js";
import type { ChatBackend, SanitizerAware } from "../contracts.js";
import type { RateLimiter } from "./rateLimiter.js";

export interface TranslationItem {
  id: number;
  text: string;
}

export interface TranslationFailure {
  id: number;
  message: string;
}

export interface BatchOutcome {
  translations: Map<number, string>;
  failures: TranslationFailure[];
  /** True when at least one paragraph needed the one-by-one fallback. */
  usedFallback: boolean;
}

const BatchReplySchema = z.array(
  z.object({
    id: z.number().int(),
    output: z.string(),
  })
);

/**
 * Cleaning applied when no sanitizer has been injected: wrapper tags and
 * fences are removed, control characters are left in place.
 */
export const nativeJsonCleaning: JsonSanitizer = (raw) =>
  raw
    .trim()
    .replace(/^<json>/, "")
    .replace(/<\/json>$/, "")
    .replace(/^```(?:json)?/, "")
    .replace(/```$/, "")
    .trim();

export class BatchTranslator implements SanitizerAware {
  private sanitizer: JsonSanitizer = nativeJsonCleaning;

  constructor(
    private readonly backend: ChatBackend,
    private readonly limiter: RateLimiter,
    private readonly prompt: PromptContext
  ) {}

  useSanitizer(sanitizer: JsonSanitizer): void {
    this.sanitizer = sanitizer;
  }

  /**
   * Parse a batch reply. Returns null when the reply is not usable JSON.
   */
  parseBatchReply(reply: string): Map<number, string> | null {
    let parsed: unknown;
    try {
      parsed = JSON.parse(this.sanitizer(reply));
    } catch (error: unknown) {
      logger.debug(`[ENGINE] Batch reply is not valid JSON: ${toErrorMessage(error)}`);
      return null;
    }

    const validated = BatchReplySchema.safeParse(parsed);
    if (!validated.success) {
      logger.debug(`[ENGINE] Batch reply has an unexpected shape: ${validated.error.message}`);
      return null;
    }

    return new Map(validated.data.map((entry) => [entry.id, entry.output]));
  }

  async translateBatch(items: TranslationItem[], signal?: AbortSignal): Promise<BatchOutcome> {
    const outcome: BatchOutcome = { translations: new Map(), failures: [], usedFallback: false };
    if (items.length === 0) {
      return outcome;
    }

    const replies = await this.requestBatch(items, signal);
    const pending: TranslationItem[] = [];
    for (const item of items) {
      const translated = replies?.get(item.id);
      if (translated === undefined) {
        pending.push(item);
      } else {
        outcome.translations.set(item.id, translated);
      }
    }

    if (pending.length > 0) {
      outcome.usedFallback = true;
      logger.warn(`[ENGINE] Falling back to single-paragraph requests for ${pending.length} of ${items.length} paragraph(s)`);
    }

    for (const item of pending) {
      try {
        outcome.translations.set(item.id, await this.translateSingle(item, signal));
      } catch (error: unknown) {
        if (error instanceof CancelledError) {
          throw error;
        }
        if (signal?.aborted) {
          throw new CancelledError(signal.reason);
        }
        outcome.failures.push({ id: item.id, message: toErrorMessage(error) });
      }
    }

    return outcome;
  }

  private async requestBatch(items: TranslationItem[], signal: AbortSignal | undefined): Promise<Map<number, string> | null> {
    await this.limiter.acquire(signal);
    let reply: string;
    try {
      reply = await this.backend.complete(
        [
          { role: "system", content: buildBatchSystemPrompt(this.prompt) },
          { role: "user", content: JSON.stringify(items.map((item) => ({ id: item.id, input: item.text }))) },
        ],
        signal
      );
    } catch (error: unknown) {
      if (error instanceof CancelledError) {
        throw error;
      }
      if (signal?.aborted) {
        throw new CancelledError(signal.reason);
      }
      logger.warn(`[ENGINE] Batch request failed: ${toErrorMessage(error)}`);
      return null;
    }
    return this.parseBatchReply(reply);
  }

  private async translateSingle(item: TranslationItem, signal: AbortSignal | undefined): Promise<string> {
    await this.limiter.acquire(signal);
    const reply = await this.backend.complete(
      [
        { role: "system", content: buildSingleSystemPrompt(this.prompt) },
        { role: "user", content: item.text },
      ],
      signal
    );
    const translated = reply.trim();
    if (translated === "") {
      throw new Error(`Empty translation for paragraph ${item.id}`);
    }
    return translated;
  }
}
