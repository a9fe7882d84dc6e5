import axios, { type AxiosError, type AxiosInstance, type AxiosResponse } from "axios";

import { CancelledError } from "../../errors/jobErrors.js";
import { logger } from "../../logging/index.js";

import { sleep } from "./rateLimiter.js";

import type { ChatCompletionRequest, ChatCompletionResponse, ChatMessage } from "../../types/chat.js";
import type { OpenAIEngineSettings } from "../../types/settings.js";
import type { ChatBackend } from "../contracts.js";

const CHAT_COMPLETIONS_PATH = "/chat/completions";
const MAX_RETRY_AFTER_MS = 3000;

export interface OpenAIBackendOptions {
  maxRetries?: number;
  baseDelayMs?: number;
  timeoutMs?: number;
  temperature?: number;
  /** Injected for tests; defaults to a fresh axios instance. */
  http?: AxiosInstance;
}

export function buildChatCompletionsUrl(baseUrl: string): string {
  return `${baseUrl.replace(/\/+$/, "")}${CHAT_COMPLETIONS_PATH}`;
}

function parseRetryAfter(headerValue: unknown, maxMs = MAX_RETRY_AFTER_MS): number | null {
  if (typeof headerValue !== "string" || headerValue === "") { return null; }
  const seconds = Number(headerValue);
  if (!Number.isNaN(seconds) && seconds >= 0) {
    return Math.min(Math.floor(seconds * 1000), maxMs);
  }
  return null;
}

/**
 * Chat backend for OpenAI-compatible `/chat/completions` endpoints.
 */
export class OpenAICompatibleBackend implements ChatBackend {
  private readonly url: string;
  private readonly http: AxiosInstance;
  private readonly maxRetries: number;
  private readonly baseDelayMs: number;
  private readonly temperature: number;

  constructor(private readonly settings: OpenAIEngineSettings, options: OpenAIBackendOptions = {}) {
    this.url = buildChatCompletionsUrl(settings.baseUrl);
    this.http = options.http ?? axios.create({ timeout: options.timeoutMs ?? 120_000 });
    this.maxRetries = options.maxRetries ?? 2;
    this.baseDelayMs = options.baseDelayMs ?? 500;
    this.temperature = options.temperature ?? 0;
  }

  async complete(messages: ChatMessage[], signal?: AbortSignal): Promise<string> {
    const payload: ChatCompletionRequest = {
      model: this.settings.model,
      messages,
      temperature: this.temperature,
      stream: false,
    };

    logger.debug(`[BACKEND REQUEST] POST ${this.url} (model: ${this.settings.model}, messages: ${messages.length})`);
    const response = await this.postWithRetries(payload, signal);
    const content = response.data.choices[0]?.message.content;
    if (typeof content !== "string") {
      throw new Error(`Backend response from ${this.url} carried no message content`);
    }
    return content;
  }

  private async postWithRetries(
    payload: ChatCompletionRequest,
    signal: AbortSignal | undefined
  ): Promise<AxiosResponse<ChatCompletionResponse>> {
    let attempt = 0;
    // Attempt 1 + maxRetries retries = total attempts.
    // 5xx and network errors are retried with backoff; 429 only when Retry-After can be honoured.
    for (;;) {
      try {
        return await this.http.post<ChatCompletionResponse>(this.url, payload, {
          headers: {
            "Content-Type": "application/json",
            Authorization: `Bearer ${this.settings.apiKey}`,
          },
          ...(signal ? { signal } : {}),
        });
      } catch (err: unknown) {
        if (signal?.aborted) {
          throw new CancelledError(signal.reason);
        }
        if (!axios.isAxiosError(err)) {
          throw err;
        }
        const error: AxiosError = err;
        const status = error.response?.status ?? 0;
        const retryAfterMs = parseRetryAfter(error.response?.headers["retry-after"]);
        const retriable = (status >= 500 && status < 600) || !error.response || (status === 429 && retryAfterMs !== null);
        if (!retriable || attempt >= this.maxRetries) {
          throw new Error(`Backend request to ${this.url} failed${status ? ` with status ${status}` : ""}: ${error.message}`, { cause: error });
        }

        const backoff = retryAfterMs ?? Math.min(this.baseDelayMs * 2 ** attempt, MAX_RETRY_AFTER_MS);
        logger.warn(`[BACKEND REQUEST] Retrying (${attempt + 1}/${this.maxRetries}) after ${backoff}ms due to ${status || "network error"}.`);
        await sleep(backoff, signal);
        attempt++;
      }
    }
  }
}
