/**
 * Translation Job Service
 *
 * Drives one run of a translation engine: consumes its event stream strictly
 * in order, dispatches each event by kind and returns the result carried by
 * the terminal `finish` event.
 *
 * Failure taxonomy:
 * - INPUT_NOT_FOUND     the input document does not exist (checked before the engine starts)
 * - TRANSPORT_FAILURE   the engine stream itself threw; the cause is kept
 * - INCOMPLETE_RUN      the stream closed without a finish event
 * - CANCELLED           the caller's AbortSignal fired
 * - RESULT_SCHEMA_MISMATCH  the finish payload could not be decoded
 *
 * Chunk errors reported as `error` events are forwarded and logged; they do
 * not stop the run.
 */

import { stat } from "fs/promises";

import {
  CancelledError,
  IncompleteRunError,
  InputNotFoundError,
  TransportFailureError,
  isTranslationJobError,
  toErrorMessage,
} from "../errors/jobErrors.js";
import { logChunkError, logger, logProgress } from "../logging/index.js";

import { decodeEngineEvent } from "./eventDecoder.js";
import { formatTranslationResult } from "./resultDecoder.js";

import type { TranslationEngine } from "../engine/contracts.js";
import type { ChunkErrorObserver, ProgressObserver, TranslationEvent } from "../types/events.js";
import type { TranslationResult } from "../types/result.js";
import type { RunSettings } from "../types/settings.js";

export interface TranslationJobOptions {
  engine: TranslationEngine;
  /** Called synchronously, in event order, for every progress update. */
  onProgress?: ProgressObserver | undefined;
  /** Called once for every non-fatal chunk error. */
  onError?: ChunkErrorObserver | undefined;
  signal?: AbortSignal | undefined;
}

export async function ensureInputExists(inputPath: string): Promise<void> {
  try {
    const info = await stat(inputPath);
    if (!info.isFile()) {
      throw new InputNotFoundError(inputPath);
    }
  } catch (error: unknown) {
    if (isTranslationJobError(error)) {
      throw error;
    }
    throw new InputNotFoundError(inputPath);
  }
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new CancelledError(signal.reason);
  }
}

/**
 * Race the next engine event against the abort signal so that a stalled
 * engine cannot hold a cancelled run open.
 */
function nextOrAbort(
  iterator: AsyncIterator<unknown>,
  signal: AbortSignal | undefined
): Promise<IteratorResult<unknown>> {
  const next = iterator.next();
  if (!signal) {
    return next;
  }

  return new Promise<IteratorResult<unknown>>((resolve, reject) => {
    const onAbort = (): void => reject(new CancelledError(signal.reason));
    signal.addEventListener("abort", onAbort, { once: true });
    next.then(
      (step) => {
        signal.removeEventListener("abort", onAbort);
        resolve(step);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

function openEngineStream(
  settings: Readonly<RunSettings>,
  engine: TranslationEngine,
  signal: AbortSignal | undefined
): AsyncIterator<unknown> {
  try {
    return engine.translateStream(settings, settings.inputPath, signal)[Symbol.asyncIterator]();
  } catch (error: unknown) {
    throw new TransportFailureError(error);
  }
}

/**
 * Lazy, single-pass view of a run. Yields every decoded event in emission
 * order and returns the result of the finish event.
 *
 * The engine iterator is released exactly once on every exit path, including
 * a consumer that stops pulling before the run is over.
 */
export async function* streamTranslation(
  settings: Readonly<RunSettings>,
  options: TranslationJobOptions
): AsyncGenerator<TranslationEvent, TranslationResult, undefined> {
  const { engine, onProgress, onError, signal } = options;

  await ensureInputExists(settings.inputPath);
  throwIfAborted(signal);

  logger.info(`[JOB] Starting translation: ${settings.inputPath}`);
  logger.info(`[JOB] Output directory: ${settings.outputDir}`);
  logger.info(`[JOB] Languages: ${settings.langIn} -> ${settings.langOut} (engine: ${engine.name})`);

  const iterator = openEngineStream(settings, engine, signal);
  let exhausted = false;
  let nextPending = false;
  let released = false;

  const release = async (): Promise<void> => {
    if (exhausted || released || !iterator.return) {
      return;
    }
    released = true;
    const closing = iterator.return();
    if (nextPending) {
      // The engine is still busy with the abandoned next(); do not wait on it.
      void closing.then(undefined, (error: unknown) => {
        logger.warn(`[JOB] Engine stream did not close cleanly: ${toErrorMessage(error)}`);
      });
      return;
    }
    try {
      await closing;
    } catch (error: unknown) {
      logger.warn(`[JOB] Engine stream did not close cleanly: ${toErrorMessage(error)}`);
    }
  };

  const pull = async (): Promise<IteratorResult<unknown>> => {
    throwIfAborted(signal);
    nextPending = true;
    try {
      const step = await nextOrAbort(iterator, signal);
      nextPending = false;
      if (step.done) {
        exhausted = true;
      }
      return step;
    } catch (error: unknown) {
      if (error instanceof CancelledError) {
        throw error;
      }
      nextPending = false;
      exhausted = true;
      logger.error(`[JOB] Engine stream failed: ${toErrorMessage(error)}`);
      throw new TransportFailureError(error);
    }
  };

  let eventsSeen = 0;
  try {
    for (;;) {
      const step = await pull();
      if (step.done) {
        break;
      }

      const event = decodeEngineEvent(step.value);
      if (event === null) {
        continue;
      }
      eventsSeen += 1;

      switch (event.type) {
        case "progress_update":
          logProgress(event);
          onProgress?.(event);
          yield event;
          break;

        case "error":
          logChunkError(event);
          onError?.(event);
          yield event;
          break;

        case "finish": {
          logger.info("[JOB] Translation finished");
          logger.info(formatTranslationResult(event.result));
          yield event;
          await drainAfterFinish(pull);
          return event.result;
        }

        case "unknown":
          logger.debug(`[JOB] Ignoring engine event of unknown type "${event.rawType}"`);
          break;
      }
    }

    logger.error(`[JOB] Engine stream ended after ${eventsSeen} event(s) without finishing`);
    throw new IncompleteRunError(eventsSeen);
  } finally {
    await release();
  }
}

/**
 * Anything an engine emits after `finish` is a protocol violation: it is
 * logged and never dispatched.
 */
async function drainAfterFinish(pull: () => Promise<IteratorResult<unknown>>): Promise<void> {
  let ignored = 0;
  for (;;) {
    let step: IteratorResult<unknown>;
    try {
      step = await pull();
    } catch (error: unknown) {
      // The result is already in hand; neither cancellation nor a failure while
      // the engine winds down undoes it.
      if (!(error instanceof CancelledError)) {
        logger.warn(`[JOB] Engine stream failed after finish: ${toErrorMessage(error)}`);
      }
      return;
    }
    if (step.done) {
      break;
    }
    if (decodeEventSafely(step.value)) {
      ignored += 1;
    }
  }
  if (ignored > 0) {
    logger.warn(`[JOB] Protocol violation: ignored ${ignored} event(s) received after finish`);
  }
}

function decodeEventSafely(raw: unknown): boolean {
  try {
    return decodeEngineEvent(raw) !== null;
  } catch (error: unknown) {
    logger.debug(`[JOB] Undecodable event after finish: ${toErrorMessage(error)}`);
    return true;
  }
}

/**
 * Run a translation to completion and resolve with its result.
 */
export async function translateDocument(
  settings: Readonly<RunSettings>,
  options: TranslationJobOptions
): Promise<TranslationResult> {
  const stream = streamTranslation(settings, options);
  for (;;) {
    const step = await stream.next();
    if (step.done) {
      return step.value;
    }
  }
}
