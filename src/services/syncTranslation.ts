/**
 * Blocking facade over the job controller
 *
 * For callers that cannot await: the run executes in a worker thread while
 * the calling thread blocks on a shared counter. Progress and chunk-error
 * observers are still invoked on the calling thread, in event order, each
 * time the worker wakes it. Failures carry the same codes as the async API.
 */

import { MessageChannel, Worker, receiveMessageOnPort, type MessagePort } from "worker_threads";

import {
  CancelledError,
  deserializeJobError,
  toErrorMessage,
} from "../errors/jobErrors.js";
import { logger } from "../logging/index.js";

import {
  SIGNAL_SLOT,
  isSyncWorkerMessage,
  type SyncWorkerData,
  type SyncWorkerRequest,
} from "./syncProtocol.js";

import type { ChunkErrorObserver, ProgressObserver } from "../types/events.js";
import type { TranslationResult } from "../types/result.js";

export interface SyncTranslationRequest extends SyncWorkerRequest {
  onProgress?: ProgressObserver | undefined;
  onError?: ChunkErrorObserver | undefined;
  /** Give up and report CANCELLED after this many milliseconds. */
  timeoutMs?: number | undefined;
}

export interface SyncChannel {
  counter: Int32Array;
  port: MessagePort;
}

interface Observers {
  onProgress?: ProgressObserver | undefined;
  onError?: ChunkErrorObserver | undefined;
}

// Same extension as this module: .ts when loaded from source, .js from dist.
const WORKER_EXTENSION = import.meta.url.endsWith(".ts") ? ".ts" : ".js";
const WORKER_URL = new URL(`./syncTranslationWorker${WORKER_EXTENSION}`, import.meta.url);

/**
 * Loads the worker module and reports a load failure through the same port
 * and counter the caller is blocked on. Without it a module that fails to
 * import would leave the caller waiting forever.
 */
const WORKER_BOOTSTRAP = `
const { workerData } = require("node:worker_threads");
import(workerData.moduleUrl).catch((error) => {
  const counter = new Int32Array(workerData.signal);
  workerData.port.postMessage({
    kind: "failure",
    error: {
      name: "TransportFailureError",
      code: "TRANSPORT_FAILURE",
      message: "Translation worker failed to start: " + (error instanceof Error ? error.message : String(error)),
    },
  });
  Atomics.add(counter, ${SIGNAL_SLOT}, 1);
  Atomics.notify(counter, ${SIGNAL_SLOT});
});
`;

/**
 * Block until the worker reports a result or a failure, dispatching every
 * intermediate message to the observers on the way.
 */
export function awaitWorkerOutcome(
  channel: SyncChannel,
  observers: Observers,
  timeoutMs?: number
): TranslationResult {
  const deadline = timeoutMs === undefined ? undefined : Date.now() + timeoutMs;
  let seen = 0;

  for (;;) {
    for (let received = receiveMessageOnPort(channel.port); received !== undefined; received = receiveMessageOnPort(channel.port)) {
      const message: unknown = received.message;
      if (!isSyncWorkerMessage(message)) {
        logger.warn("[JOB] Ignoring malformed message from translation worker");
        continue;
      }
      switch (message.kind) {
        case "progress":
          observers.onProgress?.(message.event);
          break;
        case "chunk-error":
          observers.onError?.(message.event);
          break;
        case "result":
          return Object.freeze({ ...message.result });
        case "failure":
          throw deserializeJobError(message.error);
      }
    }

    const remaining = deadline === undefined ? Infinity : deadline - Date.now();
    if (remaining <= 0) {
      throw new CancelledError(`timed out after ${timeoutMs ?? 0}ms`);
    }
    Atomics.wait(channel.counter, SIGNAL_SLOT, seen, remaining);
    seen = Atomics.load(channel.counter, SIGNAL_SLOT);
  }
}

/**
 * Run a translation to completion, blocking the calling thread.
 */
export function translateDocumentSync(request: SyncTranslationRequest): TranslationResult {
  const signal = new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT);
  const { port1, port2 } = new MessageChannel();
  const workerData: SyncWorkerData = {
    request: { config: request.config, run: request.run },
    port: port2,
    signal,
    moduleUrl: WORKER_URL.href,
  };

  const worker = new Worker(WORKER_BOOTSTRAP, { eval: true, workerData, transferList: [port2] });
  worker.unref();

  try {
    return awaitWorkerOutcome(
      { counter: new Int32Array(signal), port: port1 },
      { onProgress: request.onProgress, onError: request.onError },
      request.timeoutMs
    );
  } finally {
    port1.close();
    worker.terminate().catch((error: unknown) => {
      logger.warn(`[JOB] Translation worker did not stop cleanly: ${toErrorMessage(error)}`);
    });
  }
}
