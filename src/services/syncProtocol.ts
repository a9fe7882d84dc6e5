/**
 * Messages exchanged between the blocking facade and its worker thread.
 *
 * The worker posts a message and then bumps a shared counter; the calling
 * thread waits on that counter and drains the port synchronously.
 */

import { isJobErrorCode, type SerializedJobError } from "../errors/jobErrors.js";
import { isNumber, isRecord, isString } from "../utils/typeGuards.js";

import type { DocshiftConfig } from "../config.js";
import type { ChunkErrorEvent, ProgressUpdateEvent } from "../types/events.js";
import type { TranslationResult } from "../types/result.js";
import type { RunRequest } from "../types/settings.js";
import type { MessagePort } from "worker_threads";

export interface SyncWorkerRequest {
  /** Resolved config, or the path of a config file to load in the worker. */
  config: DocshiftConfig | string;
  run: RunRequest;
}

export interface SyncWorkerData {
  request: SyncWorkerRequest;
  port: MessagePort;
  signal: SharedArrayBuffer;
  /** File URL of the worker module the bootstrap imports. */
  moduleUrl: string;
}

export type SyncWorkerMessage =
  | { kind: "progress"; event: ProgressUpdateEvent }
  | { kind: "chunk-error"; event: ChunkErrorEvent }
  | { kind: "result"; result: TranslationResult }
  | { kind: "failure"; error: SerializedJobError };

export const SIGNAL_SLOT = 0;

export function isSerializedJobError(value: unknown): value is SerializedJobError {
  return isRecord(value)
    && isString(value["name"])
    && isString(value["message"])
    && isJobErrorCode(value["code"])
    && (value["inputPath"] === undefined || isString(value["inputPath"]))
    && (value["eventsSeen"] === undefined || isNumber(value["eventsSeen"]));
}

export function isSyncWorkerMessage(value: unknown): value is SyncWorkerMessage {
  if (!isRecord(value)) {
    return false;
  }
  switch (value["kind"]) {
    case "progress":
    case "chunk-error":
      return isRecord(value["event"]);
    case "result":
      return isRecord(value["result"]);
    case "failure":
      return isSerializedJobError(value["error"]);
    default:
      return false;
  }
}
