/**
 * Worker side of the blocking facade: runs one translation and reports every
 * observable step back through the port.
 */

import { isMainThread, workerData } from "worker_threads";

import { loadConfig } from "../config.js";
import { createEngine } from "../engine/index.js";
import { serializeJobError } from "../errors/jobErrors.js";
import { logger } from "../logging/index.js";
import { isRecord } from "../utils/typeGuards.js";

import { buildRunSettings } from "./settingsService.js";
import { SIGNAL_SLOT, type SyncWorkerData, type SyncWorkerMessage } from "./syncProtocol.js";
import { translateDocument } from "./translationJobService.js";

import type { MessagePort } from "worker_threads";

function isSyncWorkerData(value: unknown): value is SyncWorkerData {
  if (!isRecord(value)) {
    return false;
  }
  const port = value["port"];
  return isRecord(value["request"])
    && typeof value["moduleUrl"] === "string"
    && value["signal"] instanceof SharedArrayBuffer
    && isRecord(port)
    && typeof port["postMessage"] === "function";
}

function createSender(port: MessagePort, signal: SharedArrayBuffer): (message: SyncWorkerMessage) => void {
  const counter = new Int32Array(signal);
  return (message) => {
    port.postMessage(message);
    Atomics.add(counter, SIGNAL_SLOT, 1);
    Atomics.notify(counter, SIGNAL_SLOT);
  };
}

async function runWorker(data: SyncWorkerData): Promise<void> {
  const send = createSender(data.port, data.signal);
  let settled = false;

  process.on("exit", () => {
    if (!settled) {
      send({ kind: "failure", error: serializeJobError(new Error("Translation worker exited before the run completed")) });
    }
  });

  try {
    const { request } = data;
    const config = typeof request.config === "string" ? loadConfig(request.config) : request.config;
    logger.setDebugMode(config.debug);
    const settings = buildRunSettings(config, request.run);
    const result = await translateDocument(settings, {
      engine: createEngine(settings),
      onProgress: (event) => send({ kind: "progress", event }),
      onError: (event) => send({ kind: "chunk-error", event }),
    });
    settled = true;
    send({ kind: "result", result: { ...result } });
  } catch (error: unknown) {
    settled = true;
    send({ kind: "failure", error: serializeJobError(error) });
  } finally {
    data.port.close();
  }
}

if (!isMainThread) {
  if (isSyncWorkerData(workerData)) {
    await runWorker(workerData);
  } else {
    // Rejects the bootstrap's import(), which reports the failure to the caller.
    throw new Error("Translation worker started without a valid request");
  }
}
