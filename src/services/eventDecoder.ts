/**
 * Engine event decoding
 *
 * Turns one raw engine event into a `TranslationEvent`. Placeholders (null,
 * non-objects, objects without a `type`) decode to null; unrecognised types
 * are reported back as `UnknownEngineEvent` so the caller can log them.
 */

import { isNumber, isRecord, isString, type UnknownRecord } from "../utils/typeGuards.js";

import { decodeTranslationResult } from "./resultDecoder.js";

import type {
  ChunkErrorEvent,
  FinishEvent,
  ProgressUpdateEvent,
  TranslationEvent,
} from "../types/events.js";

export interface UnknownEngineEvent {
  type: "unknown";
  rawType: string;
}

export type DecodedEngineEvent = TranslationEvent | UnknownEngineEvent;

const clampPercent = (value: unknown): number =>
  isNumber(value) ? Math.min(100, Math.max(0, value)) : 0;

const optionalCount = (value: unknown): number | undefined =>
  isNumber(value) ? value : undefined;

function decodeProgress(raw: UnknownRecord): ProgressUpdateEvent {
  const event: ProgressUpdateEvent = {
    type: "progress_update",
    stage: isString(raw["stage"]) ? raw["stage"] : "",
    stageProgress: clampPercent(raw["stage_progress"]),
    overallProgress: clampPercent(raw["overall_progress"]),
  };

  const stageCurrent = optionalCount(raw["stage_current"]);
  const stageTotal = optionalCount(raw["stage_total"]);
  const partIndex = optionalCount(raw["part_index"]);
  const totalParts = optionalCount(raw["total_parts"]);
  if (stageCurrent !== undefined) { event.stageCurrent = stageCurrent; }
  if (stageTotal !== undefined) { event.stageTotal = stageTotal; }
  if (partIndex !== undefined) { event.partIndex = partIndex; }
  if (totalParts !== undefined) { event.totalParts = totalParts; }

  return event;
}

function decodeChunkError(raw: UnknownRecord): ChunkErrorEvent {
  return {
    type: "error",
    errorType: isString(raw["error_type"]) ? raw["error_type"] : "UnknownError",
    message: isString(raw["error"]) ? raw["error"] : "",
  };
}

function decodeFinish(raw: UnknownRecord): FinishEvent {
  return {
    type: "finish",
    result: decodeTranslationResult(raw["translate_result"]),
  };
}

/**
 * @throws ResultSchemaMismatchError when a finish event carries an unusable result
 */
export function decodeEngineEvent(raw: unknown): DecodedEngineEvent | null {
  if (!isRecord(raw) || !isString(raw["type"]) || raw["type"] === "") {
    return null;
  }

  switch (raw["type"]) {
    case "progress_update":
      return decodeProgress(raw);
    case "error":
      return decodeChunkError(raw);
    case "finish":
      return decodeFinish(raw);
    default:
      return { type: "unknown", rawType: raw["type"] };
  }
}
