/**
 * Translation run events
 *
 * Engines emit loosely-typed mappings (`{ type: "progress_update", ... }`);
 * the job controller decodes each one into a `TranslationEvent` before it is
 * dispatched.
 */

import type { TranslationResult } from './result.js';

export interface ProgressUpdateEvent {
  type: 'progress_update';
  stage: string;
  stageProgress: number;
  overallProgress: number;
  stageCurrent?: number | undefined;
  stageTotal?: number | undefined;
  partIndex?: number | undefined;
  totalParts?: number | undefined;
}

export interface ChunkErrorEvent {
  type: 'error';
  errorType: string;
  message: string;
}

export interface FinishEvent {
  type: 'finish';
  result: TranslationResult;
}

export type TranslationEvent = ProgressUpdateEvent | ChunkErrorEvent | FinishEvent;

/**
 * Wire shapes as produced by engines. Only `type` is relied upon; every other
 * field is read defensively.
 */
export interface RawProgressUpdate {
  type: 'progress_update';
  stage?: string;
  stage_progress?: number;
  overall_progress?: number;
  stage_current?: number;
  stage_total?: number;
  part_index?: number;
  total_parts?: number;
}

export interface RawChunkError {
  type: 'error';
  error?: string;
  error_type?: string;
}

export interface RawFinish {
  type: 'finish';
  translate_result: unknown;
}

export type RawEngineEvent = RawProgressUpdate | RawChunkError | RawFinish;

export type ProgressObserver = (event: ProgressUpdateEvent) => void;
export type ChunkErrorObserver = (event: ChunkErrorEvent) => void;
