import chalk from "chalk";

import logger from "./logger.js";

import type { ChunkErrorEvent, ProgressUpdateEvent } from "../types/events.js";

function formatPart(event: ProgressUpdateEvent): string {
  if (event.partIndex === undefined || event.totalParts === undefined || event.totalParts <= 1) {
    return "";
  }
  return ` (part ${event.partIndex}/${event.totalParts})`;
}

export function formatProgressLine(event: ProgressUpdateEvent): string {
  return `[${event.stage}]${formatPart(event)} progress: ${event.stageProgress.toFixed(1)}% | overall: ${event.overallProgress.toFixed(1)}%`;
}

export function formatChunkError(event: ChunkErrorEvent): string {
  return `Chunk error [${event.errorType}]: ${event.message}`;
}

function getProgressColor(overall: number): typeof chalk.green {
  if (overall >= 100) {return chalk.green;}
  if (overall >= 50) {return chalk.cyan;}
  return chalk.blue;
}

export function logProgress(event: ProgressUpdateEvent): void {
  logger.debug(`[JOB] ${getProgressColor(event.overallProgress)(formatProgressLine(event))}`);
}

export function logChunkError(event: ChunkErrorEvent): void {
  logger.warn(`[JOB] ${chalk.yellow(formatChunkError(event))}`);
}
