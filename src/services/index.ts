/**
 * Service Layer Exports
 *
 * Central export point for the job services. The CLI and the library entry
 * import from here or from the individual modules.
 */

export { translateDocument, streamTranslation, ensureInputExists } from './translationJobService.js';
export { translateDocumentSync, awaitWorkerOutcome } from './syncTranslation.js';
export { buildRunSettings, parsePageRanges, parsePageRangeParts } from './settingsService.js';
export { decodeTranslationResult, formatTranslationResult } from './resultDecoder.js';
export { decodeEngineEvent } from './eventDecoder.js';

export type { TranslationJobOptions } from './translationJobService.js';
export type { SyncTranslationRequest, SyncChannel } from './syncTranslation.js';
