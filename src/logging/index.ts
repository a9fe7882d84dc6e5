/**
 * Logging Module
 *
 * Centralized logging for the entire application.
 * All logging MUST go through this module.
 */

export { default as logger } from './logger.js';
export { createLogger as createConfigLogger } from './configLogger.js';
export type { Logger } from './configLogger.js';
export { formatProgressLine, formatChunkError, logProgress, logChunkError } from './eventLogger.js';
