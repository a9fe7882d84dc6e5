/**
 * Type definitions index - exports all types used throughout docshift
 */

export type * from './settings.js';
export type * from './events.js';
export type * from './result.js';
export type * from './chat.js';
