/**
 * Type Guards - SSOT for Runtime Type Checking
 *
 * Centralizes the narrowing helpers used when reading engine payloads and
 * config files.
 */

export type UnknownRecord = Record<string, unknown>;

/**
 * Type guard to check if value is a plain object (not array, not null)
 */
export const isRecord = (value: unknown): value is UnknownRecord =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const isString = (value: unknown): value is string =>
  typeof value === "string";

/**
 * Type guard to check if value is a finite number
 */
export const isNumber = (value: unknown): value is number =>
  typeof value === "number" && Number.isFinite(value);

export const isBoolean = (value: unknown): value is boolean =>
  typeof value === "boolean";

export const isNullish = (value: unknown): value is null | undefined =>
  value === null || value === undefined;

export const isNonEmptyString = (value: unknown): value is string =>
  typeof value === "string" && value.trim() !== "";

