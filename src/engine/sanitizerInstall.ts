/**
 * Sanitizer installation
 *
 * Wires the JSON output cleaner into an engine through its injection point.
 * Best effort: an engine without the injection point keeps its native
 * cleaning, and a failure is logged rather than raised. Installation happens
 * at most once per engine instance.
 */

import { logger } from '../logging/index.js';
import { toErrorMessage } from '../errors/jobErrors.js';
import { cleanJsonOutput, type JsonSanitizer } from '../parsers/json/jsonCleaning.js';

import type { SanitizerAware } from './contracts.js';

export type SanitizerInstallOutcome = 'installed' | 'already-installed' | 'unsupported' | 'failed';

const attempted = new WeakSet<object>();

export const isSanitizerAware = (value: unknown): value is SanitizerAware =>
  typeof value === 'object'
  && value !== null
  && 'useSanitizer' in value
  && typeof value.useSanitizer === 'function';

function describeEngine(engine: unknown): string {
  if (typeof engine === 'object' && engine !== null) {
    if ('name' in engine && typeof engine.name === 'string' && engine.name !== '') {
      return engine.name;
    }
    return engine.constructor.name;
  }
  return typeof engine;
}

export function installSanitizer(
  engine: unknown,
  sanitizer: JsonSanitizer = cleanJsonOutput
): SanitizerInstallOutcome {
  if (typeof engine !== 'object' || engine === null) {
    logger.warn(`[SANITIZER] Cannot install JSON output cleaner on ${describeEngine(engine)}; using native behaviour`);
    return 'unsupported';
  }

  if (attempted.has(engine)) {
    return 'already-installed';
  }
  attempted.add(engine);

  if (!isSanitizerAware(engine)) {
    logger.warn(
      `[SANITIZER] Engine ${describeEngine(engine)} has no sanitizer injection point; using its native JSON cleaning`
    );
    return 'unsupported';
  }

  try {
    engine.useSanitizer(sanitizer);
    logger.debug(`[SANITIZER] JSON output cleaner installed on ${describeEngine(engine)}`);
    return 'installed';
  } catch (error: unknown) {
    logger.warn(`[SANITIZER] Failed to install JSON output cleaner on ${describeEngine(engine)}: ${toErrorMessage(error)}`);
    return 'failed';
  }
}
