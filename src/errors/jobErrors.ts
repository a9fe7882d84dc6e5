/**
 * Translation job error taxonomy
 *
 * Every fatal condition of a run surfaces as a `TranslationJobError` with a
 * stable `code`. Non-fatal chunk errors are never thrown; they travel as
 * `error` events.
 */

import { isRecord } from '../utils/typeGuards.js';

export type JobErrorCode =
  | 'INPUT_NOT_FOUND'
  | 'INVALID_CONFIG'
  | 'TRANSPORT_FAILURE'
  | 'INCOMPLETE_RUN'
  | 'CANCELLED'
  | 'RESULT_SCHEMA_MISMATCH';

const JOB_ERROR_CODES: ReadonlySet<string> = new Set<JobErrorCode>([
  'INPUT_NOT_FOUND',
  'INVALID_CONFIG',
  'TRANSPORT_FAILURE',
  'INCOMPLETE_RUN',
  'CANCELLED',
  'RESULT_SCHEMA_MISMATCH',
]);

export class TranslationJobError extends Error {
  constructor(
    message: string,
    public readonly code: JobErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TranslationJobError';
  }
}

export class InputNotFoundError extends TranslationJobError {
  constructor(public readonly inputPath: string) {
    super(`Input document not found: ${inputPath}`, 'INPUT_NOT_FOUND');
    this.name = 'InputNotFoundError';
  }
}

export class InvalidConfigError extends TranslationJobError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'INVALID_CONFIG', options);
    this.name = 'InvalidConfigError';
  }
}

export class TransportFailureError extends TranslationJobError {
  constructor(cause: unknown) {
    super(`Translation stream failed: ${toErrorMessage(cause)}`, 'TRANSPORT_FAILURE', { cause });
    this.name = 'TransportFailureError';
  }
}

export class IncompleteRunError extends TranslationJobError {
  constructor(public readonly eventsSeen: number) {
    super(
      `Translation stream closed after ${eventsSeen} event(s) without a finish event`,
      'INCOMPLETE_RUN'
    );
    this.name = 'IncompleteRunError';
  }
}

export class CancelledError extends TranslationJobError {
  constructor(reason?: unknown) {
    super(
      reason === undefined ? 'Translation run was cancelled' : `Translation run was cancelled: ${toErrorMessage(reason)}`,
      'CANCELLED',
      reason === undefined ? undefined : { cause: reason }
    );
    this.name = 'CancelledError';
  }
}

export class ResultSchemaMismatchError extends TranslationJobError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`Unexpected translation result payload: ${message}`, 'RESULT_SCHEMA_MISMATCH', options);
    this.name = 'ResultSchemaMismatchError';
  }
}

export const isTranslationJobError = (value: unknown): value is TranslationJobError =>
  value instanceof TranslationJobError;

export const isJobErrorCode = (value: unknown): value is JobErrorCode =>
  typeof value === 'string' && JOB_ERROR_CODES.has(value);

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (isRecord(error) && typeof error['message'] === 'string') {
    return error['message'];
  }
  return String(error);
}

/**
 * Structured-clone friendly form of a job error, used to move failures
 * across a worker boundary. Subclass fields travel alongside the message.
 */
export interface SerializedJobError {
  name: string;
  code: JobErrorCode;
  message: string;
  causeMessage?: string | undefined;
  inputPath?: string | undefined;
  eventsSeen?: number | undefined;
}

export function serializeJobError(error: unknown): SerializedJobError {
  if (isTranslationJobError(error)) {
    return {
      name: error.name,
      code: error.code,
      message: error.message,
      causeMessage: error.cause === undefined ? undefined : toErrorMessage(error.cause),
      ...(error instanceof InputNotFoundError ? { inputPath: error.inputPath } : {}),
      ...(error instanceof IncompleteRunError ? { eventsSeen: error.eventsSeen } : {}),
    };
  }
  // Anything that escaped the controller unclassified came from the transport.
  return {
    name: 'TransportFailureError',
    code: 'TRANSPORT_FAILURE',
    message: `Translation stream failed: ${toErrorMessage(error)}`,
    causeMessage: toErrorMessage(error),
  };
}

function reviveJobError(serialized: SerializedJobError, cause: Error | undefined): TranslationJobError {
  const options = cause === undefined ? undefined : { cause };
  if (serialized.name === 'TranslationJobError') {
    return new TranslationJobError(serialized.message, serialized.code, options);
  }
  switch (serialized.code) {
    case 'INPUT_NOT_FOUND':
      return new InputNotFoundError(serialized.inputPath ?? '');
    case 'INVALID_CONFIG':
      return new InvalidConfigError(serialized.message, options);
    case 'TRANSPORT_FAILURE':
      return new TransportFailureError(cause ?? serialized.message);
    case 'INCOMPLETE_RUN':
      return new IncompleteRunError(serialized.eventsSeen ?? 0);
    case 'CANCELLED':
      return new CancelledError(cause);
    case 'RESULT_SCHEMA_MISMATCH':
      return new ResultSchemaMismatchError(serialized.message, options);
  }
}

/**
 * Rebuild the subclass matching the serialized code. The original message
 * and name win over whatever the subclass constructor would produce.
 */
export function deserializeJobError(serialized: SerializedJobError): TranslationJobError {
  const cause = serialized.causeMessage === undefined ? undefined : new Error(serialized.causeMessage);
  const error = reviveJobError(serialized, cause);
  error.message = serialized.message;
  error.name = serialized.name;
  return error;
}
