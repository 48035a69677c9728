/**
 * Surveillance Module - Domain Errors
 *
 * All errors are discriminated unions with a 'type' field for easy matching.
 * A zero denominator is not an error: it is an undefined RateResult.
 */

import type { ValueError } from '@sinclair/typebox/errors';

// ─────────────────────────────────────────────────────────────────────────────
// Calculation Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A windowed computation received an empty daily table.
 */
export interface EmptyInputError {
  readonly type: 'EmptyInputError';
  readonly message: string;
  readonly operation: string;
}

/**
 * A window length that is not a positive integer.
 */
export interface InvalidWindowError {
  readonly type: 'InvalidWindowError';
  readonly message: string;
  readonly operation: string;
  readonly periodDays: number;
}

export type CalculationError = EmptyInputError | InvalidWindowError;

// ─────────────────────────────────────────────────────────────────────────────
// Record Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A raw row that cannot become a CaseRecord. The row is excluded and the run
 * continues.
 */
export interface MalformedCaseError {
  readonly type: 'MalformedCaseError';
  readonly message: string;
  readonly index: number;
  readonly field: string;
  readonly value?: unknown;
}

// ─────────────────────────────────────────────────────────────────────────────
// Snapshot Errors
// ─────────────────────────────────────────────────────────────────────────────

export type SnapshotRepoError =
  | { type: 'SnapshotNotFound'; message: string; path: string }
  | { type: 'SnapshotReadError'; message: string; path: string }
  | { type: 'SnapshotParseError'; message: string; path: string }
  | { type: 'SnapshotSchemaError'; message: string; path: string; details: string[] };

// ─────────────────────────────────────────────────────────────────────────────
// Error Union
// ─────────────────────────────────────────────────────────────────────────────

export type SurveillanceError = CalculationError | SnapshotRepoError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createEmptyInputError = (operation: string): EmptyInputError => ({
  type: 'EmptyInputError',
  message: `Cannot compute ${operation}: the daily table is empty`,
  operation,
});

export const createInvalidWindowError = (
  operation: string,
  periodDays: number,
  reason = `window length must be a positive integer, got ${String(periodDays)}`
): InvalidWindowError => ({
  type: 'InvalidWindowError',
  message: `Cannot compute ${operation}: ${reason}`,
  operation,
  periodDays,
});

export const createMalformedCaseError = (
  index: number,
  field: string,
  message: string,
  value?: unknown
): MalformedCaseError => ({
  type: 'MalformedCaseError',
  message,
  index,
  field,
  ...(value !== undefined && { value }),
});

export const formatSchemaErrors = (errors: Iterable<ValueError>): string[] =>
  Array.from(errors).map((error) => `${error.path}: ${error.message}`);

// ─────────────────────────────────────────────────────────────────────────────
// HTTP Status Mapping
// ─────────────────────────────────────────────────────────────────────────────

export const SURVEILLANCE_ERROR_HTTP_STATUS: Record<SurveillanceError['type'], number> = {
  EmptyInputError: 422,
  InvalidWindowError: 500,
  SnapshotNotFound: 404,
  SnapshotReadError: 500,
  SnapshotParseError: 500,
  SnapshotSchemaError: 500,
};

export const getHttpStatusForError = (error: SurveillanceError): number => {
  return SURVEILLANCE_ERROR_HTTP_STATUS[error.type];
};
