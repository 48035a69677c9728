import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';

import { parseIsoDate } from '../calendar.js';
import { createMalformedCaseError, type MalformedCaseError } from '../errors.js';
import { RawCaseRowSchema } from '../types.js';

import type {
  CaseOutcome,
  CaseRecord,
  FinalClassification,
  RawCaseRow,
  RejectedCaseRow,
  YesNoUnknown,
} from '../types.js';

const rowValidator = TypeCompiler.Compile(RawCaseRowSchema);

type CodeField = Exclude<keyof RawCaseRow, 'notification_date' | 'case_id'>;

const OUTCOME_CODES: ReadonlyMap<number, CaseOutcome> = new Map([
  [1, 'cure'],
  [2, 'death'],
  [3, 'death_other_causes'],
  [9, 'unknown'],
]);

const YES_NO_CODES: ReadonlyMap<number, YesNoUnknown> = new Map([
  [1, 'yes'],
  [2, 'no'],
  [9, 'unknown'],
]);

const CLASSIFICATION_CODES: ReadonlyMap<number, FinalClassification> = new Map([
  [1, 'influenza'],
  [2, 'other_virus'],
  [3, 'other_agent'],
  [4, 'unspecified'],
  [5, 'covid19'],
]);

/**
 * Maps a coded field. A missing or null code is `unknown`; a code outside the
 * dictionary rejects the row.
 */
const decodeField = <T extends string>(
  index: number,
  row: RawCaseRow,
  field: CodeField,
  codes: ReadonlyMap<number, T>,
  missing: T
): Result<T, MalformedCaseError> => {
  const code = row[field];
  if (code === undefined || code === null) {
    return ok(missing);
  }

  const decoded = codes.get(code);
  if (decoded === undefined) {
    return err(
      createMalformedCaseError(index, field, `Unknown ${field} '${String(code)}'`, code)
    );
  }

  return ok(decoded);
};

const decodeDate = (index: number, row: RawCaseRow): Result<string | null, MalformedCaseError> => {
  const raw = row.notification_date;
  if (raw === undefined || raw === null || raw.trim() === '') {
    return ok(null);
  }

  const date = parseIsoDate(raw);
  if (date === null) {
    return err(
      createMalformedCaseError(
        index,
        'notification_date',
        `Invalid notification_date '${raw}', expected YYYY-MM-DD`,
        raw
      )
    );
  }

  return ok(date);
};

/**
 * Turns one raw snapshot row into a CaseRecord.
 */
export const normalizeCaseRow = (
  index: number,
  value: unknown
): Result<CaseRecord, MalformedCaseError> => {
  if (!rowValidator.Check(value)) {
    const first = rowValidator.Errors(value).First();
    const field = first === undefined || first.path === '' ? '/' : first.path;
    return err(
      createMalformedCaseError(
        index,
        field,
        `Row does not match the case schema: ${first?.message ?? 'invalid value'}`
      )
    );
  }

  const row = value;

  const date = decodeDate(index, row);
  if (date.isErr()) return err(date.error);

  const outcome = decodeField(index, row, 'outcome_code', OUTCOME_CODES, 'unknown');
  if (outcome.isErr()) return err(outcome.error);

  const icu = decodeField(index, row, 'icu_code', YES_NO_CODES, 'unknown');
  if (icu.isErr()) return err(icu.error);

  const fluVaccine = decodeField(index, row, 'flu_vaccine_code', YES_NO_CODES, 'unknown');
  if (fluVaccine.isErr()) return err(fluVaccine.error);

  const covidVaccine = decodeField(index, row, 'covid_vaccine_code', YES_NO_CODES, 'unknown');
  if (covidVaccine.isErr()) return err(covidVaccine.error);

  const classification = decodeField(
    index,
    row,
    'final_classification_code',
    CLASSIFICATION_CODES,
    'unknown'
  );
  if (classification.isErr()) return err(classification.error);

  return ok({
    caseId: String(row.case_id),
    notificationDate: date.value,
    outcome: outcome.value,
    icu: icu.value,
    fluVaccine: fluVaccine.value,
    covidVaccine: covidVaccine.value,
    finalClassification: classification.value,
  });
};

export interface NormalizedCaseRows {
  cases: CaseRecord[];
  rejected: RejectedCaseRow[];
}

/**
 * Normalizes every row of a snapshot, keeping the well-formed ones.
 * Aggregation is best-effort over well-formed rows, so a bad row never aborts
 * the batch.
 */
export const normalizeCaseRows = (rows: readonly unknown[]): NormalizedCaseRows => {
  const cases: CaseRecord[] = [];
  const rejected: RejectedCaseRow[] = [];

  rows.forEach((row, index) => {
    const result = normalizeCaseRow(index, row);
    if (result.isOk()) {
      cases.push(result.value);
    } else {
      rejected.push({
        index: result.error.index,
        field: result.error.field,
        message: result.error.message,
      });
    }
  });

  return { cases, rejected };
};
