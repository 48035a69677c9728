import { Type, type Static } from '@sinclair/typebox';

import type { Decimal } from 'decimal.js';

// ─────────────────────────────────────────────────────────────────────────────
// Calendar
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Calendar date in `YYYY-MM-DD` form. Lexicographic order is date order.
 */
export type IsoDate = string;

// ─────────────────────────────────────────────────────────────────────────────
// Case records
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Etiological classification of a notified case.
 * `unknown` covers cases whose classification was never filled in.
 */
export type FinalClassification =
  | 'influenza'
  | 'covid19'
  | 'other_virus'
  | 'other_agent'
  | 'unspecified'
  | 'unknown';

/**
 * Tri-state answer used by the ICU and vaccine fields.
 * `unknown` covers both "ignored" and missing answers.
 */
export type YesNoUnknown = 'yes' | 'no' | 'unknown';

export type CaseOutcome = 'cure' | 'death' | 'death_other_causes' | 'unknown';

/**
 * One notified case, after normalization of the raw snapshot row.
 */
export interface CaseRecord {
  readonly caseId: string;
  /** `null` when the notification date is missing; such records are never counted */
  readonly notificationDate: IsoDate | null;
  readonly outcome: CaseOutcome;
  readonly icu: YesNoUnknown;
  readonly fluVaccine: YesNoUnknown;
  readonly covidVaccine: YesNoUnknown;
  readonly finalClassification: FinalClassification;
}

export type VaccinationLabel = 'vaccinated' | 'not_vaccinated' | 'unknown';

// ─────────────────────────────────────────────────────────────────────────────
// Daily table
// ─────────────────────────────────────────────────────────────────────────────

/**
 * One row of the daily table. There is exactly one row per notification date
 * present in the input.
 */
export interface DailyRecord {
  readonly date: IsoDate;
  readonly caseCount: number;
  readonly deathCount: number;
  readonly icuCount: number;
  /**
   * Vaccinated cases on this date. `null` for dates before the vaccination
   * labelling window, where classification was not run.
   */
  readonly vaccinatedCount: number | null;
}

export type DailyCountField = 'caseCount' | 'deathCount' | 'icuCount' | 'vaccinatedCount';

export interface AggregateDailyOptions {
  /** Trailing days (ending at the max date) whose cases get a vaccination label */
  vaccinationWindowDays: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Rates
// ─────────────────────────────────────────────────────────────────────────────

export type RateMetric = 'case_variation' | 'death_rate' | 'icu_rate' | 'vaccination_rate';

export interface DefinedRate {
  readonly status: 'defined';
  readonly metric: RateMetric;
  readonly periodDays: number;
  /** Percentage rounded to 2 decimal places */
  readonly value: Decimal;
}

export interface UndefinedRate {
  readonly status: 'undefined';
  readonly metric: RateMetric;
  readonly periodDays: number;
  readonly reason: 'ZeroDenominator';
}

export type RateResult = DefinedRate | UndefinedRate;

export const isDefinedRate = (rate: RateResult): rate is DefinedRate => rate.status === 'defined';

export interface SurveillanceMetrics {
  readonly maxDate: IsoDate;
  readonly periods: RatePeriods;
  readonly caseVariation1: RateResult;
  readonly caseVariation2: RateResult;
  readonly deathRate: RateResult;
  readonly icuRate: RateResult;
  readonly vaccinationRate: RateResult;
}

/**
 * Rates keyed the way report collaborators address them:
 * `case_var_{period1}`, `case_var_{period2}`, `death_rate`, `icu_rate`, `vacc_rate`.
 */
export type NamedRates = Readonly<Record<string, RateResult>>;

// ─────────────────────────────────────────────────────────────────────────────
// Periods
// ─────────────────────────────────────────────────────────────────────────────

export interface RatePeriods {
  readonly caseVariationPeriod1: number;
  readonly caseVariationPeriod2: number;
  readonly deathRatePeriod: number;
  readonly icuRatePeriod: number;
  readonly vaccinationRatePeriod: number;
}

export interface ChartPeriods {
  /** Days in the daily chart */
  readonly dailyPeriod: number;
  /** Calendar months in the monthly chart */
  readonly monthlyPeriod: number;
}

export interface SurveillancePeriods {
  readonly rates: RatePeriods;
  readonly charts: ChartPeriods;
  readonly vaccinationWindowDays: number;
}

export const DEFAULT_SURVEILLANCE_PERIODS: SurveillancePeriods = {
  rates: {
    caseVariationPeriod1: 7,
    caseVariationPeriod2: 30,
    deathRatePeriod: 30,
    icuRatePeriod: 30,
    vaccinationRatePeriod: 30,
  },
  charts: {
    dailyPeriod: 30,
    monthlyPeriod: 12,
  },
  vaccinationWindowDays: 30,
};

// ─────────────────────────────────────────────────────────────────────────────
// Chart series
// ─────────────────────────────────────────────────────────────────────────────

export interface DailySeriesPoint {
  readonly date: IsoDate;
  readonly cases: number;
}

export interface MonthlySeriesBucket {
  /** `YYYY-MM` */
  readonly month: string;
  readonly cases: number;
  /** Last day counted in the bucket */
  readonly periodEnd: IsoDate;
  /** `MM/YY`, with ` (until DD/MM)` appended when the bucket is partial */
  readonly label: string;
  /** The bucket holds the max date and the max date is not the end of its month */
  readonly partial: boolean;
}

export interface ChartSeries {
  readonly daily: DailySeriesPoint[];
  readonly monthly: MonthlySeriesBucket[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Snapshot file (wire format)
// ─────────────────────────────────────────────────────────────────────────────

const CodeSchema = Type.Optional(Type.Union([Type.Integer(), Type.Null()]));

/**
 * One raw row of a snapshot file. Codes follow the SIVEP-Gripe data dictionary:
 * - outcome_code: 1 cure, 2 death, 3 death from other causes, 9 ignored
 * - icu_code, flu_vaccine_code, covid_vaccine_code: 1 yes, 2 no, 9 ignored
 * - final_classification_code: 1 influenza, 2 other respiratory virus,
 *   3 other etiological agent, 4 unspecified, 5 COVID-19
 */
export const RawCaseRowSchema = Type.Object({
  notification_date: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  case_id: Type.Union([Type.String({ minLength: 1 }), Type.Integer()]),
  outcome_code: CodeSchema,
  icu_code: CodeSchema,
  flu_vaccine_code: CodeSchema,
  covid_vaccine_code: CodeSchema,
  final_classification_code: CodeSchema,
});

export type RawCaseRow = Static<typeof RawCaseRowSchema>;

const SnapshotMetadataSchema = Type.Object({
  source: Type.String(),
  extractedAt: Type.String({ description: 'Date the snapshot was extracted (YYYY-MM-DD)' }),
  description: Type.Optional(Type.String()),
});

/**
 * Snapshot envelope. Rows are validated one by one so that a malformed row
 * is excluded instead of failing the whole file.
 */
export const SnapshotFileSchema = Type.Object({
  metadata: SnapshotMetadataSchema,
  cases: Type.Array(Type.Unknown()),
});

export type SnapshotFileDTO = Static<typeof SnapshotFileSchema>;

export type SnapshotMetadata = Static<typeof SnapshotMetadataSchema>;

export interface RejectedCaseRow {
  /** Position of the row in the snapshot's `cases` array */
  readonly index: number;
  readonly field: string;
  readonly message: string;
}

export interface CaseSnapshot {
  readonly metadata: SnapshotMetadata;
  readonly cases: CaseRecord[];
  readonly rejected: RejectedCaseRow[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Report payload
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Everything the report collaborators consume for one run.
 */
export interface SurveillanceReport {
  readonly metadata: SnapshotMetadata;
  readonly maxDate: IsoDate;
  readonly daily: DailyRecord[];
  readonly metrics: SurveillanceMetrics;
  readonly charts: ChartSeries;
  readonly chartPeriods: ChartPeriods;
  /** Rows excluded from aggregation: malformed rows plus rows without a date */
  readonly excluded: {
    readonly malformed: number;
    readonly undated: number;
  };
}

export type SupportedLanguage = 'pt' | 'en';
