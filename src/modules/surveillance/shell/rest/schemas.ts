/**
 * Surveillance Module REST API - TypeBox Schemas
 */

import { Type, type Static } from '@sinclair/typebox';

// ─────────────────────────────────────────────────────────────────────────────
// Request Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const ReportQuerySchema = Type.Object(
  {
    lang: Type.Optional(
      Type.Union([Type.Literal('pt'), Type.Literal('en')], {
        description: 'Language of the metrics summary text (default pt)',
      })
    ),
  },
  { additionalProperties: false }
);

export type ReportQuery = Static<typeof ReportQuerySchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Response Schemas
// ─────────────────────────────────────────────────────────────────────────────

const DailyRecordSchema = Type.Object({
  date: Type.String(),
  caseCount: Type.Integer(),
  deathCount: Type.Integer(),
  icuCount: Type.Integer(),
  vaccinatedCount: Type.Union([Type.Integer(), Type.Null()]),
});

export const RateSchema = Type.Object({
  metric: Type.Union([
    Type.Literal('case_variation'),
    Type.Literal('death_rate'),
    Type.Literal('icu_rate'),
    Type.Literal('vaccination_rate'),
  ]),
  periodDays: Type.Integer(),
  status: Type.Union([Type.Literal('defined'), Type.Literal('undefined')]),
  value: Type.Union([Type.Number(), Type.Null()], {
    description: 'Percentage rounded to 2 decimals; null when the denominator is zero',
  }),
});

export type RateDto = Static<typeof RateSchema>;

const RatePeriodsSchema = Type.Object({
  caseVariationPeriod1: Type.Integer(),
  caseVariationPeriod2: Type.Integer(),
  deathRatePeriod: Type.Integer(),
  icuRatePeriod: Type.Integer(),
  vaccinationRatePeriod: Type.Integer(),
});

const MetricsSchema = Type.Object({
  maxDate: Type.String(),
  periods: RatePeriodsSchema,
  rates: Type.Record(Type.String(), RateSchema),
});

export type MetricsDto = Static<typeof MetricsSchema>;

const ChartsSchema = Type.Object({
  daily: Type.Array(Type.Object({ date: Type.String(), cases: Type.Integer() })),
  monthly: Type.Array(
    Type.Object({
      month: Type.String(),
      cases: Type.Integer(),
      periodEnd: Type.String(),
      label: Type.String(),
      partial: Type.Boolean(),
    })
  ),
});

export const DailyResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    maxDate: Type.String(),
    records: Type.Array(DailyRecordSchema),
  }),
});

export const MetricsResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: MetricsSchema,
});

export const ChartsResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: ChartsSchema,
});

const ReportSchema = Type.Object({
  source: Type.String(),
  extractedAt: Type.String(),
  maxDate: Type.String(),
  daily: Type.Array(DailyRecordSchema),
  metrics: MetricsSchema,
  charts: ChartsSchema,
  summary: Type.String(),
  excluded: Type.Object({
    malformed: Type.Integer(),
    undated: Type.Integer(),
  }),
});

export type ReportDto = Static<typeof ReportSchema>;

export const ReportResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: ReportSchema,
});

export const ErrorResponseSchema = Type.Object({
  ok: Type.Literal(false),
  error: Type.String(),
  message: Type.String(),
});
