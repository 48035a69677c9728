/**
 * Surveillance Module REST Routes
 *
 * - GET /api/v1/surveillance/daily:   daily table
 * - GET /api/v1/surveillance/metrics: named rates
 * - GET /api/v1/surveillance/charts:  daily and monthly chart series
 * - GET /api/v1/surveillance/report:  everything above plus the summary text
 */

import { toMetricsDto, toReportDto } from './mappers.js';
import {
  ChartsResponseSchema,
  DailyResponseSchema,
  ErrorResponseSchema,
  MetricsResponseSchema,
  ReportQuerySchema,
  ReportResponseSchema,
  type ReportQuery,
} from './schemas.js';
import { getHttpStatusForError, type SurveillanceError } from '../../core/errors.js';
import { buildSurveillanceReport } from '../../core/usecases/build-surveillance-report.js';

import type { CaseSnapshotRepo } from '../../core/ports.js';
import type { SurveillancePeriods } from '../../core/types.js';
import type { FastifyPluginAsync, FastifyReply } from 'fastify';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface MakeSurveillanceRoutesDeps {
  snapshotRepo: CaseSnapshotRepo;
  periods: SurveillancePeriods;
  logger: Logger;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const sendError = (reply: FastifyReply, error: SurveillanceError) => {
  const status = getHttpStatusForError(error);
  return reply.status(status).send({
    ok: false,
    error: error.type,
    message: error.message,
  });
};

const errorResponses = {
  400: ErrorResponseSchema,
  404: ErrorResponseSchema,
  422: ErrorResponseSchema,
  500: ErrorResponseSchema,
};

// ─────────────────────────────────────────────────────────────────────────────
// Routes Factory
// ─────────────────────────────────────────────────────────────────────────────

export const makeSurveillanceRoutes = (deps: MakeSurveillanceRoutesDeps): FastifyPluginAsync => {
  const { snapshotRepo, periods, logger } = deps;

  const loadReport = () => buildSurveillanceReport({ snapshotRepo, logger }, { periods });

  return async (fastify) => {
    fastify.get(
      '/api/v1/surveillance/daily',
      { schema: { response: { 200: DailyResponseSchema, ...errorResponses } } },
      async (_request, reply) => {
        const result = await loadReport();
        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(200).send({
          ok: true,
          data: { maxDate: result.value.maxDate, records: result.value.daily },
        });
      }
    );

    fastify.get(
      '/api/v1/surveillance/metrics',
      { schema: { response: { 200: MetricsResponseSchema, ...errorResponses } } },
      async (_request, reply) => {
        const result = await loadReport();
        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(200).send({ ok: true, data: toMetricsDto(result.value.metrics) });
      }
    );

    fastify.get(
      '/api/v1/surveillance/charts',
      { schema: { response: { 200: ChartsResponseSchema, ...errorResponses } } },
      async (_request, reply) => {
        const result = await loadReport();
        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(200).send({ ok: true, data: result.value.charts });
      }
    );

    fastify.get<{ Querystring: ReportQuery }>(
      '/api/v1/surveillance/report',
      {
        schema: {
          querystring: ReportQuerySchema,
          response: { 200: ReportResponseSchema, ...errorResponses },
        },
      },
      async (request, reply) => {
        const result = await loadReport();
        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(200).send({
          ok: true,
          data: toReportDto(result.value, request.query.lang ?? 'pt'),
        });
      }
    );
  };
};
