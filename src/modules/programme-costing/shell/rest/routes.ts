/**
 * Programme Costing REST Routes
 *
 * - POST /process: cost a programme, CSV ledger out
 * - GET /meta/options: countries, currencies, modules and defaults
 */

import {
  CostingOptionsResponseSchema,
  ErrorResponseSchema,
  ProcessBodySchema,
  ProcessQuerySchema,
  type ErrorResponse,
  type ProcessBody,
  type ProcessQuery,
} from './schemas.js';
import { getHttpStatusForError, type CostingError } from '../../core/errors.js';
import { costProgrammeCsv, type CostProgrammeCsvDeps } from '../../core/usecases/cost-programme-csv.js';
import { getCostingOptions } from '../../core/usecases/get-costing-options.js';

import type { FastifyPluginAsync } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type MakeProgrammeCostingRoutesDeps = CostProgrammeCsvDeps;

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const toErrorResponse = (error: CostingError): ErrorResponse => ({
  ok: false,
  error: error.type,
  message: error.message,
  ...(error.type === 'ConfigError' && { field: error.field }),
});

// ─────────────────────────────────────────────────────────────────────────────
// Routes Factory
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates programme costing REST routes.
 */
export const makeProgrammeCostingRoutes = (
  deps: MakeProgrammeCostingRoutesDeps
): FastifyPluginAsync => {
  return async (fastify) => {
    // ─────────────────────────────────────────────────────────────────────────
    // POST /process - Cost a programme
    // ─────────────────────────────────────────────────────────────────────────
    fastify.post<{ Body: ProcessBody; Querystring: ProcessQuery }>(
      '/process',
      {
        schema: {
          body: ProcessBodySchema,
          querystring: ProcessQuerySchema,
          response: {
            400: ErrorResponseSchema,
            422: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const result = costProgrammeCsv(deps, request.body, {
          summary: request.query.summary === true,
        });

        if (result.isErr()) {
          request.log.warn({ err: result.error }, 'Programme costing failed');
          return reply.status(getHttpStatusForError(result.error)).send(toErrorResponse(result.error));
        }

        return reply
          .status(200)
          .header('content-type', 'text/csv; charset=utf-8')
          .header('content-disposition', 'attachment; filename="programme-costs.csv"')
          .send(result.value);
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /meta/options - Configuration choices
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get(
      '/meta/options',
      {
        schema: {
          response: {
            200: CostingOptionsResponseSchema,
          },
        },
      },
      async (_request, reply) => {
        return reply.status(200).send({ ok: true, data: getCostingOptions(deps) });
      }
    );
  };
};
