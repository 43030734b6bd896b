/**
 * Programme Costing REST API - TypeBox Schemas
 *
 * Request/response validation schemas for the REST API.
 */

import { Type, type Static } from '@sinclair/typebox';

import { ProgrammeConfigInputSchema } from '../../core/schemas.js';

// ─────────────────────────────────────────────────────────────────────────────
// Request Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const ProcessBodySchema = ProgrammeConfigInputSchema;

export type ProcessBody = Static<typeof ProcessBodySchema>;

export const ProcessQuerySchema = Type.Object(
  {
    summary: Type.Optional(
      Type.Boolean({ description: 'Append a Total row per year to the ledger' })
    ),
  },
  { additionalProperties: false }
);

export type ProcessQuery = Static<typeof ProcessQuerySchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Response Schemas
// ─────────────────────────────────────────────────────────────────────────────

const StringListSchema = Type.Array(Type.String());

export const CostingOptionsResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    countries: StringListSchema,
    currencies: StringListSchema,
    modules: Type.Array(
      Type.Object({
        id: Type.String(),
        title: Type.String(),
        hasTemplate: Type.Boolean(),
      })
    ),
    vehicleModels: StringListSchema,
    supplyItems: StringListSchema,
    defaults: Type.Object({
      country: Type.String(),
      start_year: Type.Integer(),
      end_year: Type.Integer(),
      discount_rate: Type.Number(),
      desired_currency: Type.String(),
      desired_year: Type.Integer(),
      modules: StringListSchema,
    }),
  }),
});

/**
 * Error response schema.
 */
export const ErrorResponseSchema = Type.Object({
  ok: Type.Literal(false),
  error: Type.String({ description: 'Error type' }),
  message: Type.Optional(Type.String({ description: 'Human-readable error message' })),
  field: Type.Optional(Type.String({ description: 'Offending configuration field' })),
});

export type ErrorResponse = Static<typeof ErrorResponseSchema>;
