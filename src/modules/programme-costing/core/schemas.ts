/**
 * Programme configuration input, as sent over HTTP or read from a CLI file.
 */

import { Type, type Static } from '@sinclair/typebox';
import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';

import { ModuleConfigSchema } from '@/modules/cost-modules/index.js';

import { createConfigError, type ConfigError } from './errors.js';

export const ModuleSelectionSchema = Type.Union([
  Type.String({ minLength: 1, description: 'Module identifier, costed with its default items' }),
  ModuleConfigSchema,
]);

export const ProgrammeConfigInputSchema = Type.Object({
  country: Type.Optional(Type.String({ minLength: 3, maxLength: 3, description: 'ISO3 code' })),
  start_year: Type.Optional(Type.Integer()),
  end_year: Type.Optional(Type.Integer()),
  discount_rate: Type.Optional(Type.Number({ description: 'Net annual rate in [0, 1]' })),
  desired_currency: Type.Optional(
    Type.String({ minLength: 2, maxLength: 3, description: 'ISO3 code, USD or I$' })
  ),
  desired_year: Type.Optional(Type.Integer()),
  modules: Type.Optional(Type.Array(ModuleSelectionSchema)),
});

export type ModuleSelection = Static<typeof ModuleSelectionSchema>;
export type ProgrammeConfigInput = Static<typeof ProgrammeConfigInputSchema>;

const ProgrammeConfigInputChecker = TypeCompiler.Compile(ProgrammeConfigInputSchema);

/**
 * Validates untyped input (a parsed JSON file) against the input schema.
 * Reports the first failing path.
 */
export const parseProgrammeConfigInput = (
  raw: unknown
): Result<ProgrammeConfigInput, ConfigError> => {
  if (ProgrammeConfigInputChecker.Check(raw)) {
    return ok(raw);
  }

  const first = ProgrammeConfigInputChecker.Errors(raw).First();
  const field = first !== undefined && first.path !== '' ? first.path.slice(1) : 'input';
  return err(createConfigError(field, first?.message ?? 'Invalid programme configuration'));
};
