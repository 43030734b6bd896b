import type { CostModuleKind } from './schemas.js';
import type { MissingSeriesError } from '@/modules/normalization/index.js';
import type { NotFoundError } from '@/modules/reference-data/index.js';

/**
 * A module could not find a reference row it needs for the country.
 * The cause names the table and key; no other country's data is substituted.
 */
export interface DataGapError {
  readonly type: 'DataGapError';
  readonly module: CostModuleKind;
  readonly country: string;
  readonly cause: NotFoundError | MissingSeriesError;
  readonly message: string;
}

export const createDataGapError = (
  module: CostModuleKind,
  country: string,
  cause: NotFoundError | MissingSeriesError
): DataGapError => ({
  type: 'DataGapError',
  module,
  country,
  cause,
  message: `${module} for ${country}: ${cause.message}`,
});

/**
 * Curried form for `mapErr`.
 */
export const toDataGap =
  (module: CostModuleKind, country: string) =>
  (cause: NotFoundError | MissingSeriesError): DataGapError =>
    createDataGapError(module, country, cause);
