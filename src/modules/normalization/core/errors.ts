import type { EconomicSeriesName } from '@/modules/reference-data/index.js';

/**
 * A country has no usable values for an economic series the rebaser needs.
 */
export interface MissingSeriesError {
  readonly type: 'MissingSeriesError';
  readonly country: string;
  readonly seriesName: EconomicSeriesName;
  readonly message: string;
}

export const createMissingSeriesError = (
  country: string,
  seriesName: EconomicSeriesName
): MissingSeriesError => ({
  type: 'MissingSeriesError',
  country,
  seriesName,
  message: `No ${seriesName} series for '${country}'`,
});
