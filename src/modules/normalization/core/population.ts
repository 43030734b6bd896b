import { Decimal } from 'decimal.js';
import { err, ok } from 'neverthrow';

import { createNotFoundError, type ReferenceDataStore } from '@/modules/reference-data/index.js';

import { getFactorAt } from './factor-maps.js';

import type { PopulationResolver } from './ports.js';

const THOUSAND = new Decimal(1000);

/**
 * Population lookups over the store's Median-variant series.
 *
 * Same year policy as the economic series: clamp outside the tabulated range,
 * carry forward across interior gaps. A country without a series is a
 * NotFoundError.
 */
export const makePopulationResolver = (store: ReferenceDataStore): PopulationResolver => {
  const resolve: PopulationResolver['resolve'] = (country, year) =>
    store.getPopulation(country).andThen((series) => {
      const value = getFactorAt(series.values, year);
      return value !== undefined
        ? ok(value)
        : err(createNotFoundError('population', `${series.country}/${String(year)}`));
    });

  return {
    resolve,
    resolvePersons: (country, year) => resolve(country, year).map((value) => value.mul(THOUSAND)),
  };
};
