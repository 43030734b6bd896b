// Ports
export type { CurrencyTimeRebaser, PopulationResolver } from './core/ports.js';

// Types
export type { PriceBase, RebaserOptions } from './core/types.js';

// Errors
export type { MissingSeriesError } from './core/errors.js';
export { createMissingSeriesError } from './core/errors.js';

// Currency codes
export {
  INTERNATIONAL_DOLLAR,
  DEFAULT_DEFLATOR_COUNTRY,
  isInternationalDollar,
  normalizeCurrencyCode,
} from './core/currency.js';

// Factor Maps
export type { FactorMap, YearCoverage } from './core/factor-maps.js';
export { getCoverage, clampYear, getFactorAt } from './core/factor-maps.js';

// Rebaser
export { makeCurrencyTimeRebaser } from './core/rebaser.js';

// Population
export { makePopulationResolver } from './core/population.js';
