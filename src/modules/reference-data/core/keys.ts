import type { CountryCode } from './types.js';

/**
 * Upper-cases and trims a country or currency code. `USD` is the local
 * currency of `USA`, so both resolve to the same country.
 */
export const normalizeCountryCode = (code: string): CountryCode => {
  const normalized = code.trim().toUpperCase();
  return normalized === 'USD' ? 'USA' : normalized;
};

/**
 * Catalog names in the source tables carry stray leading and trailing spaces.
 */
export const normalizeCatalogName = (name: string): string => name.trim();
