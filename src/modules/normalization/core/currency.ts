import { normalizeCountryCode } from '@/modules/reference-data/index.js';

/** International dollars: the PPP numeraire */
export const INTERNATIONAL_DOLLAR = 'I$';

export const DEFAULT_DEFLATOR_COUNTRY = 'USA';

export const isInternationalDollar = (currency: string): boolean =>
  currency.trim().toUpperCase() === INTERNATIONAL_DOLLAR;

/**
 * Canonical form of a currency code: `I$`, or the ISO3 code of the country
 * whose local currency unit is meant (`USD` → `USA`).
 */
export const normalizeCurrencyCode = (currency: string): string =>
  isInternationalDollar(currency) ? INTERNATIONAL_DOLLAR : normalizeCountryCode(currency);
