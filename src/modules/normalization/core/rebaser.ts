import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { moneyAt } from '@/common/types/money.js';

import { DEFAULT_DEFLATOR_COUNTRY, INTERNATIONAL_DOLLAR, normalizeCurrencyCode } from './currency.js';
import { createMissingSeriesError, type MissingSeriesError } from './errors.js';
import { getFactorAt } from './factor-maps.js';

import type { CurrencyTimeRebaser } from './ports.js';
import type { PriceBase, RebaserOptions } from './types.js';
import type { EconomicSeriesName, ReferenceDataStore } from '@/modules/reference-data/index.js';

const ONE = new Decimal(1);

/**
 * Creates a rebaser over the PPP conversion factor and GDP deflator series.
 *
 * Conversion path for an amount in currency C1 at year Y1 to C2 at Y2:
 *
 *   amount / PPP(C1, Y1)            local currency → international dollars
 *     × deflator(Y2) / deflator(Y1)  re-priced with the reference economy's deflator
 *     × PPP(C2, Y2)                  international dollars → local currency
 *
 * PPP legs are skipped for `I$`. Years outside a series clamp to its boundary,
 * interior gaps carry the latest earlier value forward. Only ratios within a
 * single deflator series are taken, so its base year cancels out and a
 * C1 → C2 → C1 round trip returns the original amount.
 */
export const makeCurrencyTimeRebaser = (
  store: ReferenceDataStore,
  options: RebaserOptions = {}
): CurrencyTimeRebaser => {
  const deflatorCountry = normalizeCurrencyCode(
    options.deflatorCountry ?? DEFAULT_DEFLATOR_COUNTRY
  );

  const seriesValue = (
    country: string,
    seriesName: EconomicSeriesName,
    year: number
  ): Result<Decimal, MissingSeriesError> => {
    const series = store.getEconomicSeries(country, seriesName);
    if (series.isErr()) {
      return err(createMissingSeriesError(country, seriesName));
    }

    const value = getFactorAt(series.value.yearlyValues, year);
    return value !== undefined ? ok(value) : err(createMissingSeriesError(country, seriesName));
  };

  const pppFactor = (currency: string, year: number): Result<Decimal, MissingSeriesError> =>
    currency === INTERNATIONAL_DOLLAR
      ? ok(ONE)
      : seriesValue(currency, 'ppp_conversion_factor', year);

  const factor = (source: PriceBase, target: PriceBase): Result<Decimal, MissingSeriesError> => {
    const from = normalizeCurrencyCode(source.currency);
    const to = normalizeCurrencyCode(target.currency);

    if (from === to && source.year === target.year) {
      return ok(ONE);
    }

    const sourcePpp = pppFactor(from, source.year);
    if (sourcePpp.isErr()) return err(sourcePpp.error);

    const targetPpp = pppFactor(to, target.year);
    if (targetPpp.isErr()) return err(targetPpp.error);

    const sourceDeflator = seriesValue(deflatorCountry, 'gdp_deflator', source.year);
    if (sourceDeflator.isErr()) return err(sourceDeflator.error);

    const targetDeflator = seriesValue(deflatorCountry, 'gdp_deflator', target.year);
    if (targetDeflator.isErr()) return err(targetDeflator.error);

    // Equal clamped years give exact unit ratios
    const currencyRatio = targetPpp.value.div(sourcePpp.value);
    const priceRatio = targetDeflator.value.div(sourceDeflator.value);
    return ok(currencyRatio.mul(priceRatio));
  };

  return {
    factor,
    rebase: (money, target) =>
      factor({ currency: money.currency, year: money.year }, target).map((value) =>
        moneyAt(money.amount.mul(value), target.currency, target.year)
      ),
  };
};
