import { Decimal } from 'decimal.js';
import { describe, it, expect } from 'vitest';

import { moneyAt } from '@/common/types/money.js';
import { makeCurrencyTimeRebaser } from '@/modules/normalization/index.js';

import { makeTestStore } from '../../fixtures/reference-data.js';

describe('makeCurrencyTimeRebaser', () => {
  const store = makeTestStore();
  const rebaser = makeCurrencyTimeRebaser(store, { deflatorCountry: 'USA' });

  describe('identity', () => {
    it('returns a factor of exactly 1 for the same currency and year', () => {
      const result = rebaser.factor({ currency: 'UGA', year: 2019 }, { currency: 'UGA', year: 2019 });

      expect(result.isOk() && result.value.toString()).toBe('1');
    });

    it('treats USD and USA as the same currency', () => {
      const result = rebaser.factor({ currency: 'USD', year: 2019 }, { currency: 'usa', year: 2019 });

      expect(result.isOk() && result.value.toString()).toBe('1');
    });

    it('does not need any series for an identity conversion', () => {
      // NPL has no PPP series
      const result = rebaser.rebase(moneyAt(10, 'NPL', 2019), { currency: 'NPL', year: 2019 });

      expect(result.isOk() && result.value.amount.toNumber()).toBe(10);
    });
  });

  describe('conversion', () => {
    it('converts local currency to USD at a later price year', () => {
      // 1000 / PPP_UGA(2019)=1000 × PPP_USA(2020)=1 × 125/100
      const result = rebaser.rebase(moneyAt(1000, 'UGA', 2019), { currency: 'USD', year: 2020 });

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value.amount.toString()).toBe('1.25');
        expect(result.value.currency).toBe('USD');
        expect(result.value.year).toBe(2020);
      }
    });

    it('converts USD to local currency', () => {
      // 100 × 1500 × 125/100
      const result = rebaser.rebase(moneyAt(100, 'USD', 2019), { currency: 'UGA', year: 2021 });

      expect(result.isOk() && result.value.amount.toString()).toBe('187500');
    });

    it('skips the PPP legs for international dollars', () => {
      const toLocal = rebaser.rebase(moneyAt(6, 'I$', 2019), { currency: 'UGA', year: 2019 });
      const toLaterYear = rebaser.rebase(moneyAt(80, 'I$', 2015), { currency: 'I$', year: 2018 });

      expect(toLocal.isOk() && toLocal.value.amount.toString()).toBe('6000');
      expect(toLaterYear.isOk() && toLaterYear.value.amount.toString()).toBe('100');
    });

    it('carries the deflator across missing years', () => {
      // 2016 takes the 2015 value (80)
      const result = rebaser.rebase(moneyAt(80, 'I$', 2016), { currency: 'I$', year: 2018 });

      expect(result.isOk() && result.value.amount.toString()).toBe('100');
    });
  });

  describe('clamping', () => {
    it('uses the last covered year for later targets', () => {
      const clamped = rebaser.factor({ currency: 'USD', year: 2019 }, { currency: 'UGA', year: 2050 });
      const boundary = rebaser.factor({ currency: 'USD', year: 2019 }, { currency: 'UGA', year: 2021 });

      expect(clamped.isOk() && boundary.isOk()).toBe(true);
      if (clamped.isOk() && boundary.isOk()) {
        expect(clamped.value.equals(boundary.value)).toBe(true);
        expect(clamped.value.toString()).toBe('1875');
      }
    });

    it('uses the first covered year for earlier sources', () => {
      const result = rebaser.rebase(moneyAt(80, 'I$', 2000), { currency: 'I$', year: 2018 });

      expect(result.isOk() && result.value.amount.toString()).toBe('100');
    });

    it('returns a factor of 1 when both years clamp to the same value', () => {
      const result = rebaser.factor({ currency: 'I$', year: 2030 }, { currency: 'I$', year: 2040 });

      expect(result.isOk() && result.value.toString()).toBe('1');
    });
  });

  describe('round trip', () => {
    it('returns the original amount after converting there and back', () => {
      const original = moneyAt('1234.56', 'UGA', 2019);

      const result = rebaser
        .rebase(original, { currency: 'ARG', year: 2020 })
        .andThen((converted) => rebaser.rebase(converted, { currency: 'UGA', year: 2019 }));

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        const drift = result.value.amount.minus(original.amount).abs();
        expect(drift.lessThan(new Decimal('1e-9'))).toBe(true);
      }
    });
  });

  describe('missing series', () => {
    it('reports a currency without a PPP series', () => {
      const result = rebaser.rebase(moneyAt(10, 'NPL', 2019), { currency: 'USD', year: 2019 });

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error).toEqual({
          type: 'MissingSeriesError',
          country: 'NPL',
          seriesName: 'ppp_conversion_factor',
          message: "No ppp_conversion_factor series for 'NPL'",
        });
      }
    });

    it('reports a deflator country without a deflator series', () => {
      const argDeflated = makeCurrencyTimeRebaser(store, { deflatorCountry: 'ARG' });

      const result = argDeflated.factor({ currency: 'USD', year: 2019 }, { currency: 'I$', year: 2020 });

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.country).toBe('ARG');
        expect(result.error.seriesName).toBe('gdp_deflator');
      }
    });

    it('defaults to the USA deflator', () => {
      const defaulted = makeCurrencyTimeRebaser(store);

      const result = defaulted.factor({ currency: 'I$', year: 2019 }, { currency: 'I$', year: 2020 });

      expect(result.isOk() && result.value.toString()).toBe('1.25');
    });
  });
});
