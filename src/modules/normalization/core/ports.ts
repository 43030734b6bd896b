import type { MissingSeriesError } from './errors.js';
import type { PriceBase } from './types.js';
import type { MoneyAt } from '@/common/types/money.js';
import type { NotFoundError } from '@/modules/reference-data/index.js';
import type { Decimal } from 'decimal.js';
import type { Result } from 'neverthrow';

/**
 * Converts money between currencies and price years.
 *
 * Lets cost modules and the aggregator depend on the conversion contract
 * instead of the economic series behind it.
 */
export interface CurrencyTimeRebaser {
  rebase(money: MoneyAt, target: PriceBase): Result<MoneyAt, MissingSeriesError>;

  /**
   * Multiplicative factor taking an amount from `source` to `target`.
   */
  factor(source: PriceBase, target: PriceBase): Result<Decimal, MissingSeriesError>;
}

/**
 * Resolves the projected population of a country in a given year.
 */
export interface PopulationResolver {
  /** Thousands of persons */
  resolve(country: string, year: number): Result<Decimal, NotFoundError>;
  /** Persons */
  resolvePersons(country: string, year: number): Result<Decimal, NotFoundError>;
}
