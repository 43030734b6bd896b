import { Decimal } from 'decimal.js';

/**
 * An amount together with the currency and price year it is expressed in.
 *
 * Every monetary value in the engine travels as a MoneyAt so that the
 * rebaser always knows where an amount comes from. `currency` is an ISO3
 * country code (that country's local currency unit), `USD`, or `I$`.
 */
export interface MoneyAt {
  readonly amount: Decimal;
  readonly currency: string;
  readonly year: number;
}

export const moneyAt = (amount: Decimal.Value, currency: string, year: number): MoneyAt =>
  Object.freeze({ amount: new Decimal(amount), currency, year });

/**
 * Multiplies the amount, keeping currency and year.
 */
export const scaleMoney = (money: MoneyAt, factor: Decimal.Value): MoneyAt =>
  moneyAt(money.amount.mul(factor), money.currency, money.year);
