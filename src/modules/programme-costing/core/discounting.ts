import { Decimal } from 'decimal.js';

/**
 * (1 + rate)^offset, the divisor turning a cost incurred `offset` years after
 * the programme start into its present value.
 */
export const discountFactor = (rate: Decimal, offset: number): Decimal =>
  new Decimal(1).plus(rate).pow(offset);

export const presentValue = (amount: Decimal, rate: Decimal, offset: number): Decimal =>
  amount.div(discountFactor(rate, offset));
