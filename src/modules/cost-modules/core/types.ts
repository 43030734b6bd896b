import type { CostModuleKind, ModuleConfig } from './schemas.js';
import type { DataGapError } from './errors.js';
import type { MoneyAt } from '@/common/types/money.js';
import type { PopulationResolver } from '@/modules/normalization/index.js';
import type { CountryCode, ReferenceDataStore } from '@/modules/reference-data/index.js';
import type { Result } from 'neverthrow';

/**
 * A cost produced by a module, still in the currency and price year of the
 * reference row it came from.
 */
export interface RawLineItem {
  readonly component: string;
  readonly money: MoneyAt;
}

export interface CostModuleContext {
  readonly country: CountryCode;
  readonly year: number;
  readonly store: ReferenceDataStore;
  readonly population: PopulationResolver;
}

/**
 * A cost category. Modules compute unit costs times quantities and never
 * convert currencies; the aggregator rebases their output.
 */
export interface CostModule<K extends CostModuleKind> {
  readonly kind: K;
  /** Ledger prefix for the module's components */
  readonly title: string;
  compute(
    config: Extract<ModuleConfig, { kind: K }>,
    context: CostModuleContext
  ): Result<RawLineItem[], DataGapError>;
}
