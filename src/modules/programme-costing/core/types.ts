import type { CostModuleKind, ModuleConfig } from '@/modules/cost-modules/index.js';
import type { CountryCode } from '@/modules/reference-data/index.js';
import type { Decimal } from 'decimal.js';

/**
 * A validated programme configuration, defaults applied.
 */
export interface ProgrammeConfig {
  readonly country: CountryCode;
  readonly startYear: number;
  readonly endYear: number;
  /** Net annual rate in [0, 1] */
  readonly discountRate: Decimal;
  /** `I$`, `USD` or an ISO3 code, normalized */
  readonly desiredCurrency: string;
  readonly desiredYear: number;
  readonly modules: readonly ModuleConfig[];
}

/**
 * One ledger row: the discounted cost of a component in a programme year,
 * in the desired currency at desired-year prices.
 */
export interface CostLedgerEntry {
  readonly year: number;
  readonly component: string;
  readonly module: CostModuleKind;
  readonly cost: Decimal;
}

/**
 * Default item lists for modules requested by identifier only.
 */
export type ModuleTemplates = ReadonlyMap<CostModuleKind, ModuleConfig>;
