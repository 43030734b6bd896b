/**
 * Cost Programme Use Case
 *
 * Runs every configured module for every programme year and folds the line
 * items into a ledger.
 */

import { err, ok, type Result } from 'neverthrow';

import { computeModule, type CostModuleRegistry } from '@/modules/cost-modules/index.js';

import { discountFactor } from '../discounting.js';

import type { CostingError } from '../errors.js';
import type { CostLedgerEntry, ProgrammeConfig } from '../types.js';
import type { CurrencyTimeRebaser, PopulationResolver } from '@/modules/normalization/index.js';
import type { ReferenceDataStore } from '@/modules/reference-data/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface CostProgrammeDeps {
  store: ReferenceDataStore;
  rebaser: CurrencyTimeRebaser;
  population: PopulationResolver;
  /** Module implementations; the built-in registry when omitted */
  modules?: CostModuleRegistry;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Year ascending, then component by UTF-16 code unit order.
 */
export const compareLedgerEntries = (a: CostLedgerEntry, b: CostLedgerEntry): number => {
  if (a.year !== b.year) {
    return a.year - b.year;
  }
  if (a.component === b.component) {
    return 0;
  }
  return a.component < b.component ? -1 : 1;
};

// ─────────────────────────────────────────────────────────────────────────────
// Use Case
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Costs a programme.
 *
 * For each year from start to end: compute each module's line items, rebase
 * them to the desired currency and price year, divide by
 * (1 + discountRate)^(year − startYear) and add them to the entry of their
 * (year, component). The first error aborts the run.
 */
export const costProgramme = (
  deps: CostProgrammeDeps,
  config: ProgrammeConfig
): Result<CostLedgerEntry[], CostingError> => {
  const { store, rebaser, population, modules } = deps;
  const target = { currency: config.desiredCurrency, year: config.desiredYear };
  const entries = new Map<string, CostLedgerEntry>();

  for (let year = config.startYear; year <= config.endYear; year++) {
    const discount = discountFactor(config.discountRate, year - config.startYear);
    const context = { country: config.country, year, store, population };

    for (const moduleConfig of config.modules) {
      const lines = computeModule(moduleConfig, context, modules);
      if (lines.isErr()) return err(lines.error);

      for (const line of lines.value) {
        const rebased = rebaser.rebase(line.money, target);
        if (rebased.isErr()) return err(rebased.error);

        const cost = rebased.value.amount.div(discount);
        const key = `${String(year)}\u0000${line.component}`;
        const existing = entries.get(key);
        entries.set(
          key,
          existing !== undefined
            ? { ...existing, cost: existing.cost.plus(cost) }
            : { year, component: line.component, module: moduleConfig.kind, cost }
        );
      }
    }
  }

  return ok([...entries.values()].sort(compareLedgerEntries));
};
