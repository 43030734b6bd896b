import { err, ok } from 'neverthrow';

import { moneyAt } from '@/common/types/money.js';

import { toDataGap } from '../errors.js';
import { componentLabel } from '../shared.js';

import type { CostModule, RawLineItem } from '../types.js';

const TITLE = 'Office supplies';

/**
 * Catalog items. Equipment with a useful life is annualised: its price is
 * spread evenly over that many years.
 */
export const officeSuppliesModule: CostModule<'office_supplies'> = {
  kind: 'office_supplies',
  title: TITLE,
  compute(config, { country, store }) {
    const lines: RawLineItem[] = [];

    for (const item of config.items) {
      const supply = store.getSupply(item.item);
      if (supply.isErr()) return err(toDataGap('office_supplies', country)(supply.error));

      let amount = supply.value.price.mul(item.quantity ?? 1);
      if (item.usefulLifeYears !== undefined) {
        amount = amount.div(item.usefulLifeYears);
      }

      lines.push({
        component: componentLabel(TITLE, item.label ?? supply.value.item),
        money: moneyAt(amount, supply.value.currency, supply.value.year),
      });
    }

    return ok(lines);
  },
};
