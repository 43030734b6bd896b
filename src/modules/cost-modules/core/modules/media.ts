import { err, ok } from 'neverthrow';

import { moneyAt, scaleMoney } from '@/common/types/money.js';

import { toDataGap } from '../errors.js';
import { componentLabel } from '../shared.js';

import type { CostModule, RawLineItem } from '../types.js';

const TITLE = 'Media';

/**
 * Mass-media reach priced per person or per thousand people, scaled by the
 * share of the population covered. The unit cost carries its own currency
 * and price year.
 */
export const mediaModule: CostModule<'media'> = {
  kind: 'media',
  title: TITLE,
  compute(config, { country, year, population }) {
    const lines: RawLineItem[] = [];

    for (const item of config.items) {
      const reach =
        item.per === 'person'
          ? population.resolvePersons(country, year)
          : population.resolve(country, year);
      if (reach.isErr()) return err(toDataGap('media', country)(reach.error));

      const { unitCost } = item;
      const price = moneyAt(unitCost.amount, unitCost.currency, unitCost.year);
      lines.push({
        component: componentLabel(TITLE, item.label),
        money: scaleMoney(price, reach.value.mul(item.coverage ?? 1)),
      });
    }

    return ok(lines);
  },
};
