import { err, ok } from 'neverthrow';

import { moneyAt } from '@/common/types/money.js';

import { toDataGap } from '../errors.js';
import { componentLabel, perDiemRate } from '../shared.js';

import type { CostModule, RawLineItem } from '../types.js';

const TITLE = 'Per diem';

/**
 * Travel allowances: daily subsistence rate of the administrative level times
 * travellers, days and trips per year.
 */
export const perDiemModule: CostModule<'per_diem'> = {
  kind: 'per_diem',
  title: TITLE,
  compute(config, { country, store }) {
    if (config.items.length === 0) return ok([]);

    const gap = toDataGap('per_diem', country);
    const record = store.getPerDiem(country);
    if (record.isErr()) return err(gap(record.error));
    const { currency, year } = record.value;

    const lines: RawLineItem[] = [];
    for (const item of config.items) {
      const rate = perDiemRate(record.value, item.division, item.local ?? false);
      if (rate.isErr()) return err(gap(rate.error));

      const amount = rate.value
        .mul(item.travellers)
        .mul(item.days)
        .mul(item.tripsPerYear ?? 1);
      lines.push({ component: componentLabel(TITLE, item.label), money: moneyAt(amount, currency, year) });
    }

    return ok(lines);
  },
};
