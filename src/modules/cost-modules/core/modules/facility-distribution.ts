import { Decimal } from 'decimal.js';
import { err, ok } from 'neverthrow';

import { moneyAt } from '@/common/types/money.js';

import { toDataGap } from '../errors.js';
import { componentLabel, divisionCount } from '../shared.js';

import type { CostModule, RawLineItem } from '../types.js';

const TITLE = 'Facility distribution';

/**
 * Materials placed at health facilities (wall posters, leaflet stands):
 * catalog price times units per facility times the number of facilities of
 * the selected types, plus one per division office when requested.
 */
export const facilityDistributionModule: CostModule<'facility_distribution'> = {
  kind: 'facility_distribution',
  title: TITLE,
  compute(config, { country, store }) {
    if (config.items.length === 0) return ok([]);

    const gap = toDataGap('facility_distribution', country);
    const facilities = store.getHealthcareFacilities(country);
    if (facilities.isErr()) return err(gap(facilities.error));

    const lines: RawLineItem[] = [];
    for (const item of config.items) {
      const supply = store.getSupply(item.item);
      if (supply.isErr()) return err(gap(supply.error));

      let sites = [...new Set(item.facilityTypes)].reduce(
        (sum, facilityType) => sum.plus(facilities.value.counts[facilityType]),
        new Decimal(0)
      );
      if (item.perDivision !== undefined) {
        const offices = divisionCount(store, country, item.perDivision);
        if (offices.isErr()) return err(gap(offices.error));
        sites = sites.plus(offices.value);
      }

      const amount = supply.value.price.mul(item.unitsPerFacility ?? 1).mul(sites);
      lines.push({
        component: componentLabel(TITLE, item.label),
        money: moneyAt(amount, supply.value.currency, supply.value.year),
      });
    }

    return ok(lines);
  },
};
