import { err, ok } from 'neverthrow';

import { moneyAt } from '@/common/types/money.js';

import { toDataGap } from '../errors.js';
import { componentLabel, divisionCount, regionalDistance, TWO } from '../shared.js';

import type { CostModule, RawLineItem } from '../types.js';

const TITLE = 'Logistics';

/**
 * Distribution runs: every division of the level gets a number of return
 * trips, topped up by trips per million inhabitants. Each trip covers the
 * chosen percentile distance out and back.
 */
export const logisticsModule: CostModule<'logistics'> = {
  kind: 'logistics',
  title: TITLE,
  compute(config, { country, year, store, population }) {
    const gap = toDataGap('logistics', country);
    const lines: RawLineItem[] = [];

    for (const item of config.items) {
      const vehicle = store.getTransport(item.vehicleModel);
      if (vehicle.isErr()) return err(gap(vehicle.error));

      const distance = regionalDistance(store, country, item.percentile);
      if (distance.isErr()) return err(gap(distance.error));

      const divisions = divisionCount(store, country, item.division);
      if (divisions.isErr()) return err(gap(divisions.error));

      let trips = divisions.value.mul(item.tripsPerDivision ?? 1);
      const tripsPerMillion = item.tripsPerMillionPeople ?? 0;
      if (tripsPerMillion > 0) {
        const thousands = population.resolve(country, year);
        if (thousands.isErr()) return err(gap(thousands.error));
        trips = trips.plus(thousands.value.div(1000).mul(tripsPerMillion));
      }

      const amount = trips.mul(TWO).mul(distance.value).mul(vehicle.value.operatingCostPerKm);
      lines.push({
        component: componentLabel(TITLE, item.label),
        money: moneyAt(amount, vehicle.value.currency, vehicle.value.year),
      });
    }

    return ok(lines);
  },
};
