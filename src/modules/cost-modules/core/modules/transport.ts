import { Decimal } from 'decimal.js';
import { err, ok } from 'neverthrow';

import { moneyAt, scaleMoney } from '@/common/types/money.js';
import { createNotFoundError } from '@/modules/reference-data/index.js';

import { toDataGap } from '../errors.js';
import { componentLabel, ONE, regionalDistance, TWO } from '../shared.js';

import type { CostModule, RawLineItem } from '../types.js';

const TITLE = 'Transport';

/**
 * Vehicle running costs: operating cost per km over the trip distance.
 * Without an explicit distance a trip spans the country's typical
 * inter-regional distance. A fuel price adds a separate fuel line from the
 * vehicle's consumption per km.
 */
export const transportModule: CostModule<'transport'> = {
  kind: 'transport',
  title: TITLE,
  compute(config, { country, store }) {
    const gap = toDataGap('transport', country);
    const lines: RawLineItem[] = [];

    for (const item of config.items) {
      const vehicle = store.getTransport(item.vehicleModel);
      if (vehicle.isErr()) return err(gap(vehicle.error));

      let distance: Decimal.Value;
      if (item.distanceKm !== undefined) {
        distance = item.distanceKm;
      } else {
        const typical = regionalDistance(store, country);
        if (typical.isErr()) return err(gap(typical.error));
        distance = typical.value;
      }

      const kilometres = new Decimal(distance)
        .mul(item.roundTrip === false ? ONE : TWO)
        .mul(item.tripsPerYear ?? 1)
        .mul(item.vehicles ?? 1);
      const component = componentLabel(TITLE, item.label);

      lines.push({
        component,
        money: moneyAt(
          vehicle.value.operatingCostPerKm.mul(kilometres),
          vehicle.value.currency,
          vehicle.value.year
        ),
      });

      const { fuelPricePerLitre } = item;
      if (fuelPricePerLitre !== undefined) {
        const consumption = vehicle.value.consumptionLitresPerKm;
        if (consumption === null) {
          const key = `${vehicle.value.vehicleModel}/consumption_litres_per_km`;
          return err(gap(createNotFoundError('transport', key)));
        }
        const price = moneyAt(
          fuelPricePerLitre.amount,
          fuelPricePerLitre.currency,
          fuelPricePerLitre.year
        );
        lines.push({
          component: `${component} - fuel`,
          money: scaleMoney(price, consumption.mul(kilometres)),
        });
      }
    }

    return ok(lines);
  },
};
