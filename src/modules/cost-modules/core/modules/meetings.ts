import { Decimal } from 'decimal.js';
import { err, ok } from 'neverthrow';

import { moneyAt, scaleMoney } from '@/common/types/money.js';

import { toDataGap } from '../errors.js';
import { componentLabel, perDiemRate, regionalDistance, TWO } from '../shared.js';

import type { CostModule, RawLineItem } from '../types.js';

const TITLE = 'Meetings';

export const DEFAULT_PASSENGERS_PER_VEHICLE = 4;

/**
 * Workshops and coordination meetings. Each attendee group is paid the per
 * diem of the meeting's level for every meeting day; travelling attendees
 * share vehicles over a return trip of the typical regional distance. A room
 * size adds venue hire at the given daily rate per square metre.
 */
export const meetingsModule: CostModule<'meetings'> = {
  kind: 'meetings',
  title: TITLE,
  compute(config, { country, store }) {
    if (config.items.length === 0) return ok([]);

    const gap = toDataGap('meetings', country);
    const perDiem = store.getPerDiem(country);
    if (perDiem.isErr()) return err(gap(perDiem.error));

    const lines: RawLineItem[] = [];
    for (const item of config.items) {
      const meetings = item.meetingsPerYear ?? 1;
      const meetingLabel = componentLabel(TITLE, item.label);

      for (const attendee of item.attendees) {
        const rate = perDiemRate(perDiem.value, item.division, attendee.local ?? false);
        if (rate.isErr()) return err(gap(rate.error));

        const amount = rate.value
          .mul(attendee.count)
          .mul(item.days)
          .mul(meetings);
        lines.push({
          component: `${meetingLabel} - ${attendee.label} per diem`,
          money: moneyAt(amount, perDiem.value.currency, perDiem.value.year),
        });
      }

      const { roomSizeM2, roomRatePerM2 } = item;
      if (roomSizeM2 !== undefined && roomSizeM2 > 0 && roomRatePerM2 !== undefined) {
        const rate = moneyAt(roomRatePerM2.amount, roomRatePerM2.currency, roomRatePerM2.year);
        lines.push({
          component: `${meetingLabel} - venue`,
          money: scaleMoney(rate, new Decimal(roomSizeM2).mul(item.days).mul(meetings)),
        });
      }

      const travelling = item.attendees
        .filter((attendee) => attendee.travelling === true)
        .reduce((sum, attendee) => sum.plus(attendee.count), new Decimal(0));
      if (travelling.isZero() || item.vehicleModel === undefined) {
        continue;
      }

      const vehicle = store.getTransport(item.vehicleModel);
      if (vehicle.isErr()) return err(gap(vehicle.error));
      const distance = regionalDistance(store, country);
      if (distance.isErr()) return err(gap(distance.error));

      const vehicles = travelling
        .div(item.passengersPerVehicle ?? DEFAULT_PASSENGERS_PER_VEHICLE)
        .ceil();
      const amount = vehicles
        .mul(TWO)
        .mul(distance.value)
        .mul(vehicle.value.operatingCostPerKm)
        .mul(meetings);
      lines.push({
        component: `${meetingLabel} - travel`,
        money: moneyAt(amount, vehicle.value.currency, vehicle.value.year),
      });
    }

    return ok(lines);
  },
};
