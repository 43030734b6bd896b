import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import {
  createNotFoundError,
  TYPICAL_DISTANCE_PERCENTILE,
  type DistancePercentile,
  type NotFoundError,
  type PerDiemRecord,
  type ReferenceDataStore,
} from '@/modules/reference-data/index.js';

import type { AdministrativeLevel } from './schemas.js';

export const ONE = new Decimal(1);
export const TWO = new Decimal(2);

/**
 * Number of administrative units at a level: 1 for national, otherwise the
 * country's provincial or district division count.
 */
export const divisionCount = (
  store: ReferenceDataStore,
  country: string,
  level: AdministrativeLevel
): Result<Decimal, NotFoundError> => {
  if (level === 'national') {
    return ok(ONE);
  }
  return store
    .getAdministrativeDivisions(country)
    .map((record) =>
      level === 'provincial' ? record.provincialDivisions : record.districtDivisions
    );
};

/**
 * Daily allowance for a trip at an administrative level. Staff working in
 * their own area receive the local proportion of the rate. A level without a
 * published rate is a NotFoundError keyed `<country>/<level>`.
 */
export const perDiemRate = (
  record: PerDiemRecord,
  level: AdministrativeLevel,
  local: boolean
): Result<Decimal, NotFoundError> => {
  const rate =
    level === 'national'
      ? record.dsaNational
      : level === 'provincial'
        ? record.dsaUpper
        : record.dsaLower;
  if (rate === null) {
    return err(createNotFoundError('per_diems', `${record.country}/${level}`));
  }
  return ok(local ? rate.mul(record.localProportion) : rate);
};

export const regionalDistance = (
  store: ReferenceDataStore,
  country: string,
  percentile: DistancePercentile = TYPICAL_DISTANCE_PERCENTILE
): Result<Decimal, NotFoundError> =>
  store.getDistances(country).andThen((record) => {
    const distance = record.percentileDistances.get(percentile);
    return distance !== undefined
      ? ok(distance)
      : err(createNotFoundError('distances', `${record.country}/DDist${String(percentile)}`));
  });

export const componentLabel = (title: string, label: string): string => `${title}: ${label}`;
