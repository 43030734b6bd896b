import type { Decimal } from 'decimal.js';

/**
 * A factor map is keyed by calendar year.
 * Values are Decimal factors (PPP conversion factors, deflator indices, population).
 */
export type FactorMap = ReadonlyMap<number, Decimal>;

export interface YearCoverage {
  readonly first: number;
  readonly last: number;
}

/**
 * First and last year holding a value, or null for an empty map.
 */
export const getCoverage = (map: FactorMap): YearCoverage | null => {
  let first: number | null = null;
  let last: number | null = null;

  for (const year of map.keys()) {
    if (first === null || year < first) first = year;
    if (last === null || year > last) last = year;
  }

  return first !== null && last !== null ? { first, last } : null;
};

/**
 * Clamps a year into the covered range.
 */
export const clampYear = (year: number, coverage: YearCoverage): number =>
  Math.min(Math.max(year, coverage.first), coverage.last);

function findLatestValueBefore(map: FactorMap, year: number): Decimal | undefined {
  let latestYear: number | null = null;
  let latestValue: Decimal | undefined;

  for (const [candidate, value] of map) {
    if (candidate >= year) continue;

    if (latestYear === null || candidate > latestYear) {
      latestYear = candidate;
      latestValue = value;
    }
  }

  return latestValue;
}

/**
 * Looks up the factor for a year.
 *
 * Years before the first or after the last covered year take the boundary
 * value; a year inside the range with no value takes the latest earlier value.
 * Returns undefined only for an empty map.
 *
 * @example
 * ```typescript
 * const deflator = new Map([[2015, new Decimal(80)], [2018, new Decimal(100)]]);
 * getFactorAt(deflator, 2016); // 80 (carried forward)
 * getFactorAt(deflator, 2050); // 100 (clamped to 2018)
 * ```
 */
export const getFactorAt = (map: FactorMap, year: number): Decimal | undefined => {
  const coverage = getCoverage(map);
  if (coverage === null) {
    return undefined;
  }

  const clamped = clampYear(year, coverage);
  return map.get(clamped) ?? findLatestValueBefore(map, clamped);
};
