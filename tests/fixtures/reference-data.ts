/**
 * Synthetic reference tables for costing tests.
 *
 * Figures are made up and chosen so that expected costs are exact:
 * - UGA has every table; ARG has salaries, per diems, distances and series;
 *   NPL has salaries and divisions only.
 * - USA PPP is 1 throughout; the USA deflator covers 2015..2021 with
 *   2016-2017 missing.
 */

import { Decimal } from 'decimal.js';

import { makeCurrencyTimeRebaser, makePopulationResolver } from '@/modules/normalization/index.js';
import {
  createReferenceSnapshot,
  type CadreLevel,
  type DistancePercentile,
  type EconomicSeriesName,
  type EconomicSeriesRecord,
  type FacilityType,
  type ReferenceDataStore,
  type ReferenceTables,
} from '@/modules/reference-data/index.js';

import type { CostModuleContext } from '@/modules/cost-modules/index.js';

const d = (value: Decimal.Value): Decimal => new Decimal(value);

const salary = (country: string, cadreLevel: CadreLevel, annualSalary: number) => ({
  country,
  cadreLevel,
  annualSalary: d(annualSalary),
  currency: 'I$',
  year: 2019,
});

const series = (
  country: string,
  seriesName: EconomicSeriesName,
  values: Record<number, number>
): EconomicSeriesRecord => ({
  country,
  seriesName,
  yearlyValues: new Map(
    Object.entries(values).map(([year, value]) => [Number(year), d(value)] as const)
  ),
});

const distances = (
  country: string,
  values: readonly (readonly [DistancePercentile, number])[]
) => ({
  country,
  percentileDistances: new Map(values.map(([percentile, km]) => [percentile, d(km)] as const)),
  sizeKmSq: null,
});

const facilities = (country: string, counts: Record<FacilityType, number>) => ({
  country,
  counts: {
    regional_hospitals: d(counts.regional_hospitals),
    provincial_hospitals: d(counts.provincial_hospitals),
    district_hospitals: d(counts.district_hospitals),
    health_centres: d(counts.health_centres),
    health_posts: d(counts.health_posts),
  },
});

const population = (country: string, values: Record<number, number>, variant = 'Median') =>
  Object.entries(values).map(([year, value]) => ({
    country,
    year: Number(year),
    variant,
    valueInThousands: d(value),
  }));

export const makeReferenceTables = (): ReferenceTables => ({
  salaries: [
    salary('UGA', 5, 30000),
    salary('UGA', 4, 20000),
    salary('UGA', 3, 12000),
    salary('UGA', 2, 8000),
    salary('UGA', 1, 6000),
    salary('ARG', 2, 30000),
    salary('NPL', 5, 10000),
  ],
  perDiems: [
    {
      country: 'UGA',
      dsaNational: d(200),
      dsaUpper: d(120),
      dsaLower: d(50),
      currency: 'USD',
      year: 2019,
      localProportion: d('0.2'),
    },
    {
      country: 'ARG',
      dsaNational: d(265),
      dsaUpper: d(150),
      dsaLower: d(98),
      currency: 'USD',
      year: 2019,
      localProportion: d('0.2'),
    },
  ],
  transport: [
    {
      vehicleModel: 'Corolla sedan 2014 model',
      operatingCostPerKm: d('0.5'),
      consumptionLitresPerKm: d('0.07'),
      currency: 'USD',
      year: 2019,
    },
    {
      vehicleModel: 'Land Cruiser ',
      operatingCostPerKm: d('1.2'),
      consumptionLitresPerKm: d('0.12'),
      currency: 'USD',
      year: 2019,
    },
  ],
  supplies: [
    { item: 'Paper plain', price: d('0.02'), currency: 'USD', year: 2019 },
    {
      item: 'Multifunciton Photocopier, Fax, Printer and Scanner ',
      price: d(2200),
      currency: 'USD',
      year: 2019,
    },
    { item: 'Poster A2', price: d('2.5'), currency: 'USD', year: 2019 },
  ],
  distances: [
    distances('UGA', [
      [50, 150],
      [95, 400],
    ]),
    distances('ARG', [[95, 1200]]),
  ],
  administrativeDivisions: [
    { country: 'UGA', provincialDivisions: d(4), districtDivisions: d(135) },
    { country: 'ARG', provincialDivisions: d(24), districtDivisions: d(500) },
    { country: 'NPL', provincialDivisions: d(7), districtDivisions: d(77) },
  ],
  healthcareFacilities: [
    facilities('UGA', {
      regional_hospitals: 14,
      provincial_hospitals: 0,
      district_hospitals: 40,
      health_centres: 1000,
      health_posts: 2000,
    }),
  ],
  economicSeries: [
    series('USA', 'ppp_conversion_factor', { 2015: 1, 2018: 1, 2019: 1, 2020: 1, 2021: 1 }),
    series('UGA', 'ppp_conversion_factor', { 2018: 800, 2019: 1000, 2020: 1200, 2021: 1500 }),
    series('ARG', 'ppp_conversion_factor', { 2019: 20, 2020: 25, 2021: 30 }),
    series('USA', 'gdp_deflator', { 2015: 80, 2018: 100, 2019: 100, 2020: 125, 2021: 125 }),
    series('UGA', 'gdp_deflator', { 2019: 50 }),
  ],
  population: [
    ...population('UGA', { 2018: 42000, 2019: 43000, 2020: 44000, 2021: 45000, 2022: 46000 }),
    ...population('UGA', { 2030: 55000 }),
    ...population('UGA', { 2020: 40000 }, 'Low'),
    ...population('ARG', { 2019: 45000, 2020: 45500 }),
    ...population('USA', { 2020: 330000 }),
  ],
});

export const makeTestStore = (tables: ReferenceTables = makeReferenceTables()): ReferenceDataStore =>
  createReferenceSnapshot(tables).store;

/**
 * Module context over the test store.
 */
export const makeModuleContext = (
  overrides: Partial<Pick<CostModuleContext, 'country' | 'year'>> = {},
  store: ReferenceDataStore = makeTestStore()
): CostModuleContext => ({
  country: overrides.country ?? 'UGA',
  year: overrides.year ?? 2020,
  store,
  population: makePopulationResolver(store),
});

/**
 * Everything a costing run needs, over the test store.
 */
export const makeCostingDeps = (store: ReferenceDataStore = makeTestStore()) => ({
  store,
  rebaser: makeCurrencyTimeRebaser(store, { deflatorCountry: 'USA' }),
  population: makePopulationResolver(store),
});
