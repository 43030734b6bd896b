import { Decimal } from 'decimal.js';

import { normalizeCatalogName, normalizeCountryCode } from '../../core/keys.js';
import { CADRE_LEVELS, DISTANCE_PERCENTILES } from '../../core/types.js';

import type {
  AdministrativeDivisionRecord,
  CadreLevel,
  DistancePercentile,
  DistanceRecord,
  EconomicSeriesName,
  EconomicSeriesRecord,
  HealthcareFacilityRecord,
  PerDiemRecord,
  PopulationRecord,
  SalaryRecord,
  SupplyRecord,
  TransportRecord,
} from '../../core/types.js';
import type {
  AdministrativeDivisions,
  CostsPerDiems,
  CostsSalaries,
  CostsTransport,
  DistanceBetweenRegions,
  HealthcareFacilities,
  OfficeSuppliesAndFurniture,
  Population,
} from '@/infra/database/reference/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Column parsing
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Parses a numeric column. Null, blank and non-finite values are absent.
 */
export const toDecimal = (value: unknown): Decimal | null => {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? new Decimal(value) : null;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '' || !/^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/.test(trimmed)) {
      return null;
    }
    return new Decimal(trimmed);
  }
  return null;
};

/** Economic series treat zero and negative values as missing observations */
const toPositiveDecimal = (value: unknown): Decimal | null => {
  const parsed = toDecimal(value);
  return parsed !== null && parsed.greaterThan(0) ? parsed : null;
};

export const toInteger = (value: unknown): number | null => {
  const parsed = toDecimal(value);
  return parsed?.isInteger() === true ? parsed.toNumber() : null;
};

const toCadreLevel = (value: unknown): CadreLevel | null => {
  const level = toInteger(value);
  return CADRE_LEVELS.find((candidate) => candidate === level) ?? null;
};

// ─────────────────────────────────────────────────────────────────────────────
// Table rows → records (null when a required column is absent)
// ─────────────────────────────────────────────────────────────────────────────

export const toSalaryRecord = (row: CostsSalaries): SalaryRecord | null => {
  const cadreLevel = toCadreLevel(row.ISCO_08_level);
  const annualSalary = toDecimal(row.annual_salary);
  const year = toInteger(row.year);
  if (cadreLevel === null || annualSalary === null || year === null) {
    return null;
  }
  return {
    country: normalizeCountryCode(row.ISO3),
    cadreLevel,
    annualSalary,
    currency: row.currency.trim(),
    year,
  };
};

export const toPerDiemRecord = (row: CostsPerDiems): PerDiemRecord | null => {
  const dsaNational = toDecimal(row.dsa_national);
  const dsaUpper = toDecimal(row.dsa_upper);
  const dsaLower = toDecimal(row.dsa_lower);
  const localProportion = toDecimal(row.local_proportion);
  const year = toInteger(row.year);
  if (
    (dsaNational === null && dsaUpper === null && dsaLower === null) ||
    localProportion === null ||
    year === null
  ) {
    return null;
  }
  return {
    country: normalizeCountryCode(row.ISO3),
    dsaNational,
    dsaUpper,
    dsaLower,
    currency: row.currency.trim(),
    year,
    localProportion,
  };
};

export const toTransportRecord = (row: CostsTransport): TransportRecord | null => {
  const operatingCostPerKm = toDecimal(row.operating_cost_per_km);
  const year = toInteger(row.year);
  if (operatingCostPerKm === null || year === null) {
    return null;
  }
  return {
    vehicleModel: normalizeCatalogName(row.vehicle_model),
    operatingCostPerKm,
    consumptionLitresPerKm: toDecimal(row.consumption_litres_per_km),
    currency: row.currency.trim(),
    year,
  };
};

export const toSupplyRecord = (row: OfficeSuppliesAndFurniture): SupplyRecord | null => {
  const price = toDecimal(row.price);
  const year = toInteger(row.year);
  if (price === null || year === null) {
    return null;
  }
  return { item: normalizeCatalogName(row.item), price, currency: row.currency.trim(), year };
};

const DISTANCE_COLUMNS: Readonly<Record<DistancePercentile, keyof DistanceBetweenRegions>> = {
  10: 'DDist10',
  20: 'DDist20',
  30: 'DDist30',
  40: 'DDist40',
  50: 'DDist50',
  60: 'DDist60',
  70: 'DDist70',
  80: 'DDist80',
  90: 'DDist90',
  95: 'DDist95',
  100: 'DDist100',
};

export const toDistanceRecord = (row: DistanceBetweenRegions): DistanceRecord | null => {
  const percentileDistances = new Map<DistancePercentile, Decimal>();
  for (const percentile of DISTANCE_PERCENTILES) {
    const distance = toDecimal(row[DISTANCE_COLUMNS[percentile]]);
    if (distance !== null) {
      percentileDistances.set(percentile, distance);
    }
  }
  if (percentileDistances.size === 0) {
    return null;
  }
  return {
    country: normalizeCountryCode(row.ISO3),
    percentileDistances,
    sizeKmSq: toDecimal(row.size_km_sq),
  };
};

export const toAdministrativeDivisionRecord = (
  row: AdministrativeDivisions
): AdministrativeDivisionRecord | null => {
  const provincialDivisions = toDecimal(row.provincial_divisions);
  const districtDivisions = toDecimal(row.district_divisions);
  if (provincialDivisions === null || districtDivisions === null) {
    return null;
  }
  return { country: normalizeCountryCode(row.ISO3), provincialDivisions, districtDivisions };
};

// An empty facility cell means the country reports none of that type
const facilityCount = (value: unknown): Decimal => toDecimal(value) ?? new Decimal(0);

export const toHealthcareFacilityRecord = (row: HealthcareFacilities): HealthcareFacilityRecord => ({
  country: normalizeCountryCode(row.ISO3),
  counts: {
    regional_hospitals: facilityCount(row.regional_hospitals),
    provincial_hospitals: facilityCount(row.provincial_hospitals),
    district_hospitals: facilityCount(row.district_hospitals),
    health_centres: facilityCount(row.health_centres),
    health_posts: facilityCount(row.health_posts),
  },
});

/**
 * Series names as published in the World Development Indicators extract.
 */
export const ECONOMIC_SERIES_SOURCE_NAMES: Readonly<Record<string, EconomicSeriesName>> = {
  'PPP conversion factor, GDP (LCU per international $)': 'ppp_conversion_factor',
  'GDP deflator (base year varies by country)': 'gdp_deflator',
  'GDP per capita, PPP (current international $)': 'gdp_per_capita_ppp',
};

const YEAR_COLUMN_PATTERN = /^(\d{4}) \[YR\d{4}\]$/;

/**
 * economic_statistics has one column per year, so rows are read as plain
 * column → value records.
 */
export type EconomicStatisticsRow = Readonly<Record<string, unknown>>;

export const toEconomicSeriesRecord = (row: EconomicStatisticsRow): EconomicSeriesRecord | null => {
  const country = row['Country Code'];
  const sourceName = row['Series Name'];
  if (typeof country !== 'string' || typeof sourceName !== 'string') {
    return null;
  }
  const seriesName = ECONOMIC_SERIES_SOURCE_NAMES[sourceName.trim()];
  if (seriesName === undefined) {
    return null;
  }

  const yearlyValues = new Map<number, Decimal>();
  for (const [column, value] of Object.entries(row)) {
    const year = YEAR_COLUMN_PATTERN.exec(column)?.[1];
    if (year === undefined) {
      continue;
    }
    const parsed = toPositiveDecimal(value);
    if (parsed !== null) {
      yearlyValues.set(Number(year), parsed);
    }
  }

  return { country: normalizeCountryCode(country), seriesName, yearlyValues };
};

export const toPopulationRecord = (row: Population): PopulationRecord | null => {
  const year = toInteger(row.Time);
  const valueInThousands = toDecimal(row.Value);
  if (year === null || valueInThousands === null) {
    return null;
  }
  return {
    country: normalizeCountryCode(row.Iso3),
    year,
    variant: row.Variant.trim(),
    valueInThousands,
  };
};
