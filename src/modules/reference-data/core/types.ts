import type { Decimal } from 'decimal.js';

// ─────────────────────────────────────────────────────────────────────────────
// Keys
// ─────────────────────────────────────────────────────────────────────────────

/** ISO 3166-1 alpha-3 code, upper case */
export type CountryCode = string;

/** ISCO-08 skill level of a salary cadre */
export type CadreLevel = 1 | 2 | 3 | 4 | 5;
export const CADRE_LEVELS: readonly CadreLevel[] = [1, 2, 3, 4, 5];

export const DISTANCE_PERCENTILES = [10, 20, 30, 40, 50, 60, 70, 80, 90, 95, 100] as const;
export type DistancePercentile = (typeof DISTANCE_PERCENTILES)[number];

/** Percentile used as the typical distance between two regions */
export const TYPICAL_DISTANCE_PERCENTILE: DistancePercentile = 95;

export const ECONOMIC_SERIES = ['ppp_conversion_factor', 'gdp_deflator', 'gdp_per_capita_ppp'] as const;
export type EconomicSeriesName = (typeof ECONOMIC_SERIES)[number];

export const FACILITY_TYPES = [
  'regional_hospitals',
  'provincial_hospitals',
  'district_hospitals',
  'health_centres',
  'health_posts',
] as const;
export type FacilityType = (typeof FACILITY_TYPES)[number];

export const REFERENCE_TABLES = [
  'salaries',
  'per_diems',
  'transport',
  'supplies',
  'distances',
  'administrative_divisions',
  'healthcare_facilities',
  'economic_series',
  'population',
] as const;
export type ReferenceTableName = (typeof REFERENCE_TABLES)[number];

// ─────────────────────────────────────────────────────────────────────────────
// Records
// ─────────────────────────────────────────────────────────────────────────────

export interface SalaryRecord {
  readonly country: CountryCode;
  readonly cadreLevel: CadreLevel;
  readonly annualSalary: Decimal;
  readonly currency: string;
  readonly year: number;
}

/**
 * Daily subsistence allowances. A rate the source leaves blank is null; the
 * other levels stay usable.
 */
export interface PerDiemRecord {
  readonly country: CountryCode;
  readonly dsaNational: Decimal | null;
  readonly dsaUpper: Decimal | null;
  readonly dsaLower: Decimal | null;
  readonly currency: string;
  readonly year: number;
  /** Share of the full rate paid to staff travelling within their own area */
  readonly localProportion: Decimal;
}

export interface TransportRecord {
  readonly vehicleModel: string;
  readonly operatingCostPerKm: Decimal;
  /** Read when a transport item prices fuel separately */
  readonly consumptionLitresPerKm: Decimal | null;
  readonly currency: string;
  readonly year: number;
}

export interface SupplyRecord {
  readonly item: string;
  readonly price: Decimal;
  readonly currency: string;
  readonly year: number;
}

export interface DistanceRecord {
  readonly country: CountryCode;
  /** Kilometres; percentiles with no value in the source are absent */
  readonly percentileDistances: ReadonlyMap<DistancePercentile, Decimal>;
  readonly sizeKmSq: Decimal | null;
}

export interface AdministrativeDivisionRecord {
  readonly country: CountryCode;
  readonly provincialDivisions: Decimal;
  readonly districtDivisions: Decimal;
}

export interface HealthcareFacilityRecord {
  readonly country: CountryCode;
  readonly counts: Readonly<Record<FacilityType, Decimal>>;
}

export interface EconomicSeriesRecord {
  readonly country: CountryCode;
  readonly seriesName: EconomicSeriesName;
  readonly yearlyValues: ReadonlyMap<number, Decimal>;
}

export interface PopulationRecord {
  readonly country: CountryCode;
  readonly year: number;
  readonly variant: string;
  /** Thousands of persons */
  readonly valueInThousands: Decimal;
}

/**
 * A country's population series (Median variant), year → thousands.
 */
export interface PopulationSeries {
  readonly country: CountryCode;
  readonly values: ReadonlyMap<number, Decimal>;
}

/**
 * Raw rows of every reference table, as handed over by a loader.
 */
export interface ReferenceTables {
  readonly salaries: readonly SalaryRecord[];
  readonly perDiems: readonly PerDiemRecord[];
  readonly transport: readonly TransportRecord[];
  readonly supplies: readonly SupplyRecord[];
  readonly distances: readonly DistanceRecord[];
  readonly administrativeDivisions: readonly AdministrativeDivisionRecord[];
  readonly healthcareFacilities: readonly HealthcareFacilityRecord[];
  readonly economicSeries: readonly EconomicSeriesRecord[];
  readonly population: readonly PopulationRecord[];
}

export type ReferenceTableStats = Readonly<Record<ReferenceTableName, number>>;
