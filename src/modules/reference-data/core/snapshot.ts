import { err, ok, type Result } from 'neverthrow';

import { createDuplicateKeyWarning, createNotFoundError } from './errors.js';
import { normalizeCatalogName, normalizeCountryCode } from './keys.js';

import type { DuplicateKeyWarning, NotFoundError } from './errors.js';
import type { ReferenceDataStore } from './ports.js';
import type {
  CadreLevel,
  CountryCode,
  EconomicSeriesName,
  PopulationSeries,
  ReferenceTableName,
  ReferenceTables,
  ReferenceTableStats,
} from './types.js';
import type { Decimal } from 'decimal.js';

export interface ReferenceSnapshot {
  readonly store: ReferenceDataStore;
  /** One entry per key that appeared more than once in a table */
  readonly warnings: readonly DuplicateKeyWarning[];
}

export const POPULATION_VARIANT = 'Median';

// ─────────────────────────────────────────────────────────────────────────────
// Indexing
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Indexes rows by key, keeping the first row per key.
 */
const indexRows = <T>(
  table: ReferenceTableName,
  rows: readonly T[],
  keyOf: (row: T) => string,
  warnings: DuplicateKeyWarning[]
): ReadonlyMap<string, T> => {
  const index = new Map<string, T>();
  const occurrences = new Map<string, number>();

  for (const row of rows) {
    const key = keyOf(row);
    occurrences.set(key, (occurrences.get(key) ?? 0) + 1);
    if (!index.has(key)) {
      index.set(key, row);
    }
  }

  for (const [key, count] of occurrences) {
    if (count > 1) {
      warnings.push(createDuplicateKeyWarning(table, key, count));
    }
  }

  return index;
};

const sortedUnique = (values: Iterable<string>): readonly string[] =>
  Object.freeze([...new Set(values)].sort());

const lookup = <T>(
  index: ReadonlyMap<string, T>,
  table: ReferenceTableName,
  key: string
): Result<T, NotFoundError> => {
  const row = index.get(key);
  return row !== undefined ? ok(row) : err(createNotFoundError(table, key));
};

const salaryKey = (country: CountryCode, cadreLevel: CadreLevel): string =>
  `${normalizeCountryCode(country)}/${String(cadreLevel)}`;

const seriesKey = (country: CountryCode, seriesName: EconomicSeriesName): string =>
  `${normalizeCountryCode(country)}/${seriesName}`;

const buildPopulationIndex = (
  tables: ReferenceTables,
  warnings: DuplicateKeyWarning[]
): ReadonlyMap<string, PopulationSeries> => {
  const medianRows = tables.population.filter(
    (row) => row.variant.trim().toLowerCase() === POPULATION_VARIANT.toLowerCase()
  );
  const byYear = indexRows(
    'population',
    medianRows,
    (row) => `${normalizeCountryCode(row.country)}/${String(row.year)}`,
    warnings
  );

  const series = new Map<string, Map<number, Decimal>>();
  for (const row of byYear.values()) {
    const country = normalizeCountryCode(row.country);
    const values = series.get(country) ?? new Map<number, Decimal>();
    values.set(row.year, row.valueInThousands);
    series.set(country, values);
  }

  const index = new Map<string, PopulationSeries>();
  for (const [country, values] of series) {
    index.set(country, Object.freeze({ country, values }));
  }
  return index;
};

// ─────────────────────────────────────────────────────────────────────────────
// Snapshot
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Builds the in-memory store from raw reference rows.
 *
 * Keys are normalized on both sides: country codes upper-cased (USD → USA),
 * catalog names trimmed. Duplicate keys keep the first row and yield a warning
 * for the caller to log.
 */
export const createReferenceSnapshot = (tables: ReferenceTables): ReferenceSnapshot => {
  const warnings: DuplicateKeyWarning[] = [];

  const salaries = indexRows(
    'salaries',
    tables.salaries,
    (row) => salaryKey(row.country, row.cadreLevel),
    warnings
  );
  const perDiems = indexRows(
    'per_diems',
    tables.perDiems,
    (row) => normalizeCountryCode(row.country),
    warnings
  );
  const transport = indexRows(
    'transport',
    tables.transport,
    (row) => normalizeCatalogName(row.vehicleModel),
    warnings
  );
  const supplies = indexRows(
    'supplies',
    tables.supplies,
    (row) => normalizeCatalogName(row.item),
    warnings
  );
  const distances = indexRows(
    'distances',
    tables.distances,
    (row) => normalizeCountryCode(row.country),
    warnings
  );
  const divisions = indexRows(
    'administrative_divisions',
    tables.administrativeDivisions,
    (row) => normalizeCountryCode(row.country),
    warnings
  );
  const facilities = indexRows(
    'healthcare_facilities',
    tables.healthcareFacilities,
    (row) => normalizeCountryCode(row.country),
    warnings
  );
  const economicSeries = indexRows(
    'economic_series',
    tables.economicSeries,
    (row) => seriesKey(row.country, row.seriesName),
    warnings
  );
  const population = buildPopulationIndex(tables, warnings);

  const countries = sortedUnique(
    [
      ...tables.salaries,
      ...tables.perDiems,
      ...tables.distances,
      ...tables.administrativeDivisions,
      ...tables.healthcareFacilities,
    ].map((row) => normalizeCountryCode(row.country))
  );
  const seriesCountries = (seriesName: EconomicSeriesName): readonly string[] =>
    sortedUnique(
      tables.economicSeries
        .filter((row) => row.seriesName === seriesName)
        .map((row) => normalizeCountryCode(row.country))
    );
  const seriesCountryLists: Readonly<Record<EconomicSeriesName, readonly string[]>> = {
    ppp_conversion_factor: seriesCountries('ppp_conversion_factor'),
    gdp_deflator: seriesCountries('gdp_deflator'),
    gdp_per_capita_ppp: seriesCountries('gdp_per_capita_ppp'),
  };
  const vehicleModels = sortedUnique(transport.keys());
  const supplyItems = sortedUnique(supplies.keys());

  const stats: ReferenceTableStats = Object.freeze({
    salaries: salaries.size,
    per_diems: perDiems.size,
    transport: transport.size,
    supplies: supplies.size,
    distances: distances.size,
    administrative_divisions: divisions.size,
    healthcare_facilities: facilities.size,
    economic_series: economicSeries.size,
    population: population.size,
  });

  const store: ReferenceDataStore = {
    getSalary: (country, cadreLevel) =>
      lookup(salaries, 'salaries', salaryKey(country, cadreLevel)),
    getPerDiem: (country) => lookup(perDiems, 'per_diems', normalizeCountryCode(country)),
    getTransport: (vehicleModel) =>
      lookup(transport, 'transport', normalizeCatalogName(vehicleModel)),
    getSupply: (item) => lookup(supplies, 'supplies', normalizeCatalogName(item)),
    getDistances: (country) => lookup(distances, 'distances', normalizeCountryCode(country)),
    getAdministrativeDivisions: (country) =>
      lookup(divisions, 'administrative_divisions', normalizeCountryCode(country)),
    getHealthcareFacilities: (country) =>
      lookup(facilities, 'healthcare_facilities', normalizeCountryCode(country)),
    getEconomicSeries: (country, seriesName) =>
      lookup(economicSeries, 'economic_series', seriesKey(country, seriesName)),
    getPopulation: (country) => lookup(population, 'population', normalizeCountryCode(country)),
    listCountries: () => countries,
    listSeriesCountries: (seriesName) => seriesCountryLists[seriesName],
    listVehicleModels: () => vehicleModels,
    listSupplyItems: () => supplyItems,
    stats: () => stats,
  };

  return { store: Object.freeze(store), warnings: Object.freeze(warnings) };
};
