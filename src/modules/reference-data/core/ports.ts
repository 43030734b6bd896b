import type { NotFoundError, ReferenceLoadError } from './errors.js';
import type {
  AdministrativeDivisionRecord,
  CadreLevel,
  CountryCode,
  DistanceRecord,
  EconomicSeriesName,
  EconomicSeriesRecord,
  HealthcareFacilityRecord,
  PerDiemRecord,
  PopulationSeries,
  ReferenceTables,
  ReferenceTableStats,
  SalaryRecord,
  SupplyRecord,
  TransportRecord,
} from './types.js';
import type { Result } from 'neverthrow';

/**
 * Read-only, in-memory view over the reference tables.
 *
 * Lookups are synchronous: the snapshot is loaded once and shared by every
 * costing run. A missing key is always a NotFoundError, never a substitute row.
 */
export interface ReferenceDataStore {
  getSalary(country: CountryCode, cadreLevel: CadreLevel): Result<SalaryRecord, NotFoundError>;
  getPerDiem(country: CountryCode): Result<PerDiemRecord, NotFoundError>;
  getTransport(vehicleModel: string): Result<TransportRecord, NotFoundError>;
  getSupply(item: string): Result<SupplyRecord, NotFoundError>;
  getDistances(country: CountryCode): Result<DistanceRecord, NotFoundError>;
  getAdministrativeDivisions(
    country: CountryCode
  ): Result<AdministrativeDivisionRecord, NotFoundError>;
  getHealthcareFacilities(country: CountryCode): Result<HealthcareFacilityRecord, NotFoundError>;
  getEconomicSeries(
    country: CountryCode,
    seriesName: EconomicSeriesName
  ): Result<EconomicSeriesRecord, NotFoundError>;
  getPopulation(country: CountryCode): Result<PopulationSeries, NotFoundError>;

  /** Countries with cost data (salary, per diem, distance, division or facility rows) */
  listCountries(): readonly CountryCode[];
  listSeriesCountries(seriesName: EconomicSeriesName): readonly CountryCode[];
  listVehicleModels(): readonly string[];
  listSupplyItems(): readonly string[];
  stats(): ReferenceTableStats;
}

/**
 * Port for reading raw reference tables from storage.
 */
export interface ReferenceDataLoader {
  load(): Promise<Result<ReferenceTables, ReferenceLoadError>>;
}
