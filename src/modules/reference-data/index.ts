// Types
export type {
  CountryCode,
  CadreLevel,
  DistancePercentile,
  EconomicSeriesName,
  FacilityType,
  ReferenceTableName,
  SalaryRecord,
  PerDiemRecord,
  TransportRecord,
  SupplyRecord,
  DistanceRecord,
  AdministrativeDivisionRecord,
  HealthcareFacilityRecord,
  EconomicSeriesRecord,
  PopulationRecord,
  PopulationSeries,
  ReferenceTables,
  ReferenceTableStats,
} from './core/types.js';
export {
  CADRE_LEVELS,
  DISTANCE_PERCENTILES,
  TYPICAL_DISTANCE_PERCENTILE,
  ECONOMIC_SERIES,
  FACILITY_TYPES,
  REFERENCE_TABLES,
} from './core/types.js';

// Errors
export type {
  NotFoundError,
  DuplicateKeyWarning,
  ReferenceDataError,
  ReferenceLoadError,
} from './core/errors.js';
export { createNotFoundError, createDuplicateKeyWarning } from './core/errors.js';

// Ports
export type { ReferenceDataStore, ReferenceDataLoader } from './core/ports.js';

// Snapshot
export type { ReferenceSnapshot } from './core/snapshot.js';
export { createReferenceSnapshot, POPULATION_VARIANT } from './core/snapshot.js';
export { normalizeCountryCode, normalizeCatalogName } from './core/keys.js';

// Shell - Repository
export {
  KyselyReferenceLoader,
  makeKyselyReferenceLoader,
  type KyselyReferenceLoaderDeps,
} from './shell/repo/kysely-reference-loader.js';
export { toDecimal, ECONOMIC_SERIES_SOURCE_NAMES } from './shell/repo/row-mappers.js';
