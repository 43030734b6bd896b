// Schemas
export {
  AdministrativeLevelSchema,
  CadreLevelSchema,
  MoneyAtSchema,
  ModuleConfigSchema,
  PersonnelConfigSchema,
  PerDiemConfigSchema,
  TransportConfigSchema,
  OfficeSuppliesConfigSchema,
  FacilityDistributionConfigSchema,
  LogisticsConfigSchema,
  MeetingsConfigSchema,
  MediaConfigSchema,
  COST_MODULE_KINDS,
  isCostModuleKind,
} from './core/schemas.js';
export type {
  AdministrativeLevel,
  CostModuleKind,
  ModuleConfig,
  PersonnelConfig,
  PerDiemConfig,
  TransportConfig,
  OfficeSuppliesConfig,
  FacilityDistributionConfig,
  LogisticsConfig,
  MeetingsConfig,
  MediaConfig,
} from './core/schemas.js';

// Types
export type { RawLineItem, CostModuleContext, CostModule } from './core/types.js';

// Errors
export type { DataGapError } from './core/errors.js';
export { createDataGapError, toDataGap } from './core/errors.js';

// Shared calculations
export { divisionCount, perDiemRate, regionalDistance, componentLabel } from './core/shared.js';

// Registry
export type { CostModuleRegistry } from './core/registry.js';
export { COST_MODULES, computeModule } from './core/registry.js';

// Modules
export { personnelModule, STANDARD_POPULATION } from './core/modules/personnel.js';
export { perDiemModule } from './core/modules/per-diem.js';
export { transportModule } from './core/modules/transport.js';
export { officeSuppliesModule } from './core/modules/office-supplies.js';
export { facilityDistributionModule } from './core/modules/facility-distribution.js';
export { logisticsModule } from './core/modules/logistics.js';
export { meetingsModule, DEFAULT_PASSENGERS_PER_VEHICLE } from './core/modules/meetings.js';
export { mediaModule } from './core/modules/media.js';
