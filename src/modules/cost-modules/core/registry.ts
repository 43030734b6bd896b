import { facilityDistributionModule } from './modules/facility-distribution.js';
import { logisticsModule } from './modules/logistics.js';
import { mediaModule } from './modules/media.js';
import { meetingsModule } from './modules/meetings.js';
import { officeSuppliesModule } from './modules/office-supplies.js';
import { perDiemModule } from './modules/per-diem.js';
import { personnelModule } from './modules/personnel.js';
import { transportModule } from './modules/transport.js';

import type { DataGapError } from './errors.js';
import type { CostModuleKind, ModuleConfig } from './schemas.js';
import type { CostModule, CostModuleContext, RawLineItem } from './types.js';
import type { Result } from 'neverthrow';

export type CostModuleRegistry = { readonly [K in CostModuleKind]: CostModule<K> };

export const COST_MODULES: CostModuleRegistry = {
  personnel: personnelModule,
  per_diem: perDiemModule,
  transport: transportModule,
  office_supplies: officeSuppliesModule,
  facility_distribution: facilityDistributionModule,
  logistics: logisticsModule,
  meetings: meetingsModule,
  media: mediaModule,
};

/**
 * Dispatches a module configuration to the module of its kind.
 */
export const computeModule = (
  config: ModuleConfig,
  context: CostModuleContext,
  modules: CostModuleRegistry = COST_MODULES
): Result<RawLineItem[], DataGapError> => {
  switch (config.kind) {
    case 'personnel':
      return modules.personnel.compute(config, context);
    case 'per_diem':
      return modules.per_diem.compute(config, context);
    case 'transport':
      return modules.transport.compute(config, context);
    case 'office_supplies':
      return modules.office_supplies.compute(config, context);
    case 'facility_distribution':
      return modules.facility_distribution.compute(config, context);
    case 'logistics':
      return modules.logistics.compute(config, context);
    case 'meetings':
      return modules.meetings.compute(config, context);
    case 'media':
      return modules.media.compute(config, context);
  }
};
