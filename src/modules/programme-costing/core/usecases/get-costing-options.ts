/**
 * Get Costing Options Use Case
 *
 * Lists what a client can put in a programme configuration.
 */

import { COST_MODULES, COST_MODULE_KINDS, type CostModuleKind } from '@/modules/cost-modules/index.js';
import { INTERNATIONAL_DOLLAR } from '@/modules/normalization/index.js';

import { DEFAULT_PROGRAMME_INPUT } from '../defaults.js';

import type { ModuleTemplates } from '../types.js';
import type { ReferenceDataStore } from '@/modules/reference-data/index.js';

export interface CostingModuleOption {
  id: CostModuleKind;
  title: string;
  /** Whether the module can be requested by identifier alone */
  hasTemplate: boolean;
}

export interface CostingOptions {
  countries: string[];
  currencies: string[];
  modules: CostingModuleOption[];
  vehicleModels: string[];
  supplyItems: string[];
  defaults: typeof DEFAULT_PROGRAMME_INPUT;
}

export interface GetCostingOptionsDeps {
  store: ReferenceDataStore;
  templates: ModuleTemplates;
}

export const getCostingOptions = (deps: GetCostingOptionsDeps): CostingOptions => {
  const { store, templates } = deps;

  return {
    countries: [...store.listCountries()],
    currencies: [INTERNATIONAL_DOLLAR, ...store.listSeriesCountries('ppp_conversion_factor')],
    modules: COST_MODULE_KINDS.map((id) => ({
      id,
      title: COST_MODULES[id].title,
      hasTemplate: templates.has(id),
    })),
    vehicleModels: [...store.listVehicleModels()],
    supplyItems: [...store.listSupplyItems()],
    defaults: DEFAULT_PROGRAMME_INPUT,
  };
};
