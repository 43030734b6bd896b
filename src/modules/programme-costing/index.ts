// Types
export type { ProgrammeConfig, CostLedgerEntry, ModuleTemplates } from './core/types.js';

// Errors
export type { ConfigError, CostingError } from './core/errors.js';
export {
  createConfigError,
  getHttpStatusForError,
  COSTING_ERROR_HTTP_STATUS,
} from './core/errors.js';

// Input
export type { ProgrammeConfigInput, ModuleSelection } from './core/schemas.js';
export {
  ProgrammeConfigInputSchema,
  ModuleSelectionSchema,
  parseProgrammeConfigInput,
} from './core/schemas.js';
export {
  DEFAULT_PROGRAMME_INPUT,
  DEFAULT_MODULES,
  MIN_PROGRAMME_YEAR,
  MAX_PROGRAMME_YEAR,
} from './core/defaults.js';
export { resolveProgrammeConfig, isKnownCurrency } from './core/config.js';
export type { ResolveProgrammeConfigDeps } from './core/config.js';

// Calculations
export { discountFactor, presentValue } from './core/discounting.js';
export {
  formatLedgerCsv,
  escapeCsvField,
  LEDGER_CSV_HEADER,
  TOTAL_COMPONENT,
  type FormatLedgerOptions,
} from './core/csv.js';

// Use cases
export {
  costProgramme,
  compareLedgerEntries,
  type CostProgrammeDeps,
} from './core/usecases/cost-programme.js';
export { costProgrammeCsv, type CostProgrammeCsvDeps } from './core/usecases/cost-programme-csv.js';
export {
  getCostingOptions,
  type CostingOptions,
  type CostingModuleOption,
  type GetCostingOptionsDeps,
} from './core/usecases/get-costing-options.js';

// Shell - Templates
export {
  loadModuleTemplates,
  type TemplateLoadError,
} from './shell/templates/yaml-template-repo.js';

// Shell - REST
export {
  makeProgrammeCostingRoutes,
  type MakeProgrammeCostingRoutesDeps,
} from './shell/rest/routes.js';
