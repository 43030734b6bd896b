/**
 * Cost Programme CSV Use Case
 *
 * Configuration input in, CSV ledger out: resolve defaults, cost, format.
 */

import { resolveProgrammeConfig } from '../config.js';
import { formatLedgerCsv, type FormatLedgerOptions } from '../csv.js';
import { costProgramme, type CostProgrammeDeps } from './cost-programme.js';

import type { CostingError } from '../errors.js';
import type { ProgrammeConfigInput } from '../schemas.js';
import type { ModuleTemplates } from '../types.js';
import type { Result } from 'neverthrow';

export interface CostProgrammeCsvDeps extends CostProgrammeDeps {
  templates: ModuleTemplates;
}

export const costProgrammeCsv = (
  deps: CostProgrammeCsvDeps,
  input: ProgrammeConfigInput,
  options: FormatLedgerOptions = {}
): Result<string, CostingError> =>
  resolveProgrammeConfig(deps, input)
    .andThen((config) => costProgramme(deps, config))
    .map((entries) => formatLedgerCsv(entries, options));
