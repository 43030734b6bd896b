import type { ProgrammeConfigInput } from './schemas.js';
import type { CostModuleKind } from '@/modules/cost-modules/index.js';

export const DEFAULT_MODULES: readonly CostModuleKind[] = ['personnel', 'meetings', 'media'];

/**
 * Values used for every field a request leaves out.
 */
export const DEFAULT_PROGRAMME_INPUT = {
  country: 'UGA',
  start_year: 2020,
  end_year: 2020,
  discount_rate: 0.03,
  desired_currency: 'USD',
  desired_year: 2018,
  modules: [...DEFAULT_MODULES],
} satisfies Required<ProgrammeConfigInput>;

/** Years the population projections cover */
export const MIN_PROGRAMME_YEAR = 1950;
export const MAX_PROGRAMME_YEAR = 2100;
