/**
 * Programme Costing - Domain Errors
 *
 * All errors are discriminated unions with a 'type' field for easy matching.
 */

import type { DataGapError } from '@/modules/cost-modules/index.js';
import type { MissingSeriesError } from '@/modules/normalization/index.js';

/**
 * The programme configuration is unusable as given.
 */
export interface ConfigError {
  readonly type: 'ConfigError';
  readonly field: string;
  readonly message: string;
}

export const createConfigError = (field: string, message: string): ConfigError => ({
  type: 'ConfigError',
  field,
  message,
});

/**
 * Everything a costing run can fail with. A run aborts on the first error.
 */
export type CostingError = ConfigError | DataGapError | MissingSeriesError;

// ─────────────────────────────────────────────────────────────────────────────
// HTTP Status Mapping
// ─────────────────────────────────────────────────────────────────────────────

export const COSTING_ERROR_HTTP_STATUS: Record<CostingError['type'], number> = {
  ConfigError: 400,
  DataGapError: 422,
  MissingSeriesError: 422,
};

export const getHttpStatusForError = (error: CostingError): number =>
  COSTING_ERROR_HTTP_STATUS[error.type];
