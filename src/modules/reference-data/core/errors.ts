import type { ReferenceTableName } from './types.js';
import type { InfraError, NotFoundError } from '@/common/types/errors.js';

export type { NotFoundError } from '@/common/types/errors.js';
export { createNotFoundError } from '@/common/types/errors.js';

/**
 * Several source rows share one lookup key. The first row is kept.
 */
export interface DuplicateKeyWarning {
  readonly type: 'DuplicateKeyWarning';
  readonly table: ReferenceTableName;
  readonly key: string;
  readonly occurrences: number;
  readonly message: string;
}

export const createDuplicateKeyWarning = (
  table: ReferenceTableName,
  key: string,
  occurrences: number
): DuplicateKeyWarning => ({
  type: 'DuplicateKeyWarning',
  table,
  key,
  occurrences,
  message: `${String(occurrences)} rows share key '${key}' in ${table}; keeping the first`,
});

export type ReferenceDataError = NotFoundError;

export type ReferenceLoadError = InfraError;
