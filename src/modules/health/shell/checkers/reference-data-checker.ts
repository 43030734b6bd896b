/**
 * Reference data health checker
 *
 * The snapshot is loaded once at startup, so readiness means every table the
 * cost modules read holds at least one row.
 */

import { REFERENCE_TABLES, type ReferenceDataStore, type ReferenceTableName } from '@/modules/reference-data/index.js';

import type { HealthChecker } from '../../core/ports.js';
import type { HealthCheckResult } from '../../core/types.js';

export interface ReferenceDataHealthCheckerOptions {
  name?: string;
  /** Tables that must be non-empty (default: all) */
  requiredTables?: readonly ReferenceTableName[];
}

export const makeReferenceDataHealthChecker = (
  store: ReferenceDataStore,
  options: ReferenceDataHealthCheckerOptions = {}
): HealthChecker => {
  const { name = 'reference-data', requiredTables = REFERENCE_TABLES } = options;

  return (): HealthCheckResult => {
    const stats = store.stats();
    const empty = requiredTables.filter((table) => stats[table] === 0);

    if (empty.length > 0) {
      return {
        name,
        status: 'unhealthy',
        message: `Empty reference tables: ${empty.join(', ')}`,
        critical: true,
      };
    }

    const rows = requiredTables.reduce((sum, table) => sum + stats[table], 0);
    return {
      name,
      status: 'healthy',
      message: `${String(requiredTables.length)} tables, ${String(rows)} keyed rows`,
      critical: true,
    };
  };
};
