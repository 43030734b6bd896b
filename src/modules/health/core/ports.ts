import type { HealthCheckResult } from './types.js';

/**
 * Health check function type. Checks over in-memory state may answer synchronously.
 */
export type HealthChecker = () => HealthCheckResult | Promise<HealthCheckResult>;
