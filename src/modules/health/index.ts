/**
 * Health module exports
 */

// Routes
export { makeHealthRoutes } from './shell/rest/routes.js';

// Health checker factories
export {
  makeReferenceDataHealthChecker,
  type ReferenceDataHealthCheckerOptions,
} from './shell/checkers/index.js';

// Use cases
export { getReadiness, determineOverallStatus } from './core/usecases/get-readiness.js';

// Types
export type { HealthChecker } from './core/ports.js';
export type { HealthCheckResult, LivenessResponse, ReadinessResponse } from './core/types.js';
