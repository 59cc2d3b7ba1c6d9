/**
 * Health module exports
 */

export { makeHealthRoutes } from './shell/rest/routes.js';

export {
  makeDbHealthChecker,
  makeRedisHealthChecker,
  type DbHealthCheckerOptions,
  type PingableRedis,
  type RedisHealthCheckerOptions,
} from './shell/checkers/index.js';

export { getReadiness, overallStatus } from './core/usecases/get-readiness.js';

export type { HealthChecker } from './core/ports.js';
export type { HealthCheckResult, LivenessResponse, ReadinessResponse } from './core/types.js';
