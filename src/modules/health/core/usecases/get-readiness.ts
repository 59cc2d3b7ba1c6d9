import type { HealthChecker } from '../ports.js';
import type { HealthCheckResult, ReadinessResponse } from '../types.js';

export interface GetReadinessDeps {
  checkers: HealthChecker[];
  version?: string | undefined;
}

export interface GetReadinessInput {
  uptime: number;
  timestamp: string;
}

/**
 * A checker that threw counts as a critical failure.
 */
const toCheckResult = (result: PromiseSettledResult<HealthCheckResult>): HealthCheckResult =>
  result.status === 'fulfilled'
    ? result.value
    : {
        name: 'unknown',
        status: 'unhealthy',
        message: result.reason instanceof Error ? result.reason.message : 'Check failed',
        critical: true,
      };

/**
 * - any critical check unhealthy → "unhealthy" (503)
 * - only non-critical checks unhealthy → "degraded" (200)
 * - otherwise → "ok"
 */
export const overallStatus = (checks: HealthCheckResult[]): ReadinessResponse['status'] => {
  const unhealthy = checks.filter((check) => check.status === 'unhealthy');
  if (unhealthy.some((check) => check.critical !== false)) {
    return 'unhealthy';
  }
  return unhealthy.length > 0 ? 'degraded' : 'ok';
};

export async function getReadiness(
  deps: GetReadinessDeps,
  input: GetReadinessInput
): Promise<ReadinessResponse> {
  const { checkers, version } = deps;

  const settled = await Promise.allSettled(checkers.map((checker) => checker()));
  const checks = settled.map(toCheckResult);

  return {
    status: overallStatus(checks),
    timestamp: input.timestamp,
    uptime: input.uptime,
    checks,
    ...(version !== undefined && { version }),
  };
}
