/**
 * Redis health checker. Non-critical: without Redis only the scheduled jobs stop.
 */

import { makeTimedCheck } from './timed-check.js';

import type { HealthChecker } from '../../core/ports.js';

/** The slice of an ioredis client the check needs */
export interface PingableRedis {
  ping(): Promise<string>;
}

export interface RedisHealthCheckerOptions {
  /** Name in health check results (default: 'redis') */
  name?: string;
  /** Timeout in milliseconds (default: 3000) */
  timeoutMs?: number;
}

export const makeRedisHealthChecker = (
  redis: PingableRedis,
  options: RedisHealthCheckerOptions = {}
): HealthChecker =>
  makeTimedCheck({
    name: options.name ?? 'redis',
    timeoutMs: options.timeoutMs ?? 3000,
    critical: false,
    ping: () => redis.ping(),
  });
