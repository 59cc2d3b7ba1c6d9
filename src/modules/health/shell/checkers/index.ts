/**
 * Health checker factories
 */

export { makeDbHealthChecker, type DbHealthCheckerOptions } from './db-checker.js';
export {
  makeRedisHealthChecker,
  type PingableRedis,
  type RedisHealthCheckerOptions,
} from './redis-checker.js';
