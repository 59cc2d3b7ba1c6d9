/**
 * Database health checker. Runs `SELECT 1`.
 */

import { sql, type Kysely } from 'kysely';

import { makeTimedCheck } from './timed-check.js';

import type { HealthChecker } from '../../core/ports.js';

export interface DbHealthCheckerOptions {
  /** Name in health check results (default: 'database') */
  name?: string;
  /** Timeout in milliseconds (default: 3000) */
  timeoutMs?: number;
}

export const makeDbHealthChecker = <T>(
  db: Kysely<T>,
  options: DbHealthCheckerOptions = {}
): HealthChecker =>
  makeTimedCheck({
    name: options.name ?? 'database',
    timeoutMs: options.timeoutMs ?? 3000,
    critical: true,
    ping: () => sql`SELECT 1`.execute(db),
  });
