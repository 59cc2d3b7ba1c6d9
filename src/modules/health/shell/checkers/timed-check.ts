/**
 * Runs a check with a deadline and turns the outcome into a check result.
 */

import type { HealthChecker } from '../../core/ports.js';

export interface TimedCheckOptions {
  name: string;
  timeoutMs: number;
  critical: boolean;
  ping: () => Promise<unknown>;
}

export const makeTimedCheck = (options: TimedCheckOptions): HealthChecker => {
  const { name, timeoutMs, critical, ping } = options;

  return async () => {
    const startTime = Date.now();
    let timer: NodeJS.Timeout | undefined;

    try {
      const timeout = new Promise<never>((_resolve, reject) => {
        timer = setTimeout(() => {
          reject(new Error(`${name} health check timed out after ${String(timeoutMs)}ms`));
        }, timeoutMs);
      });

      await Promise.race([ping(), timeout]);

      return { name, status: 'healthy', latencyMs: Date.now() - startTime, critical };
    } catch (error) {
      return {
        name,
        status: 'unhealthy',
        message: error instanceof Error ? error.message : `Unknown ${name} error`,
        latencyMs: Date.now() - startTime,
        critical,
      };
    } finally {
      clearTimeout(timer);
    }
  };
};
