/**
 * Repeatable job scheduler on BullMQ.
 *
 * One queue holds a job scheduler per cron pattern; one worker runs them.
 */

import { runScheduledJob, type RunScheduledJobDeps } from '../../core/usecases/run-scheduled-job.js';
import { SCHEDULED_JOB_NAMES, SCHEDULED_JOBS, type ScheduledJobPayload } from '../../core/types.js';

import type { QueueClient } from '../../../../infra/queue/client.js';
import type { JobRunSummary } from '../../core/types.js';
import type { Job } from 'bullmq';

export const SCHEDULER_QUEUE_NAME = 'scheduled-jobs';

export interface StartSchedulerOptions {
  queueClient: QueueClient;
  deps: RunScheduledJobDeps;
  /** Clock override for tests */
  now?: () => Date;
}

export interface Scheduler {
  readonly jobNames: readonly string[];
}

export const createScheduledJobProcessor =
  (deps: RunScheduledJobDeps, now: () => Date = () => new Date()) =>
  async (job: Pick<Job<ScheduledJobPayload>, 'data'>): Promise<JobRunSummary> => {
    const result = await runScheduledJob(deps, { name: job.data.name, now: now() });
    if (result.isErr()) {
      // BullMQ marks the job failed when the processor throws
      throw new Error(result.error.message);
    }
    return result.value;
  };

/**
 * Registers every cron job (idempotent across restarts) and starts the worker.
 */
export const startScheduler = async (options: StartSchedulerOptions): Promise<Scheduler> => {
  const { queueClient, deps } = options;
  const log = deps.logger.child({ component: 'Scheduler' });

  const queue = queueClient.createQueue<ScheduledJobPayload>(SCHEDULER_QUEUE_NAME);

  for (const name of SCHEDULED_JOB_NAMES) {
    await queue.upsertJobScheduler(
      name,
      { pattern: SCHEDULED_JOBS[name], tz: 'UTC' },
      { name, data: { name } }
    );
    log.info({ name, pattern: SCHEDULED_JOBS[name] }, 'Scheduled job registered');
  }

  queueClient.createWorker<ScheduledJobPayload>({
    name: SCHEDULER_QUEUE_NAME,
    processor: createScheduledJobProcessor(deps, options.now),
    options: { concurrency: 1 },
  });

  return { jobNames: SCHEDULED_JOB_NAMES };
};
