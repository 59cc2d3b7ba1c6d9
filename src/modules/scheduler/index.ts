/**
 * Scheduler Module - Public API
 */

export type { ScheduledJobName, ScheduledJobPayload, JobRunSummary } from './core/types.js';
export { SCHEDULED_JOBS, SCHEDULED_JOB_NAMES, isScheduledJobName } from './core/types.js';

export type { SchedulerError, UnknownJobError } from './core/errors.js';

export {
  runScheduledJob,
  type RunScheduledJobDeps,
  type RunScheduledJobInput,
} from './core/usecases/run-scheduled-job.js';

export {
  sendSubscriberTips,
  pickTipOfTheDay,
  type SendSubscriberTipsDeps,
  type SubscriberTipsSummary,
} from './core/usecases/send-subscriber-tips.js';

export {
  startScheduler,
  createScheduledJobProcessor,
  SCHEDULER_QUEUE_NAME,
  type StartSchedulerOptions,
  type Scheduler,
} from './shell/queue/scheduler.js';
