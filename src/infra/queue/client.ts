/**
 * BullMQ wiring shared by the scheduler: one Redis connection, one key prefix,
 * and a single close() for everything created through it.
 *
 * The prefix goes through BullMQ's `prefix` option. BullMQ does not support an
 * ioredis `keyPrefix` on its connection.
 */

import { Queue, Worker, type Processor, type WorkerOptions } from 'bullmq';

import type { Redis } from 'ioredis';
import type { Logger } from 'pino';

export interface QueueClientConfig {
  /** Connection with `maxRetriesPerRequest: null` and no keyPrefix */
  redis: Redis;
  prefix: string;
  logger: Logger;
}

export interface CreateWorkerOptions<T> {
  name: string;
  processor: Processor<T>;
  options?: Partial<WorkerOptions>;
}

export interface QueueClient {
  createQueue<T>(name: string): Queue<T>;
  createWorker<T>(options: CreateWorkerOptions<T>): Worker<T>;
  /** Closes workers, then queues. The Redis connection stays open. */
  close(): Promise<void>;
}

export const makeQueueClient = (config: QueueClientConfig): QueueClient => {
  const { redis, prefix, logger } = config;
  const log = logger.child({ component: 'QueueClient' });

  const queues: Queue[] = [];
  const workers: Worker[] = [];

  const closeEach = async (label: string, items: { close(): Promise<void> }[]): Promise<void> => {
    const results = await Promise.allSettled(items.map((item) => item.close()));
    results.forEach((result) => {
      if (result.status === 'rejected') {
        log.error({ err: result.reason }, `Failed to close ${label}`);
      }
    });
  };

  return {
    createQueue<T>(name: string): Queue<T> {
      const queue = new Queue<T>(name, { connection: redis, prefix });
      queues.push(queue);
      log.debug({ queue: name, prefix }, 'Queue created');
      return queue;
    },

    createWorker<T>({ name, processor, options = {} }: CreateWorkerOptions<T>): Worker<T> {
      const worker = new Worker<T>(name, processor, { ...options, connection: redis, prefix });

      worker.on('completed', (job) => {
        log.info({ queue: name, job: job.name, result: job.returnvalue }, 'Job completed');
      });
      worker.on('failed', (job, error) => {
        log.error({ queue: name, job: job?.name, attempts: job?.attemptsMade, err: error }, 'Job failed');
      });
      worker.on('error', (error) => {
        log.error({ queue: name, err: error }, 'Worker error');
      });

      workers.push(worker);
      log.info({ queue: name, prefix }, 'Worker started');
      return worker;
    },

    async close(): Promise<void> {
      await closeEach('worker', workers);
      await closeEach('queue', queues);
      log.info('Queue client closed');
    },
  };
};
