/**
 * Job model for the durable queue.
 *
 * Every unit of provider-facing work runs as a job, so the code path that
 * raised an event never waits on a provider. Jobs may be delivered more
 * than once and must be safe to repeat.
 */

import { WebhookDelivery } from '../drivers/driver';
import { Order } from '../domain/resource';

export type Job =
  | { kind: 'provision.kick'; order: Order }
  | { kind: 'task.dispatch'; taskId: string }
  | { kind: 'task.poll'; taskId: string }
  | { kind: 'webhook.deliver'; driverId: string; delivery: WebhookDelivery };

export type JobKind = Job['kind'];

/** Jobs that belong to a provision task and can be cancelled with it. */
export type TaskJob = Extract<Job, { taskId: string }>;

export interface JobMeta {
  jobId: string;
  /** 1 on first delivery, incremented on every redelivery. */
  delivery: number;
}

export type JobHandler = (job: Job, meta: JobMeta) => Promise<void>;

/** Contract of the durable, at-least-once, delay-capable queue. */
export interface JobQueue {
  enqueue(job: Job, options?: { delayMs?: number }): Promise<string>;
  /** Remove a job that has not started yet. Returns false when it is gone. */
  remove(jobId: string): Promise<boolean>;
  /** Install the worker. */
  process(handler: JobHandler): void;
}

export function isTaskJob(job: Job): job is TaskJob {
  return job.kind === 'task.dispatch' || job.kind === 'task.poll';
}
