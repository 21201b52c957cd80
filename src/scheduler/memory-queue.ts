/**
 * In-process job queue.
 *
 * Implements the JobQueue contract with at-least-once semantics: a job
 * whose handler throws is redelivered (with a growing delay) until
 * `maxDeliveries` is reached. Two ways to run it:
 *
 * - `start()` ticks on a real timer (the reference server).
 * - `drain()` with a ManualClock runs every job in due order, jumping the
 *   clock forward to each job's run time (deterministic tests).
 */

import { v4 as uuid } from 'uuid';
import { DEFAULT_QUEUE_CONFIG, QueueConfig } from '../config';
import { Logger, logger as rootLogger } from '../logger';
import { ManualClock } from './clock';
import { Job, JobHandler, JobQueue } from './job';

export interface QueuedJob {
  id: string;
  job: Job;
  runAt: number;
  delivery: number;
  /** Insertion order; breaks ties between jobs due at the same time. */
  seq: number;
}

export interface MemoryJobQueueOptions {
  config?: Partial<QueueConfig>;
  clock?: ManualClock;
  logger?: Logger;
}

export class MemoryJobQueue implements JobQueue {
  private jobs: QueuedJob[] = [];
  private handler?: JobHandler;
  private timer?: NodeJS.Timeout;
  private running = false;
  private seq = 0;
  private readonly config: QueueConfig;
  private readonly clock?: ManualClock;
  private readonly log: Logger;

  constructor(options: MemoryJobQueueOptions = {}) {
    this.config = { ...DEFAULT_QUEUE_CONFIG, ...options.config };
    this.clock = options.clock;
    this.log = (options.logger ?? rootLogger).child({ component: 'job-queue' });
  }

  now(): number {
    return this.clock ? this.clock.now() : Date.now();
  }

  async enqueue(job: Job, options: { delayMs?: number } = {}): Promise<string> {
    const id = `job_${uuid()}`;
    this.insert({ id, job, runAt: this.now() + Math.max(0, options.delayMs ?? 0), delivery: 1, seq: this.seq++ });
    return id;
  }

  async remove(jobId: string): Promise<boolean> {
    const before = this.jobs.length;
    this.jobs = this.jobs.filter((j) => j.id !== jobId);
    return this.jobs.length < before;
  }

  process(handler: JobHandler): void {
    this.handler = handler;
  }

  /** Jobs waiting to run, earliest first. */
  pending(): QueuedJob[] {
    return this.jobs.map((j) => ({ ...j }));
  }

  size(): number {
    return this.jobs.length;
  }

  /** Run every job due now. Returns how many ran. */
  async runDue(): Promise<number> {
    let ran = 0;
    while (this.jobs.length > 0 && this.jobs[0].runAt <= this.now()) {
      await this.runNext();
      ran++;
    }
    return ran;
  }

  /**
   * Run jobs until the queue is empty or `maxJobs` ran. With a ManualClock
   * the clock jumps to each job's run time; without one only due jobs run.
   */
  async drain(maxJobs = 1_000): Promise<number> {
    let ran = 0;
    while (this.jobs.length > 0 && ran < maxJobs) {
      const next = this.jobs[0];
      if (next.runAt > this.now()) {
        if (!this.clock) break;
        this.clock.advanceTo(next.runAt);
      }
      await this.runNext();
      ran++;
    }
    return ran;
  }

  /** Start the real-time ticker. The timer does not keep the process alive. */
  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      if (this.running) return;
      this.running = true;
      this.runDue()
        .catch((err) => {
          this.log.error('Queue tick failed', { error: err instanceof Error ? err.message : String(err) });
        })
        .finally(() => {
          this.running = false;
        });
    }, this.config.tickMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  private insert(queued: QueuedJob): void {
    this.jobs.push(queued);
    this.jobs.sort((a, b) => a.runAt - b.runAt || a.seq - b.seq);
  }

  private async runNext(): Promise<void> {
    const queued = this.jobs.shift();
    if (!queued) return;
    if (!this.handler) {
      this.insert(queued);
      throw new Error('No job handler installed; call process() first');
    }

    try {
      await this.handler(queued.job, { jobId: queued.id, delivery: queued.delivery });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      if (queued.delivery >= this.config.maxDeliveries) {
        this.log.error('Job dropped after final delivery', {
          jobId: queued.id,
          kind: queued.job.kind,
          deliveries: queued.delivery,
          error: message,
        });
        return;
      }
      this.log.warn('Job failed; scheduling redelivery', {
        jobId: queued.id,
        kind: queued.job.kind,
        delivery: queued.delivery,
        error: message,
      });
      this.insert({
        ...queued,
        delivery: queued.delivery + 1,
        runAt: this.now() + this.config.tickMs * queued.delivery,
        seq: this.seq++,
      });
    }
  }
}
