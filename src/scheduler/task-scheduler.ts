/**
 * Task scheduling over the job queue.
 *
 * `schedule(job, delay)`, `cancel(taskId)` and `attemptCount(taskId)` for
 * provision-task jobs. Attempt counts are read from the persisted task,
 * never from queue metadata, so they survive restarts. Cancellation is
 * best-effort: a job that escapes it still finds its task terminal and
 * does nothing.
 */

import { OrchestratorError, notFoundError } from '../domain/errors';
import { JobQueue, TaskJob } from './job';
import { TaskStore } from '../storage/store';

export type AttemptKind = 'dispatch' | 'poll';

export class TaskScheduler {
  private jobsByTask = new Map<string, Set<string>>();

  constructor(
    private readonly queue: JobQueue,
    private readonly tasks: TaskStore,
  ) {}

  async schedule(job: TaskJob, delayMs: number): Promise<string> {
    const jobId = await this.queue.enqueue(job, { delayMs });
    const ids = this.jobsByTask.get(job.taskId) ?? new Set<string>();
    ids.add(jobId);
    this.jobsByTask.set(job.taskId, ids);
    return jobId;
  }

  /** Remove every not-yet-started job of a task. Returns how many were removed. */
  async cancel(taskId: string): Promise<number> {
    const ids = this.jobsByTask.get(taskId);
    if (!ids) return 0;
    this.jobsByTask.delete(taskId);
    let removed = 0;
    for (const jobId of ids) {
      if (await this.queue.remove(jobId)) removed++;
    }
    return removed;
  }

  /** Forget a job once it has started running. */
  acknowledge(taskId: string, jobId: string): void {
    const ids = this.jobsByTask.get(taskId);
    if (!ids) return;
    ids.delete(jobId);
    if (ids.size === 0) this.jobsByTask.delete(taskId);
  }

  /** Jobs of a task still tracked as scheduled. */
  scheduledCount(taskId: string): number {
    return this.jobsByTask.get(taskId)?.size ?? 0;
  }

  async attemptCount(taskId: string, kind: AttemptKind = 'poll'): Promise<number> {
    const task = await this.tasks.getById(taskId);
    if (!task) throw new OrchestratorError(notFoundError('Task', taskId));
    return kind === 'poll' ? task.pollAttempts : task.attempts;
  }
}
