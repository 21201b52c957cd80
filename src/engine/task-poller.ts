/**
 * Task Poller.
 *
 * Advances in-flight provider tasks. Each check is one scheduled job: it
 * asks the driver for the task's status and either schedules the next
 * check with exponential backoff plus jitter, or hands a terminal answer
 * to the outcome handler, which owns the state transition.
 */

import { DEFAULT_POLLER_CONFIG, PollerConfig } from '../config';
import { AuditActor, SYSTEM_ACTOR } from '../domain/audit';
import { TypedError, pollBudgetExhaustedError, providerTaskFailedError } from '../domain/errors';
import { ResourceStatus } from '../domain/resource';
import { ProvisionTask, isTerminalTaskStatus } from '../domain/task';
import { ProviderTaskResult } from '../drivers/driver';
import { Logger, logger as rootLogger } from '../logger';
import { TaskScheduler } from '../scheduler/task-scheduler';
import { ResourceStore, TaskStore } from '../storage/store';
import { DriverGateway, classifyDriverFailure } from './driver-gateway';

export type FailureEvent = 'driver.failed' | 'driver.timeout';

/** Applies a terminal provider answer to a task and its resource. */
export interface TaskOutcomeHandler {
  /** Returns false when the task was already terminal. */
  completeTask(task: ProvisionTask, result: ProviderTaskResult, actor: AuditActor): Promise<boolean>;
  failTask(task: ProvisionTask, error: TypedError, event: FailureEvent, actor: AuditActor): Promise<boolean>;
}

export type PollOutcome = 'skipped' | 'rescheduled' | 'completed' | 'failed' | 'timed-out';

export interface TaskPollerDeps {
  resources: ResourceStore;
  tasks: TaskStore;
  gateway: DriverGateway;
  scheduler: TaskScheduler;
  outcomes: TaskOutcomeHandler;
  config?: Partial<PollerConfig>;
  /** Uniform [0, 1) source for jitter. Default: Math.random. */
  random?: () => number;
  logger?: Logger;
}

export class TaskPoller {
  private readonly config: PollerConfig;
  private readonly random: () => number;
  private readonly log: Logger;

  constructor(private readonly deps: TaskPollerDeps) {
    this.config = { ...DEFAULT_POLLER_CONFIG, ...deps.config };
    this.random = deps.random ?? Math.random;
    this.log = (deps.logger ?? rootLogger).child({ component: 'task-poller' });
  }

  /**
   * Delay before the check that follows `attempt` earlier checks:
   * min(maxDelayMs, baseDelayMs * 2^attempt), plus up to jitterRatio of it.
   */
  computeDelay(attempt: number): number {
    const exponential = Math.min(this.config.maxDelayMs, this.config.baseDelayMs * Math.pow(2, attempt));
    return Math.floor(exponential + this.random() * this.config.jitterRatio * exponential);
  }

  async schedulePoll(task: ProvisionTask, delayMs?: number): Promise<string> {
    const delay = delayMs ?? this.computeDelay(task.pollAttempts);
    this.log.forTask(task).debug('Poll scheduled', { delayMs: delay, pollAttempts: task.pollAttempts });
    return this.deps.scheduler.schedule({ kind: 'task.poll', taskId: task.id }, delay);
  }

  /** Run one status check. */
  async checkOnce(taskId: string): Promise<PollOutcome> {
    const { tasks, resources, outcomes } = this.deps;

    const task = await tasks.getById(taskId);
    if (!task || isTerminalTaskStatus(task.status)) {
      this.log.debug('Poll skipped; task missing or finished', { taskId });
      return 'skipped';
    }
    const providerTaskId = task.providerTaskId;
    if (!providerTaskId) {
      this.log.warn('Poll skipped; task has no provider task id yet', { taskId });
      return 'skipped';
    }

    const resource = await resources.getById(task.resourceId);
    if (!resource) {
      this.log.warn('Poll skipped; resource not found', { taskId, resourceId: task.resourceId });
      return 'skipped';
    }
    if (
      task.action !== 'deprovision' &&
      (resource.status === ResourceStatus.Deprovisioning || resource.status === ResourceStatus.Deprovisioned)
    ) {
      this.log.info('Poll skipped; resource is being deprovisioned', { taskId, resourceId: resource.id });
      return 'skipped';
    }

    if (task.pollAttempts >= this.config.maxPollAttempts) {
      await outcomes.failTask(task, pollBudgetExhaustedError(task.id, task.pollAttempts), 'driver.timeout', SYSTEM_ACTOR);
      return 'timed-out';
    }

    const polled = await tasks.recordPoll(task.id);
    if (!polled) return 'skipped';

    let result: ProviderTaskResult;
    try {
      result = await this.deps.gateway.call(resource, (ctx, entry) => entry.driver.poll(providerTaskId, ctx));
    } catch (err) {
      const failure = classifyDriverFailure(err);
      if (failure.kind === 'permanent') {
        await outcomes.failTask(polled, failure.error, 'driver.failed', SYSTEM_ACTOR);
        return 'failed';
      }
      await tasks.noteError(polled.id, failure.error);
      return this.retryLater(
        polled,
        failure.kind === 'circuit-open' ? failure.retryAfterMs : 0,
        failure.error.message,
      );
    }

    switch (result.status) {
      case 'completed':
        await outcomes.completeTask(polled, result, SYSTEM_ACTOR);
        return 'completed';
      case 'failed':
        await outcomes.failTask(polled, providerTaskFailedError(providerTaskId, result.message), 'driver.failed', SYSTEM_ACTOR);
        return 'failed';
      case 'pending':
        return this.retryLater(polled, 0, 'still pending');
    }
  }

  private async retryLater(task: ProvisionTask, minDelayMs: number, reason: string): Promise<PollOutcome> {
    if (task.pollAttempts >= this.config.maxPollAttempts) {
      await this.deps.outcomes.failTask(
        task,
        pollBudgetExhaustedError(task.id, task.pollAttempts),
        'driver.timeout',
        SYSTEM_ACTOR,
      );
      return 'timed-out';
    }
    const delay = Math.max(minDelayMs, this.computeDelay(task.pollAttempts));
    this.log.forTask(task).debug('Provider task not finished', { pollAttempts: task.pollAttempts, reason });
    await this.schedulePoll(task, delay);
    return 'rescheduled';
  }
}
