/**
 * Provisioning Orchestrator.
 *
 * Turns a paid order into a live resource and drives every later
 * lifecycle action. Public operations only validate, record the operator
 * transition and queue a job; all provider I/O happens in job handlers
 * (`handleJob`), so no caller ever waits on a provider.
 *
 * At-least-once delivery is made safe by four store guarantees: one
 * resource per order, one live task per (resource, action), a dispatch
 * lease per task, and a compare-and-set commit for every transition.
 */

import { v4 as uuid } from 'uuid';
import { OrchestratorConfig, mergeConfig } from '../config';
import { AuditLedger } from '../audit/audit-ledger';
import { AuditActor, ProvisionAudit, SYSTEM_ACTOR } from '../domain/audit';
import {
  OrchestratorError,
  TypedError,
  notFoundError,
  providerTaskFailedError,
  stateConflictError,
  taskInFlightError,
  taskSupersededError,
  typedErrorOf,
  validationError,
  webhookSignatureError,
} from '../domain/errors';
import { LifecycleEventType } from '../domain/events';
import { Order, PlanMap, Resource, ResourceSpec, ResourceStatus } from '../domain/resource';
import { ProvisionTask, TaskAction, TaskStatus, idempotencyKey, isTerminalTaskStatus } from '../domain/task';
import {
  CostReport,
  Driver,
  DriverCallContext,
  HealthReport,
  InventoryItem,
  InventoryKind,
  MetricsKind,
  ProviderTaskResult,
  WebhookCapability,
  WebhookDelivery,
} from '../drivers/driver';
import { DriverRegistry } from '../drivers/registry';
import { LifecycleEventPublisher } from '../events/publisher';
import { Logger, logger as rootLogger } from '../logger';
import { Clock } from '../scheduler/clock';
import { Job, JobMeta, JobQueue, isTaskJob } from '../scheduler/job';
import { TaskScheduler } from '../scheduler/task-scheduler';
import { ResourcePatch, Store } from '../storage/store';
import { CredentialVault } from '../vault/credential-vault';
import { CircuitBreakerRegistry, CircuitOpenError } from './circuit-breaker';
import { DriverGateway, classifyDriverFailure } from './driver-gateway';
import { ResourceEvent, driftPath, transition } from './state-machine';
import { FailureEvent, TaskOutcomeHandler, TaskPoller } from './task-poller';

export interface OrchestratorDeps {
  store: Store;
  registry: DriverRegistry;
  vault: CredentialVault;
  queue: JobQueue;
  config?: OrchestratorConfig;
  breakers?: CircuitBreakerRegistry;
  publisher?: LifecycleEventPublisher;
  /** Time source for leases and breakers. Default: Date.now. */
  clock?: Clock;
  /** Jitter source for backoff. Default: Math.random. */
  random?: () => number;
  logger?: Logger;
}

/** Changes a resize applies on top of the current spec. */
export type ResourceSpecChanges = Partial<Omit<ResourceSpec, 'extra'>> & { extra?: Record<string, unknown> };

export type WebhookOutcome =
  | { handled: true; taskId: string; status: 'completed' | 'failed' }
  | { handled: false; reason: 'unknown-task' | 'not-terminal' | 'already-terminal'; taskId?: string };

export interface ResourceView {
  resource: Resource;
  tasks: ProvisionTask[];
}

type OperatorAction = 'suspend' | 'resume' | 'resize';

/** Build what the provider is asked to create from the plan map and the order. */
export function buildResourceSpec(planMap: PlanMap, order: Order): ResourceSpec {
  const options: NonNullable<Order['options']> = order.options ?? {};
  const { hostname, image, ...overrides } = options;
  return {
    planCode: planMap.providerPlanCode,
    region: planMap.region,
    hostname,
    image,
    extra: { ...planMap.extraConfig, ...overrides },
  };
}

function validateOrder(order: Order): void {
  const missing = (['id', 'userId', 'planId'] as const).filter((field) => !order[field]);
  if (missing.length > 0) {
    throw new OrchestratorError(validationError(`Order is missing ${missing.join(', ')}`, { missing }));
  }
}

function isBeingDeprovisioned(status: ResourceStatus): boolean {
  return status === ResourceStatus.Deprovisioning || status === ResourceStatus.Deprovisioned;
}

export class ProvisioningOrchestrator implements TaskOutcomeHandler {
  readonly config: OrchestratorConfig;
  readonly breakers: CircuitBreakerRegistry;
  readonly publisher: LifecycleEventPublisher;
  readonly ledger: AuditLedger;
  readonly scheduler: TaskScheduler;
  readonly poller: TaskPoller;

  private readonly store: Store;
  private readonly registry: DriverRegistry;
  private readonly queue: JobQueue;
  private readonly gateway: DriverGateway;
  private readonly now: Clock;
  private readonly log: Logger;

  constructor(deps: OrchestratorDeps) {
    this.store = deps.store;
    this.registry = deps.registry;
    this.queue = deps.queue;
    this.config = deps.config ?? mergeConfig();
    this.now = deps.clock ?? Date.now;
    this.log = (deps.logger ?? rootLogger).child({ component: 'orchestrator' });

    this.breakers =
      deps.breakers ??
      new CircuitBreakerRegistry({ config: this.config.breaker, now: this.now, logger: deps.logger });
    this.publisher = deps.publisher ?? new LifecycleEventPublisher(deps.store.events, deps.logger);
    this.ledger = new AuditLedger(deps.store.audit, { hashProviderRefs: this.config.audit.hashProviderRefs });
    this.scheduler = new TaskScheduler(deps.queue, deps.store.tasks);
    this.gateway = new DriverGateway(deps.registry, this.breakers, deps.vault, this.log);
    this.poller = new TaskPoller({
      resources: deps.store.resources,
      tasks: deps.store.tasks,
      gateway: this.gateway,
      scheduler: this.scheduler,
      outcomes: this,
      config: this.config.poller,
      random: deps.random,
      logger: deps.logger,
    });
  }

  /** Install this orchestrator as the queue's worker. */
  startWorker(): void {
    this.queue.process((job, meta) => this.handleJob(job, meta));
  }

  // --- Entry points ---

  /** Queue a kick for an order; used by the PaymentCaptured listener. */
  async enqueueKick(order: Order): Promise<string> {
    validateOrder(order);
    return this.queue.enqueue({ kind: 'provision.kick', order });
  }

  /**
   * Create (or find) the resource for an order and queue its provisioning.
   * Calling it again for the same order returns the existing resource.
   */
  async kick(order: Order): Promise<Resource> {
    validateOrder(order);
    const { resources, planMaps } = this.store;

    const existing = await resources.getByOrderId(order.id);
    if (existing && existing.status !== ResourceStatus.Pending) {
      this.log.debug('Order already has a resource', { orderId: order.id, resourceId: existing.id });
      return existing;
    }

    const planMap = await planMaps.getByPlanId(order.planId);
    if (!planMap) {
      throw new OrchestratorError(notFoundError('PlanMap', order.planId));
    }
    this.registry.require(planMap.driverId);

    let resource: Resource;
    if (existing) {
      resource = existing;
    } else {
      const spec = buildResourceSpec(planMap, order);
      const now = new Date().toISOString();
      const outcome = await resources.createForOrder({
        id: `res_${uuid()}`,
        orderId: order.id,
        userId: order.userId,
        driverId: planMap.driverId,
        providerRef: null,
        planCode: spec.planCode,
        region: spec.region,
        status: ResourceStatus.Pending,
        spec,
        lineItemId: order.lineItemId,
        createdAt: now,
        updatedAt: now,
      });
      resource = outcome.resource;
      if (outcome.created) {
        this.log.forResource(resource).info('Resource created');
        await this.publisher.publishResourceEvent(resource, 'OrderPlaced', { planId: order.planId });
      }
      if (resource.status !== ResourceStatus.Pending) return resource;
    }

    const queued = await this.applyTransition(resource, { type: 'queue' }, SYSTEM_ACTOR, {}, { planId: order.planId });
    if (!queued) {
      return (await resources.getById(resource.id)) ?? resource;
    }
    await this.createTask(queued, 'provision', SYSTEM_ACTOR, { spec: queued.spec });
    return queued;
  }

  async suspend(resourceId: string, actor: AuditActor): Promise<ProvisionTask> {
    return this.operate(resourceId, 'suspend', { type: 'operator.suspend' }, actor);
  }

  async resume(resourceId: string, actor: AuditActor): Promise<ProvisionTask> {
    return this.operate(resourceId, 'resume', { type: 'operator.resume' }, actor);
  }

  async resize(resourceId: string, changes: ResourceSpecChanges, actor: AuditActor): Promise<ProvisionTask> {
    const resource = await this.requireResource(resourceId);
    const { extra, ...fields } = changes;
    if (Object.keys(fields).length === 0 && !extra) {
      throw new OrchestratorError(validationError('Resize needs at least one changed field'));
    }
    const spec: ResourceSpec = {
      ...resource.spec,
      ...fields,
      extra: { ...resource.spec.extra, ...extra },
    };
    return this.operate(resourceId, 'resize', { type: 'operator.resize' }, actor, { spec });
  }

  /**
   * Tear a resource down. From ACTIVE or FAILED this records the
   * DEPROVISIONING transition first; a DEPROVISIONING resource whose last
   * attempt failed is simply dispatched again.
   */
  async deprovision(resourceId: string, actor: AuditActor): Promise<ProvisionTask> {
    const resource = await this.requireResource(resourceId);

    const live = await this.store.tasks.findActive(resourceId, 'deprovision');
    if (live) return live;

    let current = resource;
    if (resource.status !== ResourceStatus.Deprovisioning) {
      const result = transition(resource, { type: 'operator.deprovision' }, actor);
      if (!result.success) {
        throw new OrchestratorError(this.conflict(resource, 'deprovision', result.error));
      }
      if (resource.providerRef) this.assertDriverAvailable(resource.driverId);
      const committed = await this.store.resources.commitTransition(
        resource.id,
        resource.status,
        result.newStatus,
        {},
        this.ledger.prepare(result.audit),
      );
      if (!committed) {
        const fresh = await this.requireResource(resourceId);
        // A concurrent deprovision won the commit; join its task.
        if (fresh.status === ResourceStatus.Deprovisioning) return this.deprovision(resourceId, actor);
        return this.lostCommit(resourceId, 'deprovision');
      }
      current = committed.resource;
      await this.supersedeLiveTasks(current);
    } else if (resource.providerRef) {
      this.assertDriverAvailable(resource.driverId);
    }

    if (!current.providerRef) {
      return this.deprovisionLocally(current, actor);
    }
    return this.createTask(current, 'deprovision', actor);
  }

  /** Queue a drift check against the provider's view of the resource. */
  async sync(resourceId: string, actor: AuditActor): Promise<ProvisionTask> {
    const resource = await this.requireResource(resourceId);
    this.registry.requireCapability(resource.driverId, 'metrics');

    if (resource.status !== ResourceStatus.Active && resource.status !== ResourceStatus.Suspended) {
      throw new OrchestratorError(stateConflictError(resource.id, resource.status, 'sync'));
    }
    // Another task in flight owns the resource; the check is a no-op.
    const live = await this.store.tasks.findAnyActive(resourceId);
    if (live) return live;
    this.assertDriverAvailable(resource.driverId);
    return this.createTask(resource, 'sync', actor);
  }

  /** Verify and apply a webhook in one call. */
  async handleWebhook(driverId: string, delivery: WebhookDelivery): Promise<WebhookOutcome> {
    await this.verifyWebhook(driverId, delivery);
    return this.applyWebhook(driverId, delivery);
  }

  /** Verify a webhook now and apply it as a job. Returns the job id. */
  async receiveWebhook(driverId: string, delivery: WebhookDelivery): Promise<string> {
    await this.verifyWebhook(driverId, delivery);
    return this.queue.enqueue({ kind: 'webhook.deliver', driverId, delivery });
  }

  // --- Reads and capability pass-throughs ---

  async getResource(resourceId: string): Promise<ResourceView> {
    const resource = await this.requireResource(resourceId);
    const tasks = await this.store.tasks.listByResource(resourceId);
    return { resource, tasks };
  }

  async getHistory(resourceId: string): Promise<ProvisionAudit[]> {
    await this.requireResource(resourceId);
    return this.ledger.history(resourceId);
  }

  async inventory(driverId: string, kind: InventoryKind): Promise<InventoryItem[] | Record<string, number>> {
    const inventory = this.registry.requireCapability(driverId, 'inventory');
    return this.gateway.call<InventoryItem[] | Record<string, number>>({ driverId }, (ctx) => inventory[kind](ctx));
  }

  async metrics(
    resourceId: string,
    kind: MetricsKind,
  ): Promise<Record<string, number> | HealthReport | CostReport> {
    const resource = await this.requireResource(resourceId);
    const metrics = this.registry.requireCapability(resource.driverId, 'metrics');
    return this.gateway.call<Record<string, number> | HealthReport | CostReport>(resource, (ctx) =>
      metrics[kind](resource, ctx),
    );
  }

  // --- Worker ---

  /** Queue worker entry point. Throwing asks the queue for a redelivery. */
  async handleJob(job: Job, meta: JobMeta): Promise<void> {
    if (isTaskJob(job)) this.scheduler.acknowledge(job.taskId, meta.jobId);

    try {
      switch (job.kind) {
        case 'provision.kick':
          await this.kick(job.order);
          return;
        case 'task.dispatch':
          await this.runDispatch(job.taskId);
          return;
        case 'task.poll':
          await this.poller.checkOnce(job.taskId);
          return;
        case 'webhook.deliver':
          await this.applyWebhook(job.driverId, job.delivery);
          return;
      }
    } catch (err) {
      const typed = typedErrorOf(err);
      if (typed && !typed.retryable) {
        this.log.error('Job failed permanently', { jobId: meta.jobId, kind: job.kind, code: typed.code, error: typed.message });
        return;
      }
      throw err;
    }
  }

  /** Make the next provider call for a task. Duplicate deliveries are no-ops. */
  async runDispatch(taskId: string): Promise<void> {
    const { tasks, resources } = this.store;

    const task = await tasks.getById(taskId);
    if (!task || isTerminalTaskStatus(task.status) || task.providerTaskId) {
      this.log.debug('Dispatch skipped; task finished or already accepted', { taskId });
      return;
    }

    const resource = await resources.getById(task.resourceId);
    if (!resource) {
      await tasks.finish(task.id, TaskStatus.Failed, { lastError: notFoundError('Resource', task.resourceId) });
      return;
    }
    if (task.action !== 'deprovision' && isBeingDeprovisioned(resource.status)) {
      await tasks.finish(task.id, TaskStatus.Failed, { lastError: taskSupersededError(task.id, resource.id) });
      return;
    }

    const claimed = await tasks.claimDispatch(task.id, this.now(), this.config.poller.leaseMs);
    if (!claimed) {
      this.log.debug('Dispatch skipped; another delivery holds the claim', { taskId });
      return;
    }

    if (claimed.action === 'sync') {
      await this.runSync(claimed, resource);
      return;
    }

    const key = idempotencyKey(resource.orderId, claimed.attempts, claimed.action === 'provision' ? undefined : claimed.id);
    this.log.forTask(claimed).info('Dispatching task', { attempt: claimed.attempts });

    let providerTaskId: string | null;
    try {
      providerTaskId = await this.gateway.call(resource, (ctx, entry) =>
        this.invokeDriver(entry.driver, claimed, resource, key, ctx),
      );
    } catch (err) {
      await this.handleDispatchError(claimed, err);
      return;
    }

    if (providerTaskId === null) {
      await this.completeTask(claimed, { status: 'completed' }, SYSTEM_ACTOR);
      return;
    }

    const accepted = await tasks.markAccepted(claimed.id, providerTaskId);
    if (!accepted) {
      this.log.warn('Task finished while its dispatch was in flight', { taskId });
      return;
    }
    if (accepted.action === 'provision') {
      await this.applyTransition(
        resource,
        { type: 'provision.accepted', providerRef: providerTaskId },
        SYSTEM_ACTOR,
        { providerRef: providerTaskId },
        { attempt: accepted.attempts },
      );
    }
    await this.poller.schedulePoll(accepted, this.poller.computeDelay(0));
  }

  // --- Task outcomes (shared by dispatch, poller and webhooks) ---

  async completeTask(task: ProvisionTask, result: ProviderTaskResult, actor: AuditActor): Promise<boolean> {
    const finished = await this.store.tasks.finish(task.id, TaskStatus.Completed);
    if (!finished) return false;
    await this.scheduler.cancel(task.id);

    const resource = await this.store.resources.getById(task.resourceId);
    if (!resource) return true;
    this.log.forTask(task).info('Task completed');

    const succeeded: ResourceEvent = {
      type: 'driver.succeeded',
      details: result.providerResourceId
        ? { action: task.action, providerResourceId: result.providerResourceId }
        : { action: task.action },
    };

    switch (task.action) {
      case 'provision': {
        const patch = result.providerResourceId ? { providerRef: result.providerResourceId } : {};
        const active = await this.applyTransition(resource, succeeded, actor, patch);
        if (active) await this.publish(active, 'ResourceProvisioned');
        break;
      }
      case 'resize': {
        const spec = task.payload?.spec;
        const patch = spec ? { spec, planCode: spec.planCode } : {};
        await this.applyTransition(resource, succeeded, actor, patch);
        break;
      }
      case 'resume':
        await this.applyTransition(resource, succeeded, actor);
        break;
      case 'deprovision': {
        const gone = await this.applyTransition(resource, succeeded, actor);
        if (gone) await this.publish(gone, 'ResourceDeprovisioned');
        break;
      }
      case 'suspend':
        // The SUSPENDED transition was recorded when the operator asked.
        if (resource.status === ResourceStatus.Suspended) await this.publish(resource, 'ResourceSuspended');
        break;
      case 'sync':
        break;
    }
    return true;
  }

  async failTask(task: ProvisionTask, error: TypedError, event: FailureEvent, actor: AuditActor): Promise<boolean> {
    const finished = await this.store.tasks.finish(task.id, TaskStatus.Failed, { lastError: error });
    if (!finished) return false;
    await this.scheduler.cancel(task.id);

    this.log.forTask(task).warn('Task failed', { code: error.code, error: error.message });
    const resource = await this.store.resources.getById(task.resourceId);
    if (!resource) return true;

    switch (task.action) {
      case 'sync':
        break;
      case 'deprovision':
        // Stays DEPROVISIONING; a later deprovision call dispatches again.
        await this.store.resources.touch(resource.id, { lastError: error.message });
        break;
      default: {
        const failed = await this.applyTransition(
          resource,
          event === 'driver.timeout'
            ? { type: 'driver.timeout', reason: error.message }
            : { type: 'driver.failed', reason: error.message, code: error.code },
          actor,
          { lastError: error.message },
          { action: task.action },
        );
        if (failed) await this.publish(failed, 'ResourceFailed', { action: task.action, code: error.code });
      }
    }
    return true;
  }

  // --- Internals ---

  private async operate(
    resourceId: string,
    action: OperatorAction,
    event: ResourceEvent,
    actor: AuditActor,
    payload?: ProvisionTask['payload'],
  ): Promise<ProvisionTask> {
    const resource = await this.requireResource(resourceId);

    const live = await this.liveLifecycleTask(resourceId);
    if (live) return this.sameActionOrConflict(live, resourceId, action);

    const result = transition(resource, event, actor);
    if (!result.success) {
      throw new OrchestratorError(this.conflict(resource, action, result.error));
    }
    this.assertDriverAvailable(resource.driverId);

    const committed = await this.store.resources.commitTransition(
      resource.id,
      resource.status,
      result.newStatus,
      {},
      this.ledger.prepare(result.audit),
    );
    if (!committed) return this.lostCommit(resourceId, action);
    return this.createTask(committed.resource, action, actor, payload);
  }

  /**
   * The non-terminal task that owns the resource's provider state. A queued
   * sync does not count: it steps aside once a lifecycle task exists.
   */
  private async liveLifecycleTask(resourceId: string): Promise<ProvisionTask | null> {
    const tasks = await this.store.tasks.listByResource(resourceId);
    return tasks.find((t) => t.action !== 'sync' && !isTerminalTaskStatus(t.status)) ?? null;
  }

  /** A live task for the same action is the answer; any other blocks the request. */
  private sameActionOrConflict(live: ProvisionTask, resourceId: string, action: TaskAction): ProvisionTask {
    if (live.action === action) return live;
    throw new OrchestratorError(taskInFlightError(resourceId, live, action));
  }

  /**
   * Another request moved the resource first. When it was the same request,
   * its task is returned; otherwise the conflict names the current status.
   */
  private async lostCommit(resourceId: string, action: TaskAction): Promise<ProvisionTask> {
    const live = await this.liveLifecycleTask(resourceId);
    if (live) return this.sameActionOrConflict(live, resourceId, action);
    const fresh = await this.requireResource(resourceId);
    throw new OrchestratorError(stateConflictError(fresh.id, fresh.status, action));
  }

  private async createTask(
    resource: Resource,
    action: TaskAction,
    actor: AuditActor,
    payload?: ProvisionTask['payload'],
  ): Promise<ProvisionTask> {
    const now = new Date().toISOString();
    const { task, created } = await this.store.tasks.createIfNoneActive({
      id: `task_${uuid()}`,
      resourceId: resource.id,
      action,
      status: TaskStatus.Pending,
      providerTaskId: null,
      attempts: 0,
      pollAttempts: 0,
      requestedBy: actor,
      payload,
      createdAt: now,
      updatedAt: now,
    });
    if (created) {
      this.log.forTask(task).info('Task created');
      await this.scheduler.schedule({ kind: 'task.dispatch', taskId: task.id }, 0);
    }
    return task;
  }

  private async invokeDriver(
    driver: Driver,
    task: ProvisionTask,
    resource: Resource,
    key: string,
    ctx: DriverCallContext,
  ): Promise<string | null> {
    switch (task.action) {
      case 'provision':
        return driver.provision(task.payload?.spec ?? resource.spec, key, ctx);
      case 'deprovision':
        return driver.deprovision(resource, key, ctx);
      case 'suspend':
        return driver.suspend(resource, key, ctx);
      case 'resume':
        return driver.resume(resource, key, ctx);
      case 'resize':
        return driver.resize(resource, task.payload?.spec ?? resource.spec, key, ctx);
      case 'sync':
        throw new OrchestratorError(validationError('Sync tasks are not dispatched as lifecycle calls'));
    }
  }

  private async handleDispatchError(task: ProvisionTask, err: unknown): Promise<void> {
    const failure = classifyDriverFailure(err);
    const maxAttempts = this.config.poller.maxDispatchAttempts;

    if (failure.kind !== 'permanent' && task.attempts < maxAttempts) {
      await this.store.tasks.releaseDispatch(task.id, failure.error);
      const minDelay = failure.kind === 'circuit-open' ? failure.retryAfterMs : 0;
      const delayMs = Math.max(minDelay, this.poller.computeDelay(task.attempts - 1));
      this.log.forTask(task).warn('Dispatch failed; retrying', {
        attempt: task.attempts,
        code: failure.error.code,
        error: failure.error.message,
        delayMs,
      });
      await this.scheduler.schedule({ kind: 'task.dispatch', taskId: task.id }, delayMs);
      return;
    }

    const error: TypedError =
      failure.kind === 'permanent'
        ? failure.error
        : {
            ...failure.error,
            retryable: false,
            details: { ...failure.error.details, attempts: task.attempts, maxAttempts },
          };
    await this.failTask(task, error, 'driver.failed', SYSTEM_ACTOR);
  }

  private async runSync(task: ProvisionTask, resource: Resource): Promise<void> {
    if (await this.syncPreempted(task)) return;

    let report: HealthReport;
    try {
      const metrics = this.registry.requireCapability(resource.driverId, 'metrics');
      report = await this.gateway.call(resource, (ctx) => metrics.health(resource, ctx));
    } catch (err) {
      await this.handleDispatchError(task, err);
      return;
    }

    if (await this.syncPreempted(task)) return;

    const actor = task.requestedBy ?? SYSTEM_ACTOR;
    let current = resource;
    for (const observed of driftPath(resource.status, report.state)) {
      const next = await this.applyTransition(current, { type: 'sync.drift', observed, providerState: report.state }, actor);
      if (!next) break;
      current = next;
      if (observed === ResourceStatus.Suspended) await this.publish(current, 'ResourceSuspended', { drift: true });
      if (observed === ResourceStatus.Failed) await this.publish(current, 'ResourceFailed', { drift: true });
    }

    await this.store.resources.touch(
      resource.id,
      report.state === 'missing'
        ? { lastSyncedAt: new Date().toISOString(), lastError: 'Provider no longer reports this resource' }
        : { lastSyncedAt: new Date().toISOString() },
    );
    await this.store.tasks.finish(task.id, TaskStatus.Completed);
    this.log.forResource(resource).info('Resource synced', { providerState: report.state, status: current.status });
  }

  /**
   * A lifecycle task started on the resource after this sync was queued.
   * Its outcome decides the status, so the sync finishes without applying drift.
   */
  private async syncPreempted(task: ProvisionTask): Promise<boolean> {
    const tasks = await this.store.tasks.listByResource(task.resourceId);
    const other = tasks.find((t) => t.id !== task.id && !isTerminalTaskStatus(t.status));
    if (!other) return false;
    await this.store.tasks.finish(task.id, TaskStatus.Completed);
    this.log.forTask(task).info('Sync skipped; another task is in flight', { otherTaskId: other.id, otherAction: other.action });
    return true;
  }

  private async deprovisionLocally(resource: Resource, actor: AuditActor): Promise<ProvisionTask> {
    const now = new Date().toISOString();
    const { task } = await this.store.tasks.createIfNoneActive({
      id: `task_${uuid()}`,
      resourceId: resource.id,
      action: 'deprovision',
      status: TaskStatus.Pending,
      providerTaskId: null,
      attempts: 0,
      pollAttempts: 0,
      requestedBy: actor,
      createdAt: now,
      updatedAt: now,
    });
    const finished = await this.store.tasks.finish(task.id, TaskStatus.Completed);
    const gone = await this.applyTransition(
      resource,
      { type: 'driver.succeeded', details: { local: true } },
      actor,
    );
    if (gone) await this.publish(gone, 'ResourceDeprovisioned');
    this.log.forResource(resource).info('Resource had nothing at the provider; deprovisioned locally');
    return finished ?? task;
  }

  /** Cancel and fail every other live task once a resource is being torn down. */
  private async supersedeLiveTasks(resource: Resource): Promise<void> {
    const tasks = await this.store.tasks.listByResource(resource.id);
    for (const task of tasks) {
      if (task.action === 'deprovision' || isTerminalTaskStatus(task.status)) continue;
      await this.scheduler.cancel(task.id);
      const superseded = await this.store.tasks.finish(task.id, TaskStatus.Failed, {
        lastError: taskSupersededError(task.id, resource.id),
      });
      if (superseded) {
        this.log.forTask(task).info('Task superseded by deprovisioning');
      }
    }
  }

  private async verifyWebhook(driverId: string, delivery: WebhookDelivery): Promise<WebhookCapability> {
    const webhooks = this.registry.requireCapability(driverId, 'webhooks');
    const valid = await this.gateway.withContext({ driverId }, async (ctx) => webhooks.verifySignature(delivery, ctx));
    if (!valid) {
      this.log.warn('Webhook rejected', { driverId });
      throw new OrchestratorError(webhookSignatureError(driverId));
    }
    return webhooks;
  }

  private async applyWebhook(driverId: string, delivery: WebhookDelivery): Promise<WebhookOutcome> {
    const webhooks = this.registry.requireCapability(driverId, 'webhooks');
    const normalized = await this.gateway.withContext({ driverId }, (ctx) => webhooks.handleWebhook(delivery, ctx));

    let task: ProvisionTask | undefined;
    for (const candidate of await this.store.tasks.findByProviderTaskId(normalized.providerTaskId)) {
      const resource = await this.store.resources.getById(candidate.resourceId);
      if (resource?.driverId === driverId) {
        task = candidate;
        if (!isTerminalTaskStatus(candidate.status)) break;
      }
    }

    if (!task) {
      this.log.info('Webhook for an unknown provider task', { driverId });
      return { handled: false, reason: 'unknown-task' };
    }
    if (isTerminalTaskStatus(task.status)) {
      return { handled: false, reason: 'already-terminal', taskId: task.id };
    }
    if (normalized.status === 'pending') {
      return { handled: false, reason: 'not-terminal', taskId: task.id };
    }

    const applied =
      normalized.status === 'completed'
        ? await this.completeTask(task, normalized, SYSTEM_ACTOR)
        : await this.failTask(
            task,
            providerTaskFailedError(normalized.providerTaskId, normalized.message),
            'driver.failed',
            SYSTEM_ACTOR,
          );
    return applied
      ? { handled: true, taskId: task.id, status: normalized.status }
      : { handled: false, reason: 'already-terminal', taskId: task.id };
  }

  /**
   * Validate an event and commit it with its audit row. Returns the
   * updated resource, or null when the edge is illegal or another writer
   * moved the resource first.
   */
  private async applyTransition(
    resource: Resource,
    event: ResourceEvent,
    actor: AuditActor,
    patch: ResourcePatch = {},
    metadata: Record<string, unknown> = {},
  ): Promise<Resource | null> {
    const result = transition(resource, event, actor, metadata);
    if (!result.success) {
      this.log.warn('Transition rejected', { resourceId: resource.id, event: event.type, code: result.error.code });
      return null;
    }
    const committed = await this.store.resources.commitTransition(
      resource.id,
      resource.status,
      result.newStatus,
      patch,
      this.ledger.prepare(result.audit),
    );
    if (!committed) {
      this.log.debug('Transition lost to a concurrent writer', { resourceId: resource.id, event: event.type });
      return null;
    }
    this.log.forResource(resource).info('Resource transitioned', {
      from: resource.status,
      to: committed.resource.status,
      event: event.type,
    });
    return committed.resource;
  }

  private async publish(
    resource: Resource,
    type: LifecycleEventType,
    extra: Record<string, unknown> = {},
  ): Promise<void> {
    await this.publisher.publishResourceEvent(resource, type, extra);
  }

  private async requireResource(resourceId: string): Promise<Resource> {
    const resource = await this.store.resources.getById(resourceId);
    if (!resource) {
      throw new OrchestratorError(notFoundError('Resource', resourceId));
    }
    return resource;
  }

  private assertDriverAvailable(driverId: string): void {
    this.registry.require(driverId);
    const breaker = this.breakers.get(driverId);
    if (!breaker.isCallPermitted()) {
      throw new CircuitOpenError(driverId, breaker.retryAfterMs());
    }
  }

  private conflict(resource: Resource, action: string, cause: TypedError): TypedError {
    const base = stateConflictError(resource.id, resource.status, action);
    return { ...base, details: { ...base.details, validTargets: cause.details?.validTargets } };
  }
}
