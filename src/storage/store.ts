/**
 * Storage layer interfaces.
 *
 * Persistence mechanics are pluggable; these contracts pin down the few
 * operations that must be atomic for the orchestrator's guarantees:
 * order-unique resource creation, single-flight task creation, task
 * claims, and the combined "status write + audit append" commit.
 */

import { AuditDraft, ProvisionAudit } from '../domain/audit';
import { Credential, CredentialScope } from '../domain/credential';
import { LifecycleEvent } from '../domain/events';
import { PlanMap, Resource, ResourceStatus } from '../domain/resource';
import { ProvisionTask, TaskAction, TaskStatus } from '../domain/task';

/** Generic list query options. */
export interface ListOptions {
  limit?: number;
  offset?: number;
}

/** Fields of a resource that change alongside a status transition. */
export type ResourcePatch = Partial<
  Pick<Resource, 'providerRef' | 'spec' | 'planCode' | 'lastSyncedAt' | 'lastError'>
>;

/** Fields that may change without a status transition. */
export type ResourceNote = Pick<ResourcePatch, 'lastSyncedAt' | 'lastError'>;

export interface CommittedTransition {
  resource: Resource;
  audit: ProvisionAudit;
}

export interface ResourceStore {
  /**
   * Insert unless a resource already exists for the order.
   * Returns the stored resource and whether this call created it.
   */
  createForOrder(resource: Resource): Promise<{ resource: Resource; created: boolean }>;
  getById(id: string): Promise<Resource | null>;
  getByOrderId(orderId: string): Promise<Resource | null>;
  listByUser(userId: string, options?: ListOptions): Promise<Resource[]>;
  /** Update fields that are not part of the lifecycle (sync time, last error). */
  touch(id: string, patch: ResourceNote): Promise<Resource | null>;
  /**
   * Atomically: check the resource is still in `expectedStatus`, write the
   * new status and patch, append the audit row. Returns null (and writes
   * nothing) when the status has moved on.
   */
  commitTransition(
    id: string,
    expectedStatus: ResourceStatus,
    newStatus: ResourceStatus,
    patch: ResourcePatch,
    audit: AuditDraft,
  ): Promise<CommittedTransition | null>;
}

/** Fields written when a task reaches a terminal status. */
export type TaskCompletion = Partial<Pick<ProvisionTask, 'lastError' | 'providerTaskId'>>;

export interface TaskStore {
  /**
   * Insert unless a non-terminal task exists for (resourceId, action).
   * Returns the live task and whether this call created it.
   */
  createIfNoneActive(task: ProvisionTask): Promise<{ task: ProvisionTask; created: boolean }>;
  getById(id: string): Promise<ProvisionTask | null>;
  findActive(resourceId: string, action: TaskAction): Promise<ProvisionTask | null>;
  /** Any non-terminal task on the resource, whatever its action. */
  findAnyActive(resourceId: string): Promise<ProvisionTask | null>;
  listByResource(resourceId: string): Promise<ProvisionTask[]>;
  findByProviderTaskId(providerTaskId: string): Promise<ProvisionTask[]>;
  /**
   * Claim the next dispatch attempt: succeeds only for a pending task
   * without a provider task id whose lease is absent or expired. Increments
   * `attempts` and sets the lease.
   */
  claimDispatch(id: string, nowMs: number, leaseMs: number): Promise<ProvisionTask | null>;
  /** Release the dispatch lease after a failed attempt. */
  releaseDispatch(id: string, lastError: ProvisionTask['lastError']): Promise<ProvisionTask | null>;
  /** Record the provider task id the dispatch produced and drop the lease. */
  markAccepted(id: string, providerTaskId: string): Promise<ProvisionTask | null>;
  /** Increment `pollAttempts` on a pending task. */
  recordPoll(id: string): Promise<ProvisionTask | null>;
  /** Update the last error on a pending task without finishing it. */
  noteError(id: string, lastError: ProvisionTask['lastError']): Promise<ProvisionTask | null>;
  /**
   * Move a pending task to a terminal status. Returns null when the task
   * was already terminal, so exactly one finisher wins.
   */
  finish(
    id: string,
    status: TaskStatus.Completed | TaskStatus.Failed,
    completion?: TaskCompletion,
  ): Promise<ProvisionTask | null>;
}

export interface PlanMapStore {
  create(planMap: PlanMap): Promise<PlanMap>;
  getByPlanId(planId: string): Promise<PlanMap | null>;
}

export interface CredentialStore {
  create(credential: Credential): Promise<Credential>;
  getById(id: string): Promise<Credential | null>;
  /** Most recent credential for the driver in exactly this scope. */
  findForDriver(driverId: string, scope: CredentialScope): Promise<Credential | null>;
}

/** Append-only by contract: no update or delete exists on this store. */
export interface AuditStore {
  append(draft: AuditDraft): Promise<ProvisionAudit>;
  listByResource(resourceId: string, options?: ListOptions): Promise<ProvisionAudit[]>;
  countByResource(resourceId: string): Promise<number>;
}

export interface EventStore {
  create(event: LifecycleEvent): Promise<LifecycleEvent>;
  listByResource(resourceId: string, options?: ListOptions): Promise<LifecycleEvent[]>;
}

/** Composite store interface. */
export interface Store {
  resources: ResourceStore;
  tasks: TaskStore;
  planMaps: PlanMapStore;
  credentials: CredentialStore;
  audit: AuditStore;
  events: EventStore;
}
