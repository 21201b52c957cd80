/**
 * In-memory storage implementation.
 *
 * Reference implementation for development and tests. Each atomic
 * operation in the Store contract runs without an await between its check
 * and its write, which makes it atomic on the single-threaded event loop.
 * Values cross the store boundary as deep copies so callers can never
 * mutate stored state by reference.
 */

import { v4 as uuid } from 'uuid';
import { AuditDraft, ProvisionAudit } from '../domain/audit';
import { Credential, CredentialScope } from '../domain/credential';
import { LifecycleEvent } from '../domain/events';
import { PlanMap, Resource, ResourceStatus } from '../domain/resource';
import { ProvisionTask, TaskAction, TaskStatus, isTerminalTaskStatus } from '../domain/task';
import {
  AuditStore,
  CommittedTransition,
  CredentialStore,
  EventStore,
  ListOptions,
  PlanMapStore,
  ResourceNote,
  ResourcePatch,
  ResourceStore,
  Store,
  TaskCompletion,
  TaskStore,
} from './store';

function applyListOptions<T>(items: T[], options?: ListOptions): T[] {
  const offset = options?.offset ?? 0;
  const limit = options?.limit ?? 100;
  return items.slice(offset, offset + limit);
}

function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

function deepFreeze<T>(obj: T): T {
  if (obj !== null && typeof obj === 'object' && !Object.isFrozen(obj)) {
    Object.freeze(obj);
    for (const value of Object.values(obj)) {
      deepFreeze(value);
    }
  }
  return obj;
}

function nowIso(): string {
  return new Date().toISOString();
}

class MemoryAuditStore implements AuditStore {
  private byResource = new Map<string, ProvisionAudit[]>();

  /** Synchronous append, shared with the resource store's commit. */
  appendNow(draft: AuditDraft): ProvisionAudit {
    const rows = this.byResource.get(draft.resourceId) ?? [];
    const record: ProvisionAudit = deepFreeze({
      id: `aud_${uuid()}`,
      resourceId: draft.resourceId,
      sequence: rows.length + 1,
      actor: draft.actor,
      action: draft.action,
      statusBefore: draft.statusBefore,
      statusAfter: draft.statusAfter,
      metadata: deepCopy(draft.metadata),
      timestamp: nowIso(),
    });
    rows.push(record);
    this.byResource.set(draft.resourceId, rows);
    return record;
  }

  async append(draft: AuditDraft): Promise<ProvisionAudit> {
    return this.appendNow(draft);
  }

  // Rows are frozen, so they are handed out as-is rather than copied.
  async listByResource(resourceId: string, options?: ListOptions): Promise<ProvisionAudit[]> {
    return applyListOptions(this.byResource.get(resourceId) ?? [], options);
  }

  async countByResource(resourceId: string): Promise<number> {
    return this.byResource.get(resourceId)?.length ?? 0;
  }
}

class MemoryResourceStore implements ResourceStore {
  private data = new Map<string, Resource>();
  private orderIndex = new Map<string, string>();

  constructor(private audit: MemoryAuditStore) {}

  async createForOrder(resource: Resource): Promise<{ resource: Resource; created: boolean }> {
    const existingId = this.orderIndex.get(resource.orderId);
    const existing = existingId ? this.data.get(existingId) : undefined;
    if (existing) {
      return { resource: deepCopy(existing), created: false };
    }
    this.data.set(resource.id, deepCopy(resource));
    this.orderIndex.set(resource.orderId, resource.id);
    return { resource: deepCopy(resource), created: true };
  }

  async getById(id: string): Promise<Resource | null> {
    const resource = this.data.get(id);
    return resource ? deepCopy(resource) : null;
  }

  async getByOrderId(orderId: string): Promise<Resource | null> {
    const id = this.orderIndex.get(orderId);
    return id ? this.getById(id) : null;
  }

  async listByUser(userId: string, options?: ListOptions): Promise<Resource[]> {
    const items = [...this.data.values()].filter((r) => r.userId === userId);
    return applyListOptions(items.map(deepCopy), options);
  }

  async touch(id: string, patch: ResourceNote): Promise<Resource | null> {
    const existing = this.data.get(id);
    if (!existing) return null;
    const updated: Resource = { ...existing, ...deepCopy(patch), updatedAt: nowIso() };
    this.data.set(id, updated);
    return deepCopy(updated);
  }

  async commitTransition(
    id: string,
    expectedStatus: ResourceStatus,
    newStatus: ResourceStatus,
    patch: ResourcePatch,
    audit: AuditDraft,
  ): Promise<CommittedTransition | null> {
    const existing = this.data.get(id);
    if (!existing || existing.status !== expectedStatus) return null;

    const updated: Resource = {
      ...existing,
      ...deepCopy(patch),
      status: newStatus,
      updatedAt: nowIso(),
    };
    this.data.set(id, updated);
    const record = this.audit.appendNow(audit);
    return { resource: deepCopy(updated), audit: record };
  }
}

class MemoryTaskStore implements TaskStore {
  private data = new Map<string, ProvisionTask>();

  async createIfNoneActive(task: ProvisionTask): Promise<{ task: ProvisionTask; created: boolean }> {
    const active = this.liveTask(task.resourceId, task.action);
    if (active) {
      return { task: deepCopy(active), created: false };
    }
    this.data.set(task.id, deepCopy(task));
    return { task: deepCopy(task), created: true };
  }

  async getById(id: string): Promise<ProvisionTask | null> {
    const task = this.data.get(id);
    return task ? deepCopy(task) : null;
  }

  async findActive(resourceId: string, action: TaskAction): Promise<ProvisionTask | null> {
    const task = this.liveTask(resourceId, action);
    return task ? deepCopy(task) : null;
  }

  async findAnyActive(resourceId: string): Promise<ProvisionTask | null> {
    for (const task of this.data.values()) {
      if (task.resourceId === resourceId && !isTerminalTaskStatus(task.status)) return deepCopy(task);
    }
    return null;
  }

  async listByResource(resourceId: string): Promise<ProvisionTask[]> {
    return [...this.data.values()]
      .filter((t) => t.resourceId === resourceId)
      .map(deepCopy);
  }

  async findByProviderTaskId(providerTaskId: string): Promise<ProvisionTask[]> {
    return [...this.data.values()]
      .filter((t) => t.providerTaskId === providerTaskId)
      .map(deepCopy);
  }

  async claimDispatch(id: string, nowMs: number, leaseMs: number): Promise<ProvisionTask | null> {
    const task = this.data.get(id);
    if (!task || task.status !== TaskStatus.Pending || task.providerTaskId !== null) return null;
    if (task.leaseExpiresAt && new Date(task.leaseExpiresAt).getTime() > nowMs) return null;
    return this.write({
      ...task,
      attempts: task.attempts + 1,
      leaseExpiresAt: new Date(nowMs + leaseMs).toISOString(),
    });
  }

  async releaseDispatch(id: string, lastError: ProvisionTask['lastError']): Promise<ProvisionTask | null> {
    const task = this.pending(id);
    if (!task) return null;
    return this.write({ ...task, leaseExpiresAt: undefined, lastError: deepCopy(lastError) });
  }

  async markAccepted(id: string, providerTaskId: string): Promise<ProvisionTask | null> {
    const task = this.pending(id);
    if (!task) return null;
    return this.write({ ...task, providerTaskId, leaseExpiresAt: undefined });
  }

  async recordPoll(id: string): Promise<ProvisionTask | null> {
    const task = this.pending(id);
    if (!task) return null;
    return this.write({ ...task, pollAttempts: task.pollAttempts + 1 });
  }

  async noteError(id: string, lastError: ProvisionTask['lastError']): Promise<ProvisionTask | null> {
    const task = this.pending(id);
    if (!task) return null;
    return this.write({ ...task, lastError: deepCopy(lastError) });
  }

  async finish(
    id: string,
    status: TaskStatus.Completed | TaskStatus.Failed,
    completion: TaskCompletion = {},
  ): Promise<ProvisionTask | null> {
    const task = this.pending(id);
    if (!task) return null;
    const now = nowIso();
    return this.write({
      ...task,
      ...deepCopy(completion),
      status,
      leaseExpiresAt: undefined,
      completedAt: now,
    });
  }

  private liveTask(resourceId: string, action: TaskAction): ProvisionTask | undefined {
    for (const task of this.data.values()) {
      if (task.resourceId === resourceId && task.action === action && !isTerminalTaskStatus(task.status)) {
        return task;
      }
    }
    return undefined;
  }

  private pending(id: string): ProvisionTask | undefined {
    const task = this.data.get(id);
    return task && task.status === TaskStatus.Pending ? task : undefined;
  }

  private write(task: ProvisionTask): ProvisionTask {
    const updated = { ...task, updatedAt: nowIso() };
    this.data.set(task.id, updated);
    return deepCopy(updated);
  }
}

class MemoryPlanMapStore implements PlanMapStore {
  private byPlanId = new Map<string, PlanMap>();

  async create(planMap: PlanMap): Promise<PlanMap> {
    this.byPlanId.set(planMap.planId, deepCopy(planMap));
    return deepCopy(planMap);
  }

  async getByPlanId(planId: string): Promise<PlanMap | null> {
    const planMap = this.byPlanId.get(planId);
    return planMap ? deepCopy(planMap) : null;
  }
}

function sameScope(a: CredentialScope, b: CredentialScope): boolean {
  if (a.kind === 'system' || b.kind === 'system') return a.kind === b.kind;
  return a.userId === b.userId;
}

class MemoryCredentialStore implements CredentialStore {
  private data: Credential[] = [];

  async create(credential: Credential): Promise<Credential> {
    this.data.push(deepCopy(credential));
    return deepCopy(credential);
  }

  async getById(id: string): Promise<Credential | null> {
    const credential = this.data.find((c) => c.id === id);
    return credential ? deepCopy(credential) : null;
  }

  async findForDriver(driverId: string, scope: CredentialScope): Promise<Credential | null> {
    for (let i = this.data.length - 1; i >= 0; i--) {
      const credential = this.data[i];
      if (credential.driverId === driverId && sameScope(credential.scope, scope)) {
        return deepCopy(credential);
      }
    }
    return null;
  }
}

class MemoryEventStore implements EventStore {
  private data: LifecycleEvent[] = [];
  private resourceIndex = new Map<string, number[]>();

  async create(event: LifecycleEvent): Promise<LifecycleEvent> {
    const idx = this.data.length;
    this.data.push(deepCopy(event));
    const indices = this.resourceIndex.get(event.resourceId) ?? [];
    indices.push(idx);
    this.resourceIndex.set(event.resourceId, indices);
    return deepCopy(event);
  }

  async listByResource(resourceId: string, options?: ListOptions): Promise<LifecycleEvent[]> {
    const indices = this.resourceIndex.get(resourceId) ?? [];
    return applyListOptions(indices.map((i) => deepCopy(this.data[i])), options);
  }
}

/** Create a new in-memory store instance. */
export function createMemoryStore(): Store {
  const audit = new MemoryAuditStore();
  return {
    resources: new MemoryResourceStore(audit),
    tasks: new MemoryTaskStore(),
    planMaps: new MemoryPlanMapStore(),
    credentials: new MemoryCredentialStore(),
    audit,
    events: new MemoryEventStore(),
  };
}
