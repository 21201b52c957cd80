/**
 * ProvisionTask domain model.
 *
 * One unit of provider work for a resource. A resource has at most one
 * live task per action; the task's persisted counters drive idempotency
 * keys and retry budgets, so they survive worker restarts.
 */

import { AuditActor } from './audit';
import { TypedError } from './errors';
import { ResourceSpec } from './resource';

/** Provider-facing actions a task can carry. */
export type TaskAction = 'provision' | 'deprovision' | 'suspend' | 'resume' | 'resize' | 'sync';

export enum TaskStatus {
  Pending = 'pending',
  Completed = 'completed',
  Failed = 'failed',
}

export interface ProvisionTask {
  id: string;
  resourceId: string;
  action: TaskAction;
  status: TaskStatus;
  /** Provider-assigned task id; null until the driver call returns one. */
  providerTaskId: string | null;
  /** Dispatch attempts made so far; `n` in `{orderId}:attempt_{n}`. */
  attempts: number;
  /** Status checks made so far. */
  pollAttempts: number;
  lastError?: TypedError;
  /** While set and in the future, a worker holds the dispatch claim. */
  leaseExpiresAt?: string;
  /** Who asked for the work; audit rows written on its behalf carry this actor. */
  requestedBy?: AuditActor;
  /** Action input, e.g. the target spec of a resize. */
  payload?: { spec?: ResourceSpec };
  createdAt: string;
  updatedAt: string;
  completedAt?: string;
}

export function isTerminalTaskStatus(status: TaskStatus): boolean {
  return status === TaskStatus.Completed || status === TaskStatus.Failed;
}

/**
 * Idempotency key for the n-th dispatch attempt. Provisioning keys on the
 * order alone; later actions add the task id so that, say, a suspend never
 * reuses the key of the provision call.
 */
export function idempotencyKey(orderId: string, attempt: number, taskId?: string): string {
  const base = taskId ? `${orderId}/${taskId}` : orderId;
  return `${base}:attempt_${attempt}`;
}
