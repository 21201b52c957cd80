/**
 * Resource state machine.
 *
 * The single authority on legal lifecycle moves. `transition()` is pure:
 * it maps (current status, event) to the next status plus the audit
 * payload that must be written with it, or rejects the event with a
 * typed contract-violation error. Callers apply nothing on rejection.
 */

import { AuditActor, AuditDraft } from '../domain/audit';
import { TypedError, invalidTransitionError } from '../domain/errors';
import { Resource, ResourceStatus, VALID_RESOURCE_TRANSITIONS } from '../domain/resource';
import { ProviderHealthState } from '../drivers/driver';

/** Events that may move a resource. */
export type ResourceEvent =
  | { type: 'queue' }
  | { type: 'provision.accepted'; providerRef: string }
  | { type: 'driver.succeeded'; details?: Record<string, unknown> }
  | { type: 'driver.failed'; reason: string; code?: string }
  | { type: 'driver.timeout'; reason: string }
  | { type: 'operator.suspend' }
  | { type: 'operator.resume' }
  | { type: 'operator.resize' }
  | { type: 'operator.deprovision' }
  | { type: 'sync.drift'; observed: ResourceStatus; providerState: string };

export type ResourceEventType = ResourceEvent['type'];

/** Result of a state transition attempt. */
export type TransitionResult =
  | { success: true; newStatus: ResourceStatus; audit: AuditDraft }
  | { success: false; error: TypedError };

const SUCCESS_TARGETS: Partial<Record<ResourceStatus, ResourceStatus>> = {
  [ResourceStatus.Provisioning]: ResourceStatus.Active,
  [ResourceStatus.Resuming]: ResourceStatus.Active,
  [ResourceStatus.Updating]: ResourceStatus.Active,
  [ResourceStatus.Deprovisioning]: ResourceStatus.Deprovisioned,
};

/** The status an event aims for from `current`, before table validation. */
function targetOf(current: ResourceStatus, event: ResourceEvent): ResourceStatus | undefined {
  switch (event.type) {
    case 'queue':
      return ResourceStatus.Queued;
    case 'provision.accepted':
      return ResourceStatus.Provisioning;
    case 'driver.succeeded':
      return SUCCESS_TARGETS[current];
    case 'driver.failed':
    case 'driver.timeout':
      return ResourceStatus.Failed;
    case 'operator.suspend':
      return ResourceStatus.Suspended;
    case 'operator.resume':
      return ResourceStatus.Resuming;
    case 'operator.resize':
      return ResourceStatus.Updating;
    case 'operator.deprovision':
      return ResourceStatus.Deprovisioning;
    case 'sync.drift':
      return event.observed;
  }
}

/** Event fields worth keeping in the audit row. */
function eventMetadata(event: ResourceEvent): Record<string, unknown> {
  switch (event.type) {
    case 'provision.accepted':
      return { providerRef: event.providerRef };
    case 'driver.succeeded':
      return event.details ? { ...event.details } : {};
    case 'driver.failed':
      return event.code ? { reason: event.reason, code: event.code } : { reason: event.reason };
    case 'driver.timeout':
      return { reason: event.reason };
    case 'sync.drift':
      return { providerState: event.providerState };
    default:
      return {};
  }
}

/** Whether `from -> to` is in the transition table. */
export function isLegalTransition(from: ResourceStatus, to: ResourceStatus): boolean {
  return VALID_RESOURCE_TRANSITIONS[from].includes(to);
}

/** Attempt a transition for `resource` driven by `event`. */
export function transition(
  resource: Pick<Resource, 'id' | 'status'>,
  event: ResourceEvent,
  actor: AuditActor,
  metadata: Record<string, unknown> = {},
): TransitionResult {
  const current = resource.status;
  const validTargets = VALID_RESOURCE_TRANSITIONS[current];
  const target = targetOf(current, event);

  if (!target || !validTargets.includes(target)) {
    return {
      success: false,
      error: { ...invalidTransitionError(current, event.type, validTargets, target), resourceId: resource.id },
    };
  }

  return {
    success: true,
    newStatus: target,
    audit: {
      resourceId: resource.id,
      actor,
      action: event.type,
      statusBefore: current,
      statusAfter: target,
      metadata: { ...eventMetadata(event), ...metadata },
    },
  };
}

/** Statuses with no automatic way out. */
export function isTerminalResourceStatus(status: ResourceStatus): boolean {
  return status === ResourceStatus.Deprovisioned;
}

/** Statuses that stay put until an external trigger arrives. */
export function isStableResourceStatus(status: ResourceStatus): boolean {
  return (
    status === ResourceStatus.Active ||
    status === ResourceStatus.Failed ||
    status === ResourceStatus.Deprovisioned
  );
}

/**
 * Whether an audit history is a legal walk: starts at PENDING, each row
 * starts where the previous ended, and every edge is in the table.
 */
export function isValidHistory(
  rows: ReadonlyArray<{ statusBefore: ResourceStatus; statusAfter: ResourceStatus }>,
): boolean {
  let current = ResourceStatus.Pending;
  for (const row of rows) {
    if (row.statusBefore !== current || !isLegalTransition(row.statusBefore, row.statusAfter)) {
      return false;
    }
    current = row.statusAfter;
  }
  return true;
}

/**
 * Statuses a sync walks through so the record matches what the provider
 * reports. Each step is a legal edge on its own; an empty path means no
 * drift, or drift the table cannot express.
 */
export function driftPath(current: ResourceStatus, observed: ProviderHealthState): ResourceStatus[] {
  switch (observed) {
    case 'running':
      if (current === ResourceStatus.Suspended) return [ResourceStatus.Resuming, ResourceStatus.Active];
      if (current === ResourceStatus.Resuming) return [ResourceStatus.Active];
      return [];
    case 'suspended':
    case 'stopped':
      return current === ResourceStatus.Active ? [ResourceStatus.Suspended] : [];
    case 'missing':
      return current === ResourceStatus.Suspended ||
        current === ResourceStatus.Resuming ||
        current === ResourceStatus.Updating
        ? [ResourceStatus.Failed]
        : [];
    case 'unknown':
      return [];
  }
}
