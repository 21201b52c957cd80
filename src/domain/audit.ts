/**
 * Provision audit domain model.
 *
 * One immutable row per accepted lifecycle transition. Rows are never
 * updated or removed; a resource's rows in sequence order are its full
 * lifecycle history.
 */

import { ResourceStatus } from './resource';

/** Actor recorded on a row: a user id, or the orchestrator itself. */
export type AuditActor = string;

export const SYSTEM_ACTOR: AuditActor = 'system';

export interface ProvisionAudit {
  readonly id: string;
  readonly resourceId: string;
  /** 1-based position in the resource's history. */
  readonly sequence: number;
  readonly actor: AuditActor;
  readonly action: string;
  readonly statusBefore: ResourceStatus;
  readonly statusAfter: ResourceStatus;
  readonly metadata: Readonly<Record<string, unknown>>;
  readonly timestamp: string;
}

/** Row contents before the ledger assigns id, sequence and timestamp. */
export interface AuditDraft {
  resourceId: string;
  actor: AuditActor;
  action: string;
  statusBefore: ResourceStatus;
  statusAfter: ResourceStatus;
  metadata: Record<string, unknown>;
}
