/**
 * Resource domain model.
 *
 * One provisioned infrastructure item (VM, hosting account, game server)
 * and the lifecycle it moves through.
 */

/** Resource lifecycle states. */
export enum ResourceStatus {
  Pending = 'PENDING',
  Queued = 'QUEUED',
  Provisioning = 'PROVISIONING',
  Active = 'ACTIVE',
  Suspended = 'SUSPENDED',
  Resuming = 'RESUMING',
  Updating = 'UPDATING',
  Failed = 'FAILED',
  Deprovisioning = 'DEPROVISIONING',
  Deprovisioned = 'DEPROVISIONED',
}

/**
 * Valid lifecycle edges.
 *
 * QUEUED -> FAILED covers failures that happen before the provider ever
 * accepted the work (permanent rejection, missing credential, exhausted
 * dispatch attempts).
 */
export const VALID_RESOURCE_TRANSITIONS: Readonly<Record<ResourceStatus, readonly ResourceStatus[]>> = {
  [ResourceStatus.Pending]: [ResourceStatus.Queued],
  [ResourceStatus.Queued]: [ResourceStatus.Provisioning, ResourceStatus.Failed],
  [ResourceStatus.Provisioning]: [ResourceStatus.Active, ResourceStatus.Failed],
  [ResourceStatus.Active]: [
    ResourceStatus.Suspended,
    ResourceStatus.Updating,
    ResourceStatus.Deprovisioning,
  ],
  [ResourceStatus.Suspended]: [ResourceStatus.Resuming, ResourceStatus.Failed],
  [ResourceStatus.Resuming]: [ResourceStatus.Active, ResourceStatus.Failed],
  [ResourceStatus.Updating]: [ResourceStatus.Active, ResourceStatus.Failed],
  [ResourceStatus.Failed]: [ResourceStatus.Deprovisioning],
  [ResourceStatus.Deprovisioning]: [ResourceStatus.Deprovisioned],
  [ResourceStatus.Deprovisioned]: [],
};

/** What the provider is asked to build. */
export interface ResourceSpec {
  planCode: string;
  region: string;
  hostname?: string;
  image?: string;
  /** Provider-specific settings from the plan map and the order. */
  extra: Record<string, unknown>;
}

/** A provisioned infrastructure item. */
export interface Resource {
  id: string;
  /** The order that paid for this resource; unique across resources. */
  orderId: string;
  userId: string;
  driverId: string;
  /** Provider-side reference; null until the provider accepts the work. */
  providerRef: string | null;
  planCode: string;
  region: string;
  status: ResourceStatus;
  spec: ResourceSpec;
  /** Billing line item this resource was bought under. */
  lineItemId?: string;
  lastSyncedAt?: string;
  /** Human-readable, secret-free reason for the last failure. */
  lastError?: string;
  createdAt: string;
  updatedAt: string;
}

/** The paid order that triggers provisioning. */
export interface Order {
  id: string;
  userId: string;
  /** Billing plan, bridged to a driver by a PlanMap. */
  planId: string;
  /** Whether the product bought needs an infrastructure resource at all. */
  requiresProvisioning: boolean;
  lineItemId?: string;
  options?: {
    hostname?: string;
    image?: string;
    [key: string]: unknown;
  };
}

/** Static bridge from a billing plan to a driver's plan in a region. */
export interface PlanMap {
  id: string;
  planId: string;
  driverId: string;
  providerPlanCode: string;
  region: string;
  extraConfig: Record<string, unknown>;
}
