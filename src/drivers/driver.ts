/**
 * Driver capability contracts.
 *
 * A driver is a provider integration described by the capabilities it
 * declares. Every driver implements the base Provider contract and the
 * mandatory Provisioner lifecycle; metrics, inventory and webhooks are
 * optional facets. Whether a facet exists is answered by the registry's
 * `supports()`, never by probing the object at call time.
 */

import { Logger } from '../logger';
import { Resource, ResourceSpec } from '../domain/resource';

export enum ProviderType {
  Panel = 'panel',
  Compute = 'compute',
  Game = 'game',
  Cloud = 'cloud',
}

export type Capability = 'provisioner' | 'metrics' | 'inventory' | 'webhooks';

/** Per-call context handed to every driver method. */
export interface DriverCallContext {
  /**
   * Decrypted credential for this one call, or null when the driver runs
   * without one. Must not be stored or logged by the driver.
   */
  secret: string | null;
  logger: Logger;
}

export type ProviderTaskStatus = 'pending' | 'completed' | 'failed';

/** What a status check (or a webhook) reports about a provider task. */
export interface ProviderTaskResult {
  status: ProviderTaskStatus;
  /** Provider's id for the built resource, once known. */
  providerResourceId?: string;
  /** Provider's explanation, surfaced as the last error on failure. */
  message?: string;
  details?: Record<string, unknown>;
}

export interface Provider {
  readonly name: string;
  readonly type: ProviderType;
  readonly capabilities: ReadonlySet<Capability>;
}

/**
 * Mandatory lifecycle contract.
 *
 * `provision` always returns a provider task id to poll. The other
 * lifecycle calls return a task id when the provider works asynchronously,
 * or null when the change is already done.
 */
export interface Provisioner {
  provision(spec: ResourceSpec, idempotencyKey: string, ctx: DriverCallContext): Promise<string>;
  poll(providerTaskId: string, ctx: DriverCallContext): Promise<ProviderTaskResult>;
  deprovision(resource: Resource, idempotencyKey: string, ctx: DriverCallContext): Promise<string | null>;
  suspend(resource: Resource, idempotencyKey: string, ctx: DriverCallContext): Promise<string | null>;
  resume(resource: Resource, idempotencyKey: string, ctx: DriverCallContext): Promise<string | null>;
  resize(
    resource: Resource,
    spec: ResourceSpec,
    idempotencyKey: string,
    ctx: DriverCallContext,
  ): Promise<string | null>;
}

export type ProviderHealthState = 'running' | 'suspended' | 'stopped' | 'missing' | 'unknown';

export interface HealthReport {
  state: ProviderHealthState;
  details?: Record<string, unknown>;
}

export interface CostReport {
  currency: string;
  /** Amount accrued in the current billing period, in minor units. */
  accruedMinor: number;
}

export interface MetricsCapability {
  usage(resource: Resource, ctx: DriverCallContext): Promise<Record<string, number>>;
  health(resource: Resource, ctx: DriverCallContext): Promise<HealthReport>;
  costs(resource: Resource, ctx: DriverCallContext): Promise<CostReport>;
}

export interface InventoryItem {
  code: string;
  label: string;
  [key: string]: unknown;
}

export interface InventoryCapability {
  regions(ctx: DriverCallContext): Promise<InventoryItem[]>;
  images(ctx: DriverCallContext): Promise<InventoryItem[]>;
  plans(ctx: DriverCallContext): Promise<InventoryItem[]>;
  quotas(ctx: DriverCallContext): Promise<Record<string, number>>;
}

/** A webhook as received over HTTP; the raw body is kept for signatures. */
export interface WebhookDelivery {
  headers: Record<string, string | undefined>;
  rawBody: string;
  /** Epoch milliseconds when the delivery arrived. */
  receivedAt: number;
}

export interface NormalizedWebhookResult extends ProviderTaskResult {
  providerTaskId: string;
}

export interface WebhookCapability {
  verifySignature(delivery: WebhookDelivery, ctx: DriverCallContext): boolean | Promise<boolean>;
  handleWebhook(delivery: WebhookDelivery, ctx: DriverCallContext): Promise<NormalizedWebhookResult>;
}

/** A provider integration: base contract, lifecycle and optional facets. */
export interface Driver extends Provider, Provisioner {
  readonly metrics?: MetricsCapability;
  readonly inventory?: InventoryCapability;
  readonly webhooks?: WebhookCapability;
}

export type InventoryKind = keyof InventoryCapability;
export type MetricsKind = keyof MetricsCapability;

/** Capability name to the facet interface it unlocks. */
export interface CapabilityFacets {
  provisioner: Provisioner;
  metrics: MetricsCapability;
  inventory: InventoryCapability;
  webhooks: WebhookCapability;
}
