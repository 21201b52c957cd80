/**
 * Lifecycle event domain model.
 *
 * Inbound: PaymentCaptured, raised by billing once an order is paid.
 * Outbound: versioned events other collaborators subscribe to.
 */

import { Order } from './resource';

export type LifecycleEventType =
  | 'OrderPlaced'
  | 'ResourceProvisioned'
  | 'ResourceSuspended'
  | 'ResourceDeprovisioned'
  | 'ResourceFailed';

export interface LifecycleEvent {
  id: string;
  type: LifecycleEventType;
  /** Event schema version for forward compatibility. */
  schemaVersion: string;
  timestamp: string;
  resourceId: string;
  orderId: string;
  payload: Record<string, unknown>;
}

export interface EventSubscription {
  id: string;
  /** Empty or absent means every type. */
  eventTypes?: LifecycleEventType[];
  callback: (event: LifecycleEvent) => void;
}

/** Inbound events the orchestrator listens for. */
export interface InboundEventMap {
  PaymentCaptured: { order: Order };
}

export type InboundEventType = keyof InboundEventMap;
