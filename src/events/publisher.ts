/**
 * Lifecycle Event Publisher.
 *
 * Emits stable, versioned resource lifecycle events for collaborators
 * (billing, notifications) and keeps them queryable per resource.
 */

import { v4 as uuid } from 'uuid';
import { EventSubscription, LifecycleEvent, LifecycleEventType } from '../domain/events';
import { Resource } from '../domain/resource';
import { Logger, logger as rootLogger } from '../logger';
import { EventStore } from '../storage/store';

export const EVENT_SCHEMA_VERSION = '1.0.0';

export class LifecycleEventPublisher {
  private subscriptions: EventSubscription[] = [];
  private readonly log: Logger;

  constructor(
    private readonly events: EventStore,
    logger?: Logger,
  ) {
    this.log = (logger ?? rootLogger).child({ component: 'event-publisher' });
  }

  /** Publish an event describing a resource's current state. */
  async publishResourceEvent(
    resource: Resource,
    type: LifecycleEventType,
    extra: Record<string, unknown> = {},
  ): Promise<LifecycleEvent> {
    const event: LifecycleEvent = {
      id: `evt_${uuid()}`,
      type,
      schemaVersion: EVENT_SCHEMA_VERSION,
      timestamp: new Date().toISOString(),
      resourceId: resource.id,
      orderId: resource.orderId,
      payload: {
        status: resource.status,
        userId: resource.userId,
        driverId: resource.driverId,
        planCode: resource.planCode,
        region: resource.region,
        lineItemId: resource.lineItemId,
        ...extra,
      },
    };

    return this.publishEvent(event);
  }

  /** Persist an event, then deliver it to matching subscribers. */
  async publishEvent(event: LifecycleEvent): Promise<LifecycleEvent> {
    await this.events.create(event);

    for (const sub of this.subscriptions) {
      if (!this.matchesSubscription(event, sub)) continue;
      try {
        sub.callback(event);
      } catch (err) {
        // A subscriber must not affect publication or other subscribers.
        this.log.error('Event subscriber failed', {
          subscriptionId: sub.id,
          eventId: event.id,
          eventType: event.type,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }

    return event;
  }

  /** Subscribe to events. Returns an unsubscribe function. */
  subscribe(subscription: EventSubscription): () => void {
    this.subscriptions.push(subscription);
    return () => {
      this.subscriptions = this.subscriptions.filter((s) => s.id !== subscription.id);
    };
  }

  async getEventsByResource(resourceId: string): Promise<LifecycleEvent[]> {
    return this.events.listByResource(resourceId, { limit: Number.MAX_SAFE_INTEGER });
  }

  private matchesSubscription(event: LifecycleEvent, sub: EventSubscription): boolean {
    return !sub.eventTypes?.length || sub.eventTypes.includes(event.type);
  }
}
