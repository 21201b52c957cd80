/**
 * Inbound event wiring.
 *
 * Listeners are an explicit table installed once at startup. Handlers only
 * enqueue work, so the collaborator raising the event (billing) never
 * waits on a provider.
 */

import { InboundEventMap, InboundEventType } from '../domain/events';
import { Order } from '../domain/resource';
import { Logger, logger as rootLogger } from '../logger';

export type InboundHandler<K extends InboundEventType> = (payload: InboundEventMap[K]) => Promise<void>;

type HandlerTable = { [K in InboundEventType]: Array<InboundHandler<K>> };

/** In-process hub for events raised by other domains. */
export class InboundEventHub {
  private readonly handlers: HandlerTable = { PaymentCaptured: [] };

  on<K extends InboundEventType>(type: K, handler: InboundHandler<K>): () => void {
    const list: Array<InboundHandler<K>> = this.handlers[type];
    list.push(handler);
    return () => {
      const index = list.indexOf(handler);
      if (index >= 0) list.splice(index, 1);
    };
  }

  /** Deliver an event to every handler. The first handler error is rethrown to the emitter. */
  async emit<K extends InboundEventType>(type: K, payload: InboundEventMap[K]): Promise<void> {
    const list: Array<InboundHandler<K>> = this.handlers[type];
    for (const handler of [...list]) {
      await handler(payload);
    }
  }

  listenerCount(type: InboundEventType): number {
    return this.handlers[type].length;
  }
}

/** What the listeners need from the orchestrator. */
export interface KickScheduler {
  enqueueKick(order: Order): Promise<string>;
}

/**
 * Install the listener table. Returns a teardown that removes every
 * listener it installed.
 */
export function wireListeners(hub: InboundEventHub, orchestrator: KickScheduler, logger?: Logger): () => void {
  const log = (logger ?? rootLogger).child({ component: 'listeners' });

  const teardowns = [
    hub.on('PaymentCaptured', async ({ order }) => {
      if (!order.requiresProvisioning) {
        log.debug('Order needs no provisioning', { orderId: order.id });
        return;
      }
      const jobId = await orchestrator.enqueueKick(order);
      log.info('Provisioning queued for order', { orderId: order.id, jobId });
    }),
  ];

  return () => {
    for (const teardown of teardowns) teardown();
  };
}
