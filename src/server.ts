/**
 * Express server configuration.
 *
 * Assembles the orchestrator and its collaborators, and exposes the thin
 * HTTP surface over them. The HTTP layer is a reference adapter: every
 * route delegates to an orchestrator operation.
 */

import express from 'express';
import { OrchestratorConfig, VaultConfig, mergeConfig } from './config';
import { DriverRegistration, DriverRegistry } from './drivers/registry';
import { ProvisioningOrchestrator } from './engine/orchestrator';
import { InboundEventHub, wireListeners } from './events/listeners';
import { Logger, logger as rootLogger } from './logger';
import { ManualClock } from './scheduler/clock';
import { MemoryJobQueue } from './scheduler/memory-queue';
import { createMemoryStore } from './storage/memory-store';
import { Store } from './storage/store';
import { CredentialVault } from './vault/credential-vault';
import { errorHandler } from './api/middleware';
import { createDriverRoutes } from './api/drivers';
import { createOrderRoutes } from './api/orders';
import { createResourceRoutes } from './api/resources';
import { createWebhookRoutes } from './api/webhooks';

export const SERVICE_VERSION = '0.1.0';

const startTime = Date.now();

/** Application context containing all services. */
export interface AppContext {
  config: OrchestratorConfig;
  store: Store;
  registry: DriverRegistry;
  vault: CredentialVault;
  queue: MemoryJobQueue;
  hub: InboundEventHub;
  orchestrator: ProvisioningOrchestrator;
  /** Removes the inbound listeners installed at startup. */
  teardownListeners: () => void;
}

export interface AppContextOptions {
  vault: VaultConfig;
  drivers?: DriverRegistration[];
  config?: OrchestratorConfig;
  store?: Store;
  /** Virtual clock for deterministic runs; real time when absent. */
  clock?: ManualClock;
  random?: () => number;
  logger?: Logger;
}

/** Create the application context with all services. */
export function createAppContext(options: AppContextOptions): AppContext {
  const config = options.config ?? mergeConfig();
  const store = options.store ?? createMemoryStore();
  const logger = options.logger ?? rootLogger;
  const registry = new DriverRegistry(options.drivers ?? []);
  const vault = new CredentialVault(store.credentials, { ...options.vault, logger });
  const queue = new MemoryJobQueue({ config: config.queue, clock: options.clock, logger });

  const orchestrator = new ProvisioningOrchestrator({
    store,
    registry,
    vault,
    queue,
    config,
    clock: options.clock?.asClock(),
    random: options.random,
    logger,
  });
  orchestrator.startWorker();

  const hub = new InboundEventHub();
  const teardownListeners = wireListeners(hub, orchestrator, logger);

  return { config, store, registry, vault, queue, hub, orchestrator, teardownListeners };
}

/** Create and configure the Express application. */
export function createApp(ctx: AppContext): express.Application {
  const app = express();

  // Webhooks read their own raw body, so they go before the JSON parser.
  app.use('/api/v1', createWebhookRoutes(ctx.orchestrator, () => ctx.queue.now()));

  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: SERVICE_VERSION,
      uptimeMs: Date.now() - startTime,
      storage: 'memory',
      queueDepth: ctx.queue.size(),
      breakers: ctx.orchestrator.breakers.snapshot(),
    });
  });

  const v1 = express.Router();
  v1.use('/', createOrderRoutes(ctx.orchestrator));
  v1.use('/', createResourceRoutes(ctx.orchestrator));
  v1.use('/', createDriverRoutes(ctx.registry, ctx.orchestrator));
  app.use('/api/v1', v1);

  app.use(errorHandler);

  return app;
}
