/**
 * Service entry point.
 *
 * Loads configuration from the environment, starts the queue worker and
 * the HTTP surface, and shuts both down on SIGINT/SIGTERM. Provider
 * drivers are supplied by the embedding deployment.
 */

import { Server } from 'http';
import { loadConfig } from './config';
import { typedErrorOf } from './domain/errors';
import { DriverRegistration } from './drivers/registry';
import { logger, setLogLevel } from './logger';
import { AppContext, createApp, createAppContext } from './server';

export interface RunningService {
  context: AppContext;
  server: Server;
  stop(): Promise<void>;
}

export async function startService(
  drivers: DriverRegistration[] = [],
  env: Record<string, string | undefined> = process.env,
): Promise<RunningService> {
  const config = loadConfig(env);
  setLogLevel(config.logLevel);

  const context = createAppContext({ config, vault: config.vault, drivers });
  const app = createApp(context);
  context.queue.start();

  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(config.port, () => resolve(listening));
  });
  logger.info('Provision orchestrator listening', { port: config.port, drivers: drivers.length });

  const stop = async (): Promise<void> => {
    context.queue.stop();
    context.teardownListeners();
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    logger.info('Provision orchestrator stopped');
  };

  return { context, server, stop };
}

if (require.main === module) {
  startService()
    .then((service) => {
      const shutdown = (signal: string) => {
        logger.info('Shutting down', { signal });
        service.stop().then(
          () => process.exit(0),
          (err: unknown) => {
            logger.error('Shutdown failed', { error: err instanceof Error ? err.message : String(err) });
            process.exit(1);
          },
        );
      };
      process.once('SIGINT', () => shutdown('SIGINT'));
      process.once('SIGTERM', () => shutdown('SIGTERM'));
    })
    .catch((err: unknown) => {
      const typed = typedErrorOf(err);
      logger.error('Startup failed', {
        code: typed?.code,
        error: err instanceof Error ? err.message : String(err),
      });
      process.exit(1);
    });
}
