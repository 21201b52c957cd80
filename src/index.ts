/**
 * Provision Orchestrator
 *
 * Turns captured payments into provisioned infrastructure resources and
 * keeps their recorded status consistent with the provider over their
 * lifetime. Public exports for programmatic use; `main.ts` runs the
 * reference HTTP service.
 */

export { createApp, createAppContext } from './server';
export type { AppContext, AppContextOptions } from './server';
export { startService } from './main';
export * from './config';
export * from './logger';
export * from './domain/errors';
export * from './domain/resource';
export * from './domain/task';
export * from './domain/audit';
export * from './domain/credential';
export * from './domain/events';
export * from './drivers/driver';
export * from './drivers/registry';
export * from './drivers/webhook-signature';
export * from './engine/state-machine';
export * from './engine/circuit-breaker';
export * from './engine/driver-gateway';
export * from './engine/task-poller';
export * from './engine/orchestrator';
export * from './audit/audit-ledger';
export * from './vault/credential-vault';
export * from './scheduler/clock';
export * from './scheduler/job';
export * from './scheduler/memory-queue';
export * from './scheduler/task-scheduler';
export * from './events/publisher';
export * from './events/listeners';
export * from './storage/store';
export * from './storage/memory-store';
