/**
 * Driver Gateway.
 *
 * The one path by which the orchestrator and the poller reach a driver:
 * the driver's circuit breaker wraps the call, and when the driver needs a
 * credential the vault reveals it for the duration of that call only.
 * Anything the driver throws leaves here with the secret masked out of its
 * message.
 */

import { CircuitBreakerRegistry, CircuitOpenError } from './circuit-breaker';
import { DriverCallContext } from '../drivers/driver';
import { DriverRegistry, RegisteredDriver } from '../drivers/registry';
import {
  OrchestratorError,
  ProviderError,
  TypedError,
  maskSecretsInMessage,
  providerFailure,
} from '../domain/errors';
import { Logger } from '../logger';
import { CredentialVault } from '../vault/credential-vault';

/** Who a call is made for: the driver to use and the user whose credential applies. */
export interface CallTarget {
  driverId: string;
  userId?: string;
}

/** How a failed driver call should be handled. */
export type DriverFailure =
  | { kind: 'circuit-open'; retryAfterMs: number; error: TypedError }
  | { kind: 'transient'; error: TypedError }
  | { kind: 'permanent'; error: TypedError };

export function classifyDriverFailure(err: unknown): DriverFailure {
  if (err instanceof CircuitOpenError) {
    return { kind: 'circuit-open', retryAfterMs: err.retryAfterMs, error: err.typedError };
  }
  if (err instanceof OrchestratorError) {
    return { kind: 'permanent', error: err.typedError };
  }
  const error = providerFailure(err);
  return error.retryable ? { kind: 'transient', error } : { kind: 'permanent', error };
}

function maskThrown(err: unknown, secret: string | null): unknown {
  if (!secret || !(err instanceof Error) || err instanceof OrchestratorError) return err;
  const message = maskSecretsInMessage(err.message, [secret]);
  if (message === err.message) return err;
  if (err instanceof ProviderError) {
    return new ProviderError(message, { statusCode: err.statusCode, retryable: err.retryable });
  }
  return new Error(message);
}

export class DriverGateway {
  constructor(
    private readonly registry: DriverRegistry,
    private readonly breakers: CircuitBreakerRegistry,
    private readonly vault: CredentialVault,
    private readonly log: Logger,
  ) {}

  /** Call a driver through its breaker, with its credential revealed. */
  async call<T>(target: CallTarget, fn: (ctx: DriverCallContext, entry: RegisteredDriver) => Promise<T>): Promise<T> {
    const breaker = this.breakers.get(target.driverId);
    return this.withContext(target, (ctx, entry) => breaker.execute(() => fn(ctx, entry)));
  }

  /**
   * Run `fn` with the call context but outside the breaker. For local work
   * that needs the credential, such as checking a webhook signature.
   */
  async withContext<T>(
    target: CallTarget,
    fn: (ctx: DriverCallContext, entry: RegisteredDriver) => Promise<T>,
  ): Promise<T> {
    const entry = this.registry.require(target.driverId);
    const logger = this.log.child({ driverId: target.driverId });

    if (!entry.requiresCredential) {
      return fn({ secret: null, logger }, entry);
    }

    return this.vault.withSecret(target.driverId, target.userId, async (secret) => {
      try {
        return await fn({ secret, logger }, entry);
      } catch (err) {
        throw maskThrown(err, secret);
      }
    });
  }
}
