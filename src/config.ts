/**
 * Runtime configuration.
 *
 * Backoff, attempt caps and breaker thresholds are settings rather than
 * constants. Defaults below can be overridden per field, either in code
 * (`mergeConfig`) or from the environment (`loadConfig`).
 */

import { LogLevel, parseLogLevel } from './logger';
import { OrchestratorError, configError } from './domain/errors';

export interface PollerConfig {
  /** Delay before the first status check; doubles per attempt. Default: 2_000. */
  baseDelayMs: number;
  /** Upper bound for the exponential part of the delay. Default: 300_000 (5 min). */
  maxDelayMs: number;
  /** Jitter is uniform in [0, jitterRatio * delay]. Default: 0.5. */
  jitterRatio: number;
  /** Status checks allowed before the task is forced to fail. Default: 20. */
  maxPollAttempts: number;
  /** Dispatch attempts allowed for transient provider errors. Default: 5. */
  maxDispatchAttempts: number;
  /** How long a dispatch claim blocks duplicate deliveries. Default: 60_000. */
  leaseMs: number;
}

export interface BreakerConfig {
  /** Circuit opens when failures / calls in the window exceeds this. Default: 0.5. */
  failureRatio: number;
  /** Calls needed in the window before the ratio is considered. Default: 5. */
  minimumCalls: number;
  /** Sliding window length. Default: 60_000. */
  windowMs: number;
  /** Time spent OPEN before a trial call is allowed. Default: 30_000. */
  cooldownMs: number;
}

export interface AuditConfig {
  /** Store provider references as hashes in audit metadata. Default: true. */
  hashProviderRefs: boolean;
}

export interface QueueConfig {
  /** Deliveries of a throwing job before it is dropped. Default: 5. */
  maxDeliveries: number;
  /** Ticker interval of the in-process queue. Default: 250. */
  tickMs: number;
}

export interface VaultConfig {
  /** Master key material; at least 32 characters. */
  key: string;
  /** Key-derivation salt. Changing it makes stored credentials unreadable. */
  salt: string;
}

export interface OrchestratorConfig {
  poller: PollerConfig;
  breaker: BreakerConfig;
  audit: AuditConfig;
  queue: QueueConfig;
}

export interface AppConfig extends OrchestratorConfig {
  port: number;
  logLevel: LogLevel;
  vault: VaultConfig;
}

export const DEFAULT_POLLER_CONFIG: Readonly<PollerConfig> = {
  baseDelayMs: 2_000,
  maxDelayMs: 300_000,
  jitterRatio: 0.5,
  maxPollAttempts: 20,
  maxDispatchAttempts: 5,
  leaseMs: 60_000,
};

export const DEFAULT_BREAKER_CONFIG: Readonly<BreakerConfig> = {
  failureRatio: 0.5,
  minimumCalls: 5,
  windowMs: 60_000,
  cooldownMs: 30_000,
};

export const DEFAULT_AUDIT_CONFIG: Readonly<AuditConfig> = {
  hashProviderRefs: true,
};

export const DEFAULT_QUEUE_CONFIG: Readonly<QueueConfig> = {
  maxDeliveries: 5,
  tickMs: 250,
};

export interface ConfigOverrides {
  poller?: Partial<PollerConfig>;
  breaker?: Partial<BreakerConfig>;
  audit?: Partial<AuditConfig>;
  queue?: Partial<QueueConfig>;
}

/** Copy `defaults`, replacing every field the overrides set to a defined value. */
function overlay<T extends object>(defaults: Readonly<T>, overrides: Partial<T> = {}): T {
  const result: T = { ...defaults };
  for (const key in overrides) {
    const value = overrides[key];
    if (value !== undefined) result[key] = value;
  }
  return result;
}

/** Merge partial overrides with the defaults and validate the result. */
export function mergeConfig(overrides: ConfigOverrides = {}): OrchestratorConfig {
  const config: OrchestratorConfig = {
    poller: overlay<PollerConfig>(DEFAULT_POLLER_CONFIG, overrides.poller),
    breaker: overlay<BreakerConfig>(DEFAULT_BREAKER_CONFIG, overrides.breaker),
    audit: overlay<AuditConfig>(DEFAULT_AUDIT_CONFIG, overrides.audit),
    queue: overlay<QueueConfig>(DEFAULT_QUEUE_CONFIG, overrides.queue),
  };
  validateConfig(config);
  return config;
}

/** Throws VALIDATION.CONFIG describing every invalid field. */
export function validateConfig(config: OrchestratorConfig): void {
  const problems: string[] = [];
  const positive = (name: string, value: number) => {
    if (!Number.isFinite(value) || value <= 0) problems.push(`${name} must be a positive number`);
  };
  const positiveInt = (name: string, value: number) => {
    if (!Number.isInteger(value) || value <= 0) problems.push(`${name} must be a positive integer`);
  };

  positive('poller.baseDelayMs', config.poller.baseDelayMs);
  positive('poller.maxDelayMs', config.poller.maxDelayMs);
  if (config.poller.maxDelayMs < config.poller.baseDelayMs) {
    problems.push('poller.maxDelayMs must not be below poller.baseDelayMs');
  }
  if (!(config.poller.jitterRatio >= 0 && config.poller.jitterRatio <= 1)) {
    problems.push('poller.jitterRatio must be between 0 and 1');
  }
  positiveInt('poller.maxPollAttempts', config.poller.maxPollAttempts);
  positiveInt('poller.maxDispatchAttempts', config.poller.maxDispatchAttempts);
  positive('poller.leaseMs', config.poller.leaseMs);

  if (!(config.breaker.failureRatio > 0 && config.breaker.failureRatio < 1)) {
    problems.push('breaker.failureRatio must be between 0 and 1 (exclusive)');
  }
  positiveInt('breaker.minimumCalls', config.breaker.minimumCalls);
  positive('breaker.windowMs', config.breaker.windowMs);
  positive('breaker.cooldownMs', config.breaker.cooldownMs);

  positiveInt('queue.maxDeliveries', config.queue.maxDeliveries);
  positive('queue.tickMs', config.queue.tickMs);

  if (problems.length > 0) {
    throw new OrchestratorError(configError(`Invalid configuration: ${problems.join('; ')}`, { problems }));
  }
}

type Env = Record<string, string | undefined>;

function envNumber(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new OrchestratorError(configError(`${name} must be numeric, got "${raw}"`));
  }
  return value;
}

function envBoolean(env: Env, name: string): boolean | undefined {
  const raw = env[name]?.trim().toLowerCase();
  if (raw === undefined || raw === '') return undefined;
  if (raw === 'true' || raw === '1') return true;
  if (raw === 'false' || raw === '0') return false;
  throw new OrchestratorError(configError(`${name} must be true or false, got "${raw}"`));
}

/** Build the full application config from environment variables. */
export function loadConfig(env: Env = process.env): AppConfig {
  const base = mergeConfig({
    poller: {
      baseDelayMs: envNumber(env, 'PROVISION_POLL_BASE_MS'),
      maxDelayMs: envNumber(env, 'PROVISION_POLL_MAX_DELAY_MS'),
      jitterRatio: envNumber(env, 'PROVISION_POLL_JITTER'),
      maxPollAttempts: envNumber(env, 'PROVISION_POLL_MAX_ATTEMPTS'),
      maxDispatchAttempts: envNumber(env, 'PROVISION_DISPATCH_MAX_ATTEMPTS'),
      leaseMs: envNumber(env, 'PROVISION_LEASE_MS'),
    },
    breaker: {
      failureRatio: envNumber(env, 'BREAKER_FAILURE_RATIO'),
      minimumCalls: envNumber(env, 'BREAKER_MINIMUM_CALLS'),
      windowMs: envNumber(env, 'BREAKER_WINDOW_MS'),
      cooldownMs: envNumber(env, 'BREAKER_COOLDOWN_MS'),
    },
    audit: {
      hashProviderRefs: envBoolean(env, 'AUDIT_HASH_PROVIDER_REFS'),
    },
    queue: {
      maxDeliveries: envNumber(env, 'QUEUE_MAX_DELIVERIES'),
      tickMs: envNumber(env, 'QUEUE_TICK_MS'),
    },
  });

  const vaultKey = env.VAULT_KEY;
  if (!vaultKey || vaultKey.length < 32) {
    throw new OrchestratorError(configError('VAULT_KEY must be set and at least 32 characters long'));
  }

  const rawLevel = env.LOG_LEVEL;
  const logLevel = parseLogLevel(rawLevel);
  if (rawLevel && !logLevel) {
    throw new OrchestratorError(configError(`LOG_LEVEL must be one of debug, info, warn, error; got "${rawLevel}"`));
  }

  return {
    ...base,
    port: envNumber(env, 'PORT') ?? 5000,
    logLevel: logLevel ?? LogLevel.Info,
    vault: {
      key: vaultKey,
      salt: env.VAULT_SALT ?? 'provision-orchestrator-vault',
    },
  };
}
