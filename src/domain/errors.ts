/**
 * Typed error model.
 *
 * Every failure the orchestrator surfaces carries a namespaced code, a
 * human-readable message, a retryability flag and optional remediation
 * hints. Thrown failures wrap a TypedError in an OrchestratorError so the
 * HTTP layer and the job worker can map them without string matching.
 */

/** Top-level error domain namespaces. */
export type ErrorDomain =
  | 'STATE'
  | 'CONTRACT'
  | 'DRIVER'
  | 'PROVIDER'
  | 'CREDENTIAL'
  | 'WEBHOOK'
  | 'VALIDATION'
  | 'SYSTEM';

/** Typed suggested fix an operator (or agent) can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure returned in API responses and task records. */
export interface TypedError {
  /** Namespaced error code (e.g., "PROVIDER.TRANSIENT"). */
  code: string;
  /** Human-readable message, safe to show to the resource owner. */
  message: string;
  resourceId?: string;
  taskId?: string;
  driverId?: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  details?: Record<string, unknown>;
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  resourceId?: string;
  taskId?: string;
  driverId?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    resourceId: params.resourceId,
    taskId: params.taskId,
    driverId: params.driverId,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Error thrown by orchestrator operations; carries the typed payload. */
export class OrchestratorError extends Error {
  constructor(public readonly typedError: TypedError) {
    super(typedError.message);
    this.name = 'OrchestratorError';
  }
}

// --- Factories ---

export function validationError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'VALIDATION.SCHEMA',
    message,
    retryable: false,
    details,
  });
}

export function configError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'VALIDATION.CONFIG',
    message,
    retryable: false,
    details,
  });
}

export function notFoundError(entity: string, id: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.NOT_FOUND',
    message: `${entity} not found: ${id}`,
    retryable: false,
  });
}

export function invalidTransitionError(
  from: string,
  event: string,
  validTargets: readonly string[],
  target?: string,
): TypedError {
  return createTypedError({
    code: 'STATE.INVALID_TRANSITION',
    message: target
      ? `Invalid resource transition: ${from} -> ${target} (${event})`
      : `Event "${event}" has no transition from ${from}`,
    retryable: false,
    details: { from, event, target, validTargets },
  });
}

export function stateConflictError(resourceId: string, status: string, action: string): TypedError {
  return createTypedError({
    code: 'STATE.CONFLICT',
    message: `Cannot ${action} a resource in status ${status}`,
    resourceId,
    retryable: false,
    details: { status, action },
  });
}

export function taskInFlightError(resourceId: string, inFlight: { id: string; action: string }, action: string): TypedError {
  return createTypedError({
    code: 'STATE.CONFLICT',
    message: `Cannot ${action} while a ${inFlight.action} task is in flight`,
    resourceId,
    taskId: inFlight.id,
    retryable: true,
    details: { action, inFlightAction: inFlight.action },
  });
}

export function capabilityUnsupportedError(driverId: string, capability: string): TypedError {
  return createTypedError({
    code: 'CONTRACT.CAPABILITY_UNSUPPORTED',
    message: `Driver "${driverId}" does not support the ${capability} capability`,
    driverId,
    retryable: false,
    details: { capability },
  });
}

export function driverNotRegisteredError(driverId: string): TypedError {
  return createTypedError({
    code: 'DRIVER.NOT_REGISTERED',
    message: `No driver registered under "${driverId}"`,
    driverId,
    retryable: false,
    suggestedFixes: [
      { type: 'REGISTER_DRIVER', params: { driverId }, description: `Add "${driverId}" to the driver registrations` },
    ],
  });
}

export function driverUnavailableError(driverId: string, retryAfterMs: number): TypedError {
  return createTypedError({
    code: 'DRIVER.UNAVAILABLE',
    message: `Driver "${driverId}" is temporarily unavailable`,
    driverId,
    retryable: true,
    details: { retryAfterMs },
    suggestedFixes: [
      { type: 'WAIT_AND_RETRY', params: { delayMs: retryAfterMs } },
    ],
  });
}

export function credentialMissingError(driverId: string, userId?: string): TypedError {
  return createTypedError({
    code: 'CREDENTIAL.MISSING',
    message: `No credential configured for driver "${driverId}"`,
    driverId,
    retryable: false,
    details: userId ? { userId } : undefined,
    suggestedFixes: [
      { type: 'PROVIDE_CREDENTIAL', params: { driverId }, description: `Store a credential for "${driverId}"` },
    ],
  });
}

export function credentialUnreadableError(credentialId: string): TypedError {
  return createTypedError({
    code: 'CREDENTIAL.UNREADABLE',
    message: `Credential ${credentialId} could not be decrypted`,
    retryable: false,
    details: { credentialId },
    suggestedFixes: [
      { type: 'ROTATE_CREDENTIAL', params: { credentialId } },
    ],
  });
}

export function webhookSignatureError(driverId: string): TypedError {
  return createTypedError({
    code: 'WEBHOOK.SIGNATURE_INVALID',
    message: `Webhook signature verification failed for driver "${driverId}"`,
    driverId,
    retryable: false,
  });
}

export function pollBudgetExhaustedError(taskId: string, attempts: number): TypedError {
  return createTypedError({
    code: 'PROVIDER.TIMEOUT',
    message: `Provider task did not finish after ${attempts} status checks`,
    taskId,
    retryable: false,
    details: { attempts },
  });
}

export function providerTaskFailedError(providerTaskId: string, message?: string): TypedError {
  return createTypedError({
    code: 'PROVIDER.PERMANENT',
    message: message ?? 'Provider reported the task as failed',
    retryable: false,
    details: { providerTaskId },
  });
}

export function taskSupersededError(taskId: string, resourceId: string): TypedError {
  return createTypedError({
    code: 'STATE.SUPERSEDED',
    message: 'Task cancelled because the resource is being deprovisioned',
    taskId,
    resourceId,
    retryable: false,
  });
}

/**
 * Error a driver throws to report a provider failure.
 *
 * Retryability follows the HTTP status when one is known:
 * 429 and 5xx are transient, every other status is permanent.
 * Without a status the driver decides via `retryable`.
 */
export class ProviderError extends Error {
  public readonly statusCode?: number;
  public readonly retryable: boolean;

  constructor(message: string, options: { statusCode?: number; retryable?: boolean } = {}) {
    super(message);
    this.name = 'ProviderError';
    this.statusCode = options.statusCode;
    this.retryable =
      options.retryable ??
      (options.statusCode !== undefined
        ? options.statusCode === 429 || options.statusCode >= 500
        : true);
  }
}

/**
 * Classify anything a driver call threw into a provider TypedError.
 * Non-ProviderError values (network resets, timeouts, bugs in the driver)
 * are treated as transient.
 */
export function providerFailure(err: unknown, secrets: string[] = []): TypedError {
  const rawMessage = err instanceof Error ? err.message : 'Unknown provider error';
  const message = maskSecretsInMessage(rawMessage, secrets);
  if (err instanceof ProviderError) {
    return createTypedError({
      code: err.retryable ? 'PROVIDER.TRANSIENT' : 'PROVIDER.PERMANENT',
      message,
      retryable: err.retryable,
      details: err.statusCode !== undefined ? { statusCode: err.statusCode } : undefined,
    });
  }
  return createTypedError({
    code: 'PROVIDER.TRANSIENT',
    message,
    retryable: true,
  });
}

/** Extract the TypedError carried by a thrown value, if any. */
export function typedErrorOf(err: unknown): TypedError | undefined {
  return err instanceof OrchestratorError ? err.typedError : undefined;
}

// --- Secret masking ---

/**
 * Mask a secret, keeping only the last 4 characters for identification.
 * Secrets shorter than 8 characters are fully masked.
 */
export function maskSecret(secret: string): string {
  if (!secret || secret.length < 8) return '****';
  return '*'.repeat(secret.length - 4) + secret.slice(-4);
}

/** Replace every occurrence of each secret in `message` with its masked form. */
export function maskSecretsInMessage(message: string, secrets: string[]): string {
  let result = message;
  for (const secret of secrets) {
    if (secret && secret.length > 0) {
      // split/join sidesteps regex escaping of arbitrary secret characters
      result = result.split(secret).join(maskSecret(secret));
    }
  }
  return result;
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}
