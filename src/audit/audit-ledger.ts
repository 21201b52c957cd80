/**
 * Audit Ledger.
 *
 * Append-only history of every accepted lifecycle transition. The ledger
 * exposes `record` and reads; there is no update or delete, and stored
 * rows are frozen. Metadata is sanitized on the way in: secret-looking
 * fields are redacted and provider identifiers can be stored as hashes.
 */

import { createHash } from 'crypto';
import { AuditActor, AuditDraft, ProvisionAudit } from '../domain/audit';
import { maskSecretsInMessage } from '../domain/errors';
import { ResourceStatus } from '../domain/resource';
import { AuditStore } from '../storage/store';

const SECRET_KEY_PATTERN = /(secret|password|passwd|token|api[-_]?key|credential|authorization|private[-_]?key)/i;
const PROVIDER_REF_KEYS = new Set(['providerRef', 'providerResourceId', 'providerTaskId']);

export const REDACTED = '[REDACTED]';

export interface SanitizeOptions {
  hashProviderRefs: boolean;
  /** Known secret values to mask wherever they appear in strings. */
  secrets?: string[];
}

/** Stable, non-reversible stand-in for a provider identifier. */
export function hashProviderRef(value: string): string {
  return `sha256:${createHash('sha256').update(value).digest('hex').slice(0, 16)}`;
}

function sanitizeValue(key: string, value: unknown, options: SanitizeOptions): unknown {
  if (SECRET_KEY_PATTERN.test(key)) return REDACTED;
  if (typeof value === 'string') {
    if (options.hashProviderRefs && PROVIDER_REF_KEYS.has(key)) return hashProviderRef(value);
    return options.secrets?.length ? maskSecretsInMessage(value, options.secrets) : value;
  }
  if (Array.isArray(value)) {
    return value.map((item) => sanitizeValue(key, item, options));
  }
  if (value !== null && typeof value === 'object') {
    return sanitizeAuditMetadata(Object.fromEntries(Object.entries(value)), options);
  }
  return value;
}

/** Redact secret fields and optionally hash provider identifiers, recursively. */
export function sanitizeAuditMetadata(
  metadata: Record<string, unknown>,
  options: SanitizeOptions,
): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(metadata)) {
    result[key] = sanitizeValue(key, value, options);
  }
  return result;
}

export class AuditLedger {
  constructor(
    private readonly store: AuditStore,
    private readonly options: SanitizeOptions = { hashProviderRefs: true },
  ) {}

  /** Sanitize a draft so it can be committed together with a status write. */
  prepare(draft: AuditDraft): AuditDraft {
    return { ...draft, metadata: sanitizeAuditMetadata(draft.metadata, this.options) };
  }

  /** Append one row. */
  async record(
    resourceId: string,
    actor: AuditActor,
    action: string,
    before: ResourceStatus,
    after: ResourceStatus,
    metadata: Record<string, unknown> = {},
  ): Promise<ProvisionAudit> {
    return this.store.append(
      this.prepare({ resourceId, actor, action, statusBefore: before, statusAfter: after, metadata }),
    );
  }

  /** A resource's rows in the order they were written. */
  async history(resourceId: string): Promise<ProvisionAudit[]> {
    return this.store.listByResource(resourceId, { limit: Number.MAX_SAFE_INTEGER });
  }

  async count(resourceId: string): Promise<number> {
    return this.store.countByResource(resourceId);
  }
}
