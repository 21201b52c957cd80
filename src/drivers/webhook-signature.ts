/**
 * HMAC signing helpers for provider webhooks.
 *
 * Signature scheme: `sha256=` + hex HMAC-SHA256 over `${timestamp}.${rawBody}`.
 * Drivers whose provider signs this way can delegate verifySignature() here.
 */

import { createHmac, timingSafeEqual } from 'crypto';

/** Default tolerance between the signed timestamp and arrival time. */
export const DEFAULT_SIGNATURE_TOLERANCE_MS = 5 * 60_000;

export function signWebhookBody(secret: string, timestampMs: number, rawBody: string): string {
  const digest = createHmac('sha256', secret).update(`${timestampMs}.${rawBody}`).digest('hex');
  return `sha256=${digest}`;
}

export interface SignatureCheck {
  secret: string;
  rawBody: string;
  signature: string | undefined;
  /** Signed timestamp header value, epoch milliseconds as a string. */
  timestamp: string | undefined;
  receivedAt: number;
  toleranceMs?: number;
}

/** Verify signature and freshness. Malformed input is simply invalid. */
export function verifyWebhookSignature(check: SignatureCheck): boolean {
  if (!check.signature || !check.timestamp) return false;
  const timestampMs = Number(check.timestamp);
  if (!Number.isFinite(timestampMs)) return false;

  const tolerance = check.toleranceMs ?? DEFAULT_SIGNATURE_TOLERANCE_MS;
  if (Math.abs(check.receivedAt - timestampMs) > tolerance) return false;

  const expected = signWebhookBody(check.secret, timestampMs, check.rawBody);
  if (expected.length !== check.signature.length) return false;
  return timingSafeEqual(Buffer.from(expected), Buffer.from(check.signature));
}
