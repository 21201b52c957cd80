/**
 * Credential domain model.
 *
 * Provider secrets are stored encrypted; the plaintext only exists inside
 * the vault's scoped execution of a single driver call.
 */

export type CredentialScope =
  | { kind: 'user'; userId: string }
  | { kind: 'system' };

export interface Credential {
  id: string;
  name: string;
  driverId: string;
  /** `iv:authTag:ciphertext`, each base64. */
  encryptedPayload: string;
  scope: CredentialScope;
  createdBy: string;
  createdAt: string;
}
