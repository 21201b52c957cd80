/**
 * Credential Vault.
 *
 * Stores provider secrets encrypted (AES-256-GCM, key derived with scrypt)
 * and decrypts them only for the duration of one driver call. Plaintext is
 * never persisted, cached or logged; errors carry ids, never material.
 */

import crypto from 'crypto';
import { v4 as uuid } from 'uuid';
import { Credential, CredentialScope } from '../domain/credential';
import {
  OrchestratorError,
  configError,
  credentialMissingError,
  credentialUnreadableError,
  notFoundError,
} from '../domain/errors';
import { Logger, logger as rootLogger } from '../logger';
import { CredentialStore } from '../storage/store';

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 12;

export interface StoreCredentialInput {
  name: string;
  driverId: string;
  scope: CredentialScope;
  secret: string;
  createdBy: string;
}

export class CredentialVault {
  private readonly key: Buffer;
  private readonly log: Logger;

  constructor(
    private readonly credentials: CredentialStore,
    options: { key: string; salt: string; logger?: Logger },
  ) {
    if (!options.key || options.key.length < 32) {
      throw new OrchestratorError(configError('Vault key must be at least 32 characters long'));
    }
    this.key = crypto.scryptSync(options.key, options.salt, 32);
    this.log = (options.logger ?? rootLogger).child({ component: 'credential-vault' });
  }

  /** Encrypt and persist a secret. Returns the credential id. */
  async store(input: StoreCredentialInput): Promise<string> {
    const credential: Credential = {
      id: `cred_${uuid()}`,
      name: input.name,
      driverId: input.driverId,
      encryptedPayload: this.encrypt(input.secret),
      scope: input.scope,
      createdBy: input.createdBy,
      createdAt: new Date().toISOString(),
    };
    await this.credentials.create(credential);
    this.log.info('Credential stored', {
      credentialId: credential.id,
      driverId: credential.driverId,
      scope: credential.scope.kind,
    });
    return credential.id;
  }

  /** Decrypt a stored credential. Callers must not keep the value. */
  async reveal(credentialId: string): Promise<string> {
    const credential = await this.credentials.getById(credentialId);
    if (!credential) {
      throw new OrchestratorError(notFoundError('Credential', credentialId));
    }
    return this.decrypt(credential);
  }

  /**
   * Find the credential that applies to a driver call: the user's own
   * credential first, then the system-wide one.
   */
  async resolve(driverId: string, userId?: string): Promise<Credential | null> {
    if (userId) {
      const own = await this.credentials.findForDriver(driverId, { kind: 'user', userId });
      if (own) return own;
    }
    return this.credentials.findForDriver(driverId, { kind: 'system' });
  }

  /**
   * Run `fn` with the decrypted secret for a driver. The plaintext lives
   * only in this call frame.
   */
  async withSecret<T>(
    driverId: string,
    userId: string | undefined,
    fn: (secret: string) => Promise<T>,
  ): Promise<T> {
    const credential = await this.resolve(driverId, userId);
    if (!credential) {
      throw new OrchestratorError(credentialMissingError(driverId, userId));
    }
    return fn(this.decrypt(credential));
  }

  private encrypt(plaintext: string): string {
    const iv = crypto.randomBytes(IV_LENGTH);
    const cipher = crypto.createCipheriv(ALGORITHM, this.key, iv);
    const encrypted = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
    const authTag = cipher.getAuthTag();
    return `${iv.toString('base64')}:${authTag.toString('base64')}:${encrypted.toString('base64')}`;
  }

  private decrypt(credential: Credential): string {
    const parts = credential.encryptedPayload.split(':');
    if (parts.length !== 3) {
      throw new OrchestratorError(credentialUnreadableError(credential.id));
    }
    const [ivB64, authTagB64, ciphertextB64] = parts;
    try {
      const decipher = crypto.createDecipheriv(ALGORITHM, this.key, Buffer.from(ivB64, 'base64'));
      decipher.setAuthTag(Buffer.from(authTagB64, 'base64'));
      return decipher.update(ciphertextB64, 'base64', 'utf8') + decipher.final('utf8');
    } catch (err) {
      this.log.error('Credential decryption failed', {
        credentialId: credential.id,
        driverId: credential.driverId,
        reason: err instanceof Error ? err.name : 'unknown',
      });
      throw new OrchestratorError(credentialUnreadableError(credential.id));
    }
  }
}
