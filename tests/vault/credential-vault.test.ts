import { CredentialVault } from '../../src/vault/credential-vault';
import { OrchestratorError } from '../../src/domain/errors';
import { createMemoryStore } from '../../src/storage/memory-store';
import { Store } from '../../src/storage/store';
import { TEST_VAULT, captureLogs } from '../helpers/setup';

const logs = captureLogs();

async function codeOf(promise: Promise<unknown>): Promise<string | undefined> {
  try {
    await promise;
  } catch (err) {
    return err instanceof OrchestratorError ? err.typedError.code : 'UNTYPED';
  }
  return undefined;
}

describe('CredentialVault', () => {
  let store: Store;
  let vault: CredentialVault;

  beforeEach(() => {
    store = createMemoryStore();
    vault = new CredentialVault(store.credentials, TEST_VAULT);
  });

  test('persists only ciphertext', async () => {
    const id = await vault.store({
      name: 'system key',
      driverId: 'fake-cloud',
      scope: { kind: 'system' },
      secret: 'test-secret',
      createdBy: 'admin_1',
    });

    const stored = await store.credentials.getById(id);
    expect(stored?.encryptedPayload.split(':')).toHaveLength(3);
    expect(stored?.encryptedPayload).not.toContain('test-secret');
    expect(await vault.reveal(id)).toBe('test-secret');
  });

  test('uses a fresh IV for every encryption', async () => {
    const input = { name: 'k', driverId: 'd', scope: { kind: 'system' } as const, secret: 'test-secret', createdBy: 'a' };
    const a = await store.credentials.getById(await vault.store(input));
    const b = await store.credentials.getById(await vault.store(input));
    expect(a?.encryptedPayload).not.toBe(b?.encryptedPayload);
  });

  test('prefers the user credential over the system one', async () => {
    await vault.store({ name: 'sys', driverId: 'd', scope: { kind: 'system' }, secret: 'system-secret', createdBy: 'a' });
    await vault.store({
      name: 'own',
      driverId: 'd',
      scope: { kind: 'user', userId: 'user_1' },
      secret: 'user-secret',
      createdBy: 'user_1',
    });

    await expect(vault.withSecret('d', 'user_1', async (s) => s)).resolves.toBe('user-secret');
    await expect(vault.withSecret('d', 'user_2', async (s) => s)).resolves.toBe('system-secret');
    await expect(vault.withSecret('d', undefined, async (s) => s)).resolves.toBe('system-secret');
  });

  test('fails with CREDENTIAL.MISSING when nothing applies', async () => {
    expect(await codeOf(vault.withSecret('d', 'user_1', async (s) => s))).toBe('CREDENTIAL.MISSING');
  });

  test('reports a credential sealed under another key as unreadable without leaking it', async () => {
    const other = new CredentialVault(store.credentials, { ...TEST_VAULT, key: 'another-vault-key-0123456789abcdef' });
    const id = await other.store({ name: 'k', driverId: 'd', scope: { kind: 'system' }, secret: 'test-secret', createdBy: 'a' });

    expect(await codeOf(vault.reveal(id))).toBe('CREDENTIAL.UNREADABLE');
    const failure = logs.find((entry) => entry.message === 'Credential decryption failed');
    expect(failure?.context?.credentialId).toBe(id);
    expect(JSON.stringify(logs)).not.toContain('test-secret');
  });

  test('reports an unknown credential id as not found', async () => {
    expect(await codeOf(vault.reveal('cred_missing'))).toBe('VALIDATION.NOT_FOUND');
  });

  test('refuses a short master key', () => {
    expect(() => new CredentialVault(store.credentials, { key: 'short', salt: 'test-salt' })).toThrow(
      'Vault key must be at least 32 characters long',
    );
  });
});
