/**
 * Unit Tests for SecretResolver
 *
 * Provider chain order, recursive replacement, fail-fast and audit.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { SecretResolver, isSecretDescriptor } from '../../../../src/config/secrets/SecretResolver.js';
import { isSecretProvider } from '../../../../src/config/secrets/ISecretProvider.js';
import type { ISecretProvider } from '../../../../src/config/secrets/ISecretProvider.js';
import { AuditService, InMemoryAuditStorage } from '../../../../src/core/audit-service.js';

class MapProvider implements ISecretProvider {
  private readonly secrets: Map<string, string>;

  constructor(secrets: Record<string, string>) {
    this.secrets = new Map(Object.entries(secrets));
  }

  async resolve(logicalName: string): Promise<string | undefined> {
    return this.secrets.get(logicalName);
  }
}

class FailingProvider implements ISecretProvider {
  async resolve(logicalName: string): Promise<string | undefined> {
    throw new Error(`backend unavailable for ${logicalName}`);
  }
}

describe('SecretResolver', () => {
  let resolver: SecretResolver;

  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    resolver = new SecretResolver();
  });

  describe('isSecretDescriptor', () => {
    it('should recognise exactly one non-empty $secret key', () => {
      expect(isSecretDescriptor({ $secret: 'AUTH_TOKEN_SECRET' })).toBe(true);
      expect(isSecretDescriptor({ $secret: '' })).toBe(false);
      expect(isSecretDescriptor({ $secret: 'A', extra: 1 })).toBe(false);
      expect(isSecretDescriptor([{ $secret: 'A' }])).toBe(false);
      expect(isSecretDescriptor('AUTH_TOKEN_SECRET')).toBe(false);
    });
  });

  describe('isSecretProvider', () => {
    it('should require a resolve function', () => {
      expect(isSecretProvider(new MapProvider({}))).toBe(true);
      expect(isSecretProvider({ resolve: 'nope' })).toBe(false);
      expect(isSecretProvider(null)).toBe(false);
    });
  });

  describe('addProvider', () => {
    it('should keep providers in insertion order', () => {
      const first = new MapProvider({});
      const second = new FailingProvider();
      resolver.addProvider(first);
      resolver.addProvider(second);

      expect(resolver.getProviders()).toEqual([first, second]);
    });

    it('should clear providers', () => {
      resolver.addProvider(new MapProvider({}));
      resolver.clearProviders();

      expect(resolver.getProviders()).toEqual([]);
    });
  });

  describe('resolveSecrets', () => {
    it('should replace nested descriptors in place', async () => {
      resolver.addProvider(new MapProvider({ TOKEN: 'test-secret', DB: 'test-password' }));
      const config = {
        auth: { token: { secret: { $secret: 'TOKEN' }, lifetimeMinutes: 60 } },
        storage: { postgresql: { password: { $secret: 'DB' } } },
        list: [{ $secret: 'DB' }, 'plain'],
      };

      await resolver.resolveSecrets(config);

      expect(config).toEqual({
        auth: { token: { secret: 'test-secret', lifetimeMinutes: 60 } },
        storage: { postgresql: { password: 'test-password' } },
        list: ['test-password', 'plain'],
      });
    });

    it('should use the first provider that answers', async () => {
      resolver.addProvider(new MapProvider({ TOKEN: 'from-file' }));
      resolver.addProvider(new MapProvider({ TOKEN: 'from-env' }));
      const config = { secret: { $secret: 'TOKEN' } };

      await resolver.resolveSecrets(config);

      expect(config.secret).toBe('from-file');
    });

    it('should fall through a provider that throws', async () => {
      resolver.addProvider(new FailingProvider());
      resolver.addProvider(new MapProvider({ TOKEN: 'test-secret' }));
      const config = { secret: { $secret: 'TOKEN' } };

      await resolver.resolveSecrets(config);

      expect(config.secret).toBe('test-secret');
      expect(console.warn).toHaveBeenCalledWith('[SecretResolver] Provider FailingProvider failed:', {
        secretName: 'TOKEN',
        error: 'backend unavailable for TOKEN',
      });
    });

    it('should throw with the config path when failFast is set', async () => {
      resolver.addProvider(new MapProvider({}));

      await expect(
        resolver.resolveSecrets({ auth: { token: { secret: { $secret: 'TOKEN' } } } })
      ).rejects.toThrow(
        '[SecretResolver] Secret "TOKEN" at path "config.auth.token.secret" could not be resolved by any provider.'
      );
    });

    it('should leave the descriptor and warn when failFast is off', async () => {
      const lenient = new SecretResolver({ failFast: false });
      const config = { secret: { $secret: 'TOKEN' } };

      await lenient.resolveSecrets(config);

      expect(config.secret).toEqual({ $secret: 'TOKEN' });
      expect(console.warn).toHaveBeenCalledWith(
        '[SecretResolver] Secret "TOKEN" at path "config.secret" could not be resolved by any provider.'
      );
    });

    it('should ignore primitives', async () => {
      await expect(resolver.resolveSecrets('plain')).resolves.toBeUndefined();
      await expect(resolver.resolveSecrets(null)).resolves.toBeUndefined();
    });
  });

  describe('audit', () => {
    it('should record the provider but never the value', async () => {
      const storage = new InMemoryAuditStorage();
      const audited = new SecretResolver({
        auditService: new AuditService({ enabled: true, storage }),
        failFast: false,
      });
      audited.addProvider(new MapProvider({ TOKEN: 'test-secret' }));

      await audited.resolveSecrets({ a: { $secret: 'TOKEN' }, b: { $secret: 'MISSING' } });

      const entries = storage.getEntries();
      expect(entries).toHaveLength(2);
      expect(entries[0]).toMatchObject({
        source: 'secret:resolution',
        action: 'resolve:TOKEN',
        success: true,
        metadata: { secretName: 'TOKEN', provider: 'MapProvider', configPath: 'config.a' },
      });
      expect(entries[1]).toMatchObject({
        action: 'resolve:MISSING',
        success: false,
        reason: 'secret_not_found',
        metadata: { provider: 'none' },
      });
      expect(JSON.stringify(entries)).not.toContain('test-secret');
    });
  });
});
