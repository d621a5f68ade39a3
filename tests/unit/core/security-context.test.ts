/**
 * SecurityContext Tests
 *
 * Facade wiring: request scoping, authentication state and permission
 * demands end to end over the in-memory collaborators.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createSecurityContext } from '../../../src/core/security-context.js';
import type { PolicyRule, SecurityObject } from '../../../src/core/permission-resolver.js';
import { GUEST_ACCOUNT_ID, createSystemAccount } from '../../../src/core/types.js';
import { AccessDeniedError } from '../../../src/utils/errors.js';
import {
  InMemoryGenerationIndexStore,
  InMemoryIdentityRegistry,
  InMemoryLoginEventStore,
  InMemoryTenantContext,
  TEST_TOKEN_SECRET,
  createTestSecurityContext,
} from '../../../src/testing/index.js';

const OWNER_ID = '11111111-1111-4111-8111-111111111111';
const OTHER_ID = '22222222-2222-4222-8222-222222222222';

const OWNER_ONLY: PolicyRule[] = [{ kind: 'owner', actions: ['project:view', 'project:edit'] }];

const project: SecurityObject = {
  objectType: 'project',
  objectId: 'p-1',
  ownerId: OWNER_ID,
};

function harnessWithUsers(rules: PolicyRule[] = OWNER_ONLY) {
  const harness = createTestSecurityContext({ rules });
  harness.registry.addUser({ id: OWNER_ID, login: 'owner', passwordHash: 'hash-owner' });
  harness.registry.addUser({ id: OTHER_ID, login: 'other', passwordHash: 'hash-other' });
  return harness;
}

describe('SecurityContext', () => {
  beforeEach(() => {
    vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  describe('Identity state', () => {
    it('should be anonymous outside a request scope', () => {
      const { security } = harnessWithUsers();

      expect(security.currentIdentity.account.id).toBe(GUEST_ACCOUNT_ID);
      expect(security.isAuthenticated).toBe(false);
      expect(security.sessionState).toBe('anonymous');
    });

    it('should track the session state through sign-in and logout', async () => {
      const { security } = harnessWithUsers();

      const states = await security.runInRequestScope(async () => {
        const seen = [security.sessionState];
        await security.authenticateByCredential('owner', 'hash-owner');
        seen.push(security.sessionState);
        security.logout();
        seen.push(security.sessionState);
        await security.authenticateByCredential('owner', 'wrong');
        seen.push(security.sessionState);
        return seen;
      });

      expect(states).toEqual(['anonymous', 'authenticated', 'anonymous', 'rejected']);
    });

    it('should keep concurrent request scopes isolated', async () => {
      const { security } = harnessWithUsers();

      const [first, second] = await Promise.all([
        security.runInRequestScope(async () => {
          await security.authenticateByCredential('owner', 'hash-owner');
          await new Promise((resolve) => setTimeout(resolve, 5));
          return security.currentIdentity.account.id;
        }),
        security.runInRequestScope(async () => {
          await security.authenticateByCredential('other', 'hash-other');
          return security.currentIdentity.account.id;
        }),
      ]);

      expect(first).toBe(OWNER_ID);
      expect(second).toBe(OTHER_ID);
      expect(security.currentIdentity.account.id).toBe(GUEST_ACCOUNT_ID);
    });

    it('should switch identity with assignIdentity', async () => {
      const harness = harnessWithUsers();
      harness.registry.addSystemAccount('33333333-3333-4333-8333-333333333333');

      const roles = await harness.security.runInRequestScope(async () => {
        const result = await harness.security.assignIdentity(
          createSystemAccount('33333333-3333-4333-8333-333333333333', 1)
        );
        return result.ok ? result.value.roles : null;
      });

      // Not the configured system account id, so no system role
      expect(roles).toEqual(['everyone']);
    });
  });

  describe('Permissions', () => {
    it('should let only the owner edit an owner-only resource', async () => {
      const harness = harnessWithUsers();
      const { security } = harness;

      await security.runInRequestScope(async () => {
        await security.authenticateByCredential('owner', 'hash-owner');
        expect(security.checkPermissions(['project:edit'], project)).toBe(true);
        await expect(security.demandPermissions(['project:edit'], project)).resolves.toBeUndefined();
      });

      await security.runInRequestScope(async () => {
        await security.authenticateByCredential('other', 'hash-other');
        expect(security.checkPermissions(['project:edit'], project)).toBe(false);
        await expect(security.demandPermissions(['project:edit'], project)).rejects.toThrow(
          AccessDeniedError
        );
      });

      const entries = harness.auditStorage.getEntries();
      expect(entries[entries.length - 1]).toMatchObject({
        source: 'authz:resolver',
        tenantId: 1,
        userId: OTHER_ID,
        action: 'demand_permissions',
        success: false,
        reason: 'ACCESS_DENIED',
        metadata: { actions: ['project:edit'], resource: 'project:p-1' },
      });
    });

    it('should deny an anonymous caller', async () => {
      const { security } = harnessWithUsers();

      await security.runInRequestScope(async () => {
        await expect(security.demandPermissions(['project:view'], project)).rejects.toThrow(
          `Access denied for ${GUEST_ACCOUNT_ID}: project:view on project:p-1`
        );
      });
    });

    it('should keep the access denial when the audit write fails', async () => {
      const harness = harnessWithUsers();
      const { security } = harness;
      vi.spyOn(console, 'error').mockImplementation(() => undefined);
      vi.spyOn(harness.auditStorage, 'log').mockImplementation((entry) => {
        if (entry.action === 'demand_permissions') {
          throw new Error('audit down');
        }
      });

      const denial = await security.runInRequestScope(async () => {
        await security.authenticateByCredential('other', 'hash-other');
        return security.demandPermissions(['project:edit'], project).catch((caught: unknown) => caught);
      });

      expect(denial).toBeInstanceOf(AccessDeniedError);
      expect(denial).toMatchObject({ actorId: OTHER_ID, actions: ['project:edit'] });
      expect(console.error).toHaveBeenCalledWith('[SecurityContext] Audit write failed:', {
        action: 'demand_permissions',
        error: expect.objectContaining({ message: 'audit down' }),
      });
    });

    it('should grant through a role rule seeded from configuration', async () => {
      const { security } = harnessWithUsers([
        { kind: 'role', role: 'users', actions: ['project:list'] },
      ]);

      const granted = await security.runInRequestScope(async () => {
        await security.authenticateByCredential('other', 'hash-other');
        return security.checkPermissions(['project:list']);
      });

      expect(granted).toBe(true);
    });
  });

  describe('Revocation', () => {
    it('should sign out one device through createLoginEventFactory', async () => {
      const { security } = harnessWithUsers();

      const phone = await security.runInRequestScope(() =>
        security.authenticateByCredential('owner', 'hash-owner', security.createLoginEventFactory())
      );
      const laptop = await security.runInRequestScope(() =>
        security.authenticateByCredential('owner', 'hash-owner', security.createLoginEventFactory())
      );
      const phoneToken = phone.success ? phone.token : null;
      const laptopToken = laptop.success ? laptop.token : null;

      await security.runInRequestScope(() => security.revokeLoginEvent(OWNER_ID, 1));

      expect(await security.runInRequestScope(() => security.authenticateByToken(phoneToken))).toBe(false);
      expect(await security.runInRequestScope(() => security.authenticateByToken(laptopToken))).toBe(true);
    });

    it('should invalidate tokens after a password change', async () => {
      const { security } = harnessWithUsers();

      const signedIn = await security.runInRequestScope(() =>
        security.authenticateByCredential('owner', 'hash-owner')
      );
      const token = signedIn.success ? signedIn.token : null;
      const changed = await security.runInRequestScope(() =>
        security.changePassword(OWNER_ID, 'hash-owner-2')
      );

      expect(changed).toEqual({ ok: true, value: 1 });
      expect(await security.runInRequestScope(() => security.authenticateByToken(token))).toBe(false);
    });

    it('should invalidate every session with logoutAllSessions and resetTenantSessions', async () => {
      const { security } = harnessWithUsers();
      const signIn = async (login: string, hash: string) => {
        const result = await security.runInRequestScope(() =>
          security.authenticateByCredential(login, hash)
        );
        return result.success ? result.token : null;
      };

      const ownerToken = await signIn('owner', 'hash-owner');
      const otherToken = await signIn('other', 'hash-other');

      await security.runInRequestScope(() => security.logoutAllSessions(OWNER_ID));
      expect(await security.runInRequestScope(() => security.authenticateByToken(ownerToken))).toBe(false);
      expect(await security.runInRequestScope(() => security.authenticateByToken(otherToken))).toBe(true);

      await security.runInRequestScope(() => security.resetTenantSessions());
      expect(await security.runInRequestScope(() => security.authenticateByToken(otherToken))).toBe(false);
    });
  });

  describe('createSecurityContext', () => {
    it('should honour the configured token lifetime and clock', async () => {
      let now = Date.parse('2026-05-01T00:00:00.000Z');
      const registry = new InMemoryIdentityRegistry();
      registry.addUser({ id: OWNER_ID, login: 'owner', passwordHash: 'hash-owner' });

      const security = createSecurityContext(
        { token: { secret: TEST_TOKEN_SECRET, lifetimeMinutes: 1 }, now: () => now },
        {
          tenantContext: new InMemoryTenantContext(),
          identityRegistry: registry,
          generationStore: new InMemoryGenerationIndexStore(),
          loginEventStore: new InMemoryLoginEventStore(),
        }
      );

      const result = await security.runInRequestScope(() =>
        security.authenticateByCredential('owner', 'hash-owner')
      );
      const token = result.success ? result.token : null;

      now += 60_000;
      expect(await security.runInRequestScope(() => security.authenticateByToken(token))).toBe(true);
      now += 1;
      expect(await security.runInRequestScope(() => security.authenticateByToken(token))).toBe(false);
    });

    it('should honour a custom bearer sentinel', async () => {
      const harness = createTestSecurityContext({
        config: { token: { secret: TEST_TOKEN_SECRET, bearerSentinel: 'Header' } },
      });

      await harness.security.runInRequestScope(() => harness.security.authenticateByToken('Header'));

      expect(console.info).toHaveBeenCalledWith(
        '[AuthenticationService] Bearer sentinel received, skipping cookie auth:',
        {}
      );
    });

    it('should reject a short token secret', () => {
      expect(() => createTestSecurityContext({ config: { token: { secret: 'short' } } })).toThrow(
        'Configuration error: token secret must be at least 32 characters'
      );
    });

    it('should expose the wired services', () => {
      const { security } = harnessWithUsers();
      const core = security._getCoreContext();

      expect(core.auditService.isEnabled()).toBe(true);
      expect(core.identityContext.isInScope()).toBe(false);
    });
  });
});
