/**
 * Permission Resolver - Policy Engine
 *
 * Decides whether an identity may perform a set of actions, optionally on a
 * resource. A request is granted when ANY rule grants ALL requested actions.
 *
 * Rules are policy data supplied by a PolicyStore:
 * - role:    holders of a role get the listed actions
 * - account: one specific account gets the listed actions
 * - owner:   the resource owner gets the listed actions
 * - acl:     the resource's own ACL is consulted (entries keyed by account id or role)
 *
 * Any rule may be narrowed to one objectType; such a rule only applies to
 * resource-scoped checks on that type.
 *
 * Decisions are pure: no clock, no I/O, no dependence on rule order.
 *
 * Usage:
 * ```typescript
 * const resolver = new PermissionResolver(new InMemoryPolicyStore([
 *   { kind: 'role', role: 'administrators', actions: ['project:edit', 'project:delete'] },
 *   { kind: 'owner', actions: ['project:edit'] },
 * ]));
 *
 * resolver.check(identity, ['project:edit'], project);   // boolean
 * resolver.demand(identity, ['project:delete'], project); // throws AccessDeniedError
 * ```
 */

import { AccessDeniedError, AuthErrors } from '../utils/errors.js';
import { hasRole } from './types.js';
import type { CurrentIdentity, Role } from './types.js';

// ============================================================================
// Types
// ============================================================================

/** Opaque operation name, e.g. 'project:edit'. */
export type Action = string;

export interface SecurityObjectId {
  objectType: string;
  objectId: string;
}

export interface AclEntry {
  /** Account id or role name */
  subject: string;
  actions: readonly Action[];
}

/**
 * A resource reference. When no ResourceSecurityProvider is passed, ownership
 * and ACL are taken from the object itself.
 */
export interface SecurityObject extends SecurityObjectId {
  ownerId?: string;
  acl?: readonly AclEntry[];
}

/** Looks up ownership and ACL for resources referenced by id only. */
export interface ResourceSecurityProvider {
  getOwnerId(resource: SecurityObjectId): string | undefined;
  getAcl(resource: SecurityObjectId): readonly AclEntry[];
}

interface RuleScope {
  /** Only applies to resources of this type */
  objectType?: string;
}

export type PolicyRule =
  | (RuleScope & { kind: 'role'; role: Role; actions: readonly Action[] })
  | (RuleScope & { kind: 'account'; accountId: string; actions: readonly Action[] })
  | (RuleScope & { kind: 'owner'; actions: readonly Action[] })
  | (RuleScope & { kind: 'acl' });

export interface PolicyStore {
  getRules(): readonly PolicyRule[];
}

export class InMemoryPolicyStore implements PolicyStore {
  private rules: PolicyRule[];

  constructor(rules: readonly PolicyRule[] = []) {
    this.rules = [...rules];
  }

  getRules(): readonly PolicyRule[] {
    return this.rules;
  }

  addRule(rule: PolicyRule): void {
    this.rules = [...this.rules, rule];
  }

  replaceRules(rules: readonly PolicyRule[]): void {
    this.rules = [...rules];
  }
}

/** Resource security facts resolved once per check. */
interface ResolvedResource {
  objectType: string;
  ownerId?: string;
  acl: readonly AclEntry[];
}

const EMPTY: ReadonlySet<Action> = new Set<Action>();

// ============================================================================
// Permission Resolver Class
// ============================================================================

export class PermissionResolver {
  constructor(private readonly policyStore: PolicyStore) {}

  /**
   * @throws AuthError INVALID_ARGUMENT when no actions are requested
   */
  check(
    identity: CurrentIdentity,
    actions: readonly Action[],
    resource?: SecurityObject,
    provider?: ResourceSecurityProvider
  ): boolean {
    if (actions.length === 0) {
      throw AuthErrors.INVALID_ARGUMENT('At least one action must be requested');
    }

    const resolved = resource ? this.resolveResource(resource, provider) : undefined;

    return this.policyStore.getRules().some((rule) => {
      const granted = this.grantedBy(rule, identity, resolved);
      return actions.every((action) => granted.has(action));
    });
  }

  /**
   * Same decision as check(), but denial is an error.
   *
   * @throws AccessDeniedError carrying the actor id and requested actions
   */
  demand(
    identity: CurrentIdentity,
    actions: readonly Action[],
    resource?: SecurityObject,
    provider?: ResourceSecurityProvider
  ): void {
    if (this.check(identity, actions, resource, provider)) {
      return;
    }

    const label = resource ? `${resource.objectType}:${resource.objectId}` : undefined;
    console.warn('[PermissionResolver] Access denied:', {
      actorId: identity.account.id,
      roles: identity.roles,
      actions,
      resource: label,
    });
    throw new AccessDeniedError(identity.account.id, actions, label);
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private grantedBy(
    rule: PolicyRule,
    identity: CurrentIdentity,
    resource: ResolvedResource | undefined
  ): ReadonlySet<Action> {
    if (rule.objectType !== undefined && rule.objectType !== resource?.objectType) {
      return EMPTY;
    }

    switch (rule.kind) {
      case 'role':
        return hasRole(identity, rule.role) ? new Set(rule.actions) : EMPTY;

      case 'account':
        return identity.account.id === rule.accountId && identity.account.authenticated
          ? new Set(rule.actions)
          : EMPTY;

      case 'owner':
        return resource?.ownerId !== undefined &&
          identity.account.authenticated &&
          resource.ownerId === identity.account.id
          ? new Set(rule.actions)
          : EMPTY;

      case 'acl': {
        if (!resource) {
          return EMPTY;
        }
        const subjects = new Set<string>([...identity.roles]);
        if (identity.account.authenticated) {
          subjects.add(identity.account.id);
        }
        const granted = new Set<Action>();
        for (const entry of resource.acl) {
          if (subjects.has(entry.subject)) {
            entry.actions.forEach((action) => granted.add(action));
          }
        }
        return granted;
      }

      default: {
        const unreachable: never = rule;
        throw new Error(`Unhandled policy rule: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  private resolveResource(
    resource: SecurityObject,
    provider?: ResourceSecurityProvider
  ): ResolvedResource {
    if (provider) {
      return {
        objectType: resource.objectType,
        ownerId: provider.getOwnerId(resource),
        acl: provider.getAcl(resource),
      };
    }

    return {
      objectType: resource.objectType,
      ownerId: resource.ownerId,
      acl: resource.acl ?? [],
    };
  }
}
