/**
 * Core Authentication Configuration Schema
 *
 * Defines configuration for token handling, identity rules, audit and
 * authorization policy. Secret descriptors ({"$secret": "NAME"}) are resolved
 * before validation, so secret fields are plain strings here.
 */

import { z } from 'zod';
import {
  ADMIN_GROUP_ID,
  CORE_SYSTEM_ACCOUNT_ID,
  ROLE_ADMINISTRATORS,
  ROLE_EVERYONE,
  ROLE_SYSTEM,
  ROLE_USERS,
} from '../../core/types.js';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

// Account and group ids compare case-insensitively everywhere else
const toLowerCaseId = (id: string): string => id.toLowerCase();

// ============================================================================
// Token
// ============================================================================

/**
 * Session token settings
 *
 * SECURITY: the secret derives the token encryption key. Rotating it
 * invalidates every outstanding token; bump tenant generations afterwards so
 * the revocation is recorded.
 */
export const TokenConfigSchema = z.object({
  secret: z
    .string()
    .min(32, 'Token secret must be at least 32 characters')
    .describe('Server-held token secret (use {"$secret": "NAME"} in the config file)'),
  lifetimeMinutes: z
    .number()
    .int()
    .min(0)
    .optional()
    .default(0)
    .describe('Token lifetime in minutes (0 = never expires)'),
  bearerSentinel: z
    .string()
    .min(1)
    .optional()
    .default('Bearer')
    .describe('Cookie value that signals header-based auth is in use'),
});

// ============================================================================
// Identity
// ============================================================================

export const IdentityConfigSchema = z.object({
  systemAccountId: z
    .string()
    .regex(UUID_PATTERN, 'Must be a UUID')
    .transform(toLowerCaseId)
    .optional()
    .default(CORE_SYSTEM_ACCOUNT_ID)
    .describe('Account id that receives the system role'),
  adminGroupId: z
    .string()
    .regex(UUID_PATTERN, 'Must be a UUID')
    .transform(toLowerCaseId)
    .optional()
    .default(ADMIN_GROUP_ID)
    .describe('Group whose members are administrators'),
  standalone: z
    .boolean()
    .optional()
    .default(false)
    .describe('Self-hosted install: every feature (including directory login) is licensed'),
});

// ============================================================================
// Audit
// ============================================================================

export const AuditConfigSchema = z.object({
  enabled: z.boolean().optional().default(true).describe('Enable audit logging'),
  logAllAttempts: z
    .boolean()
    .optional()
    .default(true)
    .describe('Log all authentication attempts (success and failure)'),
  maxEntries: z
    .number()
    .int()
    .min(1)
    .optional()
    .describe('Capacity of the in-memory audit storage'),
});

// ============================================================================
// Authorization
// ============================================================================

const RoleSchema = z.enum([ROLE_EVERYONE, ROLE_SYSTEM, ROLE_ADMINISTRATORS, ROLE_USERS]);

const ActionsSchema = z.array(z.string().min(1)).min(1);

const ObjectTypeSchema = z
  .string()
  .min(1)
  .optional()
  .describe('Restrict the rule to resources of this type');

/**
 * Policy rule
 *
 * SECURITY: there are no default rules. An empty rule list denies everything.
 */
export const PolicyRuleSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('role'),
    role: RoleSchema,
    actions: ActionsSchema,
    objectType: ObjectTypeSchema,
  }),
  z.object({
    kind: z.literal('account'),
    accountId: z.string().min(1),
    actions: ActionsSchema,
    objectType: ObjectTypeSchema,
  }),
  z.object({
    kind: z.literal('owner'),
    actions: ActionsSchema,
    objectType: ObjectTypeSchema,
  }),
  z.object({
    kind: z.literal('acl'),
    objectType: ObjectTypeSchema,
  }),
]);

export const AuthorizationConfigSchema = z.object({
  rules: z.array(PolicyRuleSchema).describe('Policy rules; a request is granted if ANY rule grants ALL actions'),
});

// ============================================================================
// Core Authentication Configuration
// ============================================================================

export const AuthCoreConfigSchema = z.object({
  token: TokenConfigSchema.describe('Session token settings'),
  identity: IdentityConfigSchema.optional()
    .default({})
    .describe('Identity assignment settings'),
  lookupTimeoutMs: z
    .number()
    .int()
    .min(1)
    .max(60000)
    .optional()
    .describe('Upper bound for each store lookup during authentication (ms)'),
  audit: AuditConfigSchema.optional().describe('Audit logging settings'),
  authorization: AuthorizationConfigSchema.optional()
    .default({ rules: [] })
    .describe('Authorization policy'),
});

// ============================================================================
// TypeScript Types
// ============================================================================

export type TokenConfig = z.infer<typeof TokenConfigSchema>;
export type IdentityConfig = z.infer<typeof IdentityConfigSchema>;
export type AuditConfig = z.infer<typeof AuditConfigSchema>;
export type PolicyRuleConfig = z.infer<typeof PolicyRuleSchema>;
export type AuthorizationConfig = z.infer<typeof AuthorizationConfigSchema>;
export type AuthCoreConfig = z.infer<typeof AuthCoreConfigSchema>;
