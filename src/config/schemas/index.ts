/**
 * Unified Configuration Schema
 *
 * Structure:
 * - `auth`: token, identity, audit and authorization settings (REQUIRED)
 * - `storage`: PostgreSQL store settings (OPTIONAL)
 *
 * @example
 * ```json
 * {
 *   "auth": {
 *     "token": { "secret": { "$secret": "AUTH_TOKEN_SECRET" }, "lifetimeMinutes": 720 },
 *     "identity": { "standalone": false },
 *     "lookupTimeoutMs": 2000,
 *     "audit": { "enabled": true, "logAllAttempts": false },
 *     "authorization": {
 *       "rules": [{ "kind": "role", "role": "administrators", "actions": ["project:delete"] }]
 *     }
 *   },
 *   "storage": {
 *     "postgresql": { "host": "localhost", "database": "auth", "user": "auth", "password": { "$secret": "DB_PASSWORD" } }
 *   }
 * }
 * ```
 */

import { z } from 'zod';
import { AuthCoreConfigSchema } from './core.js';
import { StorageConfigSchema } from './storage.js';

export {
  TokenConfigSchema,
  IdentityConfigSchema,
  AuditConfigSchema,
  PolicyRuleSchema,
  AuthorizationConfigSchema,
  AuthCoreConfigSchema,
  type TokenConfig,
  type IdentityConfig,
  type AuditConfig,
  type PolicyRuleConfig,
  type AuthorizationConfig,
  type AuthCoreConfig,
} from './core.js';

export {
  PostgreSQLConfigSchema,
  StorageConfigSchema,
  type PostgreSQLConfig,
  type StorageConfig,
} from './storage.js';

export const UnifiedConfigSchema = z.object({
  auth: AuthCoreConfigSchema.describe('Authentication core configuration (REQUIRED)'),
  storage: StorageConfigSchema.optional().describe('Store configuration'),
});

export type UnifiedConfig = z.infer<typeof UnifiedConfigSchema>;
