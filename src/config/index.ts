/**
 * Configuration Module - Public API
 */

export { ConfigManager, DEFAULT_CONFIG_PATH, type ConfigManagerOptions } from './manager.js';

export {
  UnifiedConfigSchema,
  AuthCoreConfigSchema,
  TokenConfigSchema,
  IdentityConfigSchema,
  AuditConfigSchema,
  PolicyRuleSchema,
  AuthorizationConfigSchema,
  PostgreSQLConfigSchema,
  StorageConfigSchema,
  type UnifiedConfig,
  type AuthCoreConfig,
  type TokenConfig,
  type IdentityConfig,
  type AuditConfig,
  type PolicyRuleConfig,
  type AuthorizationConfig,
  type PostgreSQLConfig,
  type StorageConfig,
} from './schemas/index.js';

export * from './secrets/index.js';
