import { readFile } from 'fs/promises';
import {
  UnifiedConfigSchema,
  type AuthCoreConfig,
  type PostgreSQLConfig,
  type UnifiedConfig,
} from './schemas/index.js';
import { SecretResolver, FileSecretProvider, EnvProvider } from './secrets/index.js';
import type { AuditService } from '../core/audit-service.js';

export const DEFAULT_CONFIG_PATH = './config/auth-core.json';

export interface ConfigManagerOptions {
  /** Records secret resolution (optional) */
  auditService?: AuditService;

  /** Directory for file-based secrets (default: '/run/secrets') */
  secretsDir?: string;

  /** Environment used for CONFIG_PATH, NODE_ENV and EnvProvider (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

export class ConfigManager {
  private config: UnifiedConfig | null = null;
  private readonly env: NodeJS.ProcessEnv;
  private readonly secretResolver: SecretResolver;

  constructor(options?: ConfigManagerOptions) {
    this.env = options?.env ?? process.env;

    this.secretResolver = new SecretResolver({
      auditService: options?.auditService,
      failFast: true,
    });

    // Files first (production mounts), environment as fallback
    this.secretResolver.addProvider(new FileSecretProvider(options?.secretsDir ?? '/run/secrets'));
    this.secretResolver.addProvider(new EnvProvider(this.env));
  }

  /**
   * Load, resolve secrets in, and validate the configuration file.
   *
   * Path: argument, then CONFIG_PATH, then ./config/auth-core.json.
   */
  async loadConfig(configPath?: string): Promise<UnifiedConfig> {
    if (this.config) {
      return this.config;
    }

    const path = configPath || this.env.CONFIG_PATH || DEFAULT_CONFIG_PATH;

    try {
      const rawConfig: unknown = JSON.parse(await readFile(path, 'utf-8'));

      // Descriptors must be gone before validation sees the secret fields
      console.log('[ConfigManager] Resolving secrets...');
      await this.secretResolver.resolveSecrets(rawConfig);

      const config = UnifiedConfigSchema.parse(rawConfig);
      this.validateSecurityRequirements(config);
      this.config = config;

      console.log('[ConfigManager] Configuration loaded and validated successfully:', { path });
      return config;
    } catch (error) {
      if (error instanceof Error) {
        throw new Error(`Failed to load configuration: ${error.message}`);
      }
      throw error;
    }
  }

  getConfig(): UnifiedConfig {
    if (!this.config) {
      throw new Error('Configuration not loaded. Call loadConfig() first.');
    }
    return this.config;
  }

  getAuthConfig(): AuthCoreConfig {
    return this.getConfig().auth;
  }

  getPostgreSQLConfig(): PostgreSQLConfig | undefined {
    return this.getConfig().storage?.postgresql;
  }

  async reloadConfig(configPath?: string): Promise<UnifiedConfig> {
    this.config = null;
    console.log('[ConfigManager] Reloading configuration...');
    return this.loadConfig(configPath);
  }

  getSecretResolver(): SecretResolver {
    return this.secretResolver;
  }

  isSecureEnvironment(): boolean {
    return this.env.NODE_ENV === 'production';
  }

  private validateSecurityRequirements(config: UnifiedConfig): void {
    const auth = config.auth;

    if (auth.authorization.rules.length === 0) {
      console.warn('[ConfigManager] No authorization rules configured: every permission check will be denied');
    }

    if (!this.isSecureEnvironment()) {
      return;
    }

    if (auth.token.lifetimeMinutes === 0) {
      console.warn('[ConfigManager] Session tokens never expire - consider setting auth.token.lifetimeMinutes');
    }

    if (auth.identity.standalone) {
      console.warn('[ConfigManager] Standalone mode licenses every feature, including directory login');
    }

    if (!auth.audit || !auth.audit.enabled || !auth.audit.logAllAttempts) {
      console.warn('[ConfigManager] Audit logging should be enabled in production environments');
    }
  }
}
