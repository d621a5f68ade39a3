/**
 * Secret Resolver
 *
 * Walks a parsed configuration object and replaces every {"$secret": "NAME"}
 * descriptor, in place, with the value returned by the provider chain.
 *
 * Usage:
 * ```typescript
 * const resolver = new SecretResolver();
 * resolver.addProvider(new FileSecretProvider('/run/secrets'));
 * resolver.addProvider(new EnvProvider());
 *
 * const raw: unknown = JSON.parse(await readFile(path, 'utf-8'));
 * await resolver.resolveSecrets(raw);
 * ```
 */

import { isSecretProvider } from './ISecretProvider.js';
import type { ISecretProvider } from './ISecretProvider.js';
import type { AuditService } from '../../core/audit-service.js';

export interface SecretResolverConfig {
  /** Records which provider answered each secret (never the value) */
  auditService?: AuditService;

  /** Throw when a secret cannot be resolved (default: true) */
  failFast?: boolean;
}

interface SecretDescriptor {
  $secret: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isSecretDescriptor(value: unknown): value is SecretDescriptor {
  return (
    isRecord(value) &&
    Object.keys(value).length === 1 &&
    typeof value.$secret === 'string' &&
    value.$secret.length > 0
  );
}

export class SecretResolver {
  private providers: ISecretProvider[] = [];
  private readonly auditService?: AuditService;
  private readonly failFast: boolean;

  constructor(config?: SecretResolverConfig) {
    this.auditService = config?.auditService;
    this.failFast = config?.failFast ?? true;
  }

  /**
   * Providers are queried in the order they were added.
   *
   * @throws Error if provider has no resolve() method
   */
  addProvider(provider: ISecretProvider): void {
    if (!isSecretProvider(provider)) {
      throw new Error('Provider must implement ISecretProvider interface');
    }
    this.providers.push(provider);
  }

  /**
   * @throws Error when failFast is set and a descriptor cannot be resolved
   */
  async resolveSecrets(config: unknown): Promise<void> {
    await this.resolveNode(config, 'config');
  }

  getProviders(): ISecretProvider[] {
    return [...this.providers];
  }

  clearProviders(): void {
    this.providers = [];
  }

  private async resolveNode(node: unknown, nodePath: string): Promise<void> {
    if (Array.isArray(node)) {
      for (let i = 0; i < node.length; i++) {
        const item: unknown = node[i];
        if (isSecretDescriptor(item)) {
          const value = await this.resolveDescriptor(item, `${nodePath}[${i}]`);
          if (value !== undefined) {
            node[i] = value;
          }
        } else {
          await this.resolveNode(item, `${nodePath}[${i}]`);
        }
      }
      return;
    }

    if (!isRecord(node)) {
      return;
    }

    for (const key of Object.keys(node)) {
      const child = node[key];
      const childPath = `${nodePath}.${key}`;

      if (isSecretDescriptor(child)) {
        const value = await this.resolveDescriptor(child, childPath);
        if (value !== undefined) {
          node[key] = value;
        }
      } else {
        await this.resolveNode(child, childPath);
      }
    }
  }

  private async resolveDescriptor(
    descriptor: SecretDescriptor,
    configPath: string
  ): Promise<string | undefined> {
    const logicalName = descriptor.$secret;

    for (const provider of this.providers) {
      try {
        const value = await provider.resolve(logicalName);
        if (value !== undefined) {
          await this.audit(logicalName, configPath, provider.constructor.name, true);
          return value;
        }
      } catch (error) {
        console.warn(`[SecretResolver] Provider ${provider.constructor.name} failed:`, {
          secretName: logicalName,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    await this.audit(logicalName, configPath, 'none', false);

    const message = `Secret "${logicalName}" at path "${configPath}" could not be resolved by any provider.`;
    if (this.failFast) {
      throw new Error(`[SecretResolver] ${message}`);
    }
    console.warn(`[SecretResolver] ${message}`);
    return undefined;
  }

  private async audit(
    secretName: string,
    configPath: string,
    provider: string,
    success: boolean
  ): Promise<void> {
    if (!this.auditService) {
      return;
    }
    await this.auditService.log({
      timestamp: new Date(),
      source: 'secret:resolution',
      action: `resolve:${secretName}`,
      success,
      reason: success ? undefined : 'secret_not_found',
      metadata: { secretName, provider, configPath },
    });
  }
}
