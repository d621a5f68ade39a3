/**
 * Environment Variable Secret Provider
 *
 * Reads process.env[logicalName]. Intended as the fallback after
 * FileSecretProvider: environment variables leak into child processes and
 * crash dumps more easily than mounted files.
 */

import type { ISecretProvider } from '../ISecretProvider.js';

export class EnvProvider implements ISecretProvider {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async resolve(logicalName: string): Promise<string | undefined> {
    const value = this.env[logicalName];
    if (value === undefined || value.trim() === '') {
      return undefined;
    }
    return value.trim();
  }
}
