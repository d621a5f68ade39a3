/**
 * File-Based Secret Provider
 *
 * Reads `{secretDir}/{logicalName}` (Docker and Kubernetes secret mounts).
 * Names that would escape secretDir are treated as not found.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { ISecretProvider } from '../ISecretProvider.js';

const NOT_FOUND_CODES = new Set(['ENOENT', 'EACCES', 'EISDIR']);

export class FileSecretProvider implements ISecretProvider {
  private readonly secretDir: string;

  constructor(secretDir: string = '/run/secrets') {
    this.secretDir = path.resolve(secretDir);
  }

  async resolve(logicalName: string): Promise<string | undefined> {
    if (logicalName.includes('..') || path.isAbsolute(logicalName)) {
      return undefined;
    }

    const filePath = path.resolve(this.secretDir, logicalName);
    if (!filePath.startsWith(this.secretDir + path.sep)) {
      return undefined;
    }

    try {
      const value = (await fs.readFile(filePath, 'utf-8')).trim();
      return value === '' ? undefined : value;
    } catch (error) {
      const code = error instanceof Error && 'code' in error ? error.code : undefined;
      if (typeof code === 'string' && NOT_FOUND_CODES.has(code)) {
        return undefined;
      }
      throw error;
    }
  }

  getSecretDir(): string {
    return this.secretDir;
  }
}
