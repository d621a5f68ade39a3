/**
 * Secret Management Module
 *
 * Resolves {"$secret": "NAME"} descriptors so configuration files carry no
 * plaintext secrets.
 */

export type { ISecretProvider } from './ISecretProvider.js';
export { isSecretProvider } from './ISecretProvider.js';
export { SecretResolver, isSecretDescriptor, type SecretResolverConfig } from './SecretResolver.js';

export { FileSecretProvider } from './providers/FileSecretProvider.js';
export { EnvProvider } from './providers/EnvProvider.js';
