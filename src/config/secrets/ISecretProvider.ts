/**
 * Secret Provider Interface
 *
 * A provider looks a logical secret name up in one source (files, environment).
 * Providers are chained by SecretResolver; the first one that answers wins.
 */

export interface ISecretProvider {
  /**
   * Resolve a logical secret name.
   *
   * Return undefined for "not found" so the next provider is tried. Throw only
   * for unexpected failures.
   */
  resolve(logicalName: string): Promise<string | undefined>;
}

export function isSecretProvider(candidate: unknown): candidate is ISecretProvider {
  return (
    typeof candidate === 'object' &&
    candidate !== null &&
    'resolve' in candidate &&
    typeof candidate.resolve === 'function'
  );
}
