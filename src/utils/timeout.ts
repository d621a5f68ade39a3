/**
 * Lookup Timeout
 *
 * Bounds calls to external stores (identity registry, generation index,
 * login events) so an authentication check cannot hang on a slow backend.
 * A timeout surfaces as a LOOKUP_TIMEOUT AuthError; callers fail closed.
 */

import { AuthErrors } from './errors.js';

/**
 * Execute a promise with an optional timeout.
 *
 * @param promise - The pending lookup
 * @param timeoutMs - Limit in milliseconds; undefined or 0 disables the limit
 * @param operation - Description used in the error message
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number | undefined,
  operation: string
): Promise<T> {
  if (!timeoutMs) {
    return promise;
  }

  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<never>((_resolve, reject) => {
    timeoutId = setTimeout(() => {
      reject(AuthErrors.LOOKUP_TIMEOUT(operation, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}
