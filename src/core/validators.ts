/**
 * Core Validators
 *
 * Runtime validation for hand-assembled CoreContext objects. Hosts that build
 * a CoreContext themselves (instead of createSecurityContext) are checked at
 * SecurityContext construction, not on the first request.
 */

import type { CoreContext } from './security-context.js';

const REQUIRED_SERVICES = [
  ['authService', 'AuthenticationService'],
  ['permissionResolver', 'PermissionResolver'],
  ['identityContext', 'IdentityContext'],
  ['generations', 'GenerationIndex'],
  ['loginEvents', 'LoginEventRegistry'],
  ['auditService', 'AuditService'],
] as const;

export class CoreContextValidator {
  /**
   * @throws {Error} If any required service is missing
   */
  static validate(context: unknown): asserts context is CoreContext {
    if (!context || typeof context !== 'object') {
      throw new Error('CoreContext missing required field: context must be a valid object');
    }

    const fields: Record<string, unknown> = { ...context };
    for (const [field, service] of REQUIRED_SERVICES) {
      if (!fields[field]) {
        throw new Error(
          `CoreContext missing required field: ${field}. ` +
            `Ensure ${service} is initialized before creating the SecurityContext.`
        );
      }
    }
  }

  static isValid(context: unknown): context is CoreContext {
    return (
      typeof context === 'object' &&
      context !== null &&
      REQUIRED_SERVICES.every(([field]) => field in context)
    );
  }
}
