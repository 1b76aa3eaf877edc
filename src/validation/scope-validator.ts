import { ok } from '../types/result.js';
import { ERROR_INVALID_SCOPE } from '../errors/error-codes.js';
import { scopeService } from '../services/scope-service.js';
import { invalid, type ValidationResult } from './validation-result.js';

/**
 * Requested scopes split into OpenID identity scopes and API scopes
 */
export interface ValidatedScopes {
  scopes: string[];
  identityScopes: string[];
  apiScopes: string[];
}

export class ScopeValidator {
  parseScopes(scope: string | undefined): string[] {
    return scopeService.parseScopes(scope);
  }

  /**
   * Every scope must be allowed for the client, and must be an identity
   * scope or one of the tenant's API scopes.
   */
  validate(
    requested: readonly string[],
    clientAllowed: readonly string[],
    tenantAllowed: readonly string[]
  ): ValidationResult<ValidatedScopes> {
    for (const scope of requested) {
      if (!clientAllowed.includes(scope)) {
        return invalid(ERROR_INVALID_SCOPE, `Client is not allowed to request scope '${scope}'`);
      }
    }

    const identityScopes: string[] = [];
    const apiScopes: string[] = [];
    const unknown: string[] = [];

    for (const scope of requested) {
      if (scopeService.isIdentityScope(scope)) {
        identityScopes.push(scope);
      } else if (tenantAllowed.includes(scope)) {
        apiScopes.push(scope);
      } else {
        unknown.push(scope);
      }
    }

    if (unknown.length > 0) {
      return invalid(ERROR_INVALID_SCOPE, `Unknown scope(s): ${unknown.join(', ')}`);
    }

    return ok({ scopes: [...requested], identityScopes, apiScopes });
  }
}

export const scopeValidator = new ScopeValidator();
