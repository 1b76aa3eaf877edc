import {
  ADDRESS_SCOPE,
  EMAIL_SCOPE,
  IDENTITY_SCOPES,
  OFFLINE_ACCESS_SCOPE,
  OPENID_SCOPE,
  PHONE_SCOPE,
  PROFILE_SCOPE,
} from '../config/constants.js';

/**
 * Scope string helpers shared by validators, grants and token issuance
 */
export class ScopeService {
  /**
   * Split a space-delimited scope string, trimming and dropping duplicates
   */
  parseScopes(scopeString: string | undefined): string[] {
    if (!scopeString) {
      return [];
    }
    return [...new Set(scopeString.split(' ').map((s) => s.trim()).filter((s) => s.length > 0))];
  }

  formatScopes(scopes: readonly string[]): string {
    return scopes.join(' ');
  }

  hasScope(scopes: readonly string[], scope: string): boolean {
    return scopes.includes(scope);
  }

  /** Whether every scope in `subset` is also in `scopes` */
  isSubset(subset: readonly string[], scopes: readonly string[]): boolean {
    return subset.every((scope) => scopes.includes(scope));
  }

  isIdentityScope(scope: string): boolean {
    return (IDENTITY_SCOPES as readonly string[]).includes(scope);
  }

  hasOfflineAccess(scopes: readonly string[]): boolean {
    return this.hasScope(scopes, OFFLINE_ACCESS_SCOPE);
  }

  isOpenIdScope(scopes: readonly string[]): boolean {
    return this.hasScope(scopes, OPENID_SCOPE);
  }

  /**
   * Claim-bearing scopes (profile, email, address, phone) in the set
   */
  getClaimScopes(scopes: readonly string[]): string[] {
    const claimScopes: readonly string[] = [PROFILE_SCOPE, EMAIL_SCOPE, ADDRESS_SCOPE, PHONE_SCOPE];
    return scopes.filter((scope) => claimScopes.includes(scope));
  }
}

export const scopeService = new ScopeService();
