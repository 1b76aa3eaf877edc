import type { Tenant, SigningKey } from '../types/tenant.js';
import type { ValidatedClient } from '../types/client.js';
import type { User, UserInfoResponse } from '../types/user.js';
import type { TokenResponse } from '../types/oauth.js';
import type { AccessTokenPayload, ActorClaim, IdTokenPayload } from '../types/token.js';
import type { IRefreshTokenStorage } from '../storage/interfaces/token-storage.js';
import { signAccessToken, signIdToken } from '../crypto/jwt.js';
import { leftHalfHash } from '../crypto/hash.js';
import { generateJti } from '../crypto/random.js';
import { OAuthError } from '../errors/oauth-error.js';
import { scopeService } from './scope-service.js';
import {
  ADDRESS_SCOPE,
  EMAIL_SCOPE,
  PHONE_SCOPE,
  PROFILE_SCOPE,
  TOKEN_TYPE_BEARER,
  TOKEN_TYPE_DPOP,
} from '../config/constants.js';

export interface TokenIssueOptions {
  tenant: Tenant;
  signingKey: SigningKey;
  client: ValidatedClient;
  /** Defaults to the user's id, then the client id */
  subjectId?: string;
  user?: User;
  scopes: readonly string[];
  /** Resource indicators; become the access token audience */
  resources?: readonly string[];
  nonce?: string;
  authTime?: number;
  acr?: string;
  amr?: string[];
  sessionId?: string;
  /** Thumbprint of the DPoP key the tokens are bound to */
  dpopJkt?: string;
  refreshTokenStorage?: IRefreshTokenStorage;
  parentRefreshTokenId?: string;
  familyId?: string;
  /** Added to the access and ID tokens without overriding registered claims */
  extraClaims?: Readonly<Record<string, string>>;
  act?: ActorClaim;
  issuedTokenType?: string;
}

/**
 * Claims released for a user by scope (OIDC Core Section 5.4)
 */
export function buildUserClaims(user: User, scopes: readonly string[]): Omit<UserInfoResponse, 'sub'> {
  const claims: Omit<UserInfoResponse, 'sub'> = {};

  if (scopeService.hasScope(scopes, PROFILE_SCOPE)) {
    if (user.name) claims.name = user.name;
    if (user.givenName) claims.given_name = user.givenName;
    if (user.familyName) claims.family_name = user.familyName;
    if (user.nickname) claims.nickname = user.nickname;
    if (user.preferredUsername) claims.preferred_username = user.preferredUsername;
    if (user.picture) claims.picture = user.picture;
    if (user.locale) claims.locale = user.locale;
    if (user.updatedAt !== undefined) claims.updated_at = user.updatedAt;
  }

  if (scopeService.hasScope(scopes, EMAIL_SCOPE)) {
    if (user.email) claims.email = user.email;
    if (user.emailVerified !== undefined) claims.email_verified = user.emailVerified;
  }

  if (scopeService.hasScope(scopes, ADDRESS_SCOPE) && user.address) {
    claims.address = user.address;
  }

  if (scopeService.hasScope(scopes, PHONE_SCOPE)) {
    if (user.phoneNumber) claims.phone_number = user.phoneNumber;
    if (user.phoneNumberVerified !== undefined) claims.phone_number_verified = user.phoneNumberVerified;
  }

  return claims;
}

function withExtraClaims<T extends object>(payload: T, extra: Readonly<Record<string, string>> | undefined): T {
  if (!extra) return payload;
  const additions = Object.fromEntries(Object.entries(extra).filter(([key]) => !(key in payload)));
  return { ...additions, ...payload };
}

function audienceOf(resources: readonly string[] | undefined, clientId: string): string | string[] {
  if (!resources || resources.length === 0) return clientId;
  const [only] = resources;
  return resources.length === 1 && only !== undefined ? only : [...resources];
}

/**
 * Issues access, refresh and ID tokens
 */
export class TokenService {
  async issue(options: TokenIssueOptions): Promise<TokenResponse> {
    const { tenant, signingKey, client, user, scopes, dpopJkt, refreshTokenStorage } = options;

    if (client.requireDPoP && !dpopJkt) {
      throw OAuthError.invalidRequest('DPoP-bound tokens are required for this client');
    }

    const now = Math.floor(Date.now() / 1000);
    const subject = options.subjectId ?? user?.id ?? client.clientId;
    const scope = scopeService.formatScopes(scopes);
    const authTime = options.authTime ?? user?.authTime;

    const accessTokenPayload: AccessTokenPayload = withExtraClaims(
      {
        iss: tenant.issuer,
        sub: subject,
        aud: audienceOf(options.resources, client.clientId),
        exp: now + client.accessTokenLifetime,
        iat: now,
        jti: generateJti(),
        client_id: client.clientId,
        scope: scopes.length > 0 ? scope : undefined,
        tenant_id: tenant.id,
        sid: options.sessionId,
        acr: options.acr,
        amr: options.amr,
        auth_time: authTime,
        cnf: dpopJkt ? { jkt: dpopJkt } : undefined,
        act: options.act,
      },
      options.extraClaims
    );

    const accessToken = await signAccessToken(accessTokenPayload, signingKey);

    const response: TokenResponse = {
      access_token: accessToken,
      token_type: dpopJkt ? TOKEN_TYPE_DPOP : TOKEN_TYPE_BEARER,
      expires_in: client.accessTokenLifetime,
    };

    if (scopes.length > 0) {
      response.scope = scope;
    }

    if (scopeService.hasOfflineAccess(scopes) && client.allowOfflineAccess && refreshTokenStorage) {
      const { value } = await refreshTokenStorage.create({
        tenantId: tenant.id,
        clientId: client.clientId,
        userId: user?.id ?? options.subjectId,
        scope,
        expiresAt: new Date(Date.now() + client.refreshTokenLifetime * 1000),
        parentTokenId: options.parentRefreshTokenId,
        familyId: options.familyId,
        sessionId: options.sessionId,
        dpopJkt,
      });
      response.refresh_token = value;
    }

    if (scopeService.isOpenIdScope(scopes) && user) {
      const idTokenPayload: IdTokenPayload = withExtraClaims(
        {
          iss: tenant.issuer,
          sub: user.id,
          aud: client.clientId,
          exp: now + client.identityTokenLifetime,
          iat: now,
          auth_time: authTime ?? now,
          nonce: options.nonce,
          acr: options.acr,
          amr: options.amr,
          azp: client.clientId,
          sid: options.sessionId,
          at_hash: leftHalfHash(accessToken, signingKey.algorithm),
          ...buildUserClaims(user, scopes),
        },
        options.extraClaims
      );

      response.id_token = await signIdToken(idTokenPayload, signingKey);
    }

    if (options.issuedTokenType) {
      response.issued_token_type = options.issuedTokenType;
    }

    return response;
  }
}

export const tokenService = new TokenService();
