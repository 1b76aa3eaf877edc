import type { GrantType } from './oauth.js';
import type { ValidatedClient } from './client.js';

/**
 * Validated token request
 * RFC 6749 Section 4.1.3, 4.4.2, 6; RFC 8628 Section 3.4; RFC 8693 Section 2.1; CIBA Section 10.1
 */
export interface TokenRequest {
  grantType: GrantType;
  client: ValidatedClient;
  code?: string;
  redirectUri?: string;
  codeVerifier?: string;
  refreshToken?: string;
  deviceCode?: string;
  authReqId?: string;
  subjectToken?: string;
  subjectTokenType?: string;
  actorToken?: string;
  actorTokenType?: string;
  requestedTokenType?: string;
  scope?: string;
  requestedScopes: string[];
  resource: string[];
  /** Compact DPoP proof from the `DPoP` header */
  dpopProof?: string;
  /** RFC 7638 thumbprint of the validated DPoP key */
  dpopKeyThumbprint?: string;
  raw: Readonly<Record<string, string>>;
}
