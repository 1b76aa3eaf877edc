import type { CibaDeliveryMode } from './oauth.js';
import type { OAuthErrorCode } from '../errors/error-codes.js';

export type CibaRequestStatus = 'pending' | 'approved' | 'denied' | 'expired' | 'consumed';

/**
 * Backchannel authentication request (stored)
 *
 * Status only moves forward: pending to approved, denied or expired, and
 * approved to consumed. Terminal states never change.
 */
export interface CibaRequest {
  authReqId: string;
  tenantId: string;
  clientId: string;
  subjectId: string;
  loginHint?: string;
  loginHintToken?: string;
  idTokenHint?: string;
  bindingMessage?: string;
  userCode?: string;
  requestedScopes: string[];
  acrValues?: string;
  status: CibaRequestStatus;
  createdAt: Date;
  expiresAt: Date;
  interval: number;
  lastPolledAt?: Date;
  completedAt?: Date;
  sessionId?: string;
  error?: string;
  errorDescription?: string;
  clientNotificationToken?: string;
  /** Where ping and push callbacks go */
  clientNotificationEndpoint?: string;
  tokenDeliveryMode: CibaDeliveryMode;
}

/**
 * Parsed backchannel authentication request parameters
 * OpenID CIBA Core Section 7.1
 */
export interface CibaAuthenticationRequest {
  scope?: string;
  loginHint?: string;
  loginHintToken?: string;
  idTokenHint?: string;
  bindingMessage?: string;
  userCode?: string;
  acrValues?: string;
  requestedExpiry?: number;
  clientNotificationToken?: string;
}

export type CibaAuthenticationResult =
  | {
      success: true;
      authReqId: string;
      expiresIn: number;
      interval: number;
    }
  | {
      success: false;
      error: OAuthErrorCode;
      errorDescription: string;
    };

/**
 * Point-in-time view of a request, returned to pollers
 */
export interface CibaStatusResult {
  status: CibaRequestStatus;
  subjectId?: string;
  sessionId?: string;
  scopes: string[];
  interval?: number;
  lastPolledAt?: Date;
  error?: string;
  errorDescription?: string;
}
