/**
 * Authentication outcome used to issue an authorization code
 */
export interface ProtocolCompletion {
  userId: string;
  sessionId?: string;
  authTime: number;
  amr?: string[];
  acr?: string;
  claims: Record<string, string>;
  /** Scopes the user consented to; absent means all requested scopes */
  grantedScopes?: string[];
}

/**
 * Authorization request parked while the user completes a journey,
 * keyed by correlation id so it survives the user-agent round trip
 */
export interface ProtocolState {
  correlationId: string;
  tenantId: string;
  clientId: string;
  /** Validated authorize request parameters */
  parameters: Record<string, string>;
  /** `parameters` always hold the resolved redirect URI; this keeps whether it was sent */
  redirectUriSent: boolean;
  journeyId?: string;
  createdAt: Date;
  expiresAt: Date;
}

export interface IProtocolStateStore {
  save(state: ProtocolState): Promise<void>;

  get(correlationId: string): Promise<ProtocolState | null>;

  /**
   * Fetch and delete atomically
   */
  consume(correlationId: string): Promise<ProtocolState | null>;

  remove(correlationId: string): Promise<void>;
}
