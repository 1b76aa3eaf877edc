import * as jose from 'jose';
import type { Tenant } from '../types/tenant.js';
import type { User } from '../types/user.js';
import type { ValidatedClient } from '../types/client.js';
import type { CibaAuthenticationRequest } from '../types/ciba.js';
import { ok, err, type Result } from '../types/result.js';
import type { IUserStore } from '../storage/interfaces/user-storage.js';
import type { ISigningKeyStorage } from '../storage/interfaces/tenant-storage.js';
import { verifyJwt, type VerifyJwtOptions } from '../crypto/jwt.js';
import { getConfig } from '../config/index.js';
import { componentLogger } from '../logging/logger.js';

export type HintType = 'login_hint' | 'login_hint_token' | 'id_token_hint';

export type HintFailureReason =
  | 'no_hint'
  | 'expired'
  | 'invalid_signature'
  | 'invalid_audience'
  | 'invalid_issuer'
  | 'no_validation_keys'
  | 'missing_subject'
  | 'unknown_user'
  | 'malformed';

export interface ResolvedSubject {
  subjectId: string;
  user: User;
  hintType: HintType;
}

export interface HintFailure {
  reason: HintFailureReason;
  hintType?: HintType;
}

export interface HintResolverOptions {
  users: IUserStore;
  signingKeys: ISigningKeyStorage;
}

/**
 * Map a jose verification error to the reason we log
 */
export function classifyJwtError(error: unknown): HintFailureReason {
  if (error instanceof jose.errors.JWTExpired) {
    return 'expired';
  }
  if (error instanceof jose.errors.JWSSignatureVerificationFailed || error instanceof jose.errors.JWKSNoMatchingKey) {
    return 'invalid_signature';
  }
  if (error instanceof jose.errors.JWTClaimValidationFailed) {
    if (error.claim === 'iss') return 'invalid_issuer';
    if (error.claim === 'aud') return 'invalid_audience';
  }
  return 'malformed';
}

/**
 * Identifies the end-user a backchannel authentication request is about.
 *
 * Hints are tried in order `login_hint`, `login_hint_token`,
 * `id_token_hint`; the first one that names a known user wins. When all
 * fail, the last failure is returned. Never throws.
 */
export class HintResolver {
  private readonly users: IUserStore;
  private readonly signingKeys: ISigningKeyStorage;

  constructor(options: HintResolverOptions) {
    this.users = options.users;
    this.signingKeys = options.signingKeys;
  }

  async resolve(
    request: CibaAuthenticationRequest,
    client: ValidatedClient,
    tenant: Tenant
  ): Promise<Result<ResolvedSubject, HintFailure>> {
    const log = componentLogger('ciba');
    let failure: HintFailure = { reason: 'no_hint' };

    const attempts: Array<[HintType, string | undefined, () => Promise<Result<ResolvedSubject, HintFailure>>]> = [
      ['login_hint', request.loginHint, () => this.fromLoginHint(request.loginHint ?? '', tenant)],
      ['login_hint_token', request.loginHintToken, () => this.fromLoginHintToken(request.loginHintToken ?? '', tenant)],
      ['id_token_hint', request.idTokenHint, () => this.fromIdTokenHint(request.idTokenHint ?? '', client, tenant)],
    ];

    for (const [hintType, value, attempt] of attempts) {
      if (!value) continue;

      let result: Result<ResolvedSubject, HintFailure>;
      try {
        result = await attempt();
      } catch (error) {
        log.error({ err: error, hintType, clientId: client.clientId }, 'Unexpected error resolving hint');
        result = err({ reason: 'malformed', hintType });
      }

      if (result.ok) {
        log.debug({ hintType, sub: result.value.subjectId }, 'Resolved user from hint');
        return result;
      }

      failure = result.error;
      if (hintType === 'login_hint') {
        log.debug({ hintType, reason: failure.reason }, 'Hint did not identify a user');
      } else {
        log.warn({ hintType, reason: failure.reason, clientId: client.clientId }, 'Hint token rejected');
      }
    }

    return err(failure);
  }

  /**
   * Email, then username, then user id
   */
  private async fromLoginHint(loginHint: string, tenant: Tenant): Promise<Result<ResolvedSubject, HintFailure>> {
    const user =
      (await this.users.findByEmail(tenant.id, loginHint)) ??
      (await this.users.findByUsername(tenant.id, loginHint)) ??
      (await this.users.findById(tenant.id, loginHint));

    if (!user) {
      return err({ reason: 'unknown_user', hintType: 'login_hint' });
    }
    return ok({ subjectId: user.id, user, hintType: 'login_hint' });
  }

  /**
   * A JWT naming the user, signed with one of the tenant's keys. It may
   * carry any audience.
   */
  private async fromLoginHintToken(token: string, tenant: Tenant): Promise<Result<ResolvedSubject, HintFailure>> {
    return this.fromToken(token, tenant, 'login_hint_token', {
      issuer: tenant.issuer,
      clockTolerance: getConfig().ciba.loginHintTokenClockSkewSeconds,
    });
  }

  /**
   * An ID token previously issued to this client. Expired tokens are
   * accepted unless lifetime validation is turned on.
   */
  private async fromIdTokenHint(
    token: string,
    client: ValidatedClient,
    tenant: Tenant
  ): Promise<Result<ResolvedSubject, HintFailure>> {
    return this.fromToken(token, tenant, 'id_token_hint', {
      issuer: tenant.issuer,
      audience: client.clientId,
      validateLifetime: getConfig().ciba.idTokenHintValidateLifetime,
    });
  }

  private async fromToken(
    token: string,
    tenant: Tenant,
    hintType: HintType,
    options: VerifyJwtOptions
  ): Promise<Result<ResolvedSubject, HintFailure>> {
    const keys = await this.signingKeys.getValidationKeys(tenant.id);
    if (keys.length === 0) {
      return err({ reason: 'no_validation_keys', hintType });
    }

    let payload: jose.JWTPayload;
    try {
      payload = await verifyJwt(token, { keys }, options);
    } catch (error) {
      return err({ reason: classifyJwtError(error), hintType });
    }

    if (!payload.sub) {
      return err({ reason: 'missing_subject', hintType });
    }

    const user = await this.users.findById(tenant.id, payload.sub);
    if (!user) {
      return err({ reason: 'unknown_user', hintType });
    }

    return ok({ subjectId: user.id, user, hintType });
  }
}
