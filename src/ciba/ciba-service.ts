import type { Tenant } from '../types/tenant.js';
import type { ValidatedClient } from '../types/client.js';
import type {
  CibaAuthenticationRequest,
  CibaAuthenticationResult,
  CibaRequest,
  CibaStatusResult,
} from '../types/ciba.js';
import type { ICibaStore } from '../storage/interfaces/ciba-store.js';
import type { AuditSink } from '../events/audit-events.js';
import { auditEvent } from '../events/audit-events.js';
import {
  CIBA_DELIVERY_MODE_POLL,
  CIBA_MAX_BINDING_MESSAGE_LENGTH,
  OPENID_SCOPE,
} from '../config/constants.js';
import {
  ERROR_ACCESS_DENIED,
  ERROR_EXPIRED_TOKEN,
  ERROR_INVALID_BINDING_MESSAGE,
  ERROR_INVALID_REQUEST,
  ERROR_UNKNOWN_USER_ID,
  type OAuthErrorCode,
} from '../errors/error-codes.js';
import { generateAuthReqId } from '../crypto/random.js';
import { scopeService } from '../services/scope-service.js';
import { componentLogger } from '../logging/logger.js';
import type { HintResolver } from './hint-resolver.js';
import type { ICibaClientNotifier, ICibaUserNotifier } from './notification.js';

export interface CibaServiceOptions {
  store: ICibaStore;
  hintResolver: HintResolver;
  audit: AuditSink;
  userNotifier?: ICibaUserNotifier;
  clientNotifier?: ICibaClientNotifier;
}

function failure(error: OAuthErrorCode, errorDescription: string): CibaAuthenticationResult {
  return { success: false, error, errorDescription };
}

/**
 * Client Initiated Backchannel Authentication (OpenID CIBA Core 1.0)
 */
export class CibaService {
  private readonly store: ICibaStore;
  private readonly hintResolver: HintResolver;
  private readonly audit: AuditSink;
  private readonly userNotifier?: ICibaUserNotifier;
  private readonly clientNotifier?: ICibaClientNotifier;

  constructor(options: CibaServiceOptions) {
    this.store = options.store;
    this.hintResolver = options.hintResolver;
    this.audit = options.audit;
    this.userNotifier = options.userNotifier;
    this.clientNotifier = options.clientNotifier;
  }

  async authenticate(
    request: CibaAuthenticationRequest,
    client: ValidatedClient,
    tenant: Tenant
  ): Promise<CibaAuthenticationResult> {
    const log = componentLogger('ciba');

    if (!request.loginHint && !request.loginHintToken && !request.idTokenHint) {
      return failure(ERROR_INVALID_REQUEST, 'One of login_hint, login_hint_token, or id_token_hint is required');
    }

    const resolved = await this.hintResolver.resolve(request, client, tenant);
    if (!resolved.ok) {
      log.info(
        { clientId: client.clientId, reason: resolved.error.reason, hintType: resolved.error.hintType },
        'Could not identify user for backchannel request'
      );
      return failure(ERROR_UNKNOWN_USER_ID, 'Unable to identify the user from the provided hint');
    }
    const subjectId = resolved.value.subjectId;

    if (client.cibaRequireUserCode && !request.userCode) {
      return failure(ERROR_INVALID_REQUEST, 'User code is required for this client');
    }

    if (request.bindingMessage !== undefined && request.bindingMessage.length > CIBA_MAX_BINDING_MESSAGE_LENGTH) {
      return failure(
        ERROR_INVALID_BINDING_MESSAGE,
        `Binding message must not exceed ${CIBA_MAX_BINDING_MESSAGE_LENGTH} characters`
      );
    }

    const lifetime = client.cibaRequestLifetime;
    const requested = request.requestedExpiry;
    const expiresIn = requested !== undefined && requested > 0 ? Math.min(requested, lifetime) : lifetime;

    const deliveryMode = client.cibaTokenDeliveryMode;
    if (deliveryMode !== CIBA_DELIVERY_MODE_POLL) {
      if (!client.cibaClientNotificationEndpoint) {
        return failure(ERROR_INVALID_REQUEST, 'Client notification endpoint is required for ping/push delivery modes');
      }
      if (!request.clientNotificationToken) {
        return failure(ERROR_INVALID_REQUEST, 'client_notification_token is required for ping/push delivery modes');
      }
    }

    const scopes = scopeService.parseScopes(request.scope);
    const now = new Date();
    const cibaRequest: CibaRequest = {
      authReqId: generateAuthReqId(),
      tenantId: tenant.id,
      clientId: client.clientId,
      subjectId,
      loginHint: request.loginHint,
      loginHintToken: request.loginHintToken,
      idTokenHint: request.idTokenHint,
      bindingMessage: request.bindingMessage,
      userCode: request.userCode,
      requestedScopes: scopes.length > 0 ? scopes : [OPENID_SCOPE],
      acrValues: request.acrValues,
      status: 'pending',
      createdAt: now,
      expiresAt: new Date(now.getTime() + expiresIn * 1000),
      interval: client.cibaPollingInterval,
      tokenDeliveryMode: deliveryMode,
      clientNotificationToken: request.clientNotificationToken,
      clientNotificationEndpoint:
        deliveryMode === CIBA_DELIVERY_MODE_POLL ? undefined : client.cibaClientNotificationEndpoint,
    };

    await this.store.storeRequest(cibaRequest);

    log.info(
      { authReqId: cibaRequest.authReqId, clientId: client.clientId, sub: subjectId, deliveryMode },
      'Backchannel authentication request created'
    );
    this.audit.emit(
      auditEvent({
        type: 'ciba.requested',
        tenantId: tenant.id,
        clientId: client.clientId,
        authReqId: cibaRequest.authReqId,
        subjectId,
        deliveryMode,
        scopes: cibaRequest.requestedScopes,
      })
    );

    if (this.userNotifier) {
      try {
        await this.userNotifier.notifyUser(cibaRequest);
      } catch (error) {
        // The user can still find the request through other channels
        log.warn({ err: error, authReqId: cibaRequest.authReqId, sub: subjectId }, 'Failed to notify user');
      }
    }

    return {
      success: true,
      authReqId: cibaRequest.authReqId,
      expiresIn,
      interval: client.cibaPollingInterval,
    };
  }

  async getStatus(authReqId: string, clientId: string): Promise<CibaStatusResult> {
    const request = await this.store.getByAuthReqId(authReqId);
    if (!request) {
      return {
        status: 'expired',
        scopes: [],
        error: ERROR_EXPIRED_TOKEN,
        errorDescription: 'The auth_req_id has expired or does not exist',
      };
    }

    if (request.clientId !== clientId) {
      return {
        status: 'denied',
        scopes: [],
        error: ERROR_ACCESS_DENIED,
        errorDescription: 'The auth_req_id was not issued to this client',
      };
    }

    // Checked before status so a lapsed approval cannot be redeemed
    if (request.status === 'expired' || request.expiresAt.getTime() < Date.now()) {
      await this.store.transitionStatus(authReqId, ['pending', 'approved'], {
        status: 'expired',
        error: ERROR_EXPIRED_TOKEN,
        errorDescription: 'The auth_req_id has expired',
      });
      return {
        status: 'expired',
        scopes: request.requestedScopes,
        error: ERROR_EXPIRED_TOKEN,
        errorDescription: 'The auth_req_id has expired',
      };
    }

    return {
      status: request.status,
      subjectId: request.subjectId,
      sessionId: request.sessionId,
      scopes: request.requestedScopes,
      interval: request.interval,
      lastPolledAt: request.lastPolledAt,
      error: request.error,
      errorDescription: request.errorDescription,
    };
  }

  /**
   * Record a token poll; false means the client polled faster than the
   * request's interval
   */
  async recordPoll(authReqId: string): Promise<boolean> {
    return this.store.updateLastPolled(authReqId);
  }

  /**
   * Approved to consumed, exactly once
   */
  async consumeApproved(authReqId: string): Promise<CibaRequest | null> {
    return this.store.consumeApproved(authReqId);
  }

  async approveRequest(authReqId: string, subjectId: string, sessionId?: string): Promise<boolean> {
    const log = componentLogger('ciba');
    const request = await this.store.getByAuthReqId(authReqId);

    if (!request || request.status !== 'pending' || request.expiresAt.getTime() < Date.now()) {
      log.warn({ authReqId }, 'Cannot approve request: not found or not pending');
      return false;
    }

    if (request.subjectId !== subjectId) {
      log.warn({ authReqId, expected: request.subjectId, actual: subjectId }, 'Cannot approve request: subject mismatch');
      return false;
    }

    const approved = await this.store.transitionStatus(authReqId, ['pending'], {
      status: 'approved',
      completedAt: new Date(),
      sessionId,
    });
    if (!approved) {
      log.warn({ authReqId }, 'Cannot approve request: completed concurrently');
      return false;
    }

    log.info({ authReqId, sub: subjectId }, 'Backchannel authentication approved');
    this.audit.emit(
      auditEvent({ type: 'ciba.approved', tenantId: request.tenantId, clientId: request.clientId, authReqId, subjectId })
    );

    await this.notifyClient(approved);
    return true;
  }

  async denyRequest(authReqId: string): Promise<boolean> {
    const log = componentLogger('ciba');
    const request = await this.store.getByAuthReqId(authReqId);

    if (!request || request.status !== 'pending') {
      log.warn({ authReqId }, 'Cannot deny request: not found or not pending');
      return false;
    }

    const denied = await this.store.transitionStatus(authReqId, ['pending'], {
      status: 'denied',
      completedAt: new Date(),
      error: ERROR_ACCESS_DENIED,
      errorDescription: 'The user denied the authentication request',
    });
    if (!denied) {
      log.warn({ authReqId }, 'Cannot deny request: completed concurrently');
      return false;
    }

    log.info({ authReqId }, 'Backchannel authentication denied');
    this.audit.emit(
      auditEvent({ type: 'ciba.denied', tenantId: request.tenantId, clientId: request.clientId, authReqId })
    );

    await this.notifyClient(denied);
    return true;
  }

  private async notifyClient(request: CibaRequest): Promise<void> {
    if (!this.clientNotifier || request.tokenDeliveryMode === CIBA_DELIVERY_MODE_POLL) return;

    try {
      await this.clientNotifier.notifyClient(request);
    } catch (error) {
      componentLogger('ciba').warn({ err: error, authReqId: request.authReqId }, 'Failed to notify client');
    }
  }
}
