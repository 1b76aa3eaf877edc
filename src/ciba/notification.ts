import type { CibaRequest } from '../types/ciba.js';
import { CIBA_DELIVERY_MODE_POLL, CIBA_DELIVERY_MODE_PUSH, CONTENT_TYPE_JSON } from '../config/constants.js';
import { componentLogger } from '../logging/logger.js';

/**
 * Reaches the end-user's authentication device (push message, SMS, ...)
 */
export interface ICibaUserNotifier {
  notifyUser(request: CibaRequest): Promise<void>;
}

/**
 * Calls the client back when a ping or push mode request completes
 */
export interface ICibaClientNotifier {
  notifyClient(request: CibaRequest): Promise<void>;
}

/**
 * Writes the notification to the log. Useful in development, where the
 * approval is driven by hand.
 */
export class LoggingCibaUserNotifier implements ICibaUserNotifier {
  async notifyUser(request: CibaRequest): Promise<void> {
    componentLogger('ciba').info(
      {
        authReqId: request.authReqId,
        sub: request.subjectId,
        clientId: request.clientId,
        bindingMessage: request.bindingMessage,
        scope: request.requestedScopes.join(' '),
      },
      'Authentication requested for user'
    );
  }
}

export interface HttpCibaClientNotifierOptions {
  timeoutMs?: number;
  fetch?: typeof fetch;
}

/**
 * POSTs to the client notification endpoint with the client notification
 * token as bearer credential (CIBA Core Sections 10.2 and 10.3).
 *
 * Both modes send `auth_req_id`; a denied push request adds the error.
 * Tokens are always collected from the token endpoint.
 */
export class HttpCibaClientNotifier implements ICibaClientNotifier {
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpCibaClientNotifierOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async notifyClient(request: CibaRequest): Promise<void> {
    if (request.tokenDeliveryMode === CIBA_DELIVERY_MODE_POLL) return;

    const endpoint = request.clientNotificationEndpoint;
    const token = request.clientNotificationToken;
    if (!endpoint || !token) {
      componentLogger('ciba').warn({ authReqId: request.authReqId }, 'No client notification endpoint or token');
      return;
    }

    const body: Record<string, string> = { auth_req_id: request.authReqId };
    if (request.tokenDeliveryMode === CIBA_DELIVERY_MODE_PUSH && request.status === 'denied') {
      body['error'] = request.error ?? 'access_denied';
      if (request.errorDescription) body['error_description'] = request.errorDescription;
    }

    const response = await this.fetchImpl(endpoint, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${token}`,
        'Content-Type': CONTENT_TYPE_JSON,
      },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new Error(`Client notification endpoint responded with ${response.status}`);
    }
  }
}
