import { componentLogger } from '../logging/logger.js';

interface AuditEventBase {
  tenantId: string;
  clientId?: string;
  timestamp: Date;
}

export type AuditEvent =
  | (AuditEventBase & {
      type: 'token.issued';
      grantType: string;
      subjectId?: string;
      scopes: string[];
      tokenType: string;
    })
  | (AuditEventBase & { type: 'token.failed'; grantType: string; error: string; errorDescription?: string })
  | (AuditEventBase & {
      type: 'ciba.requested';
      authReqId: string;
      subjectId: string;
      deliveryMode: string;
      scopes: string[];
    })
  | (AuditEventBase & { type: 'ciba.approved'; authReqId: string; subjectId: string })
  | (AuditEventBase & { type: 'ciba.denied'; authReqId: string })
  | (AuditEventBase & { type: 'dpop.rejected'; error: string; reason: string })
  | (AuditEventBase & { type: 'journey.started'; journeyId: string; policyId: string })
  | (AuditEventBase & { type: 'journey.completed'; journeyId: string; policyId: string; subjectId?: string })
  | (AuditEventBase & {
      type: 'journey.failed';
      journeyId: string;
      policyId: string;
      error: string;
      errorDescription?: string;
    });

export type AuditEventType = AuditEvent['type'];

/** Distributes `Omit` over the union so each variant keeps its own fields */
type WithoutTimestamp<T> = T extends AuditEvent ? Omit<T, 'timestamp'> : never;

export type AuditEventInput = WithoutTimestamp<AuditEvent>;

export interface AuditSink {
  emit(event: AuditEvent): void;
}

/**
 * Stamp an event with the current time
 */
export function auditEvent(input: AuditEventInput): AuditEvent {
  return { ...input, timestamp: new Date() };
}

function assertNever(value: never): never {
  throw new Error(`Unhandled audit event: ${JSON.stringify(value)}`);
}

/**
 * Writes every event to the `audit` logger
 */
export class LoggingAuditSink implements AuditSink {
  emit(event: AuditEvent): void {
    const log = componentLogger('audit');
    const base = { event: event.type, tenantId: event.tenantId, clientId: event.clientId };

    switch (event.type) {
      case 'token.issued':
        log.info(
          { ...base, grantType: event.grantType, sub: event.subjectId, scope: event.scopes.join(' '), tokenType: event.tokenType },
          'Token issued'
        );
        return;
      case 'token.failed':
        log.warn({ ...base, grantType: event.grantType, error: event.error, errorDescription: event.errorDescription }, 'Token request failed');
        return;
      case 'ciba.requested':
        log.info(
          { ...base, authReqId: event.authReqId, sub: event.subjectId, deliveryMode: event.deliveryMode, scope: event.scopes.join(' ') },
          'Backchannel authentication requested'
        );
        return;
      case 'ciba.approved':
        log.info({ ...base, authReqId: event.authReqId, sub: event.subjectId }, 'Backchannel authentication approved');
        return;
      case 'ciba.denied':
        log.info({ ...base, authReqId: event.authReqId }, 'Backchannel authentication denied');
        return;
      case 'dpop.rejected':
        log.warn({ ...base, error: event.error, reason: event.reason }, 'DPoP proof rejected');
        return;
      case 'journey.started':
        log.info({ ...base, journeyId: event.journeyId, policyId: event.policyId }, 'Journey started');
        return;
      case 'journey.completed':
        log.info({ ...base, journeyId: event.journeyId, policyId: event.policyId, sub: event.subjectId }, 'Journey completed');
        return;
      case 'journey.failed':
        log.warn(
          { ...base, journeyId: event.journeyId, policyId: event.policyId, error: event.error, errorDescription: event.errorDescription },
          'Journey failed'
        );
        return;
      default:
        assertNever(event);
    }
  }
}

/**
 * Keeps events in memory
 */
export class MemoryAuditSink implements AuditSink {
  readonly events: AuditEvent[] = [];

  emit(event: AuditEvent): void {
    this.events.push(event);
  }

  ofType<T extends AuditEventType>(type: T): Extract<AuditEvent, { type: T }>[] {
    return this.events.filter((e): e is Extract<AuditEvent, { type: T }> => e.type === type);
  }

  clear(): void {
    this.events.length = 0;
  }
}
