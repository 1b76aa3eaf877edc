import { describe, it, expect } from 'vitest';
import { LoggingAuditSink, MemoryAuditSink, auditEvent } from '../../events/audit-events.js';
import { redactSensitiveStrings } from '../../logging/logger.js';

describe('audit events', () => {
  it('should stamp events with the current time', () => {
    const before = Date.now();

    const event = auditEvent({ type: 'ciba.denied', tenantId: 't1', clientId: 'c1', authReqId: 'req-1' });

    expect(event).toMatchObject({ type: 'ciba.denied', tenantId: 't1', clientId: 'c1', authReqId: 'req-1' });
    expect(event.timestamp.getTime()).toBeGreaterThanOrEqual(before);
  });

  describe('MemoryAuditSink', () => {
    it('should keep events in order and filter by type', () => {
      const sink = new MemoryAuditSink();

      sink.emit(auditEvent({ type: 'token.failed', tenantId: 't1', grantType: 'password', error: 'unsupported_grant_type' }));
      sink.emit(
        auditEvent({ type: 'token.issued', tenantId: 't1', grantType: 'client_credentials', scopes: ['api:read'], tokenType: 'Bearer' })
      );
      sink.emit(auditEvent({ type: 'token.failed', tenantId: 't1', grantType: 'refresh_token', error: 'invalid_grant' }));

      expect(sink.events.map((e) => e.type)).toEqual(['token.failed', 'token.issued', 'token.failed']);
      expect(sink.ofType('token.failed').map((e) => e.grantType)).toEqual(['password', 'refresh_token']);
    });

    it('should forget everything on clear', () => {
      const sink = new MemoryAuditSink();
      sink.emit(auditEvent({ type: 'ciba.denied', tenantId: 't1', authReqId: 'req-1' }));

      sink.clear();

      expect(sink.events).toEqual([]);
    });
  });

  it('should log every event type without throwing', () => {
    const sink = new LoggingAuditSink();

    expect(() => {
      sink.emit(auditEvent({ type: 'token.issued', tenantId: 't1', grantType: 'client_credentials', scopes: [], tokenType: 'Bearer' }));
      sink.emit(auditEvent({ type: 'ciba.requested', tenantId: 't1', authReqId: 'r', subjectId: 's', deliveryMode: 'poll', scopes: ['openid'] }));
      sink.emit(auditEvent({ type: 'ciba.approved', tenantId: 't1', authReqId: 'r', subjectId: 's' }));
      sink.emit(auditEvent({ type: 'dpop.rejected', tenantId: 't1', error: 'invalid_dpop_proof', reason: 'Proof has expired' }));
      sink.emit(auditEvent({ type: 'journey.started', tenantId: 't1', journeyId: 'j', policyId: 'p' }));
      sink.emit(auditEvent({ type: 'journey.completed', tenantId: 't1', journeyId: 'j', policyId: 'p' }));
      sink.emit(auditEvent({ type: 'journey.failed', tenantId: 't1', journeyId: 'j', policyId: 'p', error: 'access_denied' }));
    }).not.toThrow();
  });
});

describe('redactSensitiveStrings', () => {
  it('should mask secret assignments inside strings', () => {
    expect(redactSensitiveStrings('retry with client_secret=test-secret now')).toBe('retry with client_secret=*** now');
  });

  it('should walk arrays and objects', () => {
    expect(redactSensitiveStrings({ note: ['TOKEN=abc', 'plain'], count: 2 })).toEqual({
      note: ['TOKEN=***', 'plain'],
      count: 2,
    });
  });
});
