import { describe, it, expect, beforeAll } from 'vitest';
import {
  EndpointType,
  UiMode,
  createProtocolContext,
  parseUiMode,
  resolveCorrelationId,
  resolveEndpointType,
  resolvePolicyId,
  resolveUiMode,
} from '../../protocol/context.js';
import { MemoryTenantStorage } from '../../storage/memory/tenant-storage.js';
import type { Tenant } from '../../types/tenant.js';

describe('protocol context', () => {
  let tenant: Tenant;

  beforeAll(async () => {
    tenant = await new MemoryTenantStorage().create({ name: 'Acme', slug: 'acme' });
  });

  describe('resolveEndpointType', () => {
    it('should map tenant-relative paths', () => {
      expect(resolveEndpointType('/connect/token')).toBe(EndpointType.Token);
      expect(resolveEndpointType('/connect/ciba')).toBe(EndpointType.BackchannelAuthentication);
      expect(resolveEndpointType('/.well-known/jwks')).toBe(EndpointType.Metadata);
    });

    it('should ignore case and a trailing slash', () => {
      expect(resolveEndpointType('/Connect/Authorize/')).toBe(EndpointType.Authorize);
    });

    it('should return null for other paths', () => {
      expect(resolveEndpointType('/connect/journey/abc')).toBeNull();
      expect(resolveEndpointType('/')).toBeNull();
    });
  });

  describe('parseUiMode', () => {
    it('should match case-insensitively', () => {
      expect(parseUiMode('headless')).toBe(UiMode.Headless);
      expect(parseUiMode('STANDALONE')).toBe(UiMode.Standalone);
    });

    it('should return null for unknown or missing values', () => {
      expect(parseUiMode('popup')).toBeNull();
      expect(parseUiMode(undefined)).toBeNull();
    });
  });

  describe('resolveUiMode', () => {
    it('should default to journeys', () => {
      expect(resolveUiMode({ journeysEnabled: true }, undefined, {})).toBe(UiMode.Journey);
    });

    it('should let the request pick a mode', () => {
      expect(resolveUiMode({ journeysEnabled: true }, { useJourneyFlow: undefined }, { ui_mode: 'headless' })).toBe(
        UiMode.Headless
      );
    });

    it('should force standalone when the tenant disables journeys', () => {
      expect(resolveUiMode({ journeysEnabled: false }, { useJourneyFlow: true }, { ui_mode: 'journey' })).toBe(
        UiMode.Standalone
      );
    });

    it('should force standalone when the client opts out', () => {
      expect(resolveUiMode({ journeysEnabled: true }, { useJourneyFlow: false }, { ui_mode: 'journey' })).toBe(
        UiMode.Standalone
      );
    });
  });

  it('should read the policy from policy, then p', () => {
    expect(resolvePolicyId({ policy: 'signin', p: 'other' })).toBe('signin');
    expect(resolvePolicyId({ p: 'other' })).toBe('other');
    expect(resolvePolicyId({ policy: '' })).toBeUndefined();
  });

  it('should keep a supplied correlation id and generate one otherwise', () => {
    expect(resolveCorrelationId({ correlation_id: 'corr-1' })).toBe('corr-1');
    const generated = resolveCorrelationId({});
    expect(generated.length).toBeGreaterThan(0);
    expect(resolveCorrelationId({})).not.toBe(generated);
  });

  describe('createProtocolContext', () => {
    it('should build a frozen context from the request', () => {
      const context = createProtocolContext({
        endpointType: EndpointType.Authorize,
        tenant,
        parameters: { client_id: 'web-app', p: 'signin', correlation_id: 'corr-2' },
        properties: { source: 'test' },
      });

      expect(context).toEqual({
        endpointType: EndpointType.Authorize,
        tenantId: tenant.id,
        clientId: 'web-app',
        uiMode: UiMode.Journey,
        policyId: 'signin',
        correlationId: 'corr-2',
        properties: { source: 'test' },
      });
      expect(Object.isFrozen(context)).toBe(true);
      expect(Object.isFrozen(context.properties)).toBe(true);
    });

    it('should leave clientId unset when nothing names a client', () => {
      const context = createProtocolContext({ endpointType: EndpointType.Metadata, tenant, parameters: {} });

      expect(context.clientId).toBeUndefined();
      expect(context.policyId).toBeUndefined();
    });
  });
});
