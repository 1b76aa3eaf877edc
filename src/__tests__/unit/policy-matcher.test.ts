import { describe, it, expect } from 'vitest';
import { evaluatePolicyCondition, findMatchingPolicy, rankPolicies } from '../../journeys/policy-matcher.js';
import type { JourneyPolicy, PolicyMatchContext } from '../../journeys/types.js';

function policy(overrides: Partial<JourneyPolicy> & Pick<JourneyPolicy, 'id'>): JourneyPolicy {
  return {
    name: overrides.id,
    type: 'SignIn',
    enabled: true,
    priority: 100,
    version: 1,
    steps: [],
    conditions: [],
    maxJourneyDurationMinutes: 30,
    ...overrides,
  };
}

const CONTEXT: PolicyMatchContext = {
  tenantId: 'tenant-1',
  clientId: 'web-app',
  type: 'SignIn',
  scopes: ['openid', 'profile'],
  acrValues: 'urn:acr:mfa',
  additionalParameters: { ui_locales: 'nb' },
};

describe('rankPolicies', () => {
  it('should order by priority, highest first', () => {
    const ranked = rankPolicies([policy({ id: 'low', priority: 10 }), policy({ id: 'high', priority: 200 })], 'tenant-1');

    expect(ranked.map((p) => p.id)).toEqual(['high', 'low']);
  });

  it('should put tenant policies ahead of global ones of equal priority', () => {
    const ranked = rankPolicies(
      [policy({ id: 'global' }), policy({ id: 'tenant', tenantId: 'tenant-1' })],
      'tenant-1'
    );

    expect(ranked.map((p) => p.id)).toEqual(['tenant', 'global']);
  });

  it('should drop disabled and foreign-tenant policies', () => {
    const ranked = rankPolicies(
      [
        policy({ id: 'disabled', enabled: false }),
        policy({ id: 'foreign', tenantId: 'tenant-2' }),
        policy({ id: 'kept' }),
      ],
      'tenant-1'
    );

    expect(ranked.map((p) => p.id)).toEqual(['kept']);
  });
});

describe('findMatchingPolicy', () => {
  it('should prefer the higher priority policy', () => {
    const match = findMatchingPolicy(
      [policy({ id: 'default', priority: 100 }), policy({ id: 'preferred', priority: 150 })],
      CONTEXT
    );

    expect(match?.id).toBe('preferred');
  });

  it('should prefer the tenant policy at equal priority', () => {
    const match = findMatchingPolicy(
      [policy({ id: 'global' }), policy({ id: 'tenant', tenantId: 'tenant-1' })],
      CONTEXT
    );

    expect(match?.id).toBe('tenant');
  });

  it('should fall through when conditions fail', () => {
    const match = findMatchingPolicy(
      [
        policy({ id: 'partner-only', priority: 500, conditions: [{ type: 'client_id', operator: 'eq', value: 'partner' }] }),
        policy({ id: 'fallback' }),
      ],
      CONTEXT
    );

    expect(match?.id).toBe('fallback');
  });

  it('should skip policies of another type', () => {
    const match = findMatchingPolicy([policy({ id: 'signup', type: 'SignUp' })], CONTEXT);

    expect(match).toBeNull();
  });

  it('should return null when nothing matches', () => {
    expect(findMatchingPolicy([], CONTEXT)).toBeNull();
  });
});

describe('evaluatePolicyCondition', () => {
  const cases: Array<[type: string, operator: string, value: string, expected: boolean]> = [
    ['client_id', 'eq', 'web-app', true],
    ['client_id', 'equals', 'mobile', false],
    ['ClientId', 'not_equals', 'mobile', true],
    ['tenant_id', 'ne', 'tenant-1', false],
    ['scope', 'contains', 'profile', true],
    ['scopes', 'contains', 'email', false],
    ['acr_values', 'starts_with', 'urn:acr', true],
    ['acr_value', 'ends_with', ':mfa', true],
    ['acr_values', 'ends_with', ':pwd', false],
    ['ui_locales', 'exists', '', true],
    ['login_hint', 'exists', '', false],
    ['login_hint', 'not_exists', '', true],
    ['ui_locales', 'NOT_EXISTS', '', false],
    ['client_id', 'approximately', 'web-app', false],
  ];

  it.each(cases)('%s %s %s should be %s', (type, operator, value, expected) => {
    expect(evaluatePolicyCondition({ type, operator, value }, CONTEXT)).toBe(expected);
  });

  it('should treat missing scopes as absent', () => {
    const context: PolicyMatchContext = { tenantId: 'tenant-1', type: 'SignIn', scopes: [] };

    expect(evaluatePolicyCondition({ type: 'scope', operator: 'not_exists', value: '' }, context)).toBe(true);
    expect(evaluatePolicyCondition({ type: 'scope', operator: 'contains', value: 'openid' }, context)).toBe(false);
  });
});
