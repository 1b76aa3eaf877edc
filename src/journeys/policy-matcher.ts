import type { JourneyPolicy, JourneyPolicyCondition, PolicyMatchContext } from './types.js';

/**
 * Candidates for a tenant: enabled, tenant-scoped or global, ordered by
 * priority (highest first) with tenant-specific policies ahead of global
 * ones of equal priority.
 */
export function rankPolicies(policies: Iterable<JourneyPolicy>, tenantId: string): JourneyPolicy[] {
  return [...policies]
    .filter((p) => p.enabled && (p.tenantId === undefined || p.tenantId === tenantId))
    .sort((a, b) => {
      if (a.priority !== b.priority) return b.priority - a.priority;
      return Number(b.tenantId !== undefined) - Number(a.tenantId !== undefined);
    });
}

/**
 * Best policy for the context, or null when nothing matches. Callers are
 * expected to fall back to a default policy of the same type.
 */
export function findMatchingPolicy(
  policies: Iterable<JourneyPolicy>,
  context: PolicyMatchContext
): JourneyPolicy | null {
  for (const policy of rankPolicies(policies, context.tenantId)) {
    if (policy.type !== context.type) continue;
    if (policy.conditions.every((c) => evaluatePolicyCondition(c, context))) {
      return policy;
    }
  }
  return null;
}

function normalize(value: string): string {
  return value.toLowerCase().replace(/_/g, '');
}

function contextValue(type: string, context: PolicyMatchContext): string | undefined {
  switch (normalize(type)) {
    case 'clientid':
      return context.clientId;
    case 'tenantid':
      return context.tenantId;
    case 'acrvalue':
    case 'acrvalues':
      return context.acrValues;
    case 'scope':
    case 'scopes':
      return context.scopes && context.scopes.length > 0 ? context.scopes.join(' ') : undefined;
    default:
      return context.additionalParameters?.[type];
  }
}

export function evaluatePolicyCondition(
  condition: JourneyPolicyCondition,
  context: PolicyMatchContext
): boolean {
  const actual = contextValue(condition.type, context);

  switch (normalize(condition.operator)) {
    case 'eq':
    case 'equals':
      return actual === condition.value;
    case 'ne':
    case 'notequals':
      return actual !== condition.value;
    case 'contains':
      return actual?.includes(condition.value) ?? false;
    case 'startswith':
      return actual?.startsWith(condition.value) ?? false;
    case 'endswith':
      return actual?.endsWith(condition.value) ?? false;
    case 'exists':
      return actual !== undefined && actual !== '';
    case 'notexists':
      return actual === undefined || actual === '';
    default:
      return false;
  }
}
