import { describe, it, expect } from 'vitest';
import { ConditionEvaluator, compareValues, resolvePath } from '../../journeys/condition-evaluator.js';
import { parseJourneyPolicies } from '../../journeys/policy-schema.js';
import { loadJourneyPolicies } from '../../journeys/default-policies.js';
import type { StepCondition } from '../../journeys/types.js';

function condition(overrides: Partial<StepCondition>): StepCondition {
  return { type: 'data', field: 'country', operator: 'equals', logicalOperator: 'and', negate: false, ...overrides };
}

describe('ConditionEvaluator', () => {
  const evaluator = new ConditionEvaluator();
  const context = {
    journeyData: { country: 'NO', age: '42', profile: { address: { city: 'Oslo' } }, newsletter: 'false' },
    input: { code: '123456' },
    userId: 'user-1',
    clientId: 'web-app',
  };

  it('should treat an empty list as true', () => {
    expect(evaluator.evaluate([], context)).toBe(true);
  });

  it('should compare case-insensitively and numerically', () => {
    expect(evaluator.evaluateOne(condition({ value: 'no' }), context)).toBe(true);
    expect(evaluator.evaluateOne(condition({ field: 'age', operator: 'gt', value: '9' }), context)).toBe(true);
    expect(evaluator.evaluateOne(condition({ field: 'age', operator: 'lte', value: '41' }), context)).toBe(false);
  });

  it('should support string and list operators', () => {
    expect(evaluator.evaluateOne(condition({ operator: 'in', value: 'se, no ,dk' }), context)).toBe(true);
    expect(evaluator.evaluateOne(condition({ operator: 'starts_with', value: 'n' }), context)).toBe(true);
    expect(evaluator.evaluateOne(condition({ operator: 'matches', value: '^[A-Z]{2}$' }), context)).toBe(true);
    expect(evaluator.evaluateOne(condition({ operator: 'matches', value: '(' }), context)).toBe(false);
    expect(evaluator.evaluateOne(condition({ field: 'newsletter', operator: 'true' }), context)).toBe(false);
  });

  it('should read input, context and nested paths', () => {
    expect(evaluator.evaluateOne(condition({ type: 'input', field: 'code', operator: 'not_empty' }), context)).toBe(true);
    expect(
      evaluator.evaluateOne(condition({ type: 'context', field: 'is_authenticated', operator: 'true' }), context)
    ).toBe(true);
    expect(
      evaluator.evaluateOne(condition({ type: 'path', field: 'profile.address.city', value: 'oslo' }), context)
    ).toBe(true);
  });

  it('should join conditions left to right', () => {
    const failing = condition({ value: 'SE' });
    const passing = condition({ value: 'NO' });

    expect(evaluator.evaluate([{ ...failing, logicalOperator: 'or' }, passing], context)).toBe(true);
    expect(evaluator.evaluate([failing, passing], context)).toBe(false);
    expect(evaluator.evaluate([{ ...failing, negate: true }], context)).toBe(true);
  });

  it('should return false for unknown operators', () => {
    expect(evaluator.evaluateOne(condition({ operator: 'approximately', value: 'NO' }), context)).toBe(false);
  });
});

describe('compareValues', () => {
  it('should order numbers, dates and text', () => {
    expect(compareValues('10', '9')).toBe(1);
    expect(compareValues('2024-01-01', '2024-06-01')).toBe(-1);
    expect(compareValues('abc', 'ABC')).toBe(0);
    expect(compareValues(undefined, 'x')).toBe(-1);
  });
});

describe('resolvePath', () => {
  it('should return undefined when a segment is missing', () => {
    expect(resolvePath({ a: { b: 1 } }, 'a.c')).toBeUndefined();
    expect(resolvePath({ a: { b: 1 } }, 'a.b')).toBe(1);
  });
});

describe('journey policy files', () => {
  it('should fill defaults when parsing', () => {
    const [policy] = parseJourneyPolicies([
      { id: 'p1', name: 'Minimal', type: 'SignIn', steps: [{ id: 's1', type: 'local_login', order: 1 }] },
    ]);

    expect(policy).toMatchObject({
      enabled: true,
      priority: 100,
      version: 1,
      conditions: [],
      maxJourneyDurationMinutes: 30,
      steps: [{ id: 's1', optional: false, configuration: {}, conditions: [], branches: {}, requiredClaims: [] }],
    });
  });

  it('should reject unknown journey types', () => {
    expect(() => parseJourneyPolicies([{ id: 'p1', name: 'Bad', type: 'Teleport', steps: [] }])).toThrow();
  });

  it('should load the bundled policies', () => {
    const ids = loadJourneyPolicies().map((p) => p.id);

    expect(ids).toEqual(expect.arrayContaining(['signin', 'signup', 'signup-signin', 'profile-edit']));
  });
});
