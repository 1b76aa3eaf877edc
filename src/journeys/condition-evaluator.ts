import type { JourneyData, StepCondition } from './types.js';
import { stringifyScalar } from './step-context.js';

export interface ConditionEvaluationContext {
  journeyData: Readonly<JourneyData>;
  input?: Readonly<Record<string, string>>;
  userId?: string;
  tenantId?: string;
  clientId?: string;
  claims?: Readonly<Record<string, string>>;
}

/**
 * Evaluates step conditions left to right. Each condition's
 * `logicalOperator` joins it to the one that follows; the first joins
 * with `and` onto `true`.
 */
export class ConditionEvaluator {
  evaluate(conditions: readonly StepCondition[], context: ConditionEvaluationContext): boolean {
    let result = true;
    let joinWith = 'and';

    for (const condition of conditions) {
      let current = this.evaluateOne(condition, context);
      if (condition.negate) {
        current = !current;
      }

      result = joinWith === 'or' ? result || current : result && current;
      joinWith = condition.logicalOperator.toLowerCase();
    }

    return result;
  }

  evaluateOne(condition: StepCondition, context: ConditionEvaluationContext): boolean {
    const value = resolveField(condition.type, condition.field, context);
    const expected = condition.value;

    switch (condition.operator.toLowerCase()) {
      case 'eq':
      case 'equals':
        return compareValues(value, expected) === 0;
      case 'ne':
      case 'not_equals':
        return compareValues(value, expected) !== 0;
      case 'gt':
      case 'greater_than':
        return compareValues(value, expected) > 0;
      case 'lt':
      case 'less_than':
        return compareValues(value, expected) < 0;
      case 'gte':
      case 'greater_than_or_equals':
        return compareValues(value, expected) >= 0;
      case 'lte':
      case 'less_than_or_equals':
        return compareValues(value, expected) <= 0;
      case 'contains':
        return includesIgnoreCase(toText(value), expected, (a, b) => a.includes(b));
      case 'starts_with':
        return includesIgnoreCase(toText(value), expected, (a, b) => a.startsWith(b));
      case 'ends_with':
        return includesIgnoreCase(toText(value), expected, (a, b) => a.endsWith(b));
      case 'exists':
        return value != null;
      case 'not_exists':
        return value == null;
      case 'empty':
        return !toText(value);
      case 'not_empty':
        return !!toText(value);
      case 'regex':
      case 'matches':
        return matchesPattern(toText(value), expected);
      case 'in':
        return isInList(value, expected);
      case 'not_in':
        return !isInList(value, expected);
      case 'true':
        return isTruthy(value);
      case 'false':
        return !isTruthy(value);
      default:
        return false;
    }
  }
}

function resolveField(type: string, field: string, context: ConditionEvaluationContext): unknown {
  switch (type.toLowerCase()) {
    case 'data':
    case 'journeydata':
      return context.journeyData[field];
    case 'claim':
    case 'claims':
      return context.claims?.[field];
    case 'input':
      return context.input?.[field];
    case 'context':
      return resolveContextField(field, context);
    case 'path':
      return resolvePath(context.journeyData, field);
    default:
      return undefined;
  }
}

function resolveContextField(field: string, context: ConditionEvaluationContext): unknown {
  switch (field.toLowerCase()) {
    case 'userid':
    case 'user_id':
      return context.userId;
    case 'tenantid':
    case 'tenant_id':
      return context.tenantId;
    case 'clientid':
    case 'client_id':
      return context.clientId;
    case 'isauthenticated':
    case 'is_authenticated':
      return !!context.userId;
    default:
      return undefined;
  }
}

/**
 * Dot-notation lookup, e.g. `user.address.country`
 */
export function resolvePath(data: Readonly<JourneyData>, path: string): unknown {
  let current: unknown = data;

  for (const part of path.split('.')) {
    if (!isRecord(current) || !(part in current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toText(value: unknown): string | undefined {
  if (value == null) return undefined;
  return stringifyScalar(value) ?? JSON.stringify(value);
}

function parseNumber(value: string): number | null {
  if (value.trim() === '') return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

function parseDate(value: string): number | null {
  const t = Date.parse(value);
  return Number.isNaN(t) ? null : t;
}

function sign(n: number): number {
  return n < 0 ? -1 : n > 0 ? 1 : 0;
}

/**
 * Numeric, then date, then case-insensitive ordinal comparison
 */
export function compareValues(left: unknown, right: string | undefined): number {
  const leftText = toText(left);
  if (leftText === undefined && right === undefined) return 0;
  if (leftText === undefined) return -1;
  if (right === undefined) return 1;

  const leftNum = parseNumber(leftText);
  const rightNum = parseNumber(right);
  if (leftNum !== null && rightNum !== null) {
    return sign(leftNum - rightNum);
  }

  const leftDate = parseDate(leftText);
  const rightDate = parseDate(right);
  if (leftDate !== null && rightDate !== null) {
    return sign(leftDate - rightDate);
  }

  const a = leftText.toUpperCase();
  const b = right.toUpperCase();
  return a < b ? -1 : a > b ? 1 : 0;
}

function includesIgnoreCase(
  value: string | undefined,
  expected: string | undefined,
  test: (a: string, b: string) => boolean
): boolean {
  if (value === undefined) return false;
  return test(value.toLowerCase(), (expected ?? '').toLowerCase());
}

function matchesPattern(value: string | undefined, pattern: string | undefined): boolean {
  if (!value || !pattern) return false;
  try {
    return new RegExp(pattern, 'i').test(value);
  } catch {
    // invalid pattern in configuration
    return false;
  }
}

function isInList(value: unknown, list: string | undefined): boolean {
  const text = toText(value);
  if (text === undefined || !list) return false;
  const needle = text.toLowerCase();
  return list.split(',').some((item) => item.trim().toLowerCase() === needle);
}

function isTruthy(value: unknown): boolean {
  if (value == null) return false;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') {
    return value !== '' && value.toLowerCase() !== 'false' && value !== '0';
  }
  return true;
}

/**
 * Evaluation view of a step context. Claims are the scalar journey
 * values, which is where login and collect steps put them.
 */
export function evaluationContextOf(context: {
  journeyData: Readonly<JourneyData>;
  input: Readonly<Record<string, string>>;
  userId: string | undefined;
  tenantId: string;
  clientId: string;
}): ConditionEvaluationContext {
  const claims: Record<string, string> = {};
  for (const [key, value] of Object.entries(context.journeyData)) {
    const text = stringifyScalar(value);
    if (text !== undefined) claims[key] = text;
  }

  return {
    journeyData: context.journeyData,
    input: context.input,
    userId: context.userId,
    tenantId: context.tenantId,
    clientId: context.clientId,
    claims,
  };
}
