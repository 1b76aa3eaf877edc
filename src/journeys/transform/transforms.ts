import { createHash } from 'node:crypto';
import type { StepExecutionContext } from '../step-context.js';
import { stringifyScalar } from '../step-context.js';
import {
  parseInputSource,
  parseTransformKind,
  type ConditionalBranch,
  type TransformKind,
  type TransformRule,
} from './transform-rules.js';

const HASH_ALGORITHMS = ['md5', 'sha1', 'sha256', 'sha384', 'sha512'] as const;
type HashAlgorithm = (typeof HASH_ALGORITHMS)[number];

/** Kinds that produce a value even when the rule's input is missing */
const INPUT_OPTIONAL_KINDS: ReadonlySet<TransformKind> = new Set(['constant', 'combine', 'template']);

export function readInput(rule: TransformRule, context: StepExecutionContext): string | undefined {
  const key = rule.inputKey ?? '';

  switch (parseInputSource(rule.inputSource)) {
    case 'constant':
      return rule.constantValue;
    case 'input':
      return context.getInput(key);
    case 'config':
      return context.getConfigString(key);
    case 'data':
      return context.getDataString(key);
  }
}

/**
 * Apply one rule. Returns null when the rule yields nothing; throws when
 * the rule is malformed for its input (bad pattern, undecodable value).
 */
export function applyTransform(rule: TransformRule, context: StepExecutionContext): string | null {
  const kind = parseTransformKind(rule.type);
  const input = readInput(rule, context);

  if (input === undefined && !INPUT_OPTIONAL_KINDS.has(kind)) {
    return rule.defaultValue ?? null;
  }

  return applyKind(kind, rule, input, context);
}

function applyKind(
  kind: TransformKind,
  rule: TransformRule,
  input: string | undefined,
  context: StepExecutionContext
): string | null {
  switch (kind) {
    case 'copy':
      return input ?? null;
    case 'constant':
      return rule.constantValue ?? null;
    case 'uppercase':
      return input?.toUpperCase() ?? null;
    case 'lowercase':
      return input?.toLowerCase() ?? null;
    case 'trim':
      return input?.trim() ?? null;
    case 'hash':
      return hashValue(input, rule.hashAlgorithm);
    case 'prefix':
      return `${rule.prefix ?? ''}${input ?? ''}`;
    case 'suffix':
      return `${input ?? ''}${rule.suffix ?? ''}`;
    case 'replace':
      return input === undefined ? null : replaceLiteral(input, rule.find ?? '', rule.replaceWith ?? '');
    case 'regex_replace':
      if (!input || !rule.pattern) return input ?? null;
      return input.replace(new RegExp(rule.pattern, 'g'), rule.replaceWith ?? '');
    case 'regex_match':
      if (!input || !rule.pattern) return null;
      return new RegExp(rule.pattern).exec(input)?.[0] ?? '';
    case 'substring':
      return substring(input, rule.startIndex, rule.length);
    case 'split':
      return input?.split(rule.delimiter ?? ',')[rule.index ?? 0] ?? null;
    case 'combine':
      return combine(rule, context);
    case 'template':
      return renderTemplate(rule.template ?? '', context);
    case 'map':
      return rule.mapping?.[input ?? ''] ?? rule.defaultValue ?? null;
    case 'conditional':
      return evaluateConditional(rule, input);
    case 'base64encode':
      return input === undefined ? null : Buffer.from(input, 'utf8').toString('base64');
    case 'base64decode':
      return input === undefined ? null : decodeBase64(input);
    case 'urlencode':
      return input === undefined ? null : encodeURIComponent(input);
    case 'urldecode':
      return input === undefined ? null : decodeURIComponent(input);
    case 'unknown':
      return input ?? null;
  }
}

function isHashAlgorithm(value: string): value is HashAlgorithm {
  return (HASH_ALGORITHMS as readonly string[]).includes(value);
}

export function hashValue(value: string | undefined, algorithm = 'sha256'): string | null {
  if (!value) return null;
  const normalized = algorithm.toLowerCase();
  const name: HashAlgorithm = isHashAlgorithm(normalized) ? normalized : 'sha256';
  return createHash(name).update(value, 'utf8').digest('base64');
}

function replaceLiteral(value: string, find: string, replacement: string): string {
  if (find === '') return value;
  return value.split(find).join(replacement);
}

/**
 * Start and length are clamped into the string, never thrown on
 */
export function substring(
  value: string | undefined,
  startIndex: number | undefined,
  length: number | undefined
): string | null {
  if (!value) return null;
  const start = Math.min(Math.max(startIndex ?? 0, 0), value.length);
  const remaining = value.length - start;
  const count = Math.min(Math.max(length ?? remaining, 0), remaining);
  return value.substring(start, start + count);
}

function combine(rule: TransformRule, context: StepExecutionContext): string {
  const keys = rule.inputKeys ?? [];
  if (keys.length === 0) return '';
  return keys.map((k) => context.getDataString(k) ?? '').join(rule.delimiter ?? ' ');
}

function renderTemplate(template: string, context: StepExecutionContext): string {
  let result = template;

  for (const [key, value] of Object.entries(context.journeyData)) {
    result = result.split(`{data:${key}}`).join(stringifyScalar(value) ?? '');
  }

  for (const [key, value] of Object.entries(context.input)) {
    result = result.split(`{input:${key}}`).join(value);
  }

  return result.split('{user:id}').join(context.userId ?? '');
}

function equalsIgnoreCase(a: string | undefined, b: string | undefined): boolean {
  if (a === undefined || b === undefined) return a === b;
  return a.toLowerCase() === b.toLowerCase();
}

function branchMatches(branch: ConditionalBranch, input: string | undefined): boolean {
  const expected = branch.value ?? '';

  switch (branch.operator?.toLowerCase()) {
    case 'notequals':
    case 'neq':
      return !equalsIgnoreCase(input, branch.value);
    case 'contains':
      return input?.toLowerCase().includes(expected.toLowerCase()) ?? false;
    case 'startswith':
      return input?.toLowerCase().startsWith(expected.toLowerCase()) ?? false;
    case 'exists':
    case 'notnull':
      return !!input;
    case 'notexists':
    case 'null':
      return !input;
    default:
      // equals, eq and anything unrecognised
      return equalsIgnoreCase(input, branch.value);
  }
}

function evaluateConditional(rule: TransformRule, input: string | undefined): string | null {
  for (const branch of rule.conditions ?? []) {
    if (branchMatches(branch, input)) {
      return branch.thenValue ?? null;
    }
  }
  return rule.defaultValue ?? null;
}

function decodeBase64(value: string): string {
  if (!/^[A-Za-z0-9+/]*={0,2}$/.test(value) || value.length % 4 !== 0) {
    throw new Error('Input is not valid base64');
  }
  return Buffer.from(value, 'base64').toString('utf8');
}
