import { z } from 'zod';

export const TRANSFORM_KINDS = [
  'copy',
  'constant',
  'uppercase',
  'lowercase',
  'trim',
  'hash',
  'prefix',
  'suffix',
  'replace',
  'regex_replace',
  'regex_match',
  'substring',
  'split',
  'combine',
  'template',
  'map',
  'conditional',
  'base64encode',
  'base64decode',
  'urlencode',
  'urldecode',
] as const;

/**
 * Known transform kinds plus `unknown`, which passes the input through so
 * that policies written for newer step versions still load
 */
export type TransformKind = (typeof TRANSFORM_KINDS)[number] | 'unknown';

export function parseTransformKind(type: string): TransformKind {
  const normalized = type.toLowerCase();
  return TRANSFORM_KINDS.find((k) => k === normalized) ?? 'unknown';
}

export type TransformInputSource = 'constant' | 'input' | 'config' | 'data';

export function parseInputSource(source: string | undefined): TransformInputSource {
  switch (source?.toLowerCase()) {
    case 'constant':
      return 'constant';
    case 'input':
      return 'input';
    case 'config':
      return 'config';
    default:
      return 'data';
  }
}

export const conditionalBranchSchema = z.object({
  operator: z.string().optional(),
  value: z.string().optional(),
  thenValue: z.string().optional(),
});

export const transformRuleSchema = z.object({
  type: z.string().default('copy'),
  inputKey: z.string().optional(),
  inputSource: z.string().optional(),
  outputKey: z.string().min(1),
  defaultValue: z.string().optional(),
  required: z.boolean().default(false),

  constantValue: z.string().optional(),
  prefix: z.string().optional(),
  suffix: z.string().optional(),
  find: z.string().optional(),
  replaceWith: z.string().optional(),
  pattern: z.string().optional(),
  hashAlgorithm: z.string().optional(),
  startIndex: z.number().int().optional(),
  length: z.number().int().optional(),
  delimiter: z.string().optional(),
  index: z.number().int().optional(),
  inputKeys: z.array(z.string()).optional(),
  template: z.string().optional(),
  mapping: z.record(z.string()).optional(),
  conditions: z.array(conditionalBranchSchema).optional(),
});

export type TransformRule = z.infer<typeof transformRuleSchema>;
export type ConditionalBranch = z.infer<typeof conditionalBranchSchema>;

export const transformRuleListSchema = z.array(transformRuleSchema);
