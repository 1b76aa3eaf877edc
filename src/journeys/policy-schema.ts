import { z } from 'zod';
import { JOURNEY_TYPES, type JourneyPolicy } from './types.js';
import { DEFAULT_JOURNEY_DURATION_MINUTES } from '../config/constants.js';

export const stepConditionSchema = z.object({
  type: z.string().min(1),
  field: z.string().min(1),
  operator: z.string().min(1),
  value: z.string().optional(),
  logicalOperator: z.enum(['and', 'or']).default('and'),
  negate: z.boolean().default(false),
});

export const policyConditionSchema = z.object({
  type: z.string().min(1),
  operator: z.string().min(1),
  value: z.string().default(''),
});

export const policyStepSchema = z.object({
  id: z.string().min(1),
  type: z.string().min(1),
  displayName: z.string().optional(),
  order: z.number().int(),
  optional: z.boolean().default(false),
  configuration: z.record(z.unknown()).default({}),
  conditions: z.array(stepConditionSchema).default([]),
  onSuccess: z.string().optional(),
  onFailure: z.string().optional(),
  branches: z.record(z.string()).default({}),
  requiredClaims: z.array(z.string()).default([]),
});

export const journeyPolicySchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  tenantId: z.string().optional(),
  type: z.enum(JOURNEY_TYPES),
  enabled: z.boolean().default(true),
  priority: z.number().int().default(100),
  description: z.string().optional(),
  version: z.number().int().default(1),
  steps: z.array(policyStepSchema),
  conditions: z.array(policyConditionSchema).default([]),
  maxJourneyDurationMinutes: z.number().int().positive().default(DEFAULT_JOURNEY_DURATION_MINUTES),
});

export const journeyPolicyListSchema = z.array(journeyPolicySchema);

export function parseJourneyPolicies(raw: unknown): JourneyPolicy[] {
  return journeyPolicyListSchema.parse(raw);
}
