export const JOURNEY_TYPES = [
  // Authentication flows
  'SignIn',
  'SignUp',
  'SignInSignUp',
  'PasswordReset',
  'ProfileEdit',
  'LinkAccount',
  'Consent',
  // Data collection, no authentication required
  'Waitlist',
  'ContactForm',
  'Survey',
  'Feedback',
  'DataCollection',
  'Custom',
] as const;

export type JourneyType = (typeof JOURNEY_TYPES)[number];

export function isJourneyType(value: string): value is JourneyType {
  return (JOURNEY_TYPES as readonly string[]).includes(value);
}

/**
 * Policy-level match condition, e.g. `{ type: 'acr_values', operator: 'contains', value: 'mfa' }`
 */
export interface JourneyPolicyCondition {
  type: string;
  operator: string;
  value: string;
}

/**
 * Step-level condition evaluated against journey data and context
 */
export interface StepCondition {
  /** Field source: data, claim, context, path, input */
  type: string;
  field: string;
  operator: string;
  value?: string;
  /** Joins this condition's result with the next one */
  logicalOperator: 'and' | 'or';
  negate: boolean;
}

export interface JourneyPolicyStep {
  id: string;
  type: string;
  displayName?: string;
  order: number;
  optional: boolean;
  configuration: Record<string, unknown>;
  conditions: StepCondition[];
  onSuccess?: string;
  onFailure?: string;
  /** Branch id returned by the handler -> target step id */
  branches: Record<string, string>;
  /** Journey data keys that must be present before the step runs */
  requiredClaims: string[];
}

export interface JourneyPolicy {
  id: string;
  name: string;
  /** Absent for global policies */
  tenantId?: string;
  type: JourneyType;
  enabled: boolean;
  priority: number;
  description?: string;
  version: number;
  steps: JourneyPolicyStep[];
  conditions: JourneyPolicyCondition[];
  maxJourneyDurationMinutes: number;
}

export interface PolicyMatchContext {
  tenantId: string;
  clientId?: string;
  type: JourneyType;
  scopes?: readonly string[];
  acrValues?: string;
  additionalParameters?: Readonly<Record<string, string>>;
}

export type JourneyStatus = 'in_progress' | 'completed' | 'failed' | 'expired';

export type JourneyData = Record<string, unknown>;

export interface JourneyState {
  id: string;
  tenantId: string;
  clientId: string;
  userId?: string;
  policyId: string;
  currentStepId: string;
  status: JourneyStatus;
  createdAt: Date;
  expiresAt: Date;
  data: JourneyData;
  sessionId?: string;
  correlationId?: string;
  callbackUrl?: string;
  completedSteps: string[];
}

export interface JourneyStartContext {
  tenantId: string;
  clientId: string;
  userId?: string;
  correlationId?: string;
  callbackUrl?: string;
  loginHint?: string;
  acrValues?: string;
  requestedScopes?: readonly string[];
  /** Copied into journey data without overwriting the keys above */
  properties?: Readonly<Record<string, unknown>>;
}

export interface JourneyStepInput {
  stepId?: string;
  values: Record<string, string>;
  action?: string;
}

/**
 * What a client needs to render the current step
 */
export interface JourneyStepView {
  stepId: string;
  stepType: string;
  displayName?: string;
  viewName?: string;
  viewData?: Record<string, unknown>;
  error?: string;
}

export interface JourneyCompletion {
  userId: string;
  sessionId?: string;
  claims: Record<string, string>;
  callbackUrl?: string;
  correlationId?: string;
}

export interface JourneyResult {
  journeyId: string;
  status: JourneyStatus;
  currentStep?: JourneyStepView;
  completion?: JourneyCompletion;
  error?: string;
  errorDescription?: string;
}
