import type { JourneyData } from './types.js';

export type StepOutcome =
  | 'continue'
  | 'require_input'
  | 'branch'
  | 'complete'
  | 'failed'
  | 'skip'
  | 'redirect';

/**
 * What a handler asks the client to render when it needs input
 */
export interface StepInputRequest {
  viewName: string;
  viewData?: Record<string, unknown>;
  error?: string;
}

export type StepHandlerResult =
  | { outcome: 'continue'; output: JourneyData; nextStepId?: string }
  | { outcome: 'require_input'; input: StepInputRequest }
  | { outcome: 'branch'; branchId: string; output: JourneyData }
  | { outcome: 'complete'; output: JourneyData }
  | { outcome: 'failed'; error: string; errorDescription?: string }
  | { outcome: 'skip' }
  | { outcome: 'redirect'; url: string };

export const StepHandlerResult = {
  success(output: JourneyData = {}): StepHandlerResult {
    return { outcome: 'continue', output };
  },

  continueTo(nextStepId: string, output: JourneyData = {}): StepHandlerResult {
    return { outcome: 'continue', output, nextStepId };
  },

  requireInput(input: StepInputRequest): StepHandlerResult {
    return { outcome: 'require_input', input };
  },

  branch(branchId: string, output: JourneyData = {}): StepHandlerResult {
    return { outcome: 'branch', branchId, output };
  },

  complete(output: JourneyData = {}): StepHandlerResult {
    return { outcome: 'complete', output };
  },

  fail(error: string, errorDescription?: string): StepHandlerResult {
    return { outcome: 'failed', error, errorDescription };
  },

  skip(): StepHandlerResult {
    return { outcome: 'skip' };
  },

  redirect(url: string): StepHandlerResult {
    return { outcome: 'redirect', url };
  },
} as const;
