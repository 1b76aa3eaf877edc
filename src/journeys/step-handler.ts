import type { StepExecutionContext } from './step-context.js';
import type { StepHandlerResult } from './step-result.js';

export interface IStepHandler {
  /** Matched case-insensitively against `JourneyPolicyStep.type` */
  readonly stepType: string;
  execute(context: StepExecutionContext): Promise<StepHandlerResult>;
}
