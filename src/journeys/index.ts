import type { IUserStore } from '../storage/interfaces/user-storage.js';
import { StepHandlerRegistry } from './step-handler-registry.js';
import { ConditionEvaluator } from './condition-evaluator.js';
import { TransformStepHandler } from './transform/transform-step.js';
import { ConditionStepHandler } from './steps/condition-step.js';
import { BranchStepHandler } from './steps/branch-step.js';
import { CollectStepHandler } from './steps/collect-step.js';
import { LocalLoginStepHandler } from './steps/local-login-step.js';
import { ConsentStepHandler } from './steps/consent-step.js';
import { CreateUserStepHandler } from './steps/create-user-step.js';
import { UpdateUserStepHandler } from './steps/update-user-step.js';

export * from './types.js';
export * from './step-result.js';
export * from './step-context.js';
export * from './step-handler.js';
export * from './step-handler-registry.js';
export * from './condition-evaluator.js';
export * from './policy-matcher.js';
export * from './policy-schema.js';
export * from './default-policies.js';
export * from './orchestrator.js';
export * from './transform/transform-rules.js';
export { applyTransform, hashValue, substring } from './transform/transforms.js';
export { TransformStepHandler } from './transform/transform-step.js';
export { ConditionStepHandler } from './steps/condition-step.js';
export { BranchStepHandler } from './steps/branch-step.js';
export { CollectStepHandler } from './steps/collect-step.js';
export { LocalLoginStepHandler } from './steps/local-login-step.js';
export { ConsentStepHandler } from './steps/consent-step.js';
export { CreateUserStepHandler } from './steps/create-user-step.js';
export { UpdateUserStepHandler } from './steps/update-user-step.js';

/**
 * Registry with every built-in step type
 */
export function createDefaultStepHandlers(users: IUserStore): StepHandlerRegistry {
  const evaluator = new ConditionEvaluator();

  return new StepHandlerRegistry([
    new TransformStepHandler(),
    new ConditionStepHandler(evaluator),
    new BranchStepHandler(evaluator),
    new CollectStepHandler(),
    new LocalLoginStepHandler(users),
    new ConsentStepHandler(),
    new CreateUserStepHandler(users),
    new UpdateUserStepHandler(users),
  ]);
}
