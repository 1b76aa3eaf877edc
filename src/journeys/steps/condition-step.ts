import { z } from 'zod';
import type { IStepHandler } from '../step-handler.js';
import type { StepExecutionContext } from '../step-context.js';
import { StepHandlerResult } from '../step-result.js';
import { ConditionEvaluator, evaluationContextOf } from '../condition-evaluator.js';
import { stepConditionSchema } from '../policy-schema.js';
import { componentLogger } from '../../logging/logger.js';

const conditionStepConfigSchema = z.object({
  conditions: z.array(stepConditionSchema).default([]),
  combineWith: z.string().default('and'),
  onTrue: z.string().optional(),
  onFalse: z.string().optional(),
});

/**
 * Evaluates conditions and branches to `onTrue`/`onFalse`. Without a
 * target, a true result continues and a false one skips.
 */
export class ConditionStepHandler implements IStepHandler {
  readonly stepType = 'condition';

  constructor(private readonly evaluator: ConditionEvaluator = new ConditionEvaluator()) {}

  async execute(context: StepExecutionContext): Promise<StepHandlerResult> {
    const log = componentLogger('journey.condition');
    const parsed = conditionStepConfigSchema.safeParse(context.configuration);
    if (!parsed.success) {
      return StepHandlerResult.fail('invalid_configuration', parsed.error.message);
    }

    const { conditions, combineWith, onTrue, onFalse } = parsed.data;
    if (conditions.length === 0) {
      log.warn({ stepId: context.stepId }, 'Condition step has no conditions, skipping');
      return StepHandlerResult.skip();
    }

    const evalContext = evaluationContextOf(context);
    const results = conditions.map((c) => {
      const result = this.evaluator.evaluateOne(c, evalContext);
      return c.negate ? !result : result;
    });
    const outcome = combineWith.toLowerCase() === 'or' ? results.some(Boolean) : results.every(Boolean);

    log.debug({ stepId: context.stepId, outcome, combineWith, count: conditions.length }, 'Condition evaluated');

    if (outcome) {
      return onTrue ? StepHandlerResult.branch(onTrue) : StepHandlerResult.success({ condition_result: 'true' });
    }
    return onFalse ? StepHandlerResult.branch(onFalse) : StepHandlerResult.skip();
  }
}
