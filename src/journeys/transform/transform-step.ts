import type { IStepHandler } from '../step-handler.js';
import type { StepExecutionContext } from '../step-context.js';
import { StepHandlerResult } from '../step-result.js';
import type { JourneyData } from '../types.js';
import { transformRuleListSchema } from './transform-rules.js';
import { applyTransform } from './transforms.js';
import { componentLogger } from '../../logging/logger.js';

/**
 * Declarative data mapping. Configuration:
 *
 * ```json
 * { "transforms": [{ "type": "prefix", "inputKey": "email", "prefix": "user-", "outputKey": "username" }] }
 * ```
 */
export class TransformStepHandler implements IStepHandler {
  readonly stepType = 'transform';

  async execute(context: StepExecutionContext): Promise<StepHandlerResult> {
    const log = componentLogger('journey.transform');
    const parsed = transformRuleListSchema.safeParse(context.getConfig('transforms') ?? []);

    if (!parsed.success) {
      return StepHandlerResult.fail('invalid_configuration', `Invalid transforms: ${parsed.error.message}`);
    }

    const rules = parsed.data;
    if (rules.length === 0) {
      log.warn({ journeyId: context.journeyId, stepId: context.stepId }, 'Transform step has no transforms, skipping');
      return StepHandlerResult.skip();
    }

    const output: JourneyData = {};

    for (const rule of rules) {
      try {
        const value = applyTransform(rule, context);
        if (value !== null) {
          output[rule.outputKey] = value;
          context.setData(rule.outputKey, value);
          log.debug({ type: rule.type, inputKey: rule.inputKey, outputKey: rule.outputKey }, 'Transform applied');
        }
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        log.warn({ outputKey: rule.outputKey, err: error }, 'Transform failed');

        if (rule.required) {
          return StepHandlerResult.fail(
            'transform_failed',
            `Required transform for ${rule.outputKey} failed: ${message}`
          );
        }
      }
    }

    return StepHandlerResult.success(output);
  }
}
