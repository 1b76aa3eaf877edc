import { z } from 'zod';
import type { IStepHandler } from '../step-handler.js';
import type { StepExecutionContext } from '../step-context.js';
import { StepHandlerResult } from '../step-result.js';
import { ConditionEvaluator, evaluationContextOf, type ConditionEvaluationContext } from '../condition-evaluator.js';
import { stepConditionSchema } from '../policy-schema.js';
import { componentLogger } from '../../logging/logger.js';

const branchRuleSchema = z.object({
  name: z.string().optional(),
  targetStepId: z.string().min(1),
  description: z.string().optional(),
  priority: z.number().default(0),
  conditions: z.array(stepConditionSchema).default([]),
  logicOperator: z.string().default('and'),
});

const branchStepConfigSchema = z.object({
  branches: z.array(branchRuleSchema).default([]),
  defaultBranch: z.string().optional(),
  evaluationMode: z.string().default('first-match'),
});

type BranchRule = z.infer<typeof branchRuleSchema>;

/**
 * Multi-way branch. Branches are tried in declaration order, or by
 * descending priority in `highest-priority` mode; a branch without
 * conditions always matches.
 */
export class BranchStepHandler implements IStepHandler {
  readonly stepType = 'branch';

  constructor(private readonly evaluator: ConditionEvaluator = new ConditionEvaluator()) {}

  async execute(context: StepExecutionContext): Promise<StepHandlerResult> {
    const log = componentLogger('journey.branch');
    const parsed = branchStepConfigSchema.safeParse(context.configuration);
    if (!parsed.success) {
      return StepHandlerResult.fail('invalid_configuration', parsed.error.message);
    }

    const { defaultBranch, evaluationMode } = parsed.data;
    let branches = parsed.data.branches;

    if (branches.length === 0 && !defaultBranch) {
      log.warn({ stepId: context.stepId }, 'Branch step has no branches and no default, continuing');
      return StepHandlerResult.success();
    }

    if (evaluationMode.toLowerCase() === 'highest-priority') {
      branches = [...branches].sort((a, b) => b.priority - a.priority);
    }

    const evalContext = evaluationContextOf(context);

    for (const branch of branches) {
      if (this.matches(branch, evalContext)) {
        const name = branch.name ?? branch.targetStepId;
        log.debug({ stepId: context.stepId, branch: name, target: branch.targetStepId }, 'Branch matched');
        context.setData('_branch_taken', name);
        return StepHandlerResult.branch(branch.targetStepId, {
          branch_name: name,
          branch_reason: branch.description ?? 'Condition matched',
        });
      }
    }

    if (defaultBranch) {
      return StepHandlerResult.branch(defaultBranch, {
        branch_name: 'default',
        branch_reason: 'No conditions matched',
      });
    }

    return StepHandlerResult.success();
  }

  private matches(branch: BranchRule, context: ConditionEvaluationContext): boolean {
    if (branch.conditions.length === 0) return true;

    const results = branch.conditions.map((c) => {
      const result = this.evaluator.evaluateOne(c, context);
      return c.negate ? !result : result;
    });

    return branch.logicOperator.toLowerCase() === 'or' ? results.some(Boolean) : results.every(Boolean);
  }
}
