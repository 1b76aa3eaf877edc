import type { IJourneyPolicyStore } from '../storage/interfaces/journey-policy-store.js';
import type { IJourneyStateStore } from '../storage/interfaces/journey-state-store.js';
import type { AuditSink } from '../events/audit-events.js';
import { auditEvent } from '../events/audit-events.js';
import { generateId } from '../crypto/random.js';
import { componentLogger } from '../logging/logger.js';
import { ConditionEvaluator, evaluationContextOf } from './condition-evaluator.js';
import { StepExecutionContext, stringifyScalar } from './step-context.js';
import type { StepHandlerRegistry } from './step-handler-registry.js';
import type { StepHandlerResult } from './step-result.js';
import type {
  JourneyCompletion,
  JourneyData,
  JourneyPolicy,
  JourneyPolicyStep,
  JourneyResult,
  JourneyStartContext,
  JourneyState,
  JourneyStepInput,
  JourneyStepView,
} from './types.js';

/** Upper bound on step transitions in one call, against routing loops */
const MAX_TRANSITIONS = 50;

export const REDIRECT_VIEW = '_Redirect';

export interface JourneyOrchestratorOptions {
  policies: IJourneyPolicyStore;
  states: IJourneyStateStore;
  handlers: StepHandlerRegistry;
  audit: AuditSink;
  evaluator?: ConditionEvaluator;
}

function orderedSteps(policy: JourneyPolicy): JourneyPolicyStep[] {
  return [...policy.steps].sort((a, b) => a.order - b.order);
}

function findStep(policy: JourneyPolicy, stepId: string): JourneyPolicyStep | undefined {
  return policy.steps.find((s) => s.id === stepId);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Drives a journey through its policy's steps until one needs input, the
 * steps run out, or a step fails.
 */
export class JourneyOrchestrator {
  private readonly policies: IJourneyPolicyStore;
  private readonly states: IJourneyStateStore;
  private readonly handlers: StepHandlerRegistry;
  private readonly audit: AuditSink;
  private readonly evaluator: ConditionEvaluator;

  constructor(options: JourneyOrchestratorOptions) {
    this.policies = options.policies;
    this.states = options.states;
    this.handlers = options.handlers;
    this.audit = options.audit;
    this.evaluator = options.evaluator ?? new ConditionEvaluator();
  }

  async start(policy: JourneyPolicy, context: JourneyStartContext): Promise<JourneyResult> {
    const journeyId = generateId();
    const [firstStep] = orderedSteps(policy);

    if (!firstStep) {
      return { journeyId, status: 'failed', error: 'invalid_policy', errorDescription: 'Policy has no steps defined' };
    }

    const data: JourneyData = {
      loginHint: context.loginHint ?? '',
      acrValues: context.acrValues ?? '',
      scopes: context.requestedScopes?.join(' ') ?? '',
      client_id: context.clientId,
    };
    for (const [key, value] of Object.entries(context.properties ?? {})) {
      if (!(key in data)) data[key] = value;
    }

    const now = new Date();
    const state: JourneyState = {
      id: journeyId,
      tenantId: context.tenantId,
      clientId: context.clientId,
      userId: context.userId,
      policyId: policy.id,
      currentStepId: firstStep.id,
      status: 'in_progress',
      createdAt: now,
      expiresAt: new Date(now.getTime() + policy.maxJourneyDurationMinutes * 60_000),
      data,
      correlationId: context.correlationId,
      callbackUrl: context.callbackUrl,
      completedSteps: [],
    };

    componentLogger('journey').info(
      { journeyId, policyId: policy.id, correlationId: context.correlationId },
      'Journey started'
    );
    this.audit.emit(
      auditEvent({ type: 'journey.started', tenantId: state.tenantId, clientId: state.clientId, journeyId, policyId: policy.id })
    );

    return this.run(state, policy, undefined);
  }

  async continue(journeyId: string, input: JourneyStepInput): Promise<JourneyResult> {
    const state = await this.states.get(journeyId);
    if (!state) {
      return { journeyId, status: 'failed', error: 'journey_not_found', errorDescription: 'Journey not found or expired' };
    }

    if (state.expiresAt.getTime() < Date.now()) {
      componentLogger('journey').warn({ journeyId, expiresAt: state.expiresAt }, 'Journey expired');
      await this.states.save({ ...state, status: 'expired' });
      return {
        journeyId,
        status: 'expired',
        error: 'journey_expired',
        errorDescription: 'Journey has expired. Please start a new session.',
      };
    }

    if (state.status !== 'in_progress') {
      return { journeyId, status: state.status, error: 'journey_not_active', errorDescription: 'Journey is no longer active' };
    }

    const policy = await this.policies.getById(state.policyId);
    if (!policy) {
      return { journeyId, status: 'failed', error: 'policy_not_found', errorDescription: 'Journey policy not found' };
    }

    if (input.stepId !== undefined && input.stepId !== state.currentStepId) {
      return {
        journeyId,
        status: 'in_progress',
        error: 'step_mismatch',
        errorDescription: `Input was for step ${input.stepId} but the journey is at ${state.currentStepId}`,
      };
    }

    return this.run(state, policy, input);
  }

  private async run(state: JourneyState, policy: JourneyPolicy, input: JourneyStepInput | undefined): Promise<JourneyResult> {
    const log = componentLogger('journey');
    let step = findStep(policy, state.currentStepId);
    let pendingInput = input;

    for (let transitions = 0; transitions < MAX_TRANSITIONS; transitions++) {
      if (!step) {
        return this.fail(state, policy, 'step_not_found', 'Current step not found in policy');
      }
      state.currentStepId = step.id;

      const evalContext = evaluationContextOf({
        journeyData: state.data,
        input: {},
        userId: state.userId,
        tenantId: state.tenantId,
        clientId: state.clientId,
      });
      if (step.conditions.length > 0 && !this.evaluator.evaluate(step.conditions, evalContext)) {
        log.debug({ journeyId: state.id, stepId: step.id }, 'Step conditions not met, skipping');
        const next = this.nextStep(policy, step, step.onSuccess);
        if (next === null) return this.complete(state, policy);
        step = next;
        continue;
      }

      const missing = step.requiredClaims.filter((claim) => !(claim in state.data));
      if (missing.length > 0) {
        log.warn({ journeyId: state.id, stepId: step.id, missing }, 'Step is missing required claims');
        return this.fail(state, policy, 'missing_claims', `Required claims not present: ${missing.join(', ')}`);
      }

      const handler = this.handlers.get(step.type);
      if (!handler) {
        log.warn({ journeyId: state.id, stepType: step.type }, 'No handler for step type');
        return this.fail(state, policy, 'handler_not_found', `No handler for step type: ${step.type}`);
      }

      const context = new StepExecutionContext({
        journeyId: state.id,
        stepId: step.id,
        tenantId: state.tenantId,
        clientId: state.clientId,
        userId: state.userId,
        configuration: step.configuration,
        journeyData: state.data,
        input: pendingInput?.values,
        action: pendingInput?.action,
      });
      pendingInput = undefined;

      let result: StepHandlerResult;
      try {
        result = await handler.execute(context);
      } catch (error) {
        log.error({ err: error, journeyId: state.id, stepId: step.id }, 'Step handler threw');
        result = { outcome: 'failed', error: 'step_error', errorDescription: errorMessage(error) };
      }

      if (result.outcome === 'continue' || result.outcome === 'branch' || result.outcome === 'complete') {
        Object.assign(state.data, result.output);
      }
      state.userId = context.userId;
      if ((result.outcome === 'continue' || result.outcome === 'complete') && !state.completedSteps.includes(step.id)) {
        state.completedSteps.push(step.id);
      }

      switch (result.outcome) {
        case 'require_input': {
          await this.states.save(state);
          return {
            journeyId: state.id,
            status: 'in_progress',
            currentStep: this.view(step, result.input.viewName, result.input.viewData, result.input.error),
          };
        }

        case 'redirect': {
          await this.states.save(state);
          return {
            journeyId: state.id,
            status: 'in_progress',
            currentStep: this.view(step, REDIRECT_VIEW, { redirectUrl: result.url }),
          };
        }

        case 'complete':
          return this.complete(state, policy);

        case 'continue':
        case 'skip': {
          const explicit = result.outcome === 'continue' ? (result.nextStepId ?? step.onSuccess) : step.onSuccess;
          const next = this.nextStep(policy, step, explicit);
          if (next === null) return this.complete(state, policy);
          step = next;
          break;
        }

        case 'branch': {
          const targetId = step.branches[result.branchId] ?? result.branchId;
          const target = findStep(policy, targetId);
          if (!target) {
            return this.fail(state, policy, 'branch_step_not_found', `Branch target step not found: ${targetId}`);
          }
          step = target;
          break;
        }

        case 'failed': {
          if (!step.onFailure) {
            return this.fail(state, policy, result.error, result.errorDescription);
          }
          log.debug({ journeyId: state.id, stepId: step.id, onFailure: step.onFailure }, 'Step failed, taking onFailure');
          state.data['lastError'] = result.error;
          state.data['lastErrorDescription'] = result.errorDescription ?? '';
          state.data['failedStepId'] = step.id;
          const target = findStep(policy, step.onFailure);
          if (!target) {
            return this.fail(state, policy, 'branch_step_not_found', `Branch target step not found: ${step.onFailure}`);
          }
          step = target;
          break;
        }
      }
    }

    return this.fail(state, policy, 'too_many_transitions', 'Journey exceeded the step transition limit');
  }

  /**
   * Explicit target when given (undefined when it names no step), else the
   * next step by order; null when the policy has no further steps
   */
  private nextStep(
    policy: JourneyPolicy,
    current: JourneyPolicyStep,
    explicitId: string | undefined
  ): JourneyPolicyStep | null | undefined {
    if (explicitId) {
      return findStep(policy, explicitId);
    }
    const steps = orderedSteps(policy);
    const index = steps.findIndex((s) => s.id === current.id);
    return steps[index + 1] ?? null;
  }

  private view(
    step: JourneyPolicyStep,
    viewName: string,
    viewData?: Record<string, unknown>,
    error?: string
  ): JourneyStepView {
    return { stepId: step.id, stepType: step.type, displayName: step.displayName, viewName, viewData, error };
  }

  private async complete(state: JourneyState, policy: JourneyPolicy): Promise<JourneyResult> {
    await this.states.delete(state.id);

    const claims: Record<string, string> = {};
    for (const [key, value] of Object.entries(state.data)) {
      const text = stringifyScalar(value);
      if (text !== undefined) claims[key] = text;
    }

    const completion: JourneyCompletion = {
      userId: state.userId ?? '',
      sessionId: state.sessionId,
      claims,
      callbackUrl: state.callbackUrl,
      correlationId: state.correlationId,
    };

    componentLogger('journey').info({ journeyId: state.id, policyId: policy.id }, 'Journey completed');
    this.audit.emit(
      auditEvent({
        type: 'journey.completed',
        tenantId: state.tenantId,
        clientId: state.clientId,
        journeyId: state.id,
        policyId: policy.id,
        subjectId: state.userId,
      })
    );

    return { journeyId: state.id, status: 'completed', completion };
  }

  private async fail(
    state: JourneyState,
    policy: JourneyPolicy,
    error: string,
    errorDescription?: string
  ): Promise<JourneyResult> {
    await this.states.delete(state.id);

    this.audit.emit(
      auditEvent({
        type: 'journey.failed',
        tenantId: state.tenantId,
        clientId: state.clientId,
        journeyId: state.id,
        policyId: policy.id,
        error,
        errorDescription,
      })
    );

    return { journeyId: state.id, status: 'failed', error, errorDescription };
  }
}
