import type { IStepHandler } from '../step-handler.js';
import type { StepExecutionContext } from '../step-context.js';
import { StepHandlerResult } from '../step-result.js';
import { splitSpaceDelimited } from '../../types/authorize-request.js';
import { OPENID_SCOPE } from '../../config/constants.js';

export const GRANTED_SCOPES_KEY = 'granted_scopes';

/**
 * Shows the requested scopes and records the ones the user accepts.
 *
 * Input: action `accept` or `deny`; `scopes` may narrow the grant.
 * `openid` stays granted when it was requested.
 */
export class ConsentStepHandler implements IStepHandler {
  readonly stepType = 'consent';

  async execute(context: StepExecutionContext): Promise<StepHandlerResult> {
    const requested = splitSpaceDelimited(context.getDataString('scopes'));
    if (requested.length === 0) {
      return StepHandlerResult.skip();
    }

    const action = context.action?.toLowerCase();

    if (action === 'deny') {
      return StepHandlerResult.fail('access_denied', 'The user denied consent');
    }

    if (action !== 'accept') {
      return StepHandlerResult.requireInput({
        viewName: 'consent',
        viewData: { clientId: context.clientId, scopes: requested },
      });
    }

    const selected = context.getInput('scopes');
    let granted = selected === undefined ? requested : splitSpaceDelimited(selected).filter((s) => requested.includes(s));
    if (requested.includes(OPENID_SCOPE) && !granted.includes(OPENID_SCOPE)) {
      granted = [OPENID_SCOPE, ...granted];
    }

    return StepHandlerResult.success({ [GRANTED_SCOPES_KEY]: granted.join(' ') });
  }
}
