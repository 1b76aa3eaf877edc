import type { IStepHandler } from '../step-handler.js';
import type { StepExecutionContext } from '../step-context.js';
import { StepHandlerResult } from '../step-result.js';
import type { IUserStore } from '../../storage/interfaces/user-storage.js';
import type { User } from '../../types/user.js';
import type { JourneyData } from '../types.js';
import { componentLogger } from '../../logging/logger.js';

export const SIGNUP_BRANCH = 'signup';

/**
 * Journey data recorded for an authenticated user
 */
export function authenticatedUserData(user: User, amr: string): JourneyData {
  const data: JourneyData = {
    sub: user.id,
    auth_time: Math.floor(Date.now() / 1000),
    amr,
  };
  if (user.username) data['username'] = user.username;
  if (user.email) data['email'] = user.email;
  if (user.name) data['name'] = user.name;
  return data;
}

/**
 * Username/password sign-in against the tenant's user store.
 *
 * Input: `username`, `password`; action `signup` branches to
 * registration when `allowSelfRegistration` is set.
 */
export class LocalLoginStepHandler implements IStepHandler {
  readonly stepType = 'local_login';

  constructor(private readonly users: IUserStore) {}

  async execute(context: StepExecutionContext): Promise<StepHandlerResult> {
    const log = componentLogger('journey.local_login');

    if (context.isAuthenticated) {
      return StepHandlerResult.skip();
    }

    const allowSelfRegistration = context.getConfigBoolean('allowSelfRegistration', false);
    const viewData = {
      loginHint: context.getDataString('loginHint') ?? '',
      allowSelfRegistration,
      allowRememberMe: context.getConfigBoolean('allowRememberMe', false),
    };

    if (context.action === SIGNUP_BRANCH) {
      if (!allowSelfRegistration) {
        return StepHandlerResult.requireInput({
          viewName: 'login',
          viewData,
          error: 'Self-registration is not enabled',
        });
      }
      return StepHandlerResult.branch(SIGNUP_BRANCH);
    }

    const username = context.getInput('username')?.trim();
    const password = context.getInput('password');

    if (!username || !password) {
      return StepHandlerResult.requireInput({
        viewName: 'login',
        viewData,
        error: context.hasInput ? 'Username and password are required' : undefined,
      });
    }

    const user = await this.users.validateCredentials(context.tenantId, username, password);
    if (!user) {
      log.info({ tenantId: context.tenantId, journeyId: context.journeyId }, 'Sign-in failed');
      return StepHandlerResult.requireInput({
        viewName: 'login',
        viewData: { ...viewData, loginHint: username },
        error: 'Invalid username or password',
      });
    }

    context.setAuthenticated(user.id);
    return StepHandlerResult.success(authenticatedUserData(user, 'pwd'));
  }
}
