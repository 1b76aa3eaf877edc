import { z } from 'zod';
import type { IStepHandler } from '../step-handler.js';
import type { StepExecutionContext } from '../step-context.js';
import { StepHandlerResult } from '../step-result.js';
import type { IUserStore } from '../../storage/interfaces/user-storage.js';
import { generateId } from '../../crypto/random.js';
import { authenticatedUserData } from './local-login-step.js';
import { componentLogger } from '../../logging/logger.js';

const emailSchema = z.string().email();

/**
 * Self-registration: collects `username`, `email`, `password` and an
 * optional `name`, creates the user and signs them in
 */
export class CreateUserStepHandler implements IStepHandler {
  readonly stepType = 'create_user';

  constructor(private readonly users: IUserStore) {}

  async execute(context: StepExecutionContext): Promise<StepHandlerResult> {
    const minPasswordLength = Number(context.getConfigString('minPasswordLength', '8'));
    const requireEmail = context.getConfigBoolean('requireEmail', true);
    const viewData = { minPasswordLength, requireEmail, email: context.getDataString('loginHint') ?? '' };

    if (!context.hasInput) {
      return StepHandlerResult.requireInput({ viewName: 'signup', viewData });
    }

    const username = context.getInput('username')?.trim() ?? '';
    const email = context.getInput('email')?.trim() ?? '';
    const password = context.getInput('password') ?? '';
    const name = context.getInput('name')?.trim();

    const problem = await this.validate(context.tenantId, { username, email, password }, minPasswordLength, requireEmail);
    if (problem) {
      return StepHandlerResult.requireInput({ viewName: 'signup', viewData: { ...viewData, username, email }, error: problem });
    }

    const user = await this.users.create(
      context.tenantId,
      {
        id: generateId(),
        tenantId: context.tenantId,
        username,
        email: email || undefined,
        emailVerified: false,
        name: name || undefined,
        updatedAt: Math.floor(Date.now() / 1000),
      },
      password
    );

    componentLogger('journey.create_user').info(
      { tenantId: context.tenantId, userId: user.id },
      'User registered'
    );

    context.setAuthenticated(user.id);
    return StepHandlerResult.success(authenticatedUserData(user, 'pwd'));
  }

  private async validate(
    tenantId: string,
    input: { username: string; email: string; password: string },
    minPasswordLength: number,
    requireEmail: boolean
  ): Promise<string | null> {
    if (!input.username) return 'Username is required';
    if (requireEmail && !input.email) return 'Email is required';
    if (input.email && !emailSchema.safeParse(input.email).success) return 'Email is not valid';
    if (input.password.length < minPasswordLength) {
      return `Password must be at least ${minPasswordLength} characters`;
    }
    if (await this.users.findByUsername(tenantId, input.username)) {
      return 'Username is already taken';
    }
    if (input.email && (await this.users.findByEmail(tenantId, input.email))) {
      return 'An account with this email already exists';
    }
    return null;
  }
}
