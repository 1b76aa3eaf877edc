import type { IStepHandler } from '../step-handler.js';
import type { StepExecutionContext } from '../step-context.js';
import { StepHandlerResult } from '../step-result.js';
import type { IUserStore } from '../../storage/interfaces/user-storage.js';
import type { User } from '../../types/user.js';
import type { JourneyData } from '../types.js';

type EditableField = 'name' | 'givenName' | 'familyName' | 'nickname' | 'locale' | 'picture' | 'phoneNumber';

/** Input name (claim style) -> user property */
const EDITABLE_FIELDS: Readonly<Record<string, EditableField>> = {
  name: 'name',
  given_name: 'givenName',
  family_name: 'familyName',
  nickname: 'nickname',
  locale: 'locale',
  picture: 'picture',
  phone_number: 'phoneNumber',
};

/**
 * Profile edit for the signed-in user. Only claim-style keys listed in
 * `EDITABLE_FIELDS` (optionally narrowed by the `fields` setting) are
 * written.
 */
export class UpdateUserStepHandler implements IStepHandler {
  readonly stepType = 'update_user';

  constructor(private readonly users: IUserStore) {}

  async execute(context: StepExecutionContext): Promise<StepHandlerResult> {
    const userId = context.userId;
    if (!userId) {
      return StepHandlerResult.fail('login_required', 'Sign in before editing the profile');
    }

    const user = await this.users.findById(context.tenantId, userId);
    if (!user) {
      return StepHandlerResult.fail('user_not_found', 'User not found');
    }

    const configured = context.getConfig('fields');
    const fields = Array.isArray(configured)
      ? configured.filter((f): f is string => typeof f === 'string' && Object.hasOwn(EDITABLE_FIELDS, f))
      : Object.keys(EDITABLE_FIELDS);

    if (!context.hasInput) {
      return StepHandlerResult.requireInput({
        viewName: 'profile',
        viewData: { fields, current: currentValues(user, fields) },
      });
    }

    const changes: Partial<Pick<User, EditableField>> = {};
    const output: JourneyData = {};

    for (const field of fields) {
      const property = EDITABLE_FIELDS[field];
      const value = context.getInput(field);
      if (property === undefined || value === undefined) continue;
      changes[property] = value.trim() || undefined;
      output[field] = value.trim();
    }

    await this.users.update(context.tenantId, userId, { ...changes, updatedAt: Math.floor(Date.now() / 1000) });
    return StepHandlerResult.success(output);
  }
}

function currentValues(user: User, fields: readonly string[]): Record<string, string> {
  const values: Record<string, string> = {};
  for (const field of fields) {
    const property = EDITABLE_FIELDS[field];
    const value = property ? user[property] : undefined;
    if (value !== undefined) values[field] = value;
  }
  return values;
}
