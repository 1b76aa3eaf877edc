import { z } from 'zod';
import type { IStepHandler } from '../step-handler.js';
import type { StepExecutionContext } from '../step-context.js';
import { StepHandlerResult } from '../step-result.js';
import type { JourneyData } from '../types.js';

const collectFieldSchema = z.object({
  name: z.string().min(1),
  label: z.string().optional(),
  type: z.string().default('text'),
  required: z.boolean().default(false),
  pattern: z.string().optional(),
  /** Journey data key; defaults to `name` */
  outputKey: z.string().optional(),
});

const collectStepConfigSchema = z.object({
  fields: z.array(collectFieldSchema).default([]),
  viewName: z.string().default('collect'),
  title: z.string().optional(),
});

export type CollectField = z.infer<typeof collectFieldSchema>;

/**
 * Validate submitted values against the field list. Returns the first
 * problem found, or null.
 */
export function validateCollectedValues(
  fields: readonly CollectField[],
  values: Readonly<Record<string, string>>
): string | null {
  for (const field of fields) {
    const value = values[field.name]?.trim() ?? '';

    if (field.required && value === '') {
      return `${field.label ?? field.name} is required`;
    }

    if (value !== '' && field.pattern) {
      let valid: boolean;
      try {
        valid = new RegExp(field.pattern).test(value);
      } catch {
        valid = false;
      }
      if (!valid) {
        return `${field.label ?? field.name} is not valid`;
      }
    }
  }
  return null;
}

/**
 * Asks for the configured fields, then copies the submitted values into
 * journey data
 */
export class CollectStepHandler implements IStepHandler {
  readonly stepType = 'collect';

  async execute(context: StepExecutionContext): Promise<StepHandlerResult> {
    const parsed = collectStepConfigSchema.safeParse(context.configuration);
    if (!parsed.success) {
      return StepHandlerResult.fail('invalid_configuration', parsed.error.message);
    }

    const { fields, viewName, title } = parsed.data;
    if (fields.length === 0) {
      return StepHandlerResult.skip();
    }

    const viewData = { title, fields };

    if (!context.hasInput) {
      return StepHandlerResult.requireInput({ viewName, viewData });
    }

    const problem = validateCollectedValues(fields, context.input);
    if (problem) {
      return StepHandlerResult.requireInput({ viewName, viewData, error: problem });
    }

    const output: JourneyData = {};
    for (const field of fields) {
      const value = context.getInput(field.name)?.trim();
      if (value !== undefined && value !== '') {
        const key = field.outputKey ?? field.name;
        output[key] = value;
        context.setData(key, value);
      }
    }

    return StepHandlerResult.success(output);
  }
}
