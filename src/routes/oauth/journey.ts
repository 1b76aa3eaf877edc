import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { OAuthEnv } from '../../types/hono.js';
import type { AuthorizeHandlers } from '../../grants/authorization-code/authorize.js';
import { OAuthError } from '../../errors/oauth-error.js';

const journeyInputSchema = z.object({
  step_id: z.string().min(1).optional(),
  action: z.string().min(1).optional(),
  values: z.record(z.string()).default({}),
});

export interface JourneyRouteOptions {
  handlers: AuthorizeHandlers;
}

/**
 * Create journey continuation routes
 *
 * POST /:tenant/connect/journey/:journeyId
 */
export function createJourneyRoutes(options: JourneyRouteOptions) {
  const { handlers } = options;

  const router = new Hono<OAuthEnv>();

  router.post(
    '/:journeyId',
    zValidator('json', journeyInputSchema, (result) => {
      if (!result.success) {
        const messages = result.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw OAuthError.invalidRequest(`Invalid journey input: ${messages.join(', ')}`);
      }
    }),
    async (c) => {
      const input = c.req.valid('json');
      return handlers.continueJourney(c, c.req.param('journeyId'), {
        stepId: input.step_id,
        action: input.action,
        values: input.values,
      });
    }
  );

  return router;
}
