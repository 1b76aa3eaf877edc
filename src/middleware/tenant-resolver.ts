import type { MiddlewareHandler } from 'hono';
import type { OAuthEnv } from '../types/hono.js';
import type { ITenantStorage, ISigningKeyStorage } from '../storage/interfaces/index.js';
import { OAuthError } from '../errors/oauth-error.js';
import { componentLogger } from '../logging/logger.js';

export interface TenantResolverOptions {
  tenantStorage: ITenantStorage;
  signingKeyStorage: ISigningKeyStorage;
  paramName?: string; // URL parameter name for tenant slug, default 'tenant'
}

/**
 * Resolve the tenant from the first path segment (/:tenant/connect/token, ...)
 *
 * Sets `tenant` and `signingKey` in context variables. A tenant without a
 * primary key gets an RS256 key on first use.
 */
export function tenantResolver(options: TenantResolverOptions): MiddlewareHandler<OAuthEnv> {
  const { tenantStorage, signingKeyStorage, paramName = 'tenant' } = options;

  return async (c, next) => {
    const tenantSlug = c.req.param(paramName);
    if (!tenantSlug) {
      throw OAuthError.invalidRequest('Missing tenant identifier');
    }

    const tenant = await tenantStorage.findBySlug(tenantSlug);
    if (!tenant) {
      throw OAuthError.invalidRequest(`Unknown tenant: ${tenantSlug}`);
    }

    let signingKey = await signingKeyStorage.getPrimary(tenant.id);
    if (!signingKey) {
      signingKey = await signingKeyStorage.create({ tenantId: tenant.id, algorithm: 'RS256', isPrimary: true });
      componentLogger('tenant').info({ tenant: tenant.slug, kid: signingKey.kid }, 'Created primary signing key');
    }

    c.set('tenant', tenant);
    c.set('signingKey', signingKey);

    await next();
  };
}
