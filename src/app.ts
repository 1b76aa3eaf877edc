import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { OAuthEnv } from './types/hono.js';
import type { IStorage, IUserAuthenticator } from './storage/interfaces/index.js';
import type { AuditSink } from './events/audit-events.js';
import type { ICibaClientNotifier, ICibaUserNotifier } from './ciba/notification.js';
import { LoggingAuditSink } from './events/audit-events.js';
import { oauthErrorHandler, requestLogger, securityHeaders } from './middleware/error-handler.js';
import { rateLimiter } from './middleware/rate-limiter.js';
import { tenantResolver } from './middleware/tenant-resolver.js';
import { protocolContext } from './protocol/context.js';
import { DPoPProofValidator } from './dpop/proof-validator.js';
import { AccessTokenVerifier } from './services/access-token-verifier.js';
import { AuthorizeRequestValidator } from './validation/authorize-request-validator.js';
import { TokenRequestValidator } from './validation/token-request-validator.js';
import { HintResolver } from './ciba/hint-resolver.js';
import { CibaService } from './ciba/ciba-service.js';
import { JourneyOrchestrator, createDefaultStepHandlers } from './journeys/index.js';
import { createGrantHandlers } from './grants/index.js';
import { createAuthorizeHandlers } from './grants/authorization-code/authorize.js';
import { createAuthorizeRoutes } from './routes/oauth/authorize.js';
import { createJourneyRoutes } from './routes/oauth/journey.js';
import { createPushedAuthorizationRoutes } from './routes/oauth/par.js';
import { createTokenRoutes } from './routes/oauth/token.js';
import { createCibaRoutes } from './routes/oauth/ciba.js';
import { createDeviceAuthorizationRoutes } from './routes/oauth/device-authorization.js';
import { createIntrospectRoutes } from './routes/oauth/introspect.js';
import { createRevokeRoutes } from './routes/oauth/revoke.js';
import { createUserInfoRoutes } from './routes/oauth/userinfo.js';
import { createOpenIDConfigurationRoutes, createJwksRoutes } from './routes/discovery/index.js';
import { getConfig } from './config/index.js';
import { HEADER_DPOP, HEADER_DPOP_NONCE, HEADER_WWW_AUTHENTICATE } from './config/constants.js';

export interface IdentityServerOptions {
  storage: IStorage;
  /** Authenticates users for the standalone and headless UI modes */
  userAuthenticator?: IUserAuthenticator;
  audit?: AuditSink;
  baseUrl?: string;
  /** Where users enter device codes; defaults to `${baseUrl}/device` */
  verificationUri?: string;
  rateLimit?: {
    windowMs: number;
    maxRequests: number;
  };
  enableCors?: boolean;
  enableLogging?: boolean;
  cibaUserNotifier?: ICibaUserNotifier;
  cibaClientNotifier?: ICibaClientNotifier;
}

/**
 * Create the identity server application
 *
 * Every protocol endpoint lives under the tenant slug:
 * `/:tenant/connect/token`, `/:tenant/.well-known/openid-configuration`, ...
 */
export function createIdentityServer(options: IdentityServerOptions) {
  const config = getConfig();
  const { storage, userAuthenticator, enableCors = true, enableLogging = true } = options;
  const audit = options.audit ?? new LoggingAuditSink();
  const baseUrl = options.baseUrl ?? config.server.baseUrl;
  const verificationUri = options.verificationUri ?? `${baseUrl}/device`;
  const rateLimit = options.rateLimit ?? config.rateLimit;

  const dpopValidator = new DPoPProofValidator({
    nonceStore: storage.dpopNonces,
    proofLifetimeSeconds: config.dpop.proofLifetimeSeconds,
    clockSkewSeconds: config.dpop.clockSkewSeconds,
  });
  const verifier = new AccessTokenVerifier({ signingKeys: storage.signingKeys, revokedTokens: storage.revokedTokens });
  const cibaService = new CibaService({
    store: storage.cibaRequests,
    hintResolver: new HintResolver({ users: storage.users, signingKeys: storage.signingKeys }),
    audit,
    userNotifier: options.cibaUserNotifier,
    clientNotifier: options.cibaClientNotifier,
  });
  const orchestrator = new JourneyOrchestrator({
    policies: storage.journeyPolicies,
    states: storage.journeyStates,
    handlers: createDefaultStepHandlers(storage.users),
    audit,
  });
  const authorizeValidator = new AuthorizeRequestValidator({
    clients: storage.clients,
    pushedAuthorizations: storage.pushedAuthorizations,
  });
  const authorizeHandlers = createAuthorizeHandlers({
    validator: authorizeValidator,
    clients: storage.clients,
    authorizationCodes: storage.authorizationCodes,
    protocolStates: storage.protocolStates,
    journeyPolicies: storage.journeyPolicies,
    journeyStates: storage.journeyStates,
    orchestrator,
    userAuthenticator,
  });

  const app = new Hono<OAuthEnv>();

  app.onError(oauthErrorHandler);

  app.use('*', securityHeaders());

  if (enableLogging) {
    app.use('*', requestLogger());
  }

  if (enableCors) {
    app.use(
      '*',
      cors({
        origin: '*',
        allowMethods: ['GET', 'POST', 'OPTIONS'],
        allowHeaders: ['Content-Type', 'Authorization', HEADER_DPOP],
        exposeHeaders: [HEADER_WWW_AUTHENTICATE, HEADER_DPOP_NONCE],
        maxAge: 86400,
      })
    );
  }

  app.use('*', rateLimiter(rateLimit));

  app.get('/health', (c) => c.json({ status: 'ok', timestamp: new Date().toISOString() }));

  const tenantRoutes = new Hono<OAuthEnv>();

  tenantRoutes.use(
    '*',
    tenantResolver({ tenantStorage: storage.tenants, signingKeyStorage: storage.signingKeys })
  );
  tenantRoutes.use('*', protocolContext());

  tenantRoutes.route('/connect/authorize', createAuthorizeRoutes({ handlers: authorizeHandlers }));
  tenantRoutes.route('/connect/journey', createJourneyRoutes({ handlers: authorizeHandlers }));
  tenantRoutes.route('/connect/par', createPushedAuthorizationRoutes({ storage, validator: authorizeValidator }));
  tenantRoutes.route(
    '/connect/token',
    createTokenRoutes({
      storage,
      validator: new TokenRequestValidator({ dpopValidator }),
      grantHandlers: createGrantHandlers({ storage, cibaService }),
      audit,
    })
  );
  tenantRoutes.route('/connect/ciba', createCibaRoutes({ storage, cibaService }));
  tenantRoutes.route('/connect/deviceauthorization', createDeviceAuthorizationRoutes({ storage, verificationUri }));
  tenantRoutes.route('/connect/introspect', createIntrospectRoutes({ storage, verifier }));
  tenantRoutes.route('/connect/revocation', createRevokeRoutes({ storage, verifier }));
  tenantRoutes.route('/connect/userinfo', createUserInfoRoutes({ users: storage.users, verifier, dpopValidator, audit }));
  tenantRoutes.route('/.well-known/openid-configuration', createOpenIDConfigurationRoutes());
  tenantRoutes.route('/.well-known/jwks', createJwksRoutes({ signingKeys: storage.signingKeys }));

  app.route('/:tenant', tenantRoutes);

  return app;
}

export type IdentityServerApp = ReturnType<typeof createIdentityServer>;
