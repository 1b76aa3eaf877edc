/**
 * Multi-tenant OAuth 2.0 / OpenID Connect identity provider core
 *
 * ```typescript
 * import { createIdentityServer, createMemoryStorage } from 'idp-core';
 *
 * const app = createIdentityServer({ storage: createMemoryStorage() });
 * ```
 */
export { createIdentityServer, type IdentityServerOptions, type IdentityServerApp } from './app.js';

export * from './types/index.js';
export * from './errors/index.js';
export * from './storage/interfaces/index.js';
export * from './storage/memory/index.js';
export * from './ciba/index.js';
export * from './journeys/index.js';
export * from './protocol/context.js';
export { DPoPProofValidator, type DPoPProofValidatorOptions } from './dpop/proof-validator.js';
export { AccessTokenVerifier, type AccessTokenVerifierOptions, type AccessTokenCheck } from './services/access-token-verifier.js';
export { TokenService, tokenService, buildUserClaims } from './services/token-service.js';
export { AuthorizeRequestValidator, type ValidatedAuthorizeRequest } from './validation/authorize-request-validator.js';
export { TokenRequestValidator } from './validation/token-request-validator.js';
export { createGrantHandlers, type GrantHandler } from './grants/index.js';
export { LoggingAuditSink, MemoryAuditSink, auditEvent, type AuditEvent, type AuditSink } from './events/audit-events.js';
export { bearerAuth, type BearerAuthOptions } from './middleware/bearer-auth.js';
export { getConfig, loadConfig, resetConfig, type Config } from './config/index.js';
export { logger, configureLogger, componentLogger } from './logging/logger.js';
