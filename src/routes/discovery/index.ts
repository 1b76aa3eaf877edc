export { createOpenIDConfigurationRoutes } from './openid-configuration.js';
export { createJwksRoutes, type JwksRouteOptions } from './jwks.js';
