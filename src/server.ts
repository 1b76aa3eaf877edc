import { serve } from '@hono/node-server';
import type { IStorage } from './storage/interfaces/index.js';
import { createIdentityServer } from './app.js';
import { createMemoryStorage } from './storage/memory/index.js';
import { loadJourneyPolicies } from './journeys/default-policies.js';
import { LoggingCibaUserNotifier, HttpCibaClientNotifier } from './ciba/notification.js';
import { configureLogger, componentLogger } from './logging/logger.js';
import { getConfig } from './config/index.js';
import {
  GRANT_TYPE_AUTHORIZATION_CODE,
  GRANT_TYPE_CIBA,
  GRANT_TYPE_CLIENT_CREDENTIALS,
  GRANT_TYPE_DEVICE_CODE,
  GRANT_TYPE_REFRESH_TOKEN,
  GRANT_TYPE_TOKEN_EXCHANGE,
} from './config/constants.js';

/**
 * Create the bootstrap tenant and, when a secret is configured, a
 * confidential client for it
 */
async function bootstrap(storage: IStorage): Promise<void> {
  const config = getConfig();
  const log = componentLogger('bootstrap');
  const slug = config.bootstrap.tenantSlug;

  const existing = await storage.tenants.findBySlug(slug);
  const tenant = existing ?? (await storage.tenants.create({ name: slug, slug }));
  log.info({ tenant: tenant.slug, issuer: tenant.issuer }, 'Tenant ready');

  const clientSecret = config.bootstrap.clientSecret;
  if (!clientSecret) {
    log.warn('BOOTSTRAP_CLIENT_SECRET is not set; no client was created');
    return;
  }

  const { client } = await storage.clients.create({
    tenantId: tenant.id,
    clientId: 'bootstrap-client',
    clientSecret,
    clientType: 'confidential',
    authMethod: 'client_secret_basic',
    name: 'Bootstrap client',
    redirectUris: [`${config.server.baseUrl}/callback`],
    allowedGrants: [
      GRANT_TYPE_AUTHORIZATION_CODE,
      GRANT_TYPE_CLIENT_CREDENTIALS,
      GRANT_TYPE_REFRESH_TOKEN,
      GRANT_TYPE_DEVICE_CODE,
      GRANT_TYPE_CIBA,
      GRANT_TYPE_TOKEN_EXCHANGE,
    ],
    allowedScopes: tenant.allowedScopes,
    cibaEnabled: true,
  });
  log.info({ tenant: tenant.slug, clientId: client.clientId }, 'Bootstrap client created');
}

async function main(): Promise<void> {
  const config = getConfig();
  configureLogger({ level: config.logging.level });
  const log = componentLogger('server');

  const seedFile = config.journeys.policySeedFile;
  const storage = createMemoryStorage({
    journeyPolicies: seedFile ? loadJourneyPolicies(seedFile) : undefined,
  });
  await bootstrap(storage);

  const app = createIdentityServer({
    storage,
    baseUrl: config.server.baseUrl,
    cibaUserNotifier: new LoggingCibaUserNotifier(),
    cibaClientNotifier: new HttpCibaClientNotifier(),
  });

  const server = serve({ fetch: app.fetch, port: config.server.port, hostname: config.server.host }, (info) => {
    log.info({ port: info.port, baseUrl: config.server.baseUrl, env: config.server.nodeEnv }, 'Identity server listening');
  });

  const shutdown = (signal: string) => {
    log.info({ signal }, 'Shutting down');
    server.close(() => process.exit(0));
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  componentLogger('server').fatal({ err: error }, 'Failed to start');
  process.exit(1);
});
