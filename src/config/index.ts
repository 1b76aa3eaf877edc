import { readFileSync, existsSync } from 'node:fs';
import * as constants from './constants.js';

/**
 * Read a secret from a file (`VAR_FILE`, the Docker secrets pattern) or
 * directly from `VAR`.
 */
export function readSecret(envVar: string): string | undefined {
  const filePath = process.env[`${envVar}_FILE`];

  if (filePath) {
    if (!existsSync(filePath)) {
      throw new Error(`Secret file for ${envVar} not found: ${filePath}`);
    }
    return readFileSync(filePath, 'utf-8').trim();
  }

  return process.env[envVar];
}

function intEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function boolEnv(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  return raw === 'true' || raw === '1';
}

/**
 * Application configuration loaded from environment
 */
export interface Config {
  server: {
    port: number;
    host: string;
    nodeEnv: string;
    baseUrl: string;
  };
  bootstrap: {
    tenantSlug: string;
    clientSecret: string | undefined;
  };
  logging: {
    level: string;
  };
  rateLimit: {
    windowMs: number;
    maxRequests: number;
  };
  defaults: {
    accessTokenTtl: number;
    idTokenTtl: number;
    refreshTokenTtl: number;
    authorizationCodeTtl: number;
    deviceCodeTtl: number;
    deviceCodeInterval: number;
    parTtl: number;
  };
  dpop: {
    proofLifetimeSeconds: number;
    clockSkewSeconds: number;
    requireNonce: boolean;
    nonceLifetimeSeconds: number;
  };
  ciba: {
    defaultRequestLifetime: number;
    defaultPollingInterval: number;
    /** Whether expired id_token_hint values are rejected */
    idTokenHintValidateLifetime: boolean;
    loginHintTokenClockSkewSeconds: number;
  };
  journeys: {
    stateLifetimeMinutes: number;
    policySeedFile: string | undefined;
  };
}

export function loadConfig(): Config {
  const port = intEnv('PORT', 3000);
  const host = process.env['HOST'] ?? '0.0.0.0';
  const nodeEnv = process.env['NODE_ENV'] ?? 'development';

  return {
    server: {
      port,
      host,
      nodeEnv,
      baseUrl: process.env['BASE_URL'] ?? `http://localhost:${port}`,
    },
    bootstrap: {
      tenantSlug: process.env['BOOTSTRAP_TENANT'] ?? 'default',
      clientSecret: readSecret('BOOTSTRAP_CLIENT_SECRET'),
    },
    logging: {
      level: process.env['LOG_LEVEL'] ?? (nodeEnv === 'test' ? 'silent' : 'info'),
    },
    rateLimit: {
      windowMs: intEnv('RATE_LIMIT_WINDOW_MS', constants.DEFAULT_RATE_LIMIT_WINDOW_MS),
      maxRequests: intEnv('RATE_LIMIT_MAX_REQUESTS', constants.DEFAULT_RATE_LIMIT_MAX_REQUESTS),
    },
    defaults: {
      accessTokenTtl: intEnv('DEFAULT_ACCESS_TOKEN_TTL', constants.DEFAULT_ACCESS_TOKEN_TTL),
      idTokenTtl: intEnv('DEFAULT_ID_TOKEN_TTL', constants.DEFAULT_ID_TOKEN_TTL),
      refreshTokenTtl: intEnv('DEFAULT_REFRESH_TOKEN_TTL', constants.DEFAULT_REFRESH_TOKEN_TTL),
      authorizationCodeTtl: intEnv(
        'DEFAULT_AUTHORIZATION_CODE_TTL',
        constants.DEFAULT_AUTHORIZATION_CODE_TTL
      ),
      deviceCodeTtl: intEnv('DEFAULT_DEVICE_CODE_TTL', constants.DEFAULT_DEVICE_CODE_TTL),
      deviceCodeInterval: intEnv('DEFAULT_DEVICE_CODE_INTERVAL', constants.DEFAULT_DEVICE_CODE_INTERVAL),
      parTtl: intEnv('DEFAULT_PAR_TTL', constants.DEFAULT_PAR_TTL),
    },
    dpop: {
      proofLifetimeSeconds: intEnv('DPOP_PROOF_LIFETIME', constants.DEFAULT_DPOP_PROOF_LIFETIME),
      clockSkewSeconds: intEnv('DPOP_CLOCK_SKEW', constants.DEFAULT_DPOP_CLOCK_SKEW),
      requireNonce: boolEnv('DPOP_REQUIRE_NONCE', false),
      nonceLifetimeSeconds: intEnv('DPOP_NONCE_LIFETIME', constants.DEFAULT_DPOP_NONCE_LIFETIME),
    },
    ciba: {
      defaultRequestLifetime: intEnv('CIBA_REQUEST_LIFETIME', constants.DEFAULT_CIBA_REQUEST_LIFETIME),
      defaultPollingInterval: intEnv('CIBA_POLLING_INTERVAL', constants.DEFAULT_CIBA_POLLING_INTERVAL),
      idTokenHintValidateLifetime: boolEnv('CIBA_ID_TOKEN_HINT_VALIDATE_LIFETIME', false),
      loginHintTokenClockSkewSeconds: intEnv(
        'CIBA_LOGIN_HINT_TOKEN_CLOCK_SKEW',
        constants.DEFAULT_LOGIN_HINT_TOKEN_CLOCK_SKEW
      ),
    },
    journeys: {
      stateLifetimeMinutes: intEnv('JOURNEY_STATE_LIFETIME_MINUTES', constants.DEFAULT_JOURNEY_DURATION_MINUTES),
      policySeedFile: process.env['JOURNEY_POLICY_SEED_FILE'],
    },
  };
}

let config: Config | null = null;

/**
 * Get the current configuration (loads if not already loaded)
 */
export function getConfig(): Config {
  if (!config) {
    config = loadConfig();
  }
  return config;
}

/**
 * Reset configuration (useful for testing)
 */
export function resetConfig(): void {
  config = null;
}

export { constants };
