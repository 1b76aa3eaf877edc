import { describe, it, expect, beforeAll } from 'vitest';
import * as jose from 'jose';
import { HintResolver, classifyJwtError } from '../../ciba/hint-resolver.js';
import { createMemoryStorage } from '../../storage/memory/index.js';
import type { IStorage } from '../../storage/interfaces/index.js';
import { toValidatedClient, type ValidatedClient } from '../../types/client.js';
import type { SigningKey, Tenant } from '../../types/tenant.js';
import { GRANT_TYPE_CIBA } from '../../config/constants.js';
import { signWithTenantKey } from '../e2e/test-setup.js';

describe('HintResolver', () => {
  let storage: IStorage;
  let tenant: Tenant;
  let signingKey: SigningKey;
  let client: ValidatedClient;
  let resolver: HintResolver;

  beforeAll(async () => {
    storage = createMemoryStorage();
    tenant = await storage.tenants.create({ name: 'Acme', slug: 'acme' });
    signingKey = await storage.signingKeys.create({ tenantId: tenant.id, isPrimary: true });

    // usernames that look like other users' ids exercise the lookup order
    await storage.users.create(tenant.id, { id: 'user-1', username: 'dana', email: 'dana@example.com' });
    await storage.users.create(tenant.id, { id: 'user-2', username: 'user-1' });

    const { client: created } = await storage.clients.create({
      tenantId: tenant.id,
      clientType: 'confidential',
      authMethod: 'client_secret_basic',
      name: 'Backchannel client',
      redirectUris: [],
      allowedGrants: [GRANT_TYPE_CIBA],
      allowedScopes: ['openid'],
      cibaEnabled: true,
    });
    client = toValidatedClient(created, tenant);
    resolver = new HintResolver({ users: storage.users, signingKeys: storage.signingKeys });
  });

  function signedHint(claims: jose.JWTPayload): Promise<string> {
    const now = Math.floor(Date.now() / 1000);
    return signWithTenantKey(signingKey, { iss: tenant.issuer, iat: now, exp: now + 60, ...claims });
  }

  describe('login_hint', () => {
    it('should match by email', async () => {
      const result = await resolver.resolve({ loginHint: 'dana@example.com' }, client, tenant);

      expect(result).toMatchObject({ ok: true, value: { subjectId: 'user-1', hintType: 'login_hint' } });
    });

    it('should prefer username over id', async () => {
      const result = await resolver.resolve({ loginHint: 'user-1' }, client, tenant);

      expect(result).toMatchObject({ ok: true, value: { subjectId: 'user-2' } });
    });

    it('should fall back to the user id', async () => {
      const result = await resolver.resolve({ loginHint: 'user-2' }, client, tenant);

      expect(result).toMatchObject({ ok: true, value: { subjectId: 'user-2' } });
    });

    it('should report unknown users', async () => {
      const result = await resolver.resolve({ loginHint: 'nobody' }, client, tenant);

      expect(result).toEqual({ ok: false, error: { reason: 'unknown_user', hintType: 'login_hint' } });
    });
  });

  it('should report no_hint when nothing was sent', async () => {
    const result = await resolver.resolve({ scope: 'openid' }, client, tenant);

    expect(result).toEqual({ ok: false, error: { reason: 'no_hint' } });
  });

  describe('login_hint_token', () => {
    it('should resolve the subject of a token signed by the tenant', async () => {
      const result = await resolver.resolve({ loginHintToken: await signedHint({ sub: 'user-1' }) }, client, tenant);

      expect(result).toMatchObject({ ok: true, value: { subjectId: 'user-1', hintType: 'login_hint_token' } });
    });

    it('should reject a token from another issuer', async () => {
      const token = await signedHint({ sub: 'user-1', iss: 'https://elsewhere.example' });

      const result = await resolver.resolve({ loginHintToken: token }, client, tenant);

      expect(result).toEqual({ ok: false, error: { reason: 'invalid_issuer', hintType: 'login_hint_token' } });
    });

    it('should reject a token without a subject', async () => {
      const result = await resolver.resolve({ loginHintToken: await signedHint({}) }, client, tenant);

      expect(result).toEqual({ ok: false, error: { reason: 'missing_subject', hintType: 'login_hint_token' } });
    });

    it('should fall through from a failed login_hint', async () => {
      const result = await resolver.resolve(
        { loginHint: 'nobody', loginHintToken: await signedHint({ sub: 'user-2' }) },
        client,
        tenant
      );

      expect(result).toMatchObject({ ok: true, value: { subjectId: 'user-2', hintType: 'login_hint_token' } });
    });
  });

  describe('id_token_hint', () => {
    it('should require the client as audience', async () => {
      const token = await signedHint({ sub: 'user-1', aud: 'someone-else' });

      const result = await resolver.resolve({ idTokenHint: token }, client, tenant);

      expect(result).toEqual({ ok: false, error: { reason: 'invalid_audience', hintType: 'id_token_hint' } });
    });

    it('should accept an expired id token', async () => {
      const past = Math.floor(Date.now() / 1000) - 3600;
      const token = await signedHint({ sub: 'user-1', aud: client.clientId, iat: past, exp: past + 60 });

      const result = await resolver.resolve({ idTokenHint: token }, client, tenant);

      expect(result).toMatchObject({ ok: true, value: { subjectId: 'user-1', hintType: 'id_token_hint' } });
    });
  });

  it('should report no_validation_keys for a tenant without keys', async () => {
    const keyless = await storage.tenants.create({ name: 'Keyless', slug: 'keyless' });

    const result = await resolver.resolve({ loginHintToken: await signedHint({ sub: 'user-1' }) }, client, keyless);

    expect(result).toEqual({ ok: false, error: { reason: 'no_validation_keys', hintType: 'login_hint_token' } });
  });
});

describe('classifyJwtError', () => {
  it('should map jose errors to reasons', () => {
    expect(classifyJwtError(new jose.errors.JWTExpired('expired', {}))).toBe('expired');
    expect(classifyJwtError(new jose.errors.JWSSignatureVerificationFailed())).toBe('invalid_signature');
    expect(classifyJwtError(new jose.errors.JWTClaimValidationFailed('bad iss', {}, 'iss'))).toBe('invalid_issuer');
    expect(classifyJwtError(new jose.errors.JWTClaimValidationFailed('bad aud', {}, 'aud'))).toBe('invalid_audience');
    expect(classifyJwtError(new Error('boom'))).toBe('malformed');
  });
});
