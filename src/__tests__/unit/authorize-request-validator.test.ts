import { describe, it, expect, beforeAll } from 'vitest';
import { AuthorizeRequestValidator } from '../../validation/authorize-request-validator.js';
import { createMemoryStorage } from '../../storage/memory/index.js';
import type { IStorage } from '../../storage/interfaces/index.js';
import type { Tenant } from '../../types/tenant.js';
import type { RequestParams } from '../../types/authorize-request.js';

const REDIRECT = 'https://app.example/cb';
const CHALLENGE = 'c'.repeat(43);

describe('AuthorizeRequestValidator', () => {
  let storage: IStorage;
  let tenant: Tenant;
  let validator: AuthorizeRequestValidator;

  beforeAll(async () => {
    storage = createMemoryStorage();
    tenant = await storage.tenants.create({
      name: 'Acme',
      slug: 'acme',
      allowedScopes: ['openid', 'profile', 'email', 'api:read'],
    });

    await storage.clients.create({
      tenantId: tenant.id,
      clientId: 'web-app',
      clientSecret: 'test-secret',
      clientType: 'confidential',
      authMethod: 'client_secret_basic',
      name: 'Web app',
      redirectUris: [REDIRECT, 'http://127.0.0.1/cb'],
      allowedGrants: ['authorization_code'],
      allowedScopes: ['openid', 'profile', 'api:read', 'api:admin'],
    });
    await storage.clients.create({
      tenantId: tenant.id,
      clientId: 'spa',
      clientType: 'public',
      authMethod: 'none',
      name: 'Single page app',
      redirectUris: [REDIRECT],
      allowedGrants: ['authorization_code'],
      allowedScopes: ['openid'],
    });
    await storage.clients.create({
      tenantId: tenant.id,
      clientId: 'machine',
      clientSecret: 'test-secret',
      clientType: 'confidential',
      authMethod: 'client_secret_basic',
      name: 'Machine',
      redirectUris: [REDIRECT],
      allowedGrants: ['client_credentials'],
      allowedScopes: ['api:read'],
    });
    await storage.clients.create({
      tenantId: tenant.id,
      clientId: 'par-only',
      clientSecret: 'test-secret',
      clientType: 'confidential',
      authMethod: 'client_secret_basic',
      name: 'PAR only',
      redirectUris: [REDIRECT],
      allowedGrants: ['authorization_code'],
      allowedScopes: ['openid'],
      requirePushedAuthorization: true,
    });

    validator = new AuthorizeRequestValidator({
      clients: storage.clients,
      pushedAuthorizations: storage.pushedAuthorizations,
    });
  });

  function validate(params: RequestParams) {
    return validator.validate({ response_type: 'code', client_id: 'web-app', redirect_uri: REDIRECT, ...params }, tenant);
  }

  it('should accept a minimal request', async () => {
    const result = await validate({ scope: 'openid profile', state: 'xyz', prompt: 'login consent' });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.redirectUri).toBe(REDIRECT);
    expect(result.value.pushed).toBe(false);
    expect(result.value.request.requestedScopes).toEqual(['openid', 'profile']);
    expect(result.value.request.promptModes).toEqual(['login', 'consent']);
    expect(result.value.client.clientId).toBe('web-app');
  });

  it('should accept a loopback redirect on any port', async () => {
    const result = await validate({ redirect_uri: 'http://127.0.0.1:51234/cb' });

    expect(result.ok).toBe(true);
  });

  describe('errors shown to the user', () => {
    it('should require client_id', async () => {
      const result = await validator.validate({ response_type: 'code' }, tenant);

      expect(result).toEqual({
        ok: false,
        error: { error: 'invalid_request', errorDescription: 'client_id is required', redirectUriValidated: false },
      });
    });

    it('should reject an unregistered redirect URI', async () => {
      const result = await validate({ redirect_uri: 'https://evil.example/cb' });

      expect(result).toMatchObject({
        ok: false,
        error: { errorDescription: 'redirect_uri is not registered for this client', redirectUriValidated: false },
      });
    });

    it('should reject unsupported response types', async () => {
      const result = await validate({ response_type: 'token' });

      expect(result).toMatchObject({
        ok: false,
        error: { error: 'unsupported_response_type', errorDescription: 'Unsupported response_type: token' },
      });
    });

    it('should reject clients without the authorization code grant', async () => {
      const result = await validate({ client_id: 'machine' });

      expect(result).toMatchObject({ ok: false, error: { error: 'unauthorized_client' } });
    });

    it('should require a pushed request when the client does', async () => {
      const result = await validate({ client_id: 'par-only' });

      expect(result).toMatchObject({
        ok: false,
        error: { errorDescription: 'Pushed authorization request is required for this client' },
      });
    });
  });

  describe('errors sent back to the client', () => {
    it('should carry the redirect target and state', async () => {
      const result = await validate({ scope: 'openid email', state: 'st-1', response_mode: 'fragment' });

      expect(result).toEqual({
        ok: false,
        error: {
          error: 'invalid_scope',
          errorDescription: "Client is not allowed to request scope 'email'",
          redirectUriValidated: true,
          redirectUri: REDIRECT,
          state: 'st-1',
          responseMode: 'fragment',
        },
      });
    });

    it('should reject scopes the tenant does not know', async () => {
      const result = await validate({ scope: 'api:admin' });

      expect(result).toMatchObject({ ok: false, error: { errorDescription: 'Unknown scope(s): api:admin' } });
    });

    it('should require PKCE from public clients', async () => {
      const result = await validate({ client_id: 'spa', scope: 'openid' });

      expect(result).toMatchObject({ ok: false, error: { errorDescription: 'code_challenge is required' } });
    });

    it('should refuse plain PKCE unless allowed', async () => {
      const result = await validate({ client_id: 'spa', code_challenge: CHALLENGE });

      expect(result).toMatchObject({
        ok: false,
        error: { errorDescription: 'Plain code_challenge_method is not allowed for this client' },
      });
    });

    it('should accept S256 PKCE', async () => {
      const result = await validate({ client_id: 'spa', code_challenge: CHALLENGE, code_challenge_method: 'S256' });

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.request.codeChallengeMethod).toBe('S256');
      }
    });

    it('should refuse request objects', async () => {
      const result = await validate({ request: 'eyJhbGciOiJub25lIn0.e30.' });

      expect(result).toMatchObject({ ok: false, error: { error: 'invalid_request_object' } });
    });

    it('should refuse prompt=none with other values', async () => {
      const result = await validate({ prompt: 'none login' });

      expect(result).toMatchObject({
        ok: false,
        error: { errorDescription: 'prompt=none cannot be combined with other values' },
      });
    });

    it('should refuse unknown prompt values', async () => {
      const result = await validate({ prompt: 'popup' });

      expect(result).toMatchObject({ ok: false, error: { errorDescription: 'Unsupported prompt value: popup' } });
    });

    it('should require a non-negative integer max_age', async () => {
      const result = await validate({ max_age: '-5' });

      expect(result).toMatchObject({ ok: false, error: { errorDescription: 'max_age must be a non-negative integer' } });
    });

    it('should require absolute resource indicators', async () => {
      const result = await validate({ resource: ['https://api.example', 'relative/path'] });

      expect(result).toMatchObject({
        ok: false,
        error: { error: 'invalid_target', errorDescription: 'Invalid resource indicator: relative/path' },
      });
    });
  });

  describe('pushed requests', () => {
    it('should expand a stored request once', async () => {
      const pushed = await storage.pushedAuthorizations.store(
        tenant.id,
        'par-only',
        { response_type: 'code', redirect_uri: REDIRECT, scope: 'openid', state: 'from-par', resource: 'https://api.example' },
        60
      );

      const first = await validator.validate({ client_id: 'par-only', request_uri: pushed.requestUri }, tenant);
      const second = await validator.validate({ client_id: 'par-only', request_uri: pushed.requestUri }, tenant);

      expect(first.ok).toBe(true);
      if (first.ok) {
        expect(first.value.pushed).toBe(true);
        expect(first.value.request.state).toBe('from-par');
        expect(first.value.request.resource).toEqual(['https://api.example']);
      }
      expect(second).toMatchObject({
        ok: false,
        error: { error: 'invalid_request_uri', errorDescription: 'request_uri is invalid, expired or already used' },
      });
    });

    it('should reject request URIs from elsewhere', async () => {
      const result = await validate({ request_uri: 'https://app.example/request.jwt' });

      expect(result).toMatchObject({
        ok: false,
        error: { errorDescription: 'request_uri was not issued by this server' },
      });
    });

    it('should reject a request_uri presented by another client', async () => {
      const pushed = await storage.pushedAuthorizations.store(tenant.id, 'par-only', { response_type: 'code' }, 60);

      const result = await validate({ request_uri: pushed.requestUri });

      expect(result).toMatchObject({
        ok: false,
        error: { errorDescription: 'request_uri was issued to a different client' },
      });
    });

    it('should not allow request_uri inside a pushed request', async () => {
      const result = await validator.validate(
        { response_type: 'code', client_id: 'web-app', request_uri: 'urn:ietf:params:oauth:request_uri:abc' },
        tenant,
        { pushing: true }
      );

      expect(result).toMatchObject({
        ok: false,
        error: { errorDescription: 'request_uri cannot be used in a pushed authorization request' },
      });
    });
  });
});
