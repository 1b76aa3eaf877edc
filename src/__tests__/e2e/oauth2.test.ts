import { describe, it, expect, beforeAll } from 'vitest';
import {
  setupTestContext,
  basicAuth,
  readJson,
  stringField,
  postForm,
  tokenRequest,
  jose,
  ALICE,
  CLIENT_SECRET,
  ISSUER,
  TENANT_SLUG,
  type TestContext,
} from './test-setup.js';
import { tokenService } from '../../services/token-service.js';
import { toValidatedClient } from '../../types/client.js';

describe('Identity server', () => {
  let ctx: TestContext;

  beforeAll(async () => {
    ctx = await setupTestContext();
  });

  async function clientCredentialsToken(scope = 'api:read'): Promise<string> {
    const res = await tokenRequest(ctx, { grant_type: 'client_credentials', scope });
    expect(res.status).toBe(200);
    return stringField(await readJson(res), 'access_token');
  }

  async function userToken(scope: string): Promise<string> {
    const stored = await ctx.storage.clients.findByClientId(ctx.tenant.id, ctx.confidentialClientId);
    if (!stored) throw new Error('client missing');
    const response = await tokenService.issue({
      tenant: ctx.tenant,
      signingKey: ctx.signingKey,
      client: toValidatedClient(stored, ctx.tenant),
      subjectId: ALICE.id,
      user: ALICE,
      scopes: scope.split(' '),
    });
    return response.access_token;
  }

  describe('Health Check', () => {
    it('should return OK status', async () => {
      const res = await ctx.app.request('/health');

      expect(res.status).toBe(200);
      const body = await readJson(res);
      expect(body['status']).toBe('ok');
    });
  });

  describe('Discovery', () => {
    it('should describe the tenant endpoints', async () => {
      const res = await ctx.app.request(`/${TENANT_SLUG}/.well-known/openid-configuration`);

      expect(res.status).toBe(200);
      expect(res.headers.get('Cache-Control')).toBe('public, max-age=3600');
      const body = await readJson(res);
      expect(body['issuer']).toBe(ISSUER);
      expect(body['authorization_endpoint']).toBe(`${ISSUER}/connect/authorize`);
      expect(body['token_endpoint']).toBe(`${ISSUER}/connect/token`);
      expect(body['jwks_uri']).toBe(`${ISSUER}/.well-known/jwks`);
      expect(body['backchannel_authentication_endpoint']).toBe(`${ISSUER}/connect/ciba`);
      expect(body['device_authorization_endpoint']).toBe(`${ISSUER}/connect/deviceauthorization`);
      expect(body['pushed_authorization_request_endpoint']).toBe(`${ISSUER}/connect/par`);
      expect(body['code_challenge_methods_supported']).toEqual(['S256']);
      expect(body['authorization_response_iss_parameter_supported']).toBe(true);
      expect(body['end_session_endpoint']).toBeUndefined();
    });

    it('should publish the signing keys', async () => {
      const res = await ctx.app.request(`/${TENANT_SLUG}/.well-known/jwks`);

      expect(res.status).toBe(200);
      const body = await readJson(res);
      const keys = body['keys'];
      expect(Array.isArray(keys)).toBe(true);
      expect(JSON.stringify(keys)).toContain(ctx.signingKey.kid);
    });

    it('should reject an unknown tenant', async () => {
      const res = await ctx.app.request('/nowhere/.well-known/openid-configuration');

      expect(res.status).toBe(400);
      const body = await readJson(res);
      expect(body['error']).toBe('invalid_request');
      expect(body['error_description']).toBe('Unknown tenant: nowhere');
    });
  });

  describe('Client Credentials Grant', () => {
    it('should issue an access token signed with the tenant key', async () => {
      const res = await tokenRequest(ctx, { grant_type: 'client_credentials', scope: 'api:read' });

      expect(res.status).toBe(200);
      expect(res.headers.get('Cache-Control')).toBe('no-store');
      const body = await readJson(res);
      expect(body['token_type']).toBe('Bearer');
      expect(body['scope']).toBe('api:read');
      expect(body['refresh_token']).toBeUndefined();
      expect(body['id_token']).toBeUndefined();

      const jwks = jose.createLocalJWKSet({ keys: await ctx.storage.signingKeys.getValidationKeys(ctx.tenant.id) });
      const { payload } = await jose.jwtVerify(stringField(body, 'access_token'), jwks, { issuer: ISSUER });
      expect(payload.sub).toBe(ctx.confidentialClientId);
      expect(payload['client_id']).toBe(ctx.confidentialClientId);
      expect(payload['tenant_id']).toBe(ctx.tenant.id);
    });

    it('should drop identity scopes', async () => {
      const res = await tokenRequest(ctx, { grant_type: 'client_credentials', scope: 'openid api:write' });

      expect(res.status).toBe(200);
      const body = await readJson(res);
      expect(body['scope']).toBe('api:write');
    });

    it('should record the issuance', async () => {
      ctx.audit.clear();
      await clientCredentialsToken();

      const [event] = ctx.audit.ofType('token.issued');
      expect(event).toMatchObject({
        type: 'token.issued',
        tenantId: ctx.tenant.id,
        clientId: ctx.confidentialClientId,
        grantType: 'client_credentials',
        scopes: ['api:read'],
        tokenType: 'Bearer',
      });
    });

    it('should reject a wrong secret', async () => {
      const res = await tokenRequest(
        ctx,
        { grant_type: 'client_credentials' },
        { Authorization: basicAuth(ctx.confidentialClientId, 'wrong-secret') }
      );

      expect(res.status).toBe(401);
      const body = await readJson(res);
      expect(body['error']).toBe('invalid_client');
    });

    it('should reject public clients', async () => {
      const res = await postForm(ctx, '/connect/token', {
        grant_type: 'client_credentials',
        client_id: ctx.publicClientId,
      });

      expect(res.status).toBe(400);
      const body = await readJson(res);
      expect(body['error']).toBe('unauthorized_client');
    });

    it('should reject an unsupported grant type', async () => {
      ctx.audit.clear();
      const res = await tokenRequest(ctx, { grant_type: 'password', username: 'alice', password: 'test-password' });

      expect(res.status).toBe(400);
      const body = await readJson(res);
      expect(body['error']).toBe('unsupported_grant_type');
      const [failed] = ctx.audit.ofType('token.failed');
      expect(failed).toMatchObject({ grantType: 'password', error: 'unsupported_grant_type' });
    });

    it('should reject a scope the client may not request', async () => {
      const res = await tokenRequest(ctx, { grant_type: 'client_credentials', scope: 'admin' });

      expect(res.status).toBe(400);
      const body = await readJson(res);
      expect(body['error']).toBe('invalid_scope');
    });
  });

  describe('Introspection', () => {
    it('should describe an active access token', async () => {
      const token = await clientCredentialsToken();

      const res = await postForm(
        ctx,
        '/connect/introspect',
        { token },
        { Authorization: basicAuth(ctx.confidentialClientId, CLIENT_SECRET) }
      );

      expect(res.status).toBe(200);
      const body = await readJson(res);
      expect(body['active']).toBe(true);
      expect(body['client_id']).toBe(ctx.confidentialClientId);
      expect(body['scope']).toBe('api:read');
      expect(body['token_type']).toBe('Bearer');
      expect(body['iss']).toBe(ISSUER);
    });

    it('should answer inactive for garbage', async () => {
      const res = await postForm(
        ctx,
        '/connect/introspect',
        { token: 'not-a-token' },
        { Authorization: basicAuth(ctx.confidentialClientId, CLIENT_SECRET) }
      );

      expect(res.status).toBe(200);
      expect(await readJson(res)).toEqual({ active: false });
    });

    it('should refuse public clients', async () => {
      const res = await postForm(ctx, '/connect/introspect', { token: 'x', client_id: ctx.publicClientId });

      expect(res.status).toBe(401);
      const body = await readJson(res);
      expect(body['error']).toBe('invalid_client');
    });
  });

  describe('Revocation', () => {
    it('should revoke an access token', async () => {
      const token = await clientCredentialsToken();
      const auth = { Authorization: basicAuth(ctx.confidentialClientId, CLIENT_SECRET) };

      const revokeRes = await postForm(ctx, '/connect/revocation', { token }, auth);
      expect(revokeRes.status).toBe(200);

      const introspectRes = await postForm(ctx, '/connect/introspect', { token }, auth);
      expect(await readJson(introspectRes)).toEqual({ active: false });
    });

    it('should answer 200 for an unknown token', async () => {
      const res = await postForm(
        ctx,
        '/connect/revocation',
        { token: 'unknown-token' },
        { Authorization: basicAuth(ctx.confidentialClientId, CLIENT_SECRET) }
      );

      expect(res.status).toBe(200);
    });

    it('should not revoke another client token', async () => {
      const token = await clientCredentialsToken();

      const res = await postForm(
        ctx,
        '/connect/revocation',
        { token },
        { Authorization: basicAuth(ctx.dpopClientId, CLIENT_SECRET) }
      );
      expect(res.status).toBe(200);

      const introspectRes = await postForm(
        ctx,
        '/connect/introspect',
        { token },
        { Authorization: basicAuth(ctx.confidentialClientId, CLIENT_SECRET) }
      );
      const body = await readJson(introspectRes);
      expect(body['active']).toBe(true);
    });

    it('should require the token parameter', async () => {
      const res = await postForm(
        ctx,
        '/connect/revocation',
        {},
        { Authorization: basicAuth(ctx.confidentialClientId, CLIENT_SECRET) }
      );

      expect(res.status).toBe(400);
      const body = await readJson(res);
      expect(body['error_description']).toBe('token is required');
    });
  });

  describe('UserInfo', () => {
    it('should release claims by granted scope', async () => {
      const token = await userToken('openid profile');

      const res = await ctx.app.request(`/${TENANT_SLUG}/connect/userinfo`, {
        headers: { Authorization: `Bearer ${token}` },
      });

      expect(res.status).toBe(200);
      expect(await readJson(res)).toEqual({ sub: ALICE.id, name: 'Alice Example', given_name: 'Alice' });
    });

    it('should add email claims with the email scope', async () => {
      const token = await userToken('openid email');

      const res = await ctx.app.request(`/${TENANT_SLUG}/connect/userinfo`, {
        method: 'POST',
        headers: { Authorization: `Bearer ${token}` },
      });

      expect(res.status).toBe(200);
      expect(await readJson(res)).toEqual({ sub: ALICE.id, email: 'alice@example.com', email_verified: true });
    });

    it('should require the openid scope', async () => {
      const token = await userToken('profile');

      const res = await ctx.app.request(`/${TENANT_SLUG}/connect/userinfo`, {
        headers: { Authorization: `Bearer ${token}` },
      });

      expect(res.status).toBe(403);
      const body = await readJson(res);
      expect(body['error']).toBe('insufficient_scope');
    });

    it('should reject a missing token', async () => {
      const res = await ctx.app.request(`/${TENANT_SLUG}/connect/userinfo`);

      expect(res.status).toBe(401);
      const body = await readJson(res);
      expect(body['error']).toBe('invalid_token');
    });
  });

  describe('Responses', () => {
    it('should carry security headers', async () => {
      const res = await ctx.app.request(`/${TENANT_SLUG}/.well-known/openid-configuration`);

      expect(res.headers.get('X-Frame-Options')).toBe('DENY');
      expect(res.headers.get('X-Content-Type-Options')).toBe('nosniff');
    });

    it('should keep tenants apart', async () => {
      const other = await ctx.storage.tenants.create({ name: 'Other', slug: 'other' });

      const res = await ctx.app.request(`/${other.slug}/connect/token`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Authorization: basicAuth(ctx.confidentialClientId, CLIENT_SECRET),
        },
        body: new URLSearchParams({ grant_type: 'client_credentials' }),
      });

      expect(res.status).toBe(401);
      const body = await readJson(res);
      expect(body['error']).toBe('invalid_client');
    });
  });
});
