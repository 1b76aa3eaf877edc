import { describe, it, expect, beforeAll } from 'vitest';
import {
  setupTestContext,
  readJson,
  stringField,
  tokenRequest,
  redirectParams,
  requiredParam,
  jose,
  ALICE,
  REDIRECT_URI,
  TENANT_SLUG,
  type TestContext,
  type JsonObject,
} from '../test-setup.js';

describe('Refresh Token Grant', () => {
  let ctx: TestContext;

  beforeAll(async () => {
    ctx = await setupTestContext();
  });

  async function signIn(scope = 'openid profile api:read offline_access'): Promise<JsonObject> {
    const query = new URLSearchParams({
      response_type: 'code',
      client_id: ctx.confidentialClientId,
      redirect_uri: REDIRECT_URI,
      scope,
    });
    const authRes = await ctx.app.request(`/${TENANT_SLUG}/connect/authorize?${query.toString()}`);
    const code = requiredParam(redirectParams(authRes), 'code');

    const res = await tokenRequest(ctx, { grant_type: 'authorization_code', code, redirect_uri: REDIRECT_URI });
    expect(res.status).toBe(200);
    return readJson(res);
  }

  function refresh(refreshToken: string, scope?: string): Promise<Response> {
    const params: Record<string, string> = { grant_type: 'refresh_token', refresh_token: refreshToken };
    if (scope) params['scope'] = scope;
    return tokenRequest(ctx, params);
  }

  it('should rotate the refresh token', async () => {
    const tokens = await signIn();
    const original = stringField(tokens, 'refresh_token');

    const res = await refresh(original);

    expect(res.status).toBe(200);
    const body = await readJson(res);
    const rotated = stringField(body, 'refresh_token');
    expect(rotated).not.toBe(original);
    expect(body['scope']).toBe('openid profile api:read offline_access');
    expect(jose.decodeJwt(stringField(body, 'access_token')).sub).toBe(ALICE.id);
    expect(jose.decodeJwt(stringField(body, 'id_token')).sub).toBe(ALICE.id);
  });

  it('should allow narrowing the scope', async () => {
    const tokens = await signIn();

    const res = await refresh(stringField(tokens, 'refresh_token'), 'api:read offline_access');

    expect(res.status).toBe(200);
    const body = await readJson(res);
    expect(body['scope']).toBe('api:read offline_access');
    expect(body['id_token']).toBeUndefined();
  });

  it('should refuse widening the scope', async () => {
    const tokens = await signIn('openid offline_access');

    const res = await refresh(stringField(tokens, 'refresh_token'), 'openid api:write offline_access');

    expect(res.status).toBe(400);
    const body = await readJson(res);
    expect(body['error']).toBe('invalid_scope');
    expect(body['error_description']).toBe('Cannot request scopes not in original grant: api:write');
  });

  it('should revoke the whole family when a rotated token is replayed', async () => {
    const tokens = await signIn();
    const original = stringField(tokens, 'refresh_token');

    const first = await refresh(original);
    const rotated = stringField(await readJson(first), 'refresh_token');

    const replay = await refresh(original);
    expect(replay.status).toBe(400);
    expect((await readJson(replay))['error_description']).toBe('Refresh token has been revoked');

    const afterReplay = await refresh(rotated);
    expect(afterReplay.status).toBe(400);
    expect((await readJson(afterReplay))['error']).toBe('invalid_grant');
  });

  it('should reject an unknown refresh token', async () => {
    const res = await refresh('unknown-refresh-token');

    expect(res.status).toBe(400);
    const body = await readJson(res);
    expect(body['error_description']).toBe('Invalid refresh token');
  });

  it('should not issue a refresh token without offline_access', async () => {
    const tokens = await signIn('openid profile');

    expect(tokens['refresh_token']).toBeUndefined();
  });
});
