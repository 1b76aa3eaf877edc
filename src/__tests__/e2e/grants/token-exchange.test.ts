import { describe, it, expect, beforeAll } from 'vitest';
import {
  setupTestContext,
  readJson,
  stringField,
  tokenRequest,
  signWithTenantKey,
  jose,
  ALICE,
  ISSUER,
  type TestContext,
} from '../test-setup.js';

const TOKEN_EXCHANGE_GRANT = 'urn:ietf:params:oauth:grant-type:token-exchange';
const ACCESS_TOKEN_TYPE = 'urn:ietf:params:oauth:token-type:access_token';

describe('Token Exchange Grant', () => {
  let ctx: TestContext;

  beforeAll(async () => {
    ctx = await setupTestContext();
  });

  async function subjectToken(claims: jose.JWTPayload = {}): Promise<string> {
    const now = Math.floor(Date.now() / 1000);
    return signWithTenantKey(ctx.signingKey, {
      iss: ISSUER,
      sub: ALICE.id,
      aud: 'upstream-api',
      scope: 'api:read api:write',
      jti: `subject-${now}-${Math.random()}`,
      iat: now,
      exp: now + 300,
      ...claims,
    });
  }

  function exchange(params: Record<string, string>): Promise<Response> {
    return tokenRequest(ctx, { grant_type: TOKEN_EXCHANGE_GRANT, subject_token_type: ACCESS_TOKEN_TYPE, ...params });
  }

  it('should issue a narrower access token for the same subject', async () => {
    const res = await exchange({ subject_token: await subjectToken(), scope: 'api:read' });

    expect(res.status).toBe(200);
    const body = await readJson(res);
    expect(body['issued_token_type']).toBe(ACCESS_TOKEN_TYPE);
    expect(body['scope']).toBe('api:read');
    expect(body['refresh_token']).toBeUndefined();
    expect(body['id_token']).toBeUndefined();

    const claims = jose.decodeJwt(stringField(body, 'access_token'));
    expect(claims.sub).toBe(ALICE.id);
    expect(claims.aud).toBe(ctx.confidentialClientId);
  });

  it('should record the actor for delegation', async () => {
    const actorToken = await subjectToken({ sub: 'service-a', scope: undefined });

    const res = await exchange({
      subject_token: await subjectToken(),
      actor_token: actorToken,
      actor_token_type: ACCESS_TOKEN_TYPE,
    });

    expect(res.status).toBe(200);
    const claims = jose.decodeJwt(stringField(await readJson(res), 'access_token'));
    expect(claims['act']).toEqual({ sub: 'service-a' });
  });

  it('should refuse scopes beyond the subject token', async () => {
    const res = await exchange({ subject_token: await subjectToken({ scope: 'api:read' }), scope: 'api:write' });

    expect(res.status).toBe(400);
    const body = await readJson(res);
    expect(body['error']).toBe('invalid_scope');
  });

  it('should reject a token from another issuer', async () => {
    const res = await exchange({ subject_token: await subjectToken({ iss: 'http://elsewhere.example' }) });

    expect(res.status).toBe(400);
    const body = await readJson(res);
    expect(body['error']).toBe('invalid_grant');
    expect(body['error_description']).toBe('Invalid subject_token');
  });

  it('should reject a revoked subject token', async () => {
    const token = await subjectToken({ jti: 'revoked-subject' });
    await ctx.storage.revokedTokens.revoke(ctx.tenant.id, 'revoked-subject', 'access_token', new Date(Date.now() + 60_000));

    const res = await exchange({ subject_token: token });

    expect(res.status).toBe(400);
    const body = await readJson(res);
    expect(body['error_description']).toBe('subject_token has been revoked');
  });

  it('should require actor_token_type with actor_token', async () => {
    const res = await exchange({ subject_token: await subjectToken(), actor_token: await subjectToken() });

    expect(res.status).toBe(400);
    const body = await readJson(res);
    expect(body['error_description']).toBe('actor_token_type is required with actor_token');
  });
});
