import { describe, it, expect, beforeAll, beforeEach } from 'vitest';
import {
  setupTestContext,
  readJson,
  stringField,
  postForm,
  tokenRequest,
  basicAuth,
  signWithTenantKey,
  jose,
  ALICE,
  CLIENT_SECRET,
  ISSUER,
  type TestContext,
} from '../test-setup.js';
import { CibaService } from '../../../ciba/ciba-service.js';
import { HintResolver } from '../../../ciba/hint-resolver.js';

const CIBA_GRANT = 'urn:openid:params:grant-type:ciba';

describe('Client Initiated Backchannel Authentication', () => {
  let ctx: TestContext;
  let ciba: CibaService;

  beforeAll(async () => {
    ctx = await setupTestContext();
    // The user-facing side approves through a service over the same store
    ciba = new CibaService({
      store: ctx.storage.cibaRequests,
      hintResolver: new HintResolver({ users: ctx.storage.users, signingKeys: ctx.storage.signingKeys }),
      audit: ctx.audit,
    });
  });

  beforeEach(() => {
    ctx.audit.clear();
  });

  function backchannel(params: Record<string, string>, clientId = ctx.confidentialClientId): Promise<Response> {
    return postForm(ctx, '/connect/ciba', params, { Authorization: basicAuth(clientId, CLIENT_SECRET) });
  }

  async function startRequest(params: Record<string, string> = {}): Promise<string> {
    const res = await backchannel({ scope: 'openid profile', login_hint: 'alice@example.com', ...params });
    expect(res.status).toBe(200);
    return stringField(await readJson(res), 'auth_req_id');
  }

  function poll(authReqId: string): Promise<Response> {
    return tokenRequest(ctx, { grant_type: CIBA_GRANT, auth_req_id: authReqId });
  }

  describe('backchannel authentication endpoint', () => {
    it('should accept a request identified by email', async () => {
      const res = await backchannel({ scope: 'openid', login_hint: 'alice@example.com', binding_message: 'W4SCT' });

      expect(res.status).toBe(200);
      expect(res.headers.get('Cache-Control')).toBe('no-store');
      const body = await readJson(res);
      expect(typeof body['auth_req_id']).toBe('string');
      expect(body['expires_in']).toBe(120);
      expect(body['interval']).toBe(0);

      const [requested] = ctx.audit.ofType('ciba.requested');
      expect(requested).toMatchObject({ subjectId: ALICE.id, deliveryMode: 'poll', scopes: ['openid'] });
    });

    it('should cap requested_expiry at the client lifetime', async () => {
      const res = await backchannel({ login_hint: 'alice', requested_expiry: '30' });

      expect(res.status).toBe(200);
      const body = await readJson(res);
      expect(body['expires_in']).toBe(30);
    });

    it('should reject a malformed requested_expiry', async () => {
      const res = await backchannel({ login_hint: 'alice', requested_expiry: 'soon' });

      expect(res.status).toBe(400);
      const body = await readJson(res);
      expect(body['error_description']).toBe('requested_expiry must be a positive integer');
    });

    it('should require a hint', async () => {
      const res = await backchannel({ scope: 'openid' });

      expect(res.status).toBe(400);
      const body = await readJson(res);
      expect(body['error']).toBe('invalid_request');
    });

    it('should answer unknown_user_id for a hint naming nobody', async () => {
      const res = await backchannel({ login_hint: 'nobody@example.com' });

      expect(res.status).toBe(400);
      const body = await readJson(res);
      expect(body['error']).toBe('unknown_user_id');
    });

    it('should reject a long binding message', async () => {
      const res = await backchannel({ login_hint: 'alice', binding_message: 'x'.repeat(65) });

      expect(res.status).toBe(400);
      const body = await readJson(res);
      expect(body['error']).toBe('invalid_binding_message');
    });

    it('should resolve a login_hint_token signed by the tenant', async () => {
      const now = Math.floor(Date.now() / 1000);
      const hintToken = await signWithTenantKey(ctx.signingKey, {
        iss: ISSUER,
        sub: ALICE.id,
        iat: now,
        exp: now + 60,
      });

      const res = await backchannel({ login_hint_token: hintToken });

      expect(res.status).toBe(200);
      const [requested] = ctx.audit.ofType('ciba.requested');
      expect(requested?.subjectId).toBe(ALICE.id);
    });

    it('should refuse clients not enabled for backchannel authentication', async () => {
      const res = await backchannel({ login_hint: 'alice' }, ctx.dpopClientId);

      expect(res.status).toBe(400);
      const body = await readJson(res);
      expect(body['error']).toBe('unauthorized_client');
    });
  });

  describe('token polling', () => {
    it('should answer authorization_pending until the user approves', async () => {
      const authReqId = await startRequest();

      const pending = await poll(authReqId);
      expect(pending.status).toBe(400);
      expect((await readJson(pending))['error']).toBe('authorization_pending');

      expect(await ciba.approveRequest(authReqId, ALICE.id, 'session-ciba')).toBe(true);

      const approved = await poll(authReqId);
      expect(approved.status).toBe(200);
      const tokens = await readJson(approved);
      expect(tokens['scope']).toBe('openid profile');
      const idToken = jose.decodeJwt(stringField(tokens, 'id_token'));
      expect(idToken.sub).toBe(ALICE.id);
      expect(idToken['sid']).toBe('session-ciba');

      const [issued] = ctx.audit.ofType('token.issued');
      expect(issued).toMatchObject({ grantType: CIBA_GRANT, subjectId: ALICE.id });
    });

    it('should hand out tokens only once', async () => {
      const authReqId = await startRequest();
      await ciba.approveRequest(authReqId, ALICE.id);

      expect((await poll(authReqId)).status).toBe(200);

      const again = await poll(authReqId);
      expect(again.status).toBe(400);
      const body = await readJson(again);
      expect(body['error']).toBe('invalid_grant');
    });

    it('should answer access_denied after the user refuses', async () => {
      const authReqId = await startRequest();
      expect(await ciba.denyRequest(authReqId)).toBe(true);

      const res = await poll(authReqId);

      const body = await readJson(res);
      expect(body['error']).toBe('access_denied');
      expect(body['error_description']).toBe('The user denied the authentication request');
    });

    it('should not approve for a different user', async () => {
      const authReqId = await startRequest();

      expect(await ciba.approveRequest(authReqId, 'someone-else')).toBe(false);
    });

    it('should answer expired_token for an unknown auth_req_id', async () => {
      const res = await poll('unknown-auth-req-id');

      expect(res.status).toBe(400);
      const body = await readJson(res);
      expect(body['error']).toBe('expired_token');
    });

    it('should answer expired_token once the request lapses', async () => {
      const authReqId = await startRequest();
      const stored = await ctx.storage.cibaRequests.getByAuthReqId(authReqId);
      if (!stored) throw new Error('request missing');
      await ctx.storage.cibaRequests.updateRequest({ ...stored, expiresAt: new Date(Date.now() - 1000) });

      const res = await poll(authReqId);

      const body = await readJson(res);
      expect(body['error']).toBe('expired_token');
      expect(await ciba.approveRequest(authReqId, ALICE.id)).toBe(false);
    });

    it('should answer slow_down when polled faster than the interval', async () => {
      const authReqId = await startRequest();
      const stored = await ctx.storage.cibaRequests.getByAuthReqId(authReqId);
      if (!stored) throw new Error('request missing');
      await ctx.storage.cibaRequests.updateRequest({ ...stored, interval: 5 });

      expect((await readJson(await poll(authReqId)))['error']).toBe('authorization_pending');
      expect((await readJson(await poll(authReqId)))['error']).toBe('slow_down');
    });
  });
});
