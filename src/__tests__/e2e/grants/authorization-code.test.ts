import { describe, it, expect, beforeAll, beforeEach } from 'vitest';
import {
  setupTestContext,
  resetUser,
  basicAuth,
  readJson,
  stringField,
  postForm,
  tokenRequest,
  redirectParams,
  requiredParam,
  generateCodeVerifier,
  generateCodeChallenge,
  jose,
  ALICE,
  CLIENT_SECRET,
  ISSUER,
  REDIRECT_URI,
  TENANT_SLUG,
  USER_PASSWORD,
  type TestContext,
  type JsonObject,
} from '../test-setup.js';

describe('Authorization Code Grant', () => {
  let ctx: TestContext;

  beforeAll(async () => {
    ctx = await setupTestContext();
  });

  beforeEach(() => {
    resetUser(ctx.userAuthenticator);
    ctx.audit.clear();
  });

  function authorize(params: Record<string, string>): Response | Promise<Response> {
    return ctx.app.request(`/${TENANT_SLUG}/connect/authorize?${new URLSearchParams(params).toString()}`);
  }

  function stepOf(body: JsonObject): JsonObject {
    const step = body['current_step'];
    if (typeof step !== 'object' || step === null || Array.isArray(step)) {
      throw new Error(`No current step in ${JSON.stringify(body)}`);
    }
    return Object.fromEntries(Object.entries(step));
  }

  function continueJourney(journeyId: string, input: Record<string, unknown>): Response | Promise<Response> {
    return ctx.app.request(`/${TENANT_SLUG}/connect/journey/${journeyId}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(input),
    });
  }

  describe('standalone sign-in', () => {
    it('should complete the flow with PKCE', async () => {
      const codeVerifier = generateCodeVerifier();

      const authRes = await authorize({
        response_type: 'code',
        client_id: ctx.confidentialClientId,
        redirect_uri: REDIRECT_URI,
        scope: 'openid profile offline_access',
        state: 'test-state',
        nonce: 'test-nonce',
        code_challenge: generateCodeChallenge(codeVerifier),
        code_challenge_method: 'S256',
      });

      expect(authRes.status).toBe(302);
      const location = authRes.headers.get('Location') ?? '';
      expect(location.startsWith(`${REDIRECT_URI}?`)).toBe(true);
      const params = redirectParams(authRes);
      expect(params.get('state')).toBe('test-state');
      expect(params.get('iss')).toBe(ISSUER);

      const tokenRes = await tokenRequest(ctx, {
        grant_type: 'authorization_code',
        code: requiredParam(params, 'code'),
        redirect_uri: REDIRECT_URI,
        code_verifier: codeVerifier,
      });

      expect(tokenRes.status).toBe(200);
      const tokens = await readJson(tokenRes);
      expect(tokens['token_type']).toBe('Bearer');
      expect(tokens['scope']).toBe('openid profile offline_access');
      expect(typeof tokens['refresh_token']).toBe('string');

      const idToken = jose.decodeJwt(stringField(tokens, 'id_token'));
      expect(idToken.iss).toBe(ISSUER);
      expect(idToken.sub).toBe(ALICE.id);
      expect(idToken.aud).toBe(ctx.confidentialClientId);
      expect(idToken['nonce']).toBe('test-nonce');
      expect(idToken['sid']).toBe('session-1');
      expect(idToken['name']).toBe('Alice Example');

      const [issued] = ctx.audit.ofType('token.issued');
      expect(issued).toMatchObject({ grantType: 'authorization_code', subjectId: ALICE.id });
    });

    it('should use the only registered redirect URI when none is sent', async () => {
      const authRes = await authorize({
        response_type: 'code',
        client_id: ctx.confidentialClientId,
        scope: 'openid',
      });

      expect(authRes.status).toBe(302);
      expect(authRes.headers.get('Location')?.startsWith(`${REDIRECT_URI}?code=`)).toBe(true);

      const tokenRes = await tokenRequest(ctx, {
        grant_type: 'authorization_code',
        code: requiredParam(redirectParams(authRes), 'code'),
      });

      expect(tokenRes.status).toBe(200);
    });

    it('should require redirect_uri at the token endpoint when it was sent to authorize', async () => {
      const authRes = await authorize({
        response_type: 'code',
        client_id: ctx.confidentialClientId,
        redirect_uri: REDIRECT_URI,
        scope: 'openid',
      });

      const tokenRes = await tokenRequest(ctx, {
        grant_type: 'authorization_code',
        code: requiredParam(redirectParams(authRes), 'code'),
      });

      expect(tokenRes.status).toBe(400);
      expect(await readJson(tokenRes)).toMatchObject({
        error: 'invalid_grant',
        error_description: 'redirect_uri does not match',
      });
    });

    it('should send the user to sign in when not authenticated', async () => {
      ctx.userAuthenticator.setCurrentUser(null);

      const authRes = await authorize({
        response_type: 'code',
        client_id: ctx.confidentialClientId,
        redirect_uri: REDIRECT_URI,
        scope: 'openid',
      });

      expect(authRes.status).toBe(302);
      expect(authRes.headers.get('Location')).toBe('http://localhost:3000/login');
    });

    it('should answer login_required for prompt=none without a session', async () => {
      ctx.userAuthenticator.setCurrentUser(null);

      const authRes = await authorize({
        response_type: 'code',
        client_id: ctx.confidentialClientId,
        redirect_uri: REDIRECT_URI,
        scope: 'openid',
        state: 'quiet',
        prompt: 'none',
      });

      expect(authRes.status).toBe(302);
      const params = redirectParams(authRes);
      expect(params.get('error')).toBe('login_required');
      expect(params.get('state')).toBe('quiet');
    });

    it('should post the response back with response_mode=form_post', async () => {
      const authRes = await authorize({
        response_type: 'code',
        client_id: ctx.confidentialClientId,
        redirect_uri: REDIRECT_URI,
        scope: 'openid',
        response_mode: 'form_post',
      });

      expect(authRes.status).toBe(200);
      expect(authRes.headers.get('Content-Type')).toBe('text/html; charset=UTF-8');
      const html = await authRes.text();
      expect(html).toContain(`action="${REDIRECT_URI}"`);
      expect(html).toContain('name="code"');
    });

    it('should put the response in the fragment with response_mode=fragment', async () => {
      const authRes = await authorize({
        response_type: 'code',
        client_id: ctx.confidentialClientId,
        redirect_uri: REDIRECT_URI,
        scope: 'openid',
        response_mode: 'fragment',
      });

      expect(authRes.status).toBe(302);
      expect(authRes.headers.get('Location')?.startsWith(`${REDIRECT_URI}#code=`)).toBe(true);
    });
  });

  describe('request validation', () => {
    it('should show an error for an unregistered redirect URI', async () => {
      const authRes = await authorize({
        response_type: 'code',
        client_id: ctx.confidentialClientId,
        redirect_uri: 'http://evil.example/callback',
        scope: 'openid',
      });

      expect(authRes.status).toBe(400);
      const body = await readJson(authRes);
      expect(body['error']).toBe('invalid_request');
      expect(body['error_description']).toBe('redirect_uri is not registered for this client');
    });

    it('should show an error for an unknown client', async () => {
      const authRes = await authorize({ response_type: 'code', client_id: 'nobody', redirect_uri: REDIRECT_URI });

      expect(authRes.status).toBe(400);
      const body = await readJson(authRes);
      expect(body['error_description']).toBe('Unknown client_id');
    });

    it('should redirect unsupported response types back to the client', async () => {
      const authRes = await authorize({
        response_type: 'token',
        client_id: ctx.confidentialClientId,
        redirect_uri: REDIRECT_URI,
      });

      expect(authRes.status).toBe(400);
      const body = await readJson(authRes);
      expect(body['error']).toBe('unsupported_response_type');
    });

    it('should redirect a scope error back to the client', async () => {
      const authRes = await authorize({
        response_type: 'code',
        client_id: ctx.confidentialClientId,
        redirect_uri: REDIRECT_URI,
        scope: 'openid admin',
        state: 's1',
      });

      expect(authRes.status).toBe(302);
      const params = redirectParams(authRes);
      expect(params.get('error')).toBe('invalid_scope');
      expect(params.get('state')).toBe('s1');
      expect(params.get('iss')).toBe(ISSUER);
    });

    it('should require PKCE from public clients', async () => {
      const authRes = await authorize({
        response_type: 'code',
        client_id: ctx.publicClientId,
        redirect_uri: REDIRECT_URI,
        scope: 'openid',
      });

      expect(authRes.status).toBe(302);
      const params = redirectParams(authRes);
      expect(params.get('error')).toBe('invalid_request');
      expect(params.get('error_description')).toBe('code_challenge is required');
    });

    it('should refuse the plain method unless the client allows it', async () => {
      const authRes = await authorize({
        response_type: 'code',
        client_id: ctx.publicClientId,
        redirect_uri: REDIRECT_URI,
        scope: 'openid',
        code_challenge: generateCodeVerifier(),
      });

      expect(authRes.status).toBe(302);
      const params = redirectParams(authRes);
      expect(params.get('error_description')).toBe('Plain code_challenge_method is not allowed for this client');
    });
  });

  describe('code redemption', () => {
    async function issueCode(codeVerifier: string): Promise<string> {
      const authRes = await authorize({
        response_type: 'code',
        client_id: ctx.confidentialClientId,
        redirect_uri: REDIRECT_URI,
        scope: 'openid',
        code_challenge: generateCodeChallenge(codeVerifier),
        code_challenge_method: 'S256',
      });
      return requiredParam(redirectParams(authRes), 'code');
    }

    it('should reject a wrong code_verifier', async () => {
      const code = await issueCode(generateCodeVerifier());

      const tokenRes = await tokenRequest(ctx, {
        grant_type: 'authorization_code',
        code,
        redirect_uri: REDIRECT_URI,
        code_verifier: generateCodeVerifier(),
      });

      expect(tokenRes.status).toBe(400);
      const body = await readJson(tokenRes);
      expect(body['error']).toBe('invalid_grant');
      expect(body['error_description']).toBe('code_verifier does not match code_challenge');
    });

    it('should reject a mismatched redirect_uri', async () => {
      const codeVerifier = generateCodeVerifier();
      const code = await issueCode(codeVerifier);

      const tokenRes = await tokenRequest(ctx, {
        grant_type: 'authorization_code',
        code,
        redirect_uri: 'http://localhost:3001/other',
        code_verifier: codeVerifier,
      });

      expect(tokenRes.status).toBe(400);
      const body = await readJson(tokenRes);
      expect(body['error_description']).toBe('redirect_uri does not match');
    });

    it('should burn a code on first use', async () => {
      const codeVerifier = generateCodeVerifier();
      const code = await issueCode(codeVerifier);
      const params = { grant_type: 'authorization_code', code, redirect_uri: REDIRECT_URI, code_verifier: codeVerifier };

      const first = await tokenRequest(ctx, params);
      expect(first.status).toBe(200);

      const second = await tokenRequest(ctx, params);
      expect(second.status).toBe(400);
      const body = await readJson(second);
      expect(body['error']).toBe('invalid_grant');
    });

    it('should reject a code presented by another client', async () => {
      const codeVerifier = generateCodeVerifier();
      const code = await issueCode(codeVerifier);

      const tokenRes = await postForm(ctx, '/connect/token', {
        grant_type: 'authorization_code',
        client_id: ctx.publicClientId,
        code,
        redirect_uri: REDIRECT_URI,
        code_verifier: codeVerifier,
      });

      expect(tokenRes.status).toBe(400);
      const body = await readJson(tokenRes);
      expect(body['error_description']).toBe('Authorization code was issued to a different client');
    });
  });

  describe('journey sign-in', () => {
    async function startJourney(codeVerifier: string, state = 'journey-state'): Promise<JsonObject> {
      const authRes = await authorize({
        response_type: 'code',
        client_id: ctx.publicClientId,
        redirect_uri: REDIRECT_URI,
        scope: 'openid profile',
        state,
        code_challenge: generateCodeChallenge(codeVerifier),
        code_challenge_method: 'S256',
      });
      expect(authRes.status).toBe(200);
      return readJson(authRes);
    }

    it('should walk through sign-in and consent to a code', async () => {
      const codeVerifier = generateCodeVerifier();

      const started = await startJourney(codeVerifier);
      expect(started['status']).toBe('in_progress');
      expect(stepOf(started)).toMatchObject({ step_id: 'login', view_name: 'login' });
      const journeyId = stringField(started, 'journey_id');

      const loginRes = await continueJourney(journeyId, {
        step_id: 'login',
        values: { username: 'alice', password: USER_PASSWORD },
      });
      expect(loginRes.status).toBe(200);
      const consent = await readJson(loginRes);
      expect(stepOf(consent)).toMatchObject({ step_id: 'consent', view_name: 'consent' });

      const consentRes = await continueJourney(journeyId, { step_id: 'consent', action: 'accept' });
      expect(consentRes.status).toBe(302);
      const params = redirectParams(consentRes);
      expect(params.get('state')).toBe('journey-state');
      expect(params.get('iss')).toBe(ISSUER);

      const tokenRes = await postForm(ctx, '/connect/token', {
        grant_type: 'authorization_code',
        client_id: ctx.publicClientId,
        code: requiredParam(params, 'code'),
        redirect_uri: REDIRECT_URI,
        code_verifier: codeVerifier,
      });
      expect(tokenRes.status).toBe(200);
      const tokens = await readJson(tokenRes);
      const idToken = jose.decodeJwt(stringField(tokens, 'id_token'));
      expect(idToken.sub).toBe(ALICE.id);
      expect(idToken['amr']).toEqual(['pwd']);

      expect(ctx.audit.ofType('journey.started')).toHaveLength(1);
      expect(ctx.audit.ofType('journey.completed')).toHaveLength(1);
    });

    it('should show the login step again after a wrong password', async () => {
      const started = await startJourney(generateCodeVerifier());
      const journeyId = stringField(started, 'journey_id');

      const res = await continueJourney(journeyId, { values: { username: 'alice', password: 'wrong-password' } });

      expect(res.status).toBe(200);
      const body = await readJson(res);
      expect(stepOf(body)).toMatchObject({ step_id: 'login', error: 'Invalid username or password' });
    });

    it('should redirect access_denied when consent is refused', async () => {
      const started = await startJourney(generateCodeVerifier(), 'deny-state');
      const journeyId = stringField(started, 'journey_id');

      await continueJourney(journeyId, { values: { username: 'alice', password: USER_PASSWORD } });
      const res = await continueJourney(journeyId, { action: 'deny' });

      expect(res.status).toBe(302);
      const params = redirectParams(res);
      expect(params.get('error')).toBe('access_denied');
      expect(params.get('state')).toBe('deny-state');
    });

    it('should reject an unknown journey', async () => {
      const res = await continueJourney('missing-journey', { values: {} });

      expect(res.status).toBe(400);
      const body = await readJson(res);
      expect(body['error_description']).toBe('Journey not found or expired');
    });

    it('should reject malformed journey input', async () => {
      const started = await startJourney(generateCodeVerifier());

      const res = await continueJourney(stringField(started, 'journey_id'), { values: { username: 42 } });

      expect(res.status).toBe(400);
      const body = await readJson(res);
      expect(body['error']).toBe('invalid_request');
    });

    it('should answer login_required for prompt=none', async () => {
      const authRes = await authorize({
        response_type: 'code',
        client_id: ctx.publicClientId,
        redirect_uri: REDIRECT_URI,
        scope: 'openid',
        prompt: 'none',
        code_challenge: generateCodeChallenge(generateCodeVerifier()),
        code_challenge_method: 'S256',
      });

      expect(authRes.status).toBe(302);
      expect(redirectParams(authRes).get('error')).toBe('login_required');
    });

    it('should refuse an unknown journey policy', async () => {
      const authRes = await authorize({
        response_type: 'code',
        client_id: ctx.publicClientId,
        redirect_uri: REDIRECT_URI,
        scope: 'openid',
        policy: 'no-such-policy',
        code_challenge: generateCodeChallenge(generateCodeVerifier()),
        code_challenge_method: 'S256',
      });

      expect(authRes.status).toBe(302);
      const params = redirectParams(authRes);
      expect(params.get('error')).toBe('invalid_request');
      expect(params.get('error_description')).toBe('Unknown journey policy: no-such-policy');
    });
  });

  describe('pushed authorization requests', () => {
    it('should authorize a pushed request by reference', async () => {
      const codeVerifier = generateCodeVerifier();

      const parRes = await postForm(
        ctx,
        '/connect/par',
        {
          response_type: 'code',
          redirect_uri: REDIRECT_URI,
          scope: 'openid',
          state: 'pushed-state',
          code_challenge: generateCodeChallenge(codeVerifier),
          code_challenge_method: 'S256',
        },
        { Authorization: basicAuth(ctx.confidentialClientId, CLIENT_SECRET) }
      );

      expect(parRes.status).toBe(201);
      const pushed = await readJson(parRes);
      const requestUri = stringField(pushed, 'request_uri');
      expect(requestUri.startsWith('urn:ietf:params:oauth:request_uri:')).toBe(true);

      const authRes = await authorize({ client_id: ctx.confidentialClientId, request_uri: requestUri });
      expect(authRes.status).toBe(302);
      const params = redirectParams(authRes);
      expect(params.get('state')).toBe('pushed-state');

      const tokenRes = await tokenRequest(ctx, {
        grant_type: 'authorization_code',
        code: requiredParam(params, 'code'),
        redirect_uri: REDIRECT_URI,
        code_verifier: codeVerifier,
      });
      expect(tokenRes.status).toBe(200);
    });

    it('should accept a request_uri only once', async () => {
      const parRes = await postForm(
        ctx,
        '/connect/par',
        { response_type: 'code', redirect_uri: REDIRECT_URI, scope: 'openid' },
        { Authorization: basicAuth(ctx.confidentialClientId, CLIENT_SECRET) }
      );
      const requestUri = stringField(await readJson(parRes), 'request_uri');

      await authorize({ client_id: ctx.confidentialClientId, request_uri: requestUri });
      const again = await authorize({ client_id: ctx.confidentialClientId, request_uri: requestUri });

      expect(again.status).toBe(400);
      const body = await readJson(again);
      expect(body['error']).toBe('invalid_request_uri');
    });

    it('should reject a client_id that differs from the authenticated client', async () => {
      const parRes = await postForm(
        ctx,
        '/connect/par',
        { client_id: ctx.publicClientId, response_type: 'code', redirect_uri: REDIRECT_URI },
        { Authorization: basicAuth(ctx.confidentialClientId, CLIENT_SECRET) }
      );

      expect(parRes.status).toBe(400);
      const body = await readJson(parRes);
      expect(body['error_description']).toBe('client_id does not match the authenticated client');
    });
  });
});
