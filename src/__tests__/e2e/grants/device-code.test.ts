import { describe, it, expect, beforeAll } from 'vitest';
import {
  setupTestContext,
  readJson,
  stringField,
  postForm,
  tokenRequest,
  basicAuth,
  jose,
  ALICE,
  CLIENT_SECRET,
  type TestContext,
} from '../test-setup.js';

const DEVICE_CODE_GRANT = 'urn:ietf:params:oauth:grant-type:device_code';

describe('Device Code Grant', () => {
  let ctx: TestContext;

  beforeAll(async () => {
    ctx = await setupTestContext();
  });

  async function requestDeviceCode(scope = 'openid profile'): Promise<{ deviceCode: string; userCode: string }> {
    const res = await postForm(
      ctx,
      '/connect/deviceauthorization',
      { scope },
      { Authorization: basicAuth(ctx.confidentialClientId, CLIENT_SECRET) }
    );
    expect(res.status).toBe(200);
    const body = await readJson(res);
    return { deviceCode: stringField(body, 'device_code'), userCode: stringField(body, 'user_code') };
  }

  function poll(deviceCode: string): Promise<Response> {
    return tokenRequest(ctx, { grant_type: DEVICE_CODE_GRANT, device_code: deviceCode });
  }

  async function approve(userCode: string, userId: string): Promise<void> {
    const record = await ctx.storage.deviceCodes.findByUserCode(ctx.tenant.id, userCode);
    if (!record) throw new Error('device code missing');
    await ctx.storage.deviceCodes.authorize(record.id, userId);
  }

  it('should issue a device code', async () => {
    const res = await postForm(
      ctx,
      '/connect/deviceauthorization',
      { scope: 'openid profile' },
      { Authorization: basicAuth(ctx.confidentialClientId, CLIENT_SECRET) }
    );

    expect(res.status).toBe(200);
    expect(res.headers.get('Cache-Control')).toBe('no-store');
    const body = await readJson(res);
    const userCode = stringField(body, 'user_code');
    expect(body['verification_uri']).toBe('http://localhost:3000/device');
    expect(body['verification_uri_complete']).toBe(
      `http://localhost:3000/device?user_code=${encodeURIComponent(userCode)}`
    );
    expect(body['interval']).toBe(0);
    expect(typeof body['expires_in']).toBe('number');
  });

  it('should refuse a client without the device grant', async () => {
    const res = await postForm(
      ctx,
      '/connect/deviceauthorization',
      { scope: 'openid' },
      { Authorization: basicAuth(ctx.dpopClientId, CLIENT_SECRET) }
    );

    expect(res.status).toBe(400);
    const body = await readJson(res);
    expect(body['error']).toBe('unauthorized_client');
  });

  it('should answer authorization_pending while waiting', async () => {
    const { deviceCode } = await requestDeviceCode();

    const res = await poll(deviceCode);

    expect(res.status).toBe(400);
    const body = await readJson(res);
    expect(body['error']).toBe('authorization_pending');
  });

  it('should issue tokens once the user approves', async () => {
    const { deviceCode, userCode } = await requestDeviceCode();
    await approve(userCode, ALICE.id);

    const res = await poll(deviceCode);

    expect(res.status).toBe(200);
    const tokens = await readJson(res);
    expect(tokens['scope']).toBe('openid profile');
    const accessToken = jose.decodeJwt(stringField(tokens, 'access_token'));
    expect(accessToken.sub).toBe(ALICE.id);
    const idToken = jose.decodeJwt(stringField(tokens, 'id_token'));
    expect(idToken['name']).toBe('Alice Example');
  });

  it('should be single use', async () => {
    const { deviceCode, userCode } = await requestDeviceCode();
    await approve(userCode, ALICE.id);

    expect((await poll(deviceCode)).status).toBe(200);

    const again = await poll(deviceCode);
    expect(again.status).toBe(400);
    const body = await readJson(again);
    expect(body['error']).toBe('invalid_grant');
  });

  it('should answer access_denied when the user refuses', async () => {
    const { deviceCode, userCode } = await requestDeviceCode();
    const record = await ctx.storage.deviceCodes.findByUserCode(ctx.tenant.id, userCode);
    if (!record) throw new Error('device code missing');
    await ctx.storage.deviceCodes.deny(record.id);

    const res = await poll(deviceCode);

    const body = await readJson(res);
    expect(body['error']).toBe('access_denied');
  });

  it('should reject an unknown device code', async () => {
    const res = await poll('unknown-device-code');

    expect(res.status).toBe(400);
    const body = await readJson(res);
    expect(body['error']).toBe('invalid_grant');
    expect(body['error_description']).toBe('Invalid device code');
  });

  it('should answer slow_down when polled faster than the interval', async () => {
    await ctx.storage.tenants.update(ctx.tenant.id, { deviceCodeInterval: 5 });
    try {
      const { deviceCode } = await requestDeviceCode();

      const first = await poll(deviceCode);
      expect((await readJson(first))['error']).toBe('authorization_pending');

      const second = await poll(deviceCode);
      expect((await readJson(second))['error']).toBe('slow_down');
    } finally {
      await ctx.storage.tenants.update(ctx.tenant.id, { deviceCodeInterval: 0 });
    }
  });
});
