import { describe, it, expect } from 'vitest';
import { completionFromJourney, restoreRequest } from '../../grants/authorization-code/authorize.js';

describe('completionFromJourney', () => {
  it('should lift authentication data and keep the remaining claims', () => {
    const completion = completionFromJourney({
      userId: 'user-1',
      sessionId: 'session-1',
      claims: {
        sub: 'user-1',
        auth_time: '1700000000',
        amr: 'pwd otp',
        acr: 'urn:acr:mfa',
        email: 'dana@example.com',
        scopes: 'openid profile',
        granted_scopes: 'openid',
        client_id: 'web-app',
        lastError: 'lookup_failed',
        _internal: 'x',
        department: 'engineering',
      },
    });

    expect(completion).toEqual({
      userId: 'user-1',
      sessionId: 'session-1',
      authTime: 1700000000,
      amr: ['pwd', 'otp'],
      acr: 'urn:acr:mfa',
      claims: { department: 'engineering' },
      grantedScopes: ['openid'],
    });
  });

  it('should fall back to now without a usable auth_time', () => {
    const completion = completionFromJourney({ userId: 'user-1', claims: { auth_time: 'soon' } }, 1234);

    expect(completion.authTime).toBe(1234);
    expect(completion.amr).toBeUndefined();
    expect(completion.acr).toBeUndefined();
    expect(completion.grantedScopes).toBeUndefined();
  });
});

describe('restoreRequest', () => {
  it('should split stored resources back into a list', () => {
    const request = restoreRequest({
      response_type: 'code',
      client_id: 'web-app',
      scope: 'openid profile',
      resource: 'https://a.example https://b.example',
    });

    expect(request.clientId).toBe('web-app');
    expect(request.requestedScopes).toEqual(['openid', 'profile']);
    expect(request.resource).toEqual(['https://a.example', 'https://b.example']);
    expect(request.redirectUriSent).toBe(true);
  });

  it('should keep a defaulted redirect URI marked as not sent', () => {
    const request = restoreRequest(
      { response_type: 'code', client_id: 'web-app', redirect_uri: 'https://app.example/cb' },
      false
    );

    expect(request.redirectUri).toBe('https://app.example/cb');
    expect(request.redirectUriSent).toBe(false);
  });
});
