import { describe, it, expect, beforeAll } from 'vitest';
import { TokenRequestValidator, type TokenRequestDPoP } from '../../validation/token-request-validator.js';
import { DPoPProofValidator } from '../../dpop/proof-validator.js';
import { MemoryDPoPNonceStore } from '../../storage/memory/dpop-nonce-store.js';
import { MemoryTenantStorage } from '../../storage/memory/tenant-storage.js';
import { MemoryClientStorage } from '../../storage/memory/client-storage.js';
import { toValidatedClient, type CreateClientInput, type ValidatedClient } from '../../types/client.js';
import type { Tenant } from '../../types/tenant.js';
import { createDPoPKey, createDPoPProof, thumbprintOf, type DPoPKey } from '../e2e/test-setup.js';

const TOKEN_URL = 'https://id.example.com/acme/connect/token';
const NO_DPOP: TokenRequestDPoP = { proofs: [], httpMethod: 'POST', httpUri: TOKEN_URL };

describe('TokenRequestValidator', () => {
  let tenant: Tenant;
  let client: ValidatedClient;
  let dpopClient: ValidatedClient;
  let key: DPoPKey;
  let validator: TokenRequestValidator;

  beforeAll(async () => {
    tenant = await new MemoryTenantStorage().create({
      name: 'Acme',
      slug: 'acme',
      allowedScopes: ['openid', 'profile', 'api:read'],
    });
    const clients = new MemoryClientStorage();
    const base: CreateClientInput = {
      tenantId: tenant.id,
      clientSecret: 'test-secret',
      clientType: 'confidential',
      authMethod: 'client_secret_basic',
      name: 'Backend',
      redirectUris: [],
      allowedGrants: ['client_credentials', 'refresh_token', 'urn:ietf:params:oauth:grant-type:token-exchange'],
      allowedScopes: ['openid', 'api:read'],
    };
    client = toValidatedClient((await clients.create({ ...base, clientId: 'backend' })).client, tenant);
    dpopClient = toValidatedClient(
      (await clients.create({ ...base, clientId: 'bound', requireDPoP: true })).client,
      tenant
    );

    key = await createDPoPKey();
    validator = new TokenRequestValidator({
      dpopValidator: new DPoPProofValidator({ nonceStore: new MemoryDPoPNonceStore() }),
    });
  });

  it('should build the token request from the form', async () => {
    const result = await validator.validate(
      { grant_type: 'client_credentials', scope: 'api:read', code: '' },
      ['https://api.example'],
      client,
      tenant,
      NO_DPOP
    );

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toMatchObject({
      grantType: 'client_credentials',
      scope: 'api:read',
      requestedScopes: ['api:read'],
      resource: ['https://api.example'],
    });
    expect(result.value.code).toBeUndefined();
    expect(result.value.dpopKeyThumbprint).toBeUndefined();
  });

  it('should require grant_type', async () => {
    const result = await validator.validate({}, [], client, tenant, NO_DPOP);

    expect(result).toMatchObject({ ok: false, error: { error: 'invalid_request', errorDescription: 'grant_type is required' } });
  });

  it('should reject unknown grant types', async () => {
    const result = await validator.validate({ grant_type: 'password' }, [], client, tenant, NO_DPOP);

    expect(result).toMatchObject({
      ok: false,
      error: { error: 'unsupported_grant_type', errorDescription: 'Unsupported grant_type: password' },
    });
  });

  it('should reject grants the client may not use', async () => {
    const result = await validator.validate({ grant_type: 'authorization_code', code: 'abc' }, [], client, tenant, NO_DPOP);

    expect(result).toMatchObject({
      ok: false,
      error: { error: 'unauthorized_client', errorDescription: 'Client is not authorized for grant type: authorization_code' },
    });
  });

  it('should require the parameters of each grant', async () => {
    const refresh = await validator.validate({ grant_type: 'refresh_token' }, [], client, tenant, NO_DPOP);
    const exchange = await validator.validate(
      { grant_type: 'urn:ietf:params:oauth:grant-type:token-exchange', subject_token: 'token' },
      [],
      client,
      tenant,
      NO_DPOP
    );

    expect(refresh).toMatchObject({ ok: false, error: { errorDescription: 'refresh_token is required' } });
    expect(exchange).toMatchObject({ ok: false, error: { errorDescription: 'subject_token_type is required' } });
  });

  it('should validate requested scopes', async () => {
    const result = await validator.validate({ grant_type: 'client_credentials', scope: 'profile' }, [], client, tenant, NO_DPOP);

    expect(result).toMatchObject({
      ok: false,
      error: { error: 'invalid_scope', errorDescription: "Client is not allowed to request scope 'profile'" },
    });
  });

  it('should reject relative resource indicators', async () => {
    const result = await validator.validate({ grant_type: 'client_credentials' }, ['/api'], client, tenant, NO_DPOP);

    expect(result).toMatchObject({
      ok: false,
      error: { error: 'invalid_target', errorDescription: 'Invalid resource indicator: /api' },
    });
  });

  describe('DPoP', () => {
    it('should bind to the proof key', async () => {
      const proof = await createDPoPProof(key, { htm: 'POST', htu: TOKEN_URL });

      const result = await validator.validate({ grant_type: 'client_credentials' }, [], client, tenant, {
        ...NO_DPOP,
        proofs: [proof],
      });

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.dpopProof).toBe(proof);
        expect(result.value.dpopKeyThumbprint).toBe(await thumbprintOf(key));
      }
    });

    it('should refuse more than one proof', async () => {
      const proof = await createDPoPProof(key, { htm: 'POST', htu: TOKEN_URL });

      const result = await validator.validate({ grant_type: 'client_credentials' }, [], client, tenant, {
        ...NO_DPOP,
        proofs: [proof, proof],
      });

      expect(result).toMatchObject({ ok: false, error: { errorDescription: 'Only one DPoP proof may be sent' } });
    });

    it('should require a proof from bound clients', async () => {
      const result = await validator.validate({ grant_type: 'client_credentials' }, [], dpopClient, tenant, NO_DPOP);

      expect(result).toMatchObject({
        ok: false,
        error: { error: 'invalid_request', errorDescription: 'DPoP proof is required for this client' },
      });
    });

    it('should challenge bound clients for a nonce', async () => {
      const proof = await createDPoPProof(key, { htm: 'POST', htu: TOKEN_URL });

      const result = await validator.validate({ grant_type: 'client_credentials' }, [], dpopClient, tenant, {
        ...NO_DPOP,
        proofs: [proof],
      });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.error).toBe('use_dpop_nonce');
      expect(result.error.headers?.['DPoP-Nonce']).toBeTruthy();
    });

    it('should report a bad proof as invalid_dpop_proof', async () => {
      const proof = await createDPoPProof(key, { htm: 'GET', htu: TOKEN_URL });

      const result = await validator.validate({ grant_type: 'client_credentials' }, [], client, tenant, {
        ...NO_DPOP,
        proofs: [proof],
      });

      expect(result).toMatchObject({
        ok: false,
        error: { error: 'invalid_dpop_proof', errorDescription: 'htm does not match the request method' },
      });
    });
  });
});
