import * as jose from 'jose';
import type { AccessTokenPayload, IdTokenPayload } from '../types/token.js';
import type { SigningKey, SigningAlgorithm } from '../types/tenant.js';
import type { JsonWebKeySet } from '../types/client.js';

/**
 * JWT signing and verification utilities using jose library
 */

async function importPrivateKey(pem: string, algorithm: SigningAlgorithm): Promise<jose.KeyLike> {
  return jose.importPKCS8(pem, algorithm);
}

async function importPublicKey(pem: string, algorithm: SigningAlgorithm): Promise<jose.KeyLike> {
  return jose.importSPKI(pem, algorithm);
}

/**
 * Sign a JWT access token
 */
export async function signAccessToken(
  payload: AccessTokenPayload,
  signingKey: SigningKey
): Promise<string> {
  const privateKey = await importPrivateKey(signingKey.privateKey, signingKey.algorithm);

  return new jose.SignJWT(payload)
    .setProtectedHeader({
      alg: signingKey.algorithm,
      kid: signingKey.kid,
      typ: 'at+jwt', // RFC 9068 JWT Profile for OAuth 2.0 Access Tokens
    })
    .sign(privateKey);
}

/**
 * Sign a JWT ID token
 */
export async function signIdToken(payload: IdTokenPayload, signingKey: SigningKey): Promise<string> {
  const privateKey = await importPrivateKey(signingKey.privateKey, signingKey.algorithm);

  return new jose.SignJWT(payload)
    .setProtectedHeader({
      alg: signingKey.algorithm,
      kid: signingKey.kid,
      typ: 'JWT',
    })
    .sign(privateKey);
}

export interface VerifyJwtOptions {
  issuer?: string;
  audience?: string | string[];
  clockTolerance?: number;
  /** When false, an expired but otherwise valid token is accepted */
  validateLifetime?: boolean;
}

/**
 * Verify a JWT against a set of public JWKs (selected by `kid`/`alg`)
 */
export async function verifyJwt(
  token: string,
  jwks: JsonWebKeySet,
  options: VerifyJwtOptions = {}
): Promise<jose.JWTPayload> {
  const keySet = jose.createLocalJWKSet(jwks);

  const verifyOptions: jose.JWTVerifyOptions = {
    clockTolerance: options.clockTolerance ?? 5,
  };

  if (options.issuer) {
    verifyOptions.issuer = options.issuer;
  }

  if (options.audience) {
    verifyOptions.audience = options.audience;
  }

  try {
    const { payload } = await jose.jwtVerify(token, keySet, verifyOptions);
    return payload;
  } catch (error) {
    // exp is checked after signature, iss and aud
    if (options.validateLifetime === false && error instanceof jose.errors.JWTExpired) {
      return jose.decodeJwt(token);
    }
    throw error;
  }
}

/**
 * Decode a JWT without verification
 * WARNING: Only use this when you've already verified the token or for debugging
 */
export function decodeJwt(token: string): jose.JWTPayload | null {
  try {
    return jose.decodeJwt(token);
  } catch {
    return null;
  }
}

/**
 * Generate a new RSA key pair for signing
 */
export async function generateRsaKeyPair(
  algorithm: 'RS256' | 'RS384' | 'RS512' = 'RS256'
): Promise<{ publicKey: string; privateKey: string }> {
  const modulusLength = algorithm === 'RS512' ? 4096 : 2048;

  const { publicKey, privateKey } = await jose.generateKeyPair(algorithm, {
    modulusLength,
    extractable: true,
  });

  return {
    publicKey: await jose.exportSPKI(publicKey),
    privateKey: await jose.exportPKCS8(privateKey),
  };
}

/**
 * Generate a new EC key pair for signing
 */
export async function generateEcKeyPair(
  algorithm: 'ES256' | 'ES384' | 'ES512' = 'ES256'
): Promise<{ publicKey: string; privateKey: string }> {
  const { publicKey, privateKey } = await jose.generateKeyPair(algorithm, {
    extractable: true,
  });

  return {
    publicKey: await jose.exportSPKI(publicKey),
    privateKey: await jose.exportPKCS8(privateKey),
  };
}

/**
 * Convert a PEM public key to JWK format (for JWKS endpoint)
 */
export async function publicKeyToJwk(
  publicKeyPem: string,
  kid: string,
  algorithm: SigningAlgorithm
): Promise<jose.JWK> {
  const publicKey = await importPublicKey(publicKeyPem, algorithm);
  const jwk = await jose.exportJWK(publicKey);

  return {
    ...jwk,
    kid,
    alg: algorithm,
    use: 'sig',
  };
}

/**
 * Verify a client assertion JWT (for private_key_jwt authentication)
 */
export async function verifyClientAssertion(
  assertion: string,
  clientJwks: JsonWebKeySet,
  options: {
    issuer: string; // client_id
    audience: string | string[]; // token endpoint URL and/or issuer
    maxAge?: number;
  }
): Promise<jose.JWTPayload> {
  const jwks = jose.createLocalJWKSet(clientJwks);

  const { payload } = await jose.jwtVerify(assertion, jwks, {
    issuer: options.issuer,
    subject: options.issuer,
    audience: options.audience,
    maxTokenAge: options.maxAge ?? 300,
  });

  return payload;
}
