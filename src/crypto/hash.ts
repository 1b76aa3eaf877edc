import { createHash, timingSafeEqual, randomBytes, scrypt as scryptCallback } from 'node:crypto';

function scryptAsync(
  password: string,
  salt: Buffer,
  keyLength: number,
  options: { N: number; r: number; p: number }
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scryptCallback(password, salt, keyLength, options, (err, derivedKey) => {
      if (err) reject(err);
      else resolve(derivedKey);
    });
  });
}

/**
 * SHA-256 hex digest, used as the storage key for codes and tokens
 */
export function sha256(value: string): string {
  return createHash('sha256').update(value, 'utf8').digest('hex');
}

export function toBase64Url(buffer: Buffer): string {
  return buffer.toString('base64').replace(/\+/g, '-').replace(/\//g, '_').replace(/=/g, '');
}

/**
 * BASE64URL(SHA256(value)) without padding. Used for PKCE S256 and DPoP `ath`.
 */
export function sha256Base64Url(value: string): string {
  return toBase64Url(createHash('sha256').update(value, 'utf8').digest());
}

/**
 * Compare two strings in constant time
 */
export function constantTimeCompare(a: string, b: string): boolean {
  const bufA = Buffer.from(a, 'utf8');
  const bufB = Buffer.from(b, 'utf8');

  if (bufA.length !== bufB.length) {
    return false;
  }

  return timingSafeEqual(bufA, bufB);
}

/**
 * Hash a client secret or user password with scrypt.
 * Format: $scrypt$N$r$p$salt$hash
 */
export async function hashSecret(secret: string): Promise<string> {
  const salt = randomBytes(16);
  const N = 16384;
  const r = 8;
  const p = 1;
  const keyLength = 64;

  const hash = await scryptAsync(secret, salt, keyLength, { N, r, p });

  return `$scrypt$${N}$${r}$${p}$${salt.toString('base64')}$${hash.toString('base64')}`;
}

export async function verifySecret(secret: string, hash: string): Promise<boolean> {
  const [, scheme, nRaw, rRaw, pRaw, saltRaw, hashRaw, ...rest] = hash.split('$');

  if (scheme !== 'scrypt' || !nRaw || !rRaw || !pRaw || !saltRaw || !hashRaw || rest.length > 0) {
    return false;
  }

  const N = parseInt(nRaw, 10);
  const r = parseInt(rRaw, 10);
  const p = parseInt(pRaw, 10);
  const salt = Buffer.from(saltRaw, 'base64');
  const storedHash = Buffer.from(hashRaw, 'base64');

  const derivedHash = await scryptAsync(secret, salt, storedHash.length, { N, r, p });

  return timingSafeEqual(storedHash, derivedHash);
}

/**
 * Lookup hash for high-entropy random values (codes, refresh tokens)
 */
export function hashToken(token: string): string {
  return sha256(token);
}

/**
 * Left-most half of the hash of `value`, base64url encoded. The hash
 * follows the signing algorithm's size (OIDC Core 3.1.3.6 `at_hash`).
 */
export function leftHalfHash(value: string, algorithm: string): string {
  const size = algorithm.slice(-3);
  const digestName = size === '384' ? 'sha384' : size === '512' ? 'sha512' : 'sha256';
  const digest = createHash(digestName).update(value, 'ascii').digest();
  return toBase64Url(digest.subarray(0, digest.length / 2));
}
