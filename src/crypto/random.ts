import { randomBytes } from 'node:crypto';
import {
  USER_CODE_CHARSET,
  USER_CODE_LENGTH,
  AUTHORIZATION_CODE_LENGTH,
  REFRESH_TOKEN_LENGTH,
  DEVICE_CODE_LENGTH,
  CIBA_AUTH_REQ_ID_LENGTH,
  CLIENT_ID_LENGTH,
  CLIENT_SECRET_LENGTH,
} from '../config/constants.js';
import { toBase64Url } from './hash.js';

/**
 * Cryptographically secure random bytes as an unpadded base64url string
 */
export function generateRandomBase64Url(length: number): string {
  return toBase64Url(randomBytes(length));
}

export function generateClientId(length: number = CLIENT_ID_LENGTH): string {
  return generateRandomBase64Url(length);
}

export function generateClientSecret(length: number = CLIENT_SECRET_LENGTH): string {
  return generateRandomBase64Url(length);
}

export function generateAuthorizationCode(length: number = AUTHORIZATION_CODE_LENGTH): string {
  return generateRandomBase64Url(length);
}

export function generateRefreshToken(length: number = REFRESH_TOKEN_LENGTH): string {
  return generateRandomBase64Url(length);
}

export function generateDeviceCode(length: number = DEVICE_CODE_LENGTH): string {
  return generateRandomBase64Url(length);
}

/**
 * CIBA auth_req_id: 32 random bytes, base64url, no padding (43 characters)
 */
export function generateAuthReqId(): string {
  return generateRandomBase64Url(CIBA_AUTH_REQ_ID_LENGTH);
}

/**
 * User code for device authorization.
 * Format: XXXX-XXXX, drawn from a charset without ambiguous characters.
 */
export function generateUserCode(length: number = USER_CODE_LENGTH): string {
  const bytes = randomBytes(length);
  let code = '';

  for (let i = 0; i < length; i++) {
    code += USER_CODE_CHARSET.charAt((bytes[i] ?? 0) % USER_CODE_CHARSET.length);
    if (i === length / 2 - 1) {
      code += '-';
    }
  }

  return code;
}

export function generateJti(): string {
  return generateRandomBase64Url(16);
}

export function generateKid(): string {
  return generateRandomBase64Url(12);
}

export function generateId(): string {
  return generateRandomBase64Url(16);
}

/** Token family ID for refresh token rotation tracking */
export function generateFamilyId(): string {
  return generateRandomBase64Url(16);
}
