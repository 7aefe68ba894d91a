import { randomBytes, randomInt } from 'node:crypto';
import {
  AUTHORIZATION_CODE_LENGTH,
  DEVICE_CODE_LENGTH,
  STATE_LENGTH,
  USER_CODE_CHARSET,
  USER_CODE_LENGTH,
} from '../config/constants.js';

/**
 * Generate cryptographically secure random bytes as base64url string
 */
export function generateRandomBase64Url(length: number): string {
  return randomBytes(length).toString('base64url');
}

/**
 * Generate a secure authorization code
 */
export function generateAuthorizationCode(length: number = AUTHORIZATION_CODE_LENGTH): string {
  return generateRandomBase64Url(length);
}

/**
 * Generate a secure device code
 */
export function generateDeviceCode(length: number = DEVICE_CODE_LENGTH): string {
  return generateRandomBase64Url(length);
}

/**
 * Generate an opaque state value when the client did not send one
 */
export function generateState(length: number = STATE_LENGTH): string {
  return generateRandomBase64Url(length);
}

/**
 * Generate a user-friendly user code for device authorization
 * Format: XXXX-XXXX (easy to type, no ambiguous characters)
 */
export function generateUserCode(length: number = USER_CODE_LENGTH): string {
  let code = '';

  for (let i = 0; i < length; i++) {
    code += USER_CODE_CHARSET.charAt(randomInt(USER_CODE_CHARSET.length));
    if (i === length / 2 - 1) {
      code += '-';
    }
  }

  return code;
}

/**
 * Normalize a user-entered code to the stored XXXX-XXXX form
 */
export function normalizeUserCode(userCode: string): string {
  const compact = userCode.replace(/[\s-]/g, '').toUpperCase();
  const half = Math.floor(compact.length / 2);
  return `${compact.slice(0, half)}-${compact.slice(half)}`;
}

/**
 * Generate a unique JWT ID (jti)
 */
export function generateJti(): string {
  return generateRandomBase64Url(16);
}
