import { randomBytes, randomUUID } from 'node:crypto';
import {
  ACCESS_TOKEN_LENGTH,
  AUTHORIZATION_CODE_LENGTH,
  CLIENT_ID_LENGTH,
  CLIENT_SECRET_LENGTH,
  REFRESH_TOKEN_LENGTH,
} from '../config/constants.js';

/**
 * Generate cryptographically secure random bytes as base64url string
 */
export function generateRandomBase64Url(length: number): string {
  return randomBytes(length).toString('base64url');
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

export function generateAccessToken(length: number = ACCESS_TOKEN_LENGTH): string {
  return generateRandomBase64Url(length);
}

export function generateRefreshToken(length: number = REFRESH_TOKEN_LENGTH): string {
  return generateRandomBase64Url(length);
}

/**
 * Generate a unique ID for database records
 */
export function generateId(): string {
  return randomUUID();
}

/**
 * Generate a token family ID for refresh token rotation tracking
 */
export function generateFamilyId(): string {
  return randomUUID();
}
