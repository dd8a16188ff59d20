import type { ZodError } from 'zod';
import { OAuthError } from '../errors/oauth-error.js';

/**
 * Summarize zod issues as `path: message` pairs
 */
export function describeZodError(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join(', ');
}

/**
 * zValidator hook turning validation failures into invalid_request
 */
export function rejectInvalid(result: { success: boolean; error?: ZodError }): void {
  if (!result.success) {
    throw OAuthError.invalidRequest(result.error ? describeZodError(result.error) : undefined);
  }
}
