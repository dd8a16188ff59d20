import {
  type OAuthErrorCode,
  type ErrorStatusCode,
  ERROR_STATUS_CODES,
  ERROR_DESCRIPTIONS,
  ERROR_INVALID_REQUEST,
  ERROR_INVALID_CLIENT,
  ERROR_INVALID_GRANT,
  ERROR_UNAUTHORIZED_CLIENT,
  ERROR_ACCESS_DENIED,
  ERROR_UNSUPPORTED_RESPONSE_TYPE,
  ERROR_INVALID_SCOPE,
  ERROR_UNSUPPORTED_GRANT_TYPE,
  ERROR_SERVER_ERROR,
  ERROR_TEMPORARILY_UNAVAILABLE,
  ERROR_INVALID_TOKEN,
  ERROR_INSUFFICIENT_SCOPE,
  ERROR_LOGIN_REQUIRED,
  ERROR_TENANT_NOT_IDENTIFIED,
  ERROR_TENANT_INACTIVE,
  ERROR_USER_LIMIT_REACHED,
  ERROR_DUPLICATE_USER,
  ERROR_AUTH_FAILED,
  ERROR_NOT_FOUND,
  ERROR_CONFLICT,
} from './error-codes.js';

/**
 * OAuth 2.0 Error Response
 * RFC 6749 Section 5.2
 */
export interface OAuthErrorResponse {
  error: OAuthErrorCode;
  error_description?: string;
  error_uri?: string;
  state?: string;
}

export interface OAuthErrorOptions {
  errorUri?: string;
  state?: string;
  cause?: unknown;
  /** Overrides the status derived from the error code */
  statusCode?: ErrorStatusCode;
}

/**
 * Error rendered as an RFC 6749 error body
 */
export class OAuthError extends Error {
  public readonly code: OAuthErrorCode;
  public readonly statusCode: ErrorStatusCode;
  public readonly description: string;
  public readonly errorUri?: string;
  public readonly state?: string;

  constructor(code: OAuthErrorCode, description?: string, options?: OAuthErrorOptions) {
    const desc = description ?? ERROR_DESCRIPTIONS[code];
    super(desc);
    this.name = 'OAuthError';
    this.code = code;
    this.statusCode = options?.statusCode ?? ERROR_STATUS_CODES[code];
    this.description = desc;

    if (options?.errorUri) {
      this.errorUri = options.errorUri;
    }
    if (options?.state) {
      this.state = options.state;
    }
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }

    // Maintains proper stack trace in V8
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert to JSON response body
   */
  toJSON(): OAuthErrorResponse {
    const response: OAuthErrorResponse = {
      error: this.code,
    };

    if (this.description) {
      response.error_description = this.description;
    }

    if (this.errorUri) {
      response.error_uri = this.errorUri;
    }

    if (this.state) {
      response.state = this.state;
    }

    return response;
  }

  /**
   * Convert to URL query string for redirect errors
   */
  toQueryString(extra?: Record<string, string>): string {
    const params = new URLSearchParams();
    params.set('error', this.code);

    if (this.description) {
      params.set('error_description', this.description);
    }

    if (this.errorUri) {
      params.set('error_uri', this.errorUri);
    }

    if (this.state) {
      params.set('state', this.state);
    }

    for (const [key, value] of Object.entries(extra ?? {})) {
      params.set(key, value);
    }

    return params.toString();
  }

  // Factory methods for common errors

  static invalidRequest(description?: string, state?: string): OAuthError {
    return new OAuthError(ERROR_INVALID_REQUEST, description, { state });
  }

  static invalidClient(description?: string): OAuthError {
    return new OAuthError(ERROR_INVALID_CLIENT, description);
  }

  static invalidGrant(description?: string): OAuthError {
    return new OAuthError(ERROR_INVALID_GRANT, description);
  }

  static unauthorizedClient(description?: string, state?: string): OAuthError {
    return new OAuthError(ERROR_UNAUTHORIZED_CLIENT, description, { state });
  }

  static accessDenied(description?: string, state?: string): OAuthError {
    return new OAuthError(ERROR_ACCESS_DENIED, description, { state });
  }

  static unsupportedResponseType(description?: string, state?: string): OAuthError {
    return new OAuthError(ERROR_UNSUPPORTED_RESPONSE_TYPE, description, { state });
  }

  static invalidScope(description?: string, state?: string): OAuthError {
    return new OAuthError(ERROR_INVALID_SCOPE, description, { state });
  }

  static unsupportedGrantType(description?: string): OAuthError {
    return new OAuthError(ERROR_UNSUPPORTED_GRANT_TYPE, description);
  }

  static serverError(description?: string, cause?: unknown): OAuthError {
    return new OAuthError(ERROR_SERVER_ERROR, description, { cause });
  }

  static temporarilyUnavailable(description?: string): OAuthError {
    return new OAuthError(ERROR_TEMPORARILY_UNAVAILABLE, description);
  }

  static invalidToken(description?: string): OAuthError {
    return new OAuthError(ERROR_INVALID_TOKEN, description);
  }

  static insufficientScope(description?: string): OAuthError {
    return new OAuthError(ERROR_INSUFFICIENT_SCOPE, description);
  }

  static loginRequired(description?: string): OAuthError {
    return new OAuthError(ERROR_LOGIN_REQUIRED, description);
  }

  static tenantNotIdentified(description?: string): OAuthError {
    return new OAuthError(ERROR_TENANT_NOT_IDENTIFIED, description);
  }

  static tenantInactive(description?: string): OAuthError {
    return new OAuthError(ERROR_TENANT_INACTIVE, description);
  }

  static userLimitReached(description?: string): OAuthError {
    return new OAuthError(ERROR_USER_LIMIT_REACHED, description);
  }

  static duplicateUser(description?: string): OAuthError {
    return new OAuthError(ERROR_DUPLICATE_USER, description);
  }

  static authFailed(): OAuthError {
    return new OAuthError(ERROR_AUTH_FAILED);
  }

  static notFound(description?: string): OAuthError {
    return new OAuthError(ERROR_NOT_FOUND, description);
  }

  static conflict(description?: string): OAuthError {
    return new OAuthError(ERROR_CONFLICT, description);
  }
}
