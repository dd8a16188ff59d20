/**
 * OAuth 2.0 Grant Types
 * RFC 6749 Sections 4.1, 4.3, 4.4, 6
 */
export type GrantType =
  | 'authorization_code'
  | 'password'
  | 'client_credentials'
  | 'refresh_token';

/**
 * Response types for authorization endpoint
 */
export type ResponseType = 'code';

/**
 * PKCE Code Challenge Methods
 */
export type CodeChallengeMethod = 'S256';

/**
 * Token types
 */
export type TokenType = 'Bearer';

/**
 * Token type hints for revocation and introspection
 * RFC 7009 Section 2.1
 */
export type TokenTypeHint = 'access_token' | 'refresh_token';

/**
 * Token endpoint response
 * RFC 6749 Section 5.1
 */
export interface TokenResponse {
  access_token: string;
  token_type: TokenType;
  expires_in: number;
  refresh_token?: string;
  scope: string;
}

/**
 * Error response body
 * RFC 6749 Section 5.2
 */
export interface ErrorResponse {
  error: string;
  error_description?: string;
  error_uri?: string;
  state?: string;
}

/**
 * Introspection response
 * RFC 7662 Section 2.2
 */
export interface IntrospectionResponse {
  active: boolean;
  scope?: string;
  client_id?: string;
  username?: string;
  token_type?: TokenType;
  exp?: number;
  iat?: number;
  sub?: string;
  iss?: string;
}

export interface UserInfoResponse {
  sub: string;
  username: string;
  email?: string;
  created_at?: string;
}

/**
 * Consent prompt returned by GET /oauth/authorize
 */
export interface ConsentPrompt {
  client_id: string;
  client_name: string;
  scope: string;
  redirect_uri: string;
  state?: string;
  code_challenge?: string;
  code_challenge_method?: CodeChallengeMethod;
}
