export type TokenType = 'access' | 'refresh';

/**
 * JWT token payload structure.
 *
 * `sub` is the principal the API key was issued to; `type` keeps refresh
 * tokens from being accepted as access tokens and vice versa.
 */
export interface JwtPayload {
  sub: string;
  type: TokenType;
}
