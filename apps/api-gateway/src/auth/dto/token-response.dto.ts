/**
 * Response shape for token issue/refresh, following the OAuth2 token
 * response convention. `refresh_token` is only present on issue.
 */
export class TokenResponseDto {
  access_token: string;
  refresh_token?: string;
  token_type: 'bearer';
  expires_in: number;

  constructor(accessToken: string, expiresIn: number, refreshToken?: string) {
    this.access_token = accessToken;
    this.token_type = 'bearer';
    this.expires_in = expiresIn;
    if (refreshToken !== undefined) {
      this.refresh_token = refreshToken;
    }
  }
}
