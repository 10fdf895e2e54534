import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { AuthService } from './auth.service';
import { RefreshTokenDto, TokenRequestDto, TokenResponseDto } from './dto';

/**
 * AuthController - API-key → JWT exchange.
 *
 * Routes:
 * - POST /auth/token    → access + refresh token for a valid API key (public)
 * - POST /auth/refresh  → new access token for a refresh token (public)
 */
@Controller('auth')
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  /**
   * @returns 200 OK with access and refresh tokens
   * @throws 401 Unauthorized if the API key is unknown
   */
  @Post('token')
  @HttpCode(HttpStatus.OK)
  issueToken(@Body() dto: TokenRequestDto): Promise<TokenResponseDto> {
    return this.authService.issueToken(dto.api_key);
  }

  @Post('refresh')
  @HttpCode(HttpStatus.OK)
  refresh(@Body() dto: RefreshTokenDto): Promise<TokenResponseDto> {
    return this.authService.refresh(dto.refresh_token);
  }
}
