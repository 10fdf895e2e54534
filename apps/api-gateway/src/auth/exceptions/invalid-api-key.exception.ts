import { HttpStatus, InternalServerErrorException, UnauthorizedException } from '@nestjs/common';

export class InvalidApiKeyException extends UnauthorizedException {
  constructor() {
    super({
      statusCode: HttpStatus.UNAUTHORIZED,
      error: 'Unauthorized',
      code: 'INVALID_API_KEY',
      message: 'Invalid API key',
    });
  }
}

export class InvalidRefreshTokenException extends UnauthorizedException {
  constructor() {
    super({
      statusCode: HttpStatus.UNAUTHORIZED,
      error: 'Unauthorized',
      code: 'INVALID_REFRESH_TOKEN',
      message: 'Invalid or expired refresh token',
    });
  }
}

/** No API key is configured at all, so no token can ever be issued. */
export class ApiKeysNotConfiguredException extends InternalServerErrorException {
  constructor() {
    super({
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      error: 'Internal Server Error',
      code: 'API_KEY_NOT_CONFIGURED',
      message: 'Server API key not configured',
    });
  }
}
