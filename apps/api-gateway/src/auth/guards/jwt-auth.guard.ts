import { Injectable, UnauthorizedException, Logger } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';

/** passport-jwt error names → response messages */
const FAILURE_MESSAGES: Record<string, string> = {
  TokenExpiredError: 'Authentication token has expired',
  JsonWebTokenError: 'Invalid authentication token',
};

/**
 * Protects every task route. Usage: `@UseGuards(JwtAuthGuard)` on a
 * controller or handler.
 *
 * Overrides handleRequest so each failure (missing, expired, malformed or
 * refresh token) gets its own 401 message instead of Passport's bare
 * "Unauthorized".
 */
@Injectable()
export class JwtAuthGuard extends AuthGuard('jwt') {
  private readonly logger = new Logger(JwtAuthGuard.name);

  handleRequest<TUser>(err: Error | null, user: TUser | false, info: Error | undefined): TUser {
    if (err) {
      this.logger.warn(`JWT auth error: ${err.message}`);
      throw err instanceof UnauthorizedException ? err : new UnauthorizedException(err.message);
    }

    if (!user) {
      const message = !info
        ? 'Authentication token is missing'
        : (FAILURE_MESSAGES[info.name] ?? (info.message || 'Authentication failed'));
      this.logger.debug(`JWT auth rejected: ${message}`);
      throw new UnauthorizedException(message);
    }

    return user;
  }
}
