import { Injectable, UnauthorizedException, Logger } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { Strategy, ExtractJwt } from 'passport-jwt';
import { ConfigService } from '@nestjs/config';
import type { JwtPayload, RequestUser } from '../interfaces';

/**
 * JWT Strategy - validates Bearer tokens on protected routes.
 *
 * Flow:
 * 1. Passport extracts JWT from Authorization header
 * 2. passport-jwt verifies signature and expiry
 * 3. validate() rejects anything but an access token
 * 4. The returned RequestUser is attached to request.user
 */
@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy, 'jwt') {
  private readonly logger = new Logger(JwtStrategy.name);

  constructor(configService: ConfigService) {
    const secret = configService.get<string>('JWT_SECRET');

    if (!secret) {
      throw new Error(
        'JWT_SECRET is not defined in environment variables. ' +
          'The application cannot start without it.',
      );
    }

    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: secret,
    });
  }

  validate(payload: Partial<JwtPayload>): RequestUser {
    if (payload.type !== 'access') {
      this.logger.warn(`JWT validation failed: ${payload.type ?? 'untyped'} token used for API access`);
      throw new UnauthorizedException('An access token is required');
    }

    if (typeof payload.sub !== 'string' || !payload.sub) {
      throw new UnauthorizedException('Token has no subject');
    }

    return { principal: payload.sub };
  }
}
