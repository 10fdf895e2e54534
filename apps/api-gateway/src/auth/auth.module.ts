import { Module } from '@nestjs/common';
import { JwtModule } from '@nestjs/jwt';
import { PassportModule } from '@nestjs/passport';
import { ConfigService } from '@nestjs/config';
import { AuthService, DEFAULT_ACCESS_TTL_SECONDS } from './auth.service';
import { AuthController } from './auth.controller';
import { JwtStrategy } from './strategies/jwt.strategy';
import { readSeconds } from './api-keys';

/**
 * AuthModule - encapsulates all authentication concerns.
 *
 * Provides:
 * - API-key exchange for JWT access/refresh tokens
 * - Passport JWT strategy for route protection
 *
 * Other feature modules only need JwtAuthGuard and CurrentUser from the
 * barrel index.ts; the strategy is registered globally through Passport.
 */
@Module({
  imports: [
    PassportModule.register({ defaultStrategy: 'jwt' }),

    JwtModule.registerAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const secret = configService.get<string>('JWT_SECRET');

        if (!secret) {
          throw new Error('JWT_SECRET is not defined. Check your .env file.');
        }

        return {
          secret,
          signOptions: {
            expiresIn: readSeconds(configService, 'JWT_EXPIRATION', DEFAULT_ACCESS_TTL_SECONDS),
          },
        };
      },
    }),
  ],
  controllers: [AuthController],
  providers: [AuthService, JwtStrategy],
  exports: [AuthService, JwtModule, PassportModule],
})
export class AuthModule {}
