import { Injectable, Logger } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { ConfigService } from '@nestjs/config';
import { createHash, timingSafeEqual } from 'crypto';
import { TokenResponseDto } from './dto';
import {
  ApiKeysNotConfiguredException,
  InvalidApiKeyException,
  InvalidRefreshTokenException,
} from './exceptions';
import type { JwtPayload } from './interfaces';
import { loadApiKeys, readSeconds } from './api-keys';

export const DEFAULT_ACCESS_TTL_SECONDS = 30 * 60;
export const DEFAULT_REFRESH_TTL_SECONDS = 7 * 24 * 60 * 60;

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

/**
 * AuthService - exchanges API keys for JWTs.
 *
 * - issueToken(): API key → access + refresh token
 * - refresh():    refresh token → new access token
 *
 * Keys are compared through fixed-length digests with timingSafeEqual, and
 * every configured key is checked so the time taken does not depend on
 * which one matched.
 */
@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);
  private readonly apiKeys: Array<{ digest: Buffer; principal: string }>;
  private readonly accessTtl: number;
  private readonly refreshTtl: number;

  constructor(
    private readonly jwtService: JwtService,
    configService: ConfigService,
  ) {
    this.apiKeys = [...loadApiKeys(configService)].map(([key, principal]) => ({
      digest: digest(key),
      principal,
    }));
    this.accessTtl = readSeconds(configService, 'JWT_EXPIRATION', DEFAULT_ACCESS_TTL_SECONDS);
    this.refreshTtl = readSeconds(
      configService,
      'JWT_REFRESH_EXPIRATION',
      DEFAULT_REFRESH_TTL_SECONDS,
    );

    if (this.apiKeys.length === 0) {
      this.logger.warn('No API keys configured (API_KEYS / API_SECRET_KEY); token requests will fail');
    }
  }

  /**
   * @throws ApiKeysNotConfiguredException if the server has no keys at all
   * @throws InvalidApiKeyException if the key matches no principal
   */
  async issueToken(apiKey: string): Promise<TokenResponseDto> {
    if (this.apiKeys.length === 0) {
      throw new ApiKeysNotConfiguredException();
    }

    const principal = this.resolvePrincipal(apiKey.trim());
    if (!principal) {
      this.logger.warn('Token request rejected: unknown API key');
      throw new InvalidApiKeyException();
    }

    const accessToken = await this.sign({ sub: principal, type: 'access' }, this.accessTtl);
    const refreshToken = await this.sign({ sub: principal, type: 'refresh' }, this.refreshTtl);

    this.logger.log(`Issued tokens for principal "${principal}"`);
    return new TokenResponseDto(accessToken, this.accessTtl, refreshToken);
  }

  /** @throws InvalidRefreshTokenException for expired, forged or access tokens */
  async refresh(refreshToken: string): Promise<TokenResponseDto> {
    let payload: Partial<JwtPayload>;
    try {
      payload = await this.jwtService.verifyAsync<Partial<JwtPayload>>(refreshToken);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.debug(`Refresh rejected: ${message}`);
      throw new InvalidRefreshTokenException();
    }

    if (payload.type !== 'refresh' || typeof payload.sub !== 'string' || !payload.sub) {
      throw new InvalidRefreshTokenException();
    }

    const accessToken = await this.sign({ sub: payload.sub, type: 'access' }, this.accessTtl);
    return new TokenResponseDto(accessToken, this.accessTtl);
  }

  // ── Private Helpers ───────────────────────────────────────

  private resolvePrincipal(apiKey: string): string | null {
    const candidate = digest(apiKey);
    let principal: string | null = null;

    for (const entry of this.apiKeys) {
      if (timingSafeEqual(candidate, entry.digest) && principal === null) {
        principal = entry.principal;
      }
    }
    return principal;
  }

  private sign(payload: JwtPayload, expiresIn: number): Promise<string> {
    return this.jwtService.signAsync({ ...payload }, { expiresIn });
  }
}
