import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { REDIS_CLIENT } from './redis.constants';
import { RedisConnectionService } from './redis-connection.service';
import { RedisHealthIndicator } from './redis.health';

/**
 * RedisModule - provides the shared ioredis connection.
 *
 * Usage:
 *   RedisModule.forRoot()                    - in the module that injects REDIS_CLIENT
 *   RedisModule.forRoot({ isGlobal: true })  - once, in an application's root module
 *
 * Consumers:
 *   - RedisTaskStore (api-gateway): task hashes, result blobs, owner index
 *   - JobRegistry (worker): delegated job records
 */
@Module({})
export class RedisModule {
  static forRoot(options: { isGlobal?: boolean } = {}): DynamicModule {
    const clientProvider = {
      provide: REDIS_CLIENT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): Redis => {
        return new Redis({
          host: configService.get<string>('REDIS_HOST', 'localhost'),
          port: Number(configService.get<string>('REDIS_PORT', '6379')),
          db: Number(configService.get<string>('REDIS_DB', '0')),
          // Retry strategy: exponential back-off capped at 10 s
          retryStrategy: (times: number) => Math.min(times * 100, 10_000),
          enableReadyCheck: true,
          maxRetriesPerRequest: 3,
          lazyConnect: true,
        });
      },
    };

    return {
      module: RedisModule,
      imports: [ConfigModule],
      providers: [clientProvider, RedisConnectionService, RedisHealthIndicator],
      exports: [REDIS_CLIENT, RedisConnectionService, RedisHealthIndicator],
      global: options.isGlobal ?? false,
    };
  }
}
