import { Injectable, Inject, Logger, OnModuleDestroy } from '@nestjs/common';
import Redis from 'ioredis';
import { REDIS_CLIENT } from './redis.constants';

/**
 * RedisConnectionService - owns the lifecycle of the shared ioredis client.
 *
 * The client is created with lazyConnect, so a process that never issues a
 * command (e.g. a gateway running the in-memory task store) never opens a
 * socket. Shutdown therefore distinguishes a connection that was used
 * (graceful QUIT) from one that never left the "wait" state.
 */
@Injectable()
export class RedisConnectionService implements OnModuleDestroy {
  private readonly logger = new Logger(RedisConnectionService.name);

  constructor(
    @Inject(REDIS_CLIENT)
    private readonly client: Redis,
  ) {}

  /** Round-trips a PING; resolves false instead of throwing. */
  async ping(): Promise<boolean> {
    try {
      return (await this.client.ping()) === 'PONG';
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Redis ping failed: ${message}`);
      return false;
    }
  }

  async onModuleDestroy(): Promise<void> {
    if (this.client.status === 'wait' || this.client.status === 'end') {
      this.client.disconnect();
      return;
    }

    this.logger.log('Closing Redis connection');
    await this.client.quit();
  }
}
