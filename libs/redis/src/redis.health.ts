import { Injectable } from '@nestjs/common';
import { HealthCheckError, HealthIndicator, type HealthIndicatorResult } from '@nestjs/terminus';
import { RedisConnectionService } from './redis-connection.service';

@Injectable()
export class RedisHealthIndicator extends HealthIndicator {
  constructor(private readonly connection: RedisConnectionService) {
    super();
  }

  async isHealthy(key: string): Promise<HealthIndicatorResult> {
    const reachable = await this.connection.ping();
    const result = this.getStatus(key, reachable);

    if (!reachable) {
      throw new HealthCheckError('Redis ping failed', result);
    }
    return result;
  }
}
