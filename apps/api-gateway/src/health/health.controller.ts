import { Controller, Get } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HealthCheck, HealthCheckService, type HealthIndicatorFunction } from '@nestjs/terminus';
import type { HealthCheckResult } from '@nestjs/terminus';
import { RedisHealthIndicator } from '@invoice-ocr/redis';
import { resolveTaskStoreDriver } from '@invoice-ocr/tasks';
import { ExtractionHealthIndicator } from './extraction.health';

@Controller('health')
export class HealthController {
  constructor(
    private readonly health: HealthCheckService,
    private readonly redis: RedisHealthIndicator,
    private readonly extraction: ExtractionHealthIndicator,
    private readonly configService: ConfigService,
  ) {}

  /** Redis is only pinged when it backs the task store. */
  @Get()
  @HealthCheck()
  check(): Promise<HealthCheckResult> {
    const checks: HealthIndicatorFunction[] = [];

    if (resolveTaskStoreDriver(this.configService) === 'redis') {
      checks.push(() => this.redis.isHealthy('redis'));
    }
    checks.push(async () => this.extraction.check('extraction'));

    return this.health.check(checks);
  }
}
