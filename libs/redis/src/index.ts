/**
 * @invoice-ocr/redis
 *
 * Shared Redis connection for the invoice OCR platform.
 *
 * Exports:
 *   - RedisModule.forRoot()      - import into any NestJS module
 *   - RedisConnectionService     - ping + graceful shutdown
 *   - RedisHealthIndicator       - terminus check backed by ping()
 *   - REDIS_CLIENT               - ioredis injection token
 *   - assertCommitted            - checks every reply of a MULTI
 */
export { RedisModule } from './redis.module';
export { RedisConnectionService } from './redis-connection.service';
export { REDIS_CLIENT } from './redis.constants';
export { RedisHealthIndicator } from './redis.health';
export { assertCommitted, type ExecResult } from './redis-transaction';
