import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { RedisModule } from '@invoice-ocr/redis';
import { HealthModule } from './health/health.module';
import { OcrJobsModule } from './ocr-jobs/ocr-jobs.module';

@Module({
  imports: [
    // ── Configuration ─────────────────────────────────────
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env', '../../.env'],
    }),

    // ── Job records (global) ──────────────────────────────
    RedisModule.forRoot({ isGlobal: true }),

    // ── Feature Modules ───────────────────────────────────
    HealthModule,
    OcrJobsModule,
  ],
})
export class AppModule {}
