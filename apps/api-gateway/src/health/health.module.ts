import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TerminusModule } from '@nestjs/terminus';
import { InvoicesModule } from '../invoices/invoices.module';
import { HealthController } from './health.controller';
import { ExtractionHealthIndicator } from './extraction.health';

/** RedisHealthIndicator comes from the global TaskStoreModule. */
@Module({
  imports: [TerminusModule, ConfigModule, InvoicesModule],
  controllers: [HealthController],
  providers: [ExtractionHealthIndicator],
})
export class HealthModule {}
