import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TaskStoreModule } from '@invoice-ocr/tasks';
import { HealthModule } from './health/health.module';
import { AuthModule } from './auth/auth.module';
import { TasksModule } from './tasks/tasks.module';
import { InvoicesModule } from './invoices/invoices.module';

@Module({
  imports: [
    // ── Configuration ─────────────────────────────────────
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env', '../../.env'],
    }),

    // ── Task persistence (global) ─────────────────────────
    TaskStoreModule.forRoot(),

    // ── Feature Modules ───────────────────────────────────
    HealthModule,
    AuthModule,
    TasksModule,
    InvoicesModule,
  ],
})
export class AppModule {}
