import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { DispatchModule } from '../dispatch/dispatch.module';
import { TasksModule } from '../tasks/tasks.module';
import { AzureOpenAiFieldExtractor } from './extraction/azure-openai-field-extractor';
import { InvoiceFieldExtractor } from './extraction/invoice-field-extractor';
import { InvoicesController } from './invoices.controller';
import { InvoicesService } from './invoices.service';

@Module({
  imports: [ConfigModule, TasksModule, DispatchModule],
  controllers: [InvoicesController],
  providers: [
    InvoicesService,
    { provide: InvoiceFieldExtractor, useClass: AzureOpenAiFieldExtractor },
  ],
  exports: [InvoiceFieldExtractor],
})
export class InvoicesModule {}
