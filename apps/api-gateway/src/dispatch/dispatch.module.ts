import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { PipelineModule } from '@invoice-ocr/pipeline';
import { GrpcClientModule } from '../grpc/grpc-client.module';
import { TaskDispatcher } from './task-dispatcher';
import { InlineTaskDispatcher } from './inline-task-dispatcher';
import { DelegatedTaskDispatcher } from './delegated-task-dispatcher';

export type DispatchMode = 'inline' | 'delegated';

/** Reads DISPATCH_MODE; anything but "delegated" runs inline. */
export function resolveDispatchMode(configService: ConfigService): DispatchMode {
  return configService.get<string>('DISPATCH_MODE', 'inline') === 'delegated'
    ? 'delegated'
    : 'inline';
}

/**
 * DispatchModule - binds TaskDispatcher to the configured strategy.
 *
 * Requires TaskStore from the global TaskStoreModule.
 */
@Module({
  imports: [ConfigModule, PipelineModule, GrpcClientModule],
  providers: [
    InlineTaskDispatcher,
    DelegatedTaskDispatcher,
    {
      provide: TaskDispatcher,
      inject: [ConfigService, InlineTaskDispatcher, DelegatedTaskDispatcher],
      useFactory: (
        configService: ConfigService,
        inline: InlineTaskDispatcher,
        delegated: DelegatedTaskDispatcher,
      ): TaskDispatcher =>
        resolveDispatchMode(configService) === 'delegated' ? delegated : inline,
    },
  ],
  exports: [TaskDispatcher, InlineTaskDispatcher],
})
export class DispatchModule {}
