import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { RedisModule } from '@invoice-ocr/redis';
import { TaskStore } from './task-store';
import { InMemoryTaskStore } from './stores/in-memory-task-store';
import { RedisTaskStore } from './stores/redis-task-store';

export type TaskStoreDriver = 'redis' | 'memory';

/** Reads TASK_STORE_DRIVER; anything but "memory" selects Redis. */
export function resolveTaskStoreDriver(configService: ConfigService): TaskStoreDriver {
  return configService.get<string>('TASK_STORE_DRIVER', 'redis') === 'memory'
    ? 'memory'
    : 'redis';
}

/**
 * TaskStoreModule - binds the TaskStore token to one implementation.
 *
 * TASK_STORE_DRIVER:
 *   - redis  (default) - RedisTaskStore on the shared ioredis connection
 *   - memory           - InMemoryTaskStore, single process only
 *
 * Both classes are registered so either can be resolved directly, but only
 * the selected one is handed out as TaskStore. The Redis client connects
 * lazily and stays idle in memory mode.
 *
 * Global: import forRoot() once, in the application's root module.
 */
@Module({})
export class TaskStoreModule {
  static forRoot(): DynamicModule {
    return {
      module: TaskStoreModule,
      imports: [ConfigModule, RedisModule.forRoot()],
      providers: [
        InMemoryTaskStore,
        RedisTaskStore,
        {
          provide: TaskStore,
          inject: [ConfigService, InMemoryTaskStore, RedisTaskStore],
          useFactory: (
            configService: ConfigService,
            memoryStore: InMemoryTaskStore,
            redisStore: RedisTaskStore,
          ): TaskStore =>
            resolveTaskStoreDriver(configService) === 'memory'
              ? memoryStore
              : redisStore,
        },
      ],
      exports: [TaskStore, RedisModule],
      global: true,
    };
  }
}
