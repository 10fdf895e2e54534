import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ObjectStore } from './object-store';
import { StorageService } from './storage.service';
import { InMemoryObjectStore } from './stores/in-memory-object-store';
import { MinioObjectStore } from './stores/minio-object-store';

/**
 * StorageModule - provides object storage access.
 *
 * STORAGE_DRIVER selects the backend: "minio" (default) or "memory".
 * ConfigModule is imported here to guarantee ConfigService is available
 * to the factory even if consumers don't import it themselves.
 */
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: ObjectStore,
      inject: [ConfigService],
      useFactory: async (configService: ConfigService): Promise<ObjectStore> => {
        const store =
          configService.get<string>('STORAGE_DRIVER', 'minio') === 'memory'
            ? new InMemoryObjectStore()
            : new MinioObjectStore(configService);
        await store.connect();
        return store;
      },
    },
    StorageService,
  ],
  exports: [StorageService, ObjectStore],
})
export class StorageModule {}
