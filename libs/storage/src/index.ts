export { ObjectStore } from './object-store';
export { MinioObjectStore } from './stores/minio-object-store';
export { InMemoryObjectStore } from './stores/in-memory-object-store';
export { StorageService } from './storage.service';
export { StorageModule } from './storage.module';
export { StorageOperationError, StorageObjectNotFoundError } from './storage.errors';
export {
  UPLOADS_PREFIX,
  OUTPUTS_PREFIX,
  sanitizeBaseName,
  extensionOf,
  buildStoredFilename,
  artifactBase,
  pageImageName,
  textArtifactName,
  jsonArtifactName,
  isDerivedArtifact,
} from './stored-filename';
