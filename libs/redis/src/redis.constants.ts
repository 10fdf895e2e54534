/**
 * Injection token for the shared ioredis connection.
 *
 * String-based so consumers can @Inject() it without importing the ioredis
 * class as a provider key.
 */
export const REDIS_CLIENT = 'REDIS_CLIENT';
