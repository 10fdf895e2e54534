import { Logger } from '@nestjs/common';
import type { ConfigService } from '@nestjs/config';

/** Principal assigned to the single API_SECRET_KEY */
export const PRIMARY_PRINCIPAL = 'primary';

const logger = new Logger('ApiKeys');

/**
 * Builds the key → principal table from
 *   API_KEYS        "alice:key-a,bob:key-b"
 *   API_SECRET_KEY  a single key owned by "primary"
 * Malformed API_KEYS entries are skipped with a warning.
 */
export function loadApiKeys(configService: ConfigService): Map<string, string> {
  const keys = new Map<string, string>();

  for (const entry of configService.get<string>('API_KEYS', '').split(',')) {
    const trimmed = entry.trim();
    if (!trimmed) continue;

    const separator = trimmed.indexOf(':');
    const principal = separator > 0 ? trimmed.slice(0, separator).trim() : '';
    const key = separator > 0 ? trimmed.slice(separator + 1).trim() : '';
    if (!principal || !key) {
      logger.warn('Ignoring malformed API_KEYS entry (expected "principal:key")');
      continue;
    }
    keys.set(key, principal);
  }

  const secretKey = configService.get<string>('API_SECRET_KEY', '').trim();
  if (secretKey) {
    keys.set(secretKey, PRIMARY_PRINCIPAL);
  }

  return keys;
}

/** Reads a duration in seconds; falls back when unset or not a positive number. */
export function readSeconds(configService: ConfigService, key: string, fallback: number): number {
  const value = Number(configService.get<string>(key, String(fallback)));
  return Number.isFinite(value) && value > 0 ? value : fallback;
}
