import { randomBytes } from 'crypto';

/** 128 random bits, hex encoded (32 chars). */
export function generateTaskId(): string {
  return randomBytes(16).toString('hex');
}
