import { randomBytes } from 'node:crypto';

/**
 * Identifier of the form `<prefix>-<epoch ms>-<6 hex chars>`
 */
export function createId(prefix: string): string {
  return `${prefix}-${Date.now()}-${randomBytes(3).toString('hex')}`;
}
