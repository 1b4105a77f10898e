import { randomBytes } from 'node:crypto';

/**
 * URL-safe random id, optionally prefixed (`run_3kTq...`).
 */
export function generateId(prefix?: string, bytes = 12): string {
  const id = randomBytes(bytes).toString('base64url');
  return prefix ? `${prefix}_${id}` : id;
}
