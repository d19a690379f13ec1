import { hostname } from 'os';
import { randomBytes } from 'crypto';

/**
 * Build a lock owner id unique to this running process
 *
 * Two processes on one host, or a restarted process reusing a pid, get
 * different ids.
 *
 * @param hint - Human-readable prefix, defaults to the hostname
 * @returns Owner id in the form `<hint>/<pid>/<nonce>`
 */
export function createOwnerId(hint?: string): string {
  const prefix = hint && hint.trim() ? hint.trim() : hostname();
  const nonce = randomBytes(4).toString('hex');
  return `${prefix}/${process.pid}/${nonce}`;
}
