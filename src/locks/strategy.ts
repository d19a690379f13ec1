/**
 * Lock strategy contract shared by the object-store and ledger backends
 */

import { isRetryableError } from '../lib/aws-errors.js';
import {
  ConfigurationError,
  LockBackendError,
  LockError,
  TransientLockError,
  formatError,
} from '../lib/errors.js';
import type { StructuredLogger } from '../monitoring/structured-logger.js';
import type {
  Clock,
  LockHandle,
  LockIdentity,
  LockRecord,
  StalePolicy,
  StrategyKind,
} from '../types.js';

export interface LockStrategy {
  readonly kind: StrategyKind;

  /**
   * Atomically create the lock record
   *
   * @throws {AlreadyLockedError} Held by someone else (fresh, or stale under the `report` policy)
   * @throws {TransientLockError} Retryable backend failure or lost race
   * @throws {LockBackendError} Non-retryable backend failure
   */
  acquire(identity: LockIdentity, owner: string, ttlMs: number | null): Promise<LockHandle>;

  /**
   * Delete the record, guarded by the handle's fencing token
   *
   * @throws {LockLostError} The record was removed or replaced by someone else
   */
  release(handle: LockHandle): Promise<void>;

  /**
   * Delete the record regardless of owner (operator recovery)
   *
   * @throws {LockNotFoundError} No record exists
   */
  forceRelease(identity: LockIdentity): Promise<void>;

  /** Read-only lookup; null when the lock is free */
  inspect(identity: LockIdentity): Promise<LockRecord | null>;
}

export interface StrategyOptions {
  stalePolicy?: StalePolicy;
  clock?: Clock;
  logger?: StructuredLogger;
}

export function assertIdentity(identity: LockIdentity): void {
  if (identity.trim() === '') {
    throw new ConfigurationError('Lock identity must be a non-empty string');
  }
}

/**
 * TTLs are stored on the lock record as whole milliseconds
 */
export function assertTtl(ttlMs: number | null): void {
  if (ttlMs !== null && (!Number.isInteger(ttlMs) || ttlMs < 0)) {
    throw new ConfigurationError(`Lock TTL must be a whole, non-negative number of milliseconds (got ${ttlMs})`);
  }
}

/**
 * Whether a record is older than the TTL that applies to it
 */
export function isStale(acquiredAt: Date, ttlMs: number | null, now: Date): boolean {
  return ttlMs !== null && now.getTime() - acquiredAt.getTime() > ttlMs;
}

/**
 * Translate a raw backend failure into the lock error taxonomy
 *
 * @param identity - Lock the operation was for
 * @param action - Short description used as message prefix
 * @param error - Whatever the store threw
 */
export function classifyBackendError(identity: LockIdentity, action: string, error: unknown): LockError {
  if (error instanceof LockError) {
    return error;
  }
  const message = `${action} failed for "${identity}": ${formatError(error)}`;
  return isRetryableError(error)
    ? new TransientLockError(identity, message, error)
    : new LockBackendError(identity, message, error);
}
