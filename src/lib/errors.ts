/**
 * Error taxonomy for lock acquisition and release
 *
 * Strategies translate raw backend failures into these classes; nothing else
 * crosses the strategy boundary.
 */

import type { LockHandle, LockIdentity, LockRecord } from '../types.js';

export type LockErrorCode =
  | 'ALREADY_LOCKED'
  | 'TRANSIENT'
  | 'LOCK_LOST'
  | 'NOT_FOUND'
  | 'BUDGET_EXHAUSTED'
  | 'CANCELLED'
  | 'BACKEND';

/**
 * Base class for every lock failure
 */
export class LockError extends Error {
  constructor(
    message: string,
    public readonly code: LockErrorCode,
    public readonly identity: LockIdentity,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'LockError';
  }
}

/**
 * Another owner holds the lock. Retried by the coordinator.
 */
export class AlreadyLockedError extends LockError {
  constructor(
    identity: LockIdentity,
    public readonly holder: LockRecord,
    public readonly stale: boolean,
    staleAfterMs: number | null = null
  ) {
    super(
      describeHolder(identity, holder, stale ? staleAfterMs : null),
      'ALREADY_LOCKED',
      identity,
      { owner: holder.owner, acquiredAt: holder.acquiredAt.toISOString(), stale }
    );
    this.name = 'AlreadyLockedError';
  }
}

/**
 * Backend hiccup (throttling, timeout, race with a concurrent release). Retried.
 */
export class TransientLockError extends LockError {
  constructor(identity: LockIdentity, message: string, cause?: unknown) {
    super(message, 'TRANSIENT', identity, undefined, { cause });
    this.name = 'TransientLockError';
  }
}

/**
 * The fencing token no longer matches: someone else removed or replaced our record
 */
export class LockLostError extends LockError {
  constructor(public readonly handle: LockHandle, cause?: unknown) {
    super(
      `Lock on "${handle.identity}" held by ${handle.owner} was removed or taken over before release; ` +
        'changes made under it may have raced with another holder',
      'LOCK_LOST',
      handle.identity,
      { owner: handle.owner, fencingToken: handle.fencingToken },
      { cause }
    );
    this.name = 'LockLostError';
  }
}

export class LockNotFoundError extends LockError {
  constructor(identity: LockIdentity) {
    super(`No lock found for "${identity}"`, 'NOT_FOUND', identity);
    this.name = 'LockNotFoundError';
  }
}

/**
 * Retry budget (attempts or elapsed time) ran out before the lock was acquired
 */
export class BudgetExhaustedError extends LockError {
  constructor(
    identity: LockIdentity,
    public readonly attempts: number,
    public readonly elapsedMs: number,
    public readonly lastError: AlreadyLockedError | TransientLockError
  ) {
    const reason =
      lastError instanceof AlreadyLockedError
        ? lastError.message
        : `Resource "${identity}" could not be locked: ${lastError.message}`;
    super(
      `${reason} (gave up after ${attempts} attempt${attempts === 1 ? '' : 's'}, ${elapsedMs}ms)\n` +
        `If the holder is gone, an operator can run: statelock unlock ${identity}`,
      'BUDGET_EXHAUSTED',
      identity,
      { attempts, elapsedMs },
      { cause: lastError }
    );
    this.name = 'BudgetExhaustedError';
  }
}

export type CancellationPhase = 'acquiring' | 'held';

export class LockCancelledError extends LockError {
  constructor(identity: LockIdentity, public readonly phase: CancellationPhase, cause?: unknown) {
    super(
      phase === 'acquiring'
        ? `Cancelled while waiting for lock on "${identity}"`
        : `Cancelled while holding lock on "${identity}" (lock released)`,
      'CANCELLED',
      identity,
      { phase },
      { cause }
    );
    this.name = 'LockCancelledError';
  }
}

/**
 * Non-retryable backend failure (permissions, missing bucket or table, bad request)
 */
export class LockBackendError extends LockError {
  constructor(identity: LockIdentity, message: string, cause?: unknown) {
    super(message, 'BACKEND', identity, undefined, { cause });
    this.name = 'LockBackendError';
  }
}

/**
 * Invalid configuration or arguments
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly configPath?: string,
    public readonly validationErrors?: string[]
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Errors the coordinator answers with another attempt
 */
export function isContention(error: unknown): error is AlreadyLockedError | TransientLockError {
  return error instanceof AlreadyLockedError || error instanceof TransientLockError;
}

function describeHolder(identity: LockIdentity, holder: LockRecord, staleAfterMs: number | null): string {
  const base = `Resource "${identity}" is locked by ${holder.owner} since ${holder.acquiredAt.toISOString()}`;
  return staleAfterMs === null ? base : `${base} (stale: older than ${staleAfterMs}ms)`;
}

/**
 * Formats an error for logging
 */
export function formatError(error: unknown): string {
  if (error instanceof LockError) {
    return `[${error.code}] ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
