/**
 * Shared types for statelock
 */

/**
 * Opaque name of the protected resource (usually derived from the state object's key)
 */
export type LockIdentity = string;

/**
 * Which backend strategy holds the lock records
 */
export type StrategyKind = 'object' | 'ledger';

/**
 * What to do with a lock record older than its TTL
 *
 * - report: surface it as a stale AlreadyLocked and leave recovery to an operator
 * - reclaim: delete it (guarded by its own fencing token) and try to take over
 */
export type StalePolicy = 'report' | 'reclaim';

/**
 * Client-side proof that this process created the current lock record
 */
export interface LockHandle {
  identity: LockIdentity;
  owner: string;
  acquiredAt: Date;
  /** Backend token that must be presented on release */
  fencingToken: string;
  /** Maximum age in milliseconds before other clients may treat the lock as stale */
  ttlMs: number | null;
  strategy: StrategyKind;
}

/**
 * Durable lock record as stored by the backend
 */
export interface LockRecord {
  identity: LockIdentity;
  owner: string;
  acquiredAt: Date;
  fencingToken: string;
  ttlMs: number | null;
}

/**
 * Lock status as reported to humans and scripts
 */
export type LockStatus =
  | { state: 'free' }
  | {
      state: 'held';
      owner: string;
      acquiredAt: Date;
      ageExceedsTtl: boolean;
    };

/**
 * Coordinator state machine, one per protected-operation invocation
 */
export type CoordinatorState = 'idle' | 'acquiring' | 'held' | 'releasing' | 'done' | 'failed';

/**
 * Retry budget and backoff shape (all durations in milliseconds)
 */
export interface BackoffPolicy {
  maxAttempts: number | null;
  maxElapsed: number | null;
  backoffBase: number;
  backoffFactor: number;
  backoffCapped: number;
}

/**
 * Clock used for lock timestamps and staleness checks
 */
export type Clock = () => Date;
