/**
 * Lock coordinator
 *
 * Runs one protected operation under a lock:
 * idle → acquiring → held → releasing → done | failed.
 * Contention is retried with backoff; release is attempted on every exit path
 * once the lock is held, including cancellation and shutdown signals.
 *
 * @example
 * ```typescript
 * const coordinator = new LockCoordinator(new LedgerLock(new DynamoLedgerStore({ table: 'locks' })));
 * const outcome = await coordinator.run('prod/app.tfstate', undefined, { ttl: 600_000 }, async () => {
 *   return applyChanges();
 * });
 * if (outcome.warning) {
 *   console.warn(outcome.warning.message);
 * }
 * ```
 */

import { DEFAULT_BACKOFF_POLICY, nextBackoff, sleep as defaultSleep, type Sleep } from '../lib/backoff.js';
import {
  BudgetExhaustedError,
  ConfigurationError,
  LockCancelledError,
  LockError,
  formatError,
  isContention,
} from '../lib/errors.js';
import { createOwnerId } from '../lib/owner.js';
import { processShutdownSignals, type ShutdownSignals } from '../lib/shutdown.js';
import { getLogger, type StructuredLogger } from '../monitoring/structured-logger.js';
import type {
  BackoffPolicy,
  Clock,
  CoordinatorState,
  LockHandle,
  LockIdentity,
  LockStatus,
} from '../types.js';
import { assertTtl, classifyBackendError, isStale, type LockStrategy } from './strategy.js';

export interface CoordinatorOptions {
  /** Default retry budget and backoff; each run may override single fields */
  policy?: Partial<BackoffPolicy>;
  /** Default lock TTL in milliseconds (null: locks never go stale) */
  ttl?: number | null;
  logger?: StructuredLogger;
  clock?: Clock;
  sleep?: Sleep;
  random?: () => number;
  shutdownSignals?: ShutdownSignals;
}

export interface RunOptions extends Partial<BackoffPolicy> {
  ttl?: number | null;
  /** Abort waiting for the lock, or ask a running operation to stop */
  signal?: AbortSignal;
  onTransition?: (from: CoordinatorState, to: CoordinatorState) => void;
}

export interface OperationContext {
  handle: LockHandle;
  /** Aborted on caller cancellation or a shutdown signal while the lock is held */
  signal: AbortSignal;
}

export type ProtectedOperation<T> = (context: OperationContext) => Promise<T> | T;

export interface RunOutcome<T> {
  result: T;
  handle: LockHandle;
  /** Acquire attempts it took */
  attempts: number;
  /** `failed` when the release went wrong after the operation completed */
  state: 'done' | 'failed';
  /** Release failure, reported alongside the result instead of replacing it */
  warning?: LockError;
}

type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown };

/**
 * Merge per-run overrides into the coordinator policy and check the result
 */
export function resolvePolicy(base: BackoffPolicy, overrides: Partial<BackoffPolicy> = {}): BackoffPolicy {
  const policy: BackoffPolicy = {
    maxAttempts: overrides.maxAttempts !== undefined ? overrides.maxAttempts : base.maxAttempts,
    maxElapsed: overrides.maxElapsed !== undefined ? overrides.maxElapsed : base.maxElapsed,
    backoffBase: overrides.backoffBase ?? base.backoffBase,
    backoffFactor: overrides.backoffFactor ?? base.backoffFactor,
    backoffCapped: overrides.backoffCapped ?? base.backoffCapped,
  };

  const errors: string[] = [];
  if (policy.maxAttempts === null && policy.maxElapsed === null) {
    errors.push('Either maxAttempts or maxElapsed must be set');
  }
  if (policy.maxAttempts !== null && (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1)) {
    errors.push('maxAttempts must be a positive integer');
  }
  if (policy.maxElapsed !== null && policy.maxElapsed < 0) {
    errors.push('maxElapsed must not be negative');
  }
  if (policy.backoffBase < 0) {
    errors.push('backoffBase must not be negative');
  }
  if (policy.backoffFactor < 1) {
    errors.push('backoffFactor must be at least 1');
  }
  if (policy.backoffCapped < policy.backoffBase) {
    errors.push('backoffCapped must be at least backoffBase');
  }
  if (errors.length > 0) {
    throw new ConfigurationError(`Invalid retry policy: ${errors.join('; ')}`, undefined, errors);
  }

  return policy;
}

export class LockCoordinator {
  private readonly policy: BackoffPolicy;
  private readonly ttlMs: number | null;
  private readonly logger: StructuredLogger;
  private readonly clock: Clock;
  private readonly sleep: Sleep;
  private readonly random: () => number;
  private readonly shutdownSignals: ShutdownSignals;

  constructor(private readonly strategy: LockStrategy, options: CoordinatorOptions = {}) {
    this.policy = resolvePolicy(DEFAULT_BACKOFF_POLICY, options.policy);
    this.ttlMs = options.ttl ?? null;
    assertTtl(this.ttlMs);
    this.logger = options.logger ?? getLogger();
    this.clock = options.clock ?? (() => new Date());
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
    this.shutdownSignals = options.shutdownSignals ?? processShutdownSignals;
  }

  /**
   * Acquire the lock, run `operation` exactly once, release the lock
   *
   * @param identity - Resource to lock
   * @param ownerHint - Readable prefix for the owner id (defaults to the hostname)
   * @param options - Per-run TTL, retry budget, cancellation signal
   * @param operation - The protected read-modify-write
   * @returns The operation's result, plus a warning if the release failed
   *
   * @throws {BudgetExhaustedError} The lock stayed busy for the whole retry budget
   * @throws {LockCancelledError} Cancelled while waiting, or while holding (after release)
   * @throws Whatever `operation` throws, unmodified (after release)
   */
  async run<T>(
    identity: LockIdentity,
    ownerHint: string | undefined,
    options: RunOptions,
    operation: ProtectedOperation<T>
  ): Promise<RunOutcome<T>> {
    const policy = resolvePolicy(this.policy, options);
    const ttlMs = options.ttl !== undefined ? options.ttl : this.ttlMs;
    assertTtl(ttlMs);
    const owner = createOwnerId(ownerHint);
    const log = this.logger.child({ identity, owner });

    let state: CoordinatorState = 'idle';
    const transition = (to: CoordinatorState): void => {
      const from = state;
      state = to;
      log.debug(`Lock ${from} → ${to}`);
      options.onTransition?.(from, to);
    };

    transition('acquiring');
    let acquired: { handle: LockHandle; attempts: number };
    try {
      acquired = await this.acquireWithRetry(identity, owner, ttlMs, policy, options.signal, log);
    } catch (error) {
      transition('failed');
      throw error;
    }

    const { handle, attempts } = acquired;
    transition('held');
    log.info('Lock acquired', { attempts });

    const settled = await this.runHeld(handle, options.signal, operation, log);

    transition('releasing');
    const releaseError = await this.releaseReporting(handle, log);
    transition(releaseError ? 'failed' : 'done');

    if (settled.cancelled) {
      throw new LockCancelledError(identity, 'held', settled.outcome.ok ? undefined : settled.outcome.error);
    }
    if (!settled.outcome.ok) {
      throw settled.outcome.error;
    }

    return {
      result: settled.outcome.value,
      handle,
      attempts,
      state: releaseError ? 'failed' : 'done',
      warning: releaseError,
    };
  }

  /**
   * Operator recovery: remove the lock whoever holds it
   *
   * @throws {LockNotFoundError} If there is no lock
   */
  async forceUnlock(identity: LockIdentity): Promise<void> {
    await this.strategy.forceRelease(identity);
  }

  async status(identity: LockIdentity): Promise<LockStatus> {
    const record = await this.strategy.inspect(identity);
    if (!record) {
      return { state: 'free' };
    }
    return {
      state: 'held',
      owner: record.owner,
      acquiredAt: record.acquiredAt,
      ageExceedsTtl: isStale(record.acquiredAt, record.ttlMs ?? this.ttlMs, this.clock()),
    };
  }

  private async acquireWithRetry(
    identity: LockIdentity,
    owner: string,
    ttlMs: number | null,
    policy: BackoffPolicy,
    signal: AbortSignal | undefined,
    log: StructuredLogger
  ): Promise<{ handle: LockHandle; attempts: number }> {
    const startedAt = this.clock().getTime();

    for (let attempt = 1; ; attempt++) {
      if (signal?.aborted) {
        throw new LockCancelledError(identity, 'acquiring', signal.reason);
      }

      try {
        const handle = await this.strategy.acquire(identity, owner, ttlMs);
        return { handle, attempts: attempt };
      } catch (error) {
        if (!isContention(error)) {
          throw error;
        }

        const elapsedMs = this.clock().getTime() - startedAt;
        const decision = nextBackoff({ attempt, elapsedMs }, policy, this.random);
        if (decision.action === 'give-up') {
          log.warn('Giving up on lock', { attempts: attempt, elapsedMs, reason: decision.reason });
          throw new BudgetExhaustedError(identity, attempt, elapsedMs, error);
        }

        log.debug('Lock busy, backing off', {
          attempt,
          delayMs: decision.delayMs,
          cause: error.code,
        });

        try {
          await this.sleep(decision.delayMs, signal);
        } catch (sleepError) {
          if (signal?.aborted) {
            throw new LockCancelledError(identity, 'acquiring', sleepError);
          }
          throw sleepError;
        }
      }
    }
  }

  /**
   * Run the operation while held; caller abort and shutdown signals are forwarded
   * to it, but the lock is not released until it settles
   */
  private async runHeld<T>(
    handle: LockHandle,
    callerSignal: AbortSignal | undefined,
    operation: ProtectedOperation<T>,
    log: StructuredLogger
  ): Promise<{ outcome: Settled<T>; cancelled: boolean }> {
    const controller = new AbortController();
    const forwardAbort = (): void => controller.abort(callerSignal?.reason);
    if (callerSignal?.aborted) {
      forwardAbort();
    } else {
      callerSignal?.addEventListener('abort', forwardAbort, { once: true });
    }
    const unsubscribe = this.shutdownSignals.subscribe((signal) => {
      log.warn(`Received ${signal} while holding lock; releasing once the operation stops`);
      controller.abort(new Error(`Received ${signal}`));
    });

    let outcome: Settled<T>;
    try {
      outcome = { ok: true, value: await operation({ handle, signal: controller.signal }) };
    } catch (error) {
      outcome = { ok: false, error };
    } finally {
      unsubscribe();
      callerSignal?.removeEventListener('abort', forwardAbort);
    }

    return { outcome, cancelled: controller.signal.aborted };
  }

  /**
   * Release, converting failures into a returned warning
   */
  private async releaseReporting(handle: LockHandle, log: StructuredLogger): Promise<LockError | undefined> {
    try {
      await this.strategy.release(handle);
      log.info('Lock released');
      return undefined;
    } catch (error) {
      const lockError = classifyBackendError(handle.identity, 'Releasing lock', error);
      log.warn(`Lock release failed: ${formatError(lockError)}`, { code: lockError.code });
      return lockError;
    }
  }
}
