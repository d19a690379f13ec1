/**
 * Ledger lock strategy
 *
 * One row per locked identity, inserted only if absent. The row's version column
 * is the fencing token. Unlike marker objects, ledger rows can be listed, which
 * makes current lock state browsable.
 */

import {
  AlreadyLockedError,
  LockLostError,
  LockNotFoundError,
  TransientLockError,
} from '../lib/errors.js';
import { getLogger, type StructuredLogger } from '../monitoring/structured-logger.js';
import {
  RowExistsError,
  RowNotFoundError,
  VersionMismatchError,
  type LedgerRow,
  type LedgerStore,
} from '../stores/ledger-store.js';
import type { Clock, LockHandle, LockIdentity, LockRecord, StalePolicy } from '../types.js';
import {
  assertIdentity,
  assertTtl,
  classifyBackendError,
  isStale,
  type LockStrategy,
  type StrategyOptions,
} from './strategy.js';

/**
 * How often forceRelease re-reads a row that keeps changing underneath it
 */
const FORCE_RELEASE_ATTEMPTS = 3;

/**
 * @param readAt - Stands in for an unreadable `acquiredAt`, so such a row never looks stale
 */
function toRecord(row: LedgerRow, readAt: Date): LockRecord {
  const acquiredAt = new Date(row.fields.acquiredAt);
  return {
    identity: row.rowKey,
    owner: row.fields.owner,
    acquiredAt: Number.isNaN(acquiredAt.getTime()) ? readAt : acquiredAt,
    fencingToken: row.version,
    ttlMs: row.fields.ttlMs,
  };
}

export class LedgerLock implements LockStrategy {
  readonly kind = 'ledger' as const;

  private readonly stalePolicy: StalePolicy;
  private readonly clock: Clock;
  private readonly logger: StructuredLogger;

  constructor(private readonly store: LedgerStore, options: StrategyOptions = {}) {
    this.stalePolicy = options.stalePolicy ?? 'report';
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? getLogger();
  }

  async acquire(identity: LockIdentity, owner: string, ttlMs: number | null): Promise<LockHandle> {
    assertIdentity(identity);
    assertTtl(ttlMs);

    const handle = await this.tryInsert(identity, owner, ttlMs);
    if (handle) {
      return handle;
    }

    const holder = await this.inspect(identity);
    if (!holder) {
      throw new TransientLockError(identity, `Ledger row "${identity}" disappeared while being inspected`);
    }

    const staleAfterMs = ttlMs ?? holder.ttlMs;
    if (!isStale(holder.acquiredAt, staleAfterMs, this.clock())) {
      throw new AlreadyLockedError(identity, holder, false);
    }

    if (this.stalePolicy === 'report') {
      this.logger.warn('Stale lock detected', {
        identity,
        owner: holder.owner,
        acquiredAt: holder.acquiredAt.toISOString(),
      });
      throw new AlreadyLockedError(identity, holder, true, staleAfterMs);
    }

    try {
      await this.store.deleteIfVersion(identity, holder.fencingToken);
    } catch (error) {
      if (error instanceof VersionMismatchError || error instanceof RowNotFoundError) {
        throw new TransientLockError(identity, `Stale ledger row "${identity}" changed while being reclaimed`, error);
      }
      throw classifyBackendError(identity, 'Reclaiming stale lock', error);
    }

    this.logger.info('Reclaimed stale lock', {
      identity,
      previousOwner: holder.owner,
      previousAcquiredAt: holder.acquiredAt.toISOString(),
    });

    const reclaimed = await this.tryInsert(identity, owner, ttlMs);
    if (reclaimed) {
      return reclaimed;
    }
    const winner = await this.inspect(identity);
    if (!winner) {
      throw new TransientLockError(identity, `Ledger row "${identity}" disappeared while being inspected`);
    }
    throw new AlreadyLockedError(identity, winner, false);
  }

  async release(handle: LockHandle): Promise<void> {
    try {
      await this.store.deleteIfVersion(handle.identity, handle.fencingToken);
    } catch (error) {
      if (error instanceof VersionMismatchError || error instanceof RowNotFoundError) {
        throw new LockLostError(handle, error);
      }
      throw classifyBackendError(handle.identity, 'Releasing lock', error);
    }
  }

  /**
   * Remove whatever row currently exists, whoever owns it
   */
  async forceRelease(identity: LockIdentity): Promise<void> {
    assertIdentity(identity);

    for (let attempt = 1; attempt <= FORCE_RELEASE_ATTEMPTS; attempt++) {
      const current = await this.inspect(identity);
      if (!current) {
        throw new LockNotFoundError(identity);
      }

      try {
        await this.store.deleteIfVersion(identity, current.fencingToken);
        this.logger.warn('Lock force-released', { identity, owner: current.owner });
        return;
      } catch (error) {
        if (error instanceof RowNotFoundError) {
          throw new LockNotFoundError(identity);
        }
        if (!(error instanceof VersionMismatchError)) {
          throw classifyBackendError(identity, 'Force-releasing lock', error);
        }
        // Replaced between read and delete; read again
      }
    }

    throw new TransientLockError(
      identity,
      `Ledger row "${identity}" kept changing; gave up after ${FORCE_RELEASE_ATTEMPTS} attempts`
    );
  }

  async inspect(identity: LockIdentity): Promise<LockRecord | null> {
    assertIdentity(identity);
    try {
      const row = await this.store.get(identity);
      return row ? toRecord(row, this.clock()) : null;
    } catch (error) {
      throw classifyBackendError(identity, 'Reading ledger row', error);
    }
  }

  /**
   * Every lock currently recorded in the ledger, oldest first
   */
  async list(): Promise<LockRecord[]> {
    let rows: LedgerRow[];
    try {
      rows = await this.store.list();
    } catch (error) {
      throw classifyBackendError('*', 'Listing ledger', error);
    }
    const readAt = this.clock();
    return rows
      .map((row) => toRecord(row, readAt))
      .sort((a, b) => a.acquiredAt.getTime() - b.acquiredAt.getTime());
  }

  private async tryInsert(
    identity: LockIdentity,
    owner: string,
    ttlMs: number | null
  ): Promise<LockHandle | null> {
    const acquiredAt = this.clock();
    try {
      const version = await this.store.insertIfAbsent(identity, {
        owner,
        acquiredAt: acquiredAt.toISOString(),
        ttlMs,
      });
      return { identity, owner, acquiredAt, fencingToken: version, ttlMs, strategy: this.kind };
    } catch (error) {
      if (error instanceof RowExistsError) {
        return null;
      }
      throw classifyBackendError(identity, 'Inserting ledger row', error);
    }
  }
}
