/**
 * Object-conditional lock strategy
 *
 * The lock is a marker object created with an atomic "create only if absent"
 * write. Its precondition token (ETag) is the fencing token: release deletes the
 * marker only if it is still the version this process created.
 *
 * @example
 * ```typescript
 * const lock = new ObjectConditionalLock(new S3ObjectStore({ bucket: 'infra-state' }));
 * const handle = await lock.acquire('prod/network.tfstate', createOwnerId(), 600_000);
 * try {
 *   // read, modify, write the state object
 * } finally {
 *   await lock.release(handle);
 * }
 * ```
 */

import {
  AlreadyLockedError,
  LockLostError,
  LockNotFoundError,
  TransientLockError,
} from '../lib/errors.js';
import { getLogger, type StructuredLogger } from '../monitoring/structured-logger.js';
import {
  ObjectNotFoundError,
  PreconditionFailedError,
  type ObjectStore,
} from '../stores/object-store.js';
import type { Clock, LockHandle, LockIdentity, LockRecord, StalePolicy } from '../types.js';
import { decodeMarker, encodeMarker } from './marker.js';
import {
  assertIdentity,
  assertTtl,
  classifyBackendError,
  isStale,
  type LockStrategy,
  type StrategyOptions,
} from './strategy.js';

export interface ObjectLockOptions extends StrategyOptions {
  /** Key prefix for marker objects (default: `locks/`) */
  prefix?: string;
}

export const DEFAULT_MARKER_PREFIX = 'locks/';

export class ObjectConditionalLock implements LockStrategy {
  readonly kind = 'object' as const;

  private readonly prefix: string;
  private readonly stalePolicy: StalePolicy;
  private readonly clock: Clock;
  private readonly logger: StructuredLogger;

  constructor(private readonly store: ObjectStore, options: ObjectLockOptions = {}) {
    this.prefix = options.prefix ?? DEFAULT_MARKER_PREFIX;
    this.stalePolicy = options.stalePolicy ?? 'report';
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? getLogger();
  }

  /**
   * Marker key for an identity. Identities are URI-encoded, so two different
   * identities can never map to the same key.
   */
  derive(identity: LockIdentity): string {
    return `${this.prefix}${encodeURIComponent(identity)}.lock`;
  }

  async acquire(identity: LockIdentity, owner: string, ttlMs: number | null): Promise<LockHandle> {
    assertIdentity(identity);
    assertTtl(ttlMs);
    const key = this.derive(identity);

    const handle = await this.tryCreate(identity, key, owner, ttlMs);
    if (handle) {
      return handle;
    }

    const holder = await this.readRecord(identity, key);
    if (!holder) {
      throw new TransientLockError(identity, `Lock marker ${key} disappeared while being inspected`);
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

    return this.reclaim(identity, key, holder, owner, ttlMs);
  }

  async release(handle: LockHandle): Promise<void> {
    const key = this.derive(handle.identity);
    try {
      await this.store.conditionalDelete(key, handle.fencingToken);
    } catch (error) {
      if (error instanceof PreconditionFailedError || error instanceof ObjectNotFoundError) {
        throw new LockLostError(handle, error);
      }
      throw classifyBackendError(handle.identity, 'Releasing lock', error);
    }
  }

  async forceRelease(identity: LockIdentity): Promise<void> {
    assertIdentity(identity);
    const key = this.derive(identity);
    try {
      await this.store.delete(key);
    } catch (error) {
      if (error instanceof ObjectNotFoundError) {
        throw new LockNotFoundError(identity);
      }
      throw classifyBackendError(identity, 'Force-releasing lock', error);
    }
    this.logger.warn('Lock force-released', { identity, key });
  }

  async inspect(identity: LockIdentity): Promise<LockRecord | null> {
    assertIdentity(identity);
    return this.readRecord(identity, this.derive(identity));
  }

  /**
   * Conditional create; null when a marker already exists
   */
  private async tryCreate(
    identity: LockIdentity,
    key: string,
    owner: string,
    ttlMs: number | null
  ): Promise<LockHandle | null> {
    const acquiredAt = this.clock();
    try {
      const token = await this.store.conditionalPut(
        key,
        encodeMarker(identity, owner, acquiredAt, ttlMs),
        { failIfExists: true }
      );
      return { identity, owner, acquiredAt, fencingToken: token, ttlMs, strategy: this.kind };
    } catch (error) {
      if (error instanceof PreconditionFailedError) {
        return null;
      }
      throw classifyBackendError(identity, 'Creating lock marker', error);
    }
  }

  private async readRecord(identity: LockIdentity, key: string): Promise<LockRecord | null> {
    try {
      const stored = await this.store.get(key);
      if (!stored) {
        return null;
      }
      const marker = decodeMarker(stored.body, stored.createdAt);
      return { identity, fencingToken: stored.token, ...marker };
    } catch (error) {
      throw classifyBackendError(identity, 'Reading lock marker', error);
    }
  }

  /**
   * Delete a stale marker (only the exact version we judged stale) and create ours
   */
  private async reclaim(
    identity: LockIdentity,
    key: string,
    stale: LockRecord,
    owner: string,
    ttlMs: number | null
  ): Promise<LockHandle> {
    try {
      await this.store.conditionalDelete(key, stale.fencingToken);
    } catch (error) {
      if (error instanceof PreconditionFailedError || error instanceof ObjectNotFoundError) {
        throw new TransientLockError(identity, `Stale lock on ${key} changed while being reclaimed`, error);
      }
      throw classifyBackendError(identity, 'Reclaiming stale lock', error);
    }

    this.logger.info('Reclaimed stale lock', {
      identity,
      previousOwner: stale.owner,
      previousAcquiredAt: stale.acquiredAt.toISOString(),
    });

    const handle = await this.tryCreate(identity, key, owner, ttlMs);
    if (handle) {
      return handle;
    }

    const winner = await this.readRecord(identity, key);
    if (!winner) {
      throw new TransientLockError(identity, `Lock marker ${key} disappeared while being inspected`);
    }
    throw new AlreadyLockedError(identity, winner, false);
  }
}
