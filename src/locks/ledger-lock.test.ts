import { describe, it, beforeEach, mock } from 'node:test';
import assert from 'node:assert/strict';
import { LedgerLock } from './ledger-lock.js';
import { MemoryLedgerStore } from '../stores/memory-ledger-store.js';
import { RowNotFoundError, VersionMismatchError } from '../stores/ledger-store.js';
import {
  AlreadyLockedError,
  ConfigurationError,
  LockBackendError,
  LockLostError,
  LockNotFoundError,
  TransientLockError,
} from '../lib/errors.js';
import { awsError, createTestClock, silentLogger, T0, type TestClock } from '../test-utils.js';

const TEN_MINUTES = 10 * 60 * 1000;

describe('LedgerLock', () => {
  let clock: TestClock;
  let store: MemoryLedgerStore;
  let lock: LedgerLock;

  beforeEach(() => {
    clock = createTestClock();
    store = new MemoryLedgerStore();
    lock = new LedgerLock(store, { clock: clock.now, logger: silentLogger() });
  });

  it('hands the lock from one owner to the next', async () => {
    const first = await lock.acquire('envA', 'hostX', TEN_MINUTES);
    assert.strictEqual(first.fencingToken, 'v1');
    assert.strictEqual(first.strategy, 'ledger');

    clock.advance(1000);
    await assert.rejects(lock.acquire('envA', 'hostY', TEN_MINUTES), (error: unknown) => {
      assert.ok(error instanceof AlreadyLockedError);
      assert.strictEqual(error.holder.owner, 'hostX');
      assert.strictEqual(error.stale, false);
      return true;
    });

    await lock.release(first);
    const second = await lock.acquire('envA', 'hostY', TEN_MINUTES);
    assert.strictEqual(second.fencingToken, 'v2');
  });

  it('lets exactly one of many concurrent acquirers win', async () => {
    const results = await Promise.allSettled(
      Array.from({ length: 6 }, (_, i) => lock.acquire('envA', `host${i}`, null))
    );
    assert.strictEqual(results.filter((result) => result.status === 'fulfilled').length, 1);
    assert.strictEqual(
      results.filter((result) => result.status === 'rejected' && result.reason instanceof AlreadyLockedError).length,
      5
    );
  });

  it('reports LockLost after a force release', async () => {
    const handle = await lock.acquire('envA', 'hostX', TEN_MINUTES);
    await lock.forceRelease('envA');
    await assert.rejects(lock.release(handle), LockLostError);
  });

  it('does not delete the row of a newer owner on a stale release', async () => {
    const old = await lock.acquire('envA', 'hostX', null);
    await lock.forceRelease('envA');
    await lock.acquire('envA', 'hostY', null);

    await assert.rejects(lock.release(old), LockLostError);
    assert.strictEqual((await lock.inspect('envA'))?.owner, 'hostY');
  });

  it('returns exactly what acquire recorded from inspect', async () => {
    const handle = await lock.acquire('envA', 'hostX', TEN_MINUTES);
    assert.deepStrictEqual(await lock.inspect('envA'), {
      identity: 'envA',
      owner: 'hostX',
      acquiredAt: T0,
      fencingToken: handle.fencingToken,
      ttlMs: TEN_MINUTES,
    });
  });

  describe('staleness', () => {
    it('reports a stale row distinctly', async () => {
      await lock.acquire('envA', 'hostX', 60_000);
      clock.advance(90_000);

      await assert.rejects(lock.acquire('envA', 'hostY', 60_000), (error: unknown) => {
        assert.ok(error instanceof AlreadyLockedError);
        assert.strictEqual(error.stale, true);
        return true;
      });
    });

    it('reclaims a stale row under the reclaim policy', async () => {
      const reclaiming = new LedgerLock(store, { clock: clock.now, stalePolicy: 'reclaim', logger: silentLogger() });
      await reclaiming.acquire('envA', 'hostX', 60_000);
      clock.advance(90_000);

      const handle = await reclaiming.acquire('envA', 'hostY', 60_000);
      assert.strictEqual(handle.fencingToken, 'v2');
      assert.strictEqual((await reclaiming.inspect('envA'))?.owner, 'hostY');
    });

    it('reports a reclaim that lost to a concurrent change as transient', async () => {
      const reclaiming = new LedgerLock(store, { clock: clock.now, stalePolicy: 'reclaim', logger: silentLogger() });
      await reclaiming.acquire('envA', 'hostX', 60_000);
      clock.advance(90_000);

      const deleteIfVersion = mock.method(store, 'deleteIfVersion');
      deleteIfVersion.mock.mockImplementationOnce(async () => {
        throw new VersionMismatchError('envA', 'v1');
      });
      await assert.rejects(reclaiming.acquire('envA', 'hostY', 60_000), TransientLockError);

      deleteIfVersion.mock.mockImplementationOnce(async () => {
        throw new RowNotFoundError('envA');
      });
      await assert.rejects(reclaiming.acquire('envA', 'hostY', 60_000), TransientLockError);
    });

    it('names the winner when another client inserts right after the reclaim', async () => {
      const reclaiming = new LedgerLock(store, { clock: clock.now, stalePolicy: 'reclaim', logger: silentLogger() });
      await reclaiming.acquire('envA', 'hostX', 60_000);
      clock.advance(90_000);

      const deleteRow = store.deleteIfVersion.bind(store);
      mock.method(store, 'deleteIfVersion', async (rowKey: string, version: string) => {
        await deleteRow(rowKey, version);
        await store.insertIfAbsent(rowKey, { owner: 'hostZ', acquiredAt: clock.now().toISOString(), ttlMs: 60_000 });
      });

      await assert.rejects(reclaiming.acquire('envA', 'hostY', 60_000), (error: unknown) => {
        assert.ok(error instanceof AlreadyLockedError);
        assert.strictEqual(error.holder.owner, 'hostZ');
        assert.strictEqual(error.holder.fencingToken, 'v2');
        assert.strictEqual(error.stale, false);
        return true;
      });
    });

    it('never counts a row with an unreadable acquiredAt as stale', async () => {
      const reclaiming = new LedgerLock(store, { clock: clock.now, stalePolicy: 'reclaim', logger: silentLogger() });
      await store.insertIfAbsent('envA', { owner: 'hostX', acquiredAt: '', ttlMs: 1000 });
      clock.advance(90_000);

      const record = await reclaiming.inspect('envA');
      assert.deepStrictEqual(record?.acquiredAt, clock.now());

      await assert.rejects(reclaiming.acquire('envA', 'hostY', 1000), (error: unknown) => {
        assert.ok(error instanceof AlreadyLockedError);
        assert.strictEqual(error.stale, false);
        return true;
      });
      assert.strictEqual((await reclaiming.inspect('envA'))?.owner, 'hostX');
    });
  });

  it('treats a row that vanished before inspection as transient', async () => {
    await lock.acquire('envA', 'hostX', null);
    mock.method(store, 'get', async () => null);
    await assert.rejects(lock.acquire('envA', 'hostY', null), TransientLockError);
  });

  it('rejects a ttl that the row cannot record', async () => {
    await assert.rejects(lock.acquire('envA', 'hostX', 1500.5), ConfigurationError);
    await assert.rejects(lock.acquire('envA', 'hostX', -5), ConfigurationError);
    assert.deepStrictEqual(await lock.list(), []);
  });

  describe('forceRelease', () => {
    it('reports NotFound for a free lock', async () => {
      await assert.rejects(lock.forceRelease('envA'), LockNotFoundError);
    });

    it('re-reads when the row changes between read and delete', async () => {
      await lock.acquire('envA', 'hostX', null);
      const deleteIfVersion = mock.method(store, 'deleteIfVersion');
      deleteIfVersion.mock.mockImplementationOnce(async () => {
        throw new VersionMismatchError('envA', 'v1');
      });

      await lock.forceRelease('envA');

      assert.strictEqual(deleteIfVersion.mock.callCount(), 2);
      assert.strictEqual(await lock.inspect('envA'), null);
    });

    it('gives up with a transient error when the row keeps changing', async () => {
      await lock.acquire('envA', 'hostX', null);
      mock.method(store, 'deleteIfVersion', async () => {
        throw new VersionMismatchError('envA', 'v1');
      });

      await assert.rejects(lock.forceRelease('envA'), TransientLockError);
    });
  });

  describe('list', () => {
    it('lists every held lock, oldest first', async () => {
      await lock.acquire('envB', 'hostY', null);
      clock.advance(-5000);
      await lock.acquire('envA', 'hostX', 60_000);

      const records = await lock.list();
      assert.deepStrictEqual(
        records.map((record) => [record.identity, record.owner]),
        [
          ['envA', 'hostX'],
          ['envB', 'hostY'],
        ]
      );
    });

    it('is empty when nothing is locked', async () => {
      assert.deepStrictEqual(await lock.list(), []);
    });
  });

  it('classifies a non-retryable store failure as a backend error', async () => {
    mock.method(store, 'get', async () => {
      throw awsError('ResourceNotFoundException', 'Requested resource not found', 400);
    });
    await assert.rejects(lock.inspect('envA'), LockBackendError);
  });
});
