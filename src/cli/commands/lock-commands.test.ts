/**
 * Tests for the status, unlock, list and run commands
 */

import { describe, it, beforeEach, afterEach, mock } from 'node:test';
import assert from 'node:assert/strict';
import { handleStatusCommand } from './status.js';
import { handleUnlockCommand } from './unlock.js';
import { handleListCommand } from './list.js';
import { EXIT_CANCELLED, EXIT_LOCK_UNAVAILABLE, handleRunCommand } from './run.js';
import { existsSync } from 'fs';
import { join } from 'path';
import { LockCoordinator, type RunOptions } from '../../locks/coordinator.js';
import { LedgerLock } from '../../locks/ledger-lock.js';
import { ObjectConditionalLock } from '../../locks/object-lock.js';
import { MemoryLedgerStore } from '../../stores/memory-ledger-store.js';
import { MemoryObjectStore } from '../../stores/memory-object-store.js';
import { ConfigurationError } from '../../lib/errors.js';
import { sleep } from '../../lib/backoff.js';
import {
  cleanupTempDir,
  createFakeShutdownSignals,
  createTempDir,
  createTestClock,
  silentLogger,
  T0,
  type TestClock,
} from '../../test-utils.js';

const ANSI = /\u001b\[[0-9;]*m/g;

describe('lock commands', () => {
  let clock: TestClock;
  let lock: ObjectConditionalLock;
  let coordinator: LockCoordinator;
  let out: string[];
  let err: string[];

  beforeEach(() => {
    clock = createTestClock();
    lock = new ObjectConditionalLock(new MemoryObjectStore(clock.now), { clock: clock.now, logger: silentLogger() });
    coordinator = new LockCoordinator(lock, {
      clock: clock.now,
      logger: silentLogger(),
      shutdownSignals: createFakeShutdownSignals(),
    });
    out = [];
    err = [];
    mock.method(console, 'log', (...args: unknown[]) => {
      out.push(args.join(' ').replace(ANSI, ''));
    });
    mock.method(console, 'error', (...args: unknown[]) => {
      err.push(args.join(' ').replace(ANSI, ''));
    });
  });

  afterEach(() => {
    mock.restoreAll();
  });

  describe('status', () => {
    it('exits 0 for a free lock', async () => {
      assert.strictEqual(await handleStatusCommand(coordinator, 'envA'), 0);
      assert.deepStrictEqual(out, ['✅ envA is free']);
    });

    it('exits 1 and names the holder of a held lock', async () => {
      await lock.acquire('envA', 'hostX', 60_000);
      clock.advance(120_000);

      assert.strictEqual(await handleStatusCommand(coordinator, 'envA'), 1);
      assert.deepStrictEqual(out, [
        '🔒 envA is locked',
        '   Owner:    hostX',
        '   Since:    2026-01-01T00:00:00.000Z',
        '   Stale:    older than its TTL; the holder may have crashed',
        '   If the holder is gone: statelock unlock envA',
      ]);
    });
  });

  describe('unlock', () => {
    it('breaks a held lock and says whose it was', async () => {
      await lock.acquire('envA', 'hostX', null);

      assert.strictEqual(await handleUnlockCommand(coordinator, 'envA'), 0);
      assert.deepStrictEqual(out, [
        'Breaking lock held by hostX since 2026-01-01T00:00:00.000Z',
        '✅ Cleared lock for envA',
      ]);
      assert.strictEqual(await lock.inspect('envA'), null);
    });

    it('exits 1 when there is nothing to unlock', async () => {
      assert.strictEqual(await handleUnlockCommand(coordinator, 'envA'), 1);
      assert.deepStrictEqual(out, ['ℹ️  No lock to clear for envA']);
    });
  });

  describe('list', () => {
    it('needs the ledger strategy', async () => {
      await assert.rejects(handleListCommand(lock), ConfigurationError);
    });

    it('prints every lock and marks stale ones', async () => {
      const ledger = new LedgerLock(new MemoryLedgerStore(), { clock: clock.now, logger: silentLogger() });
      await ledger.acquire('envA', 'hostX', null);
      clock.advance(1000);
      await ledger.acquire('envB', 'hostY', 1000);

      assert.strictEqual(await handleListCommand(ledger, new Date(clock.now().getTime() + 4000)), 0);
      assert.deepStrictEqual(out, [
        '2 locks held:\n',
        '  envA  hostX  2026-01-01T00:00:00.000Z',
        '  envB  hostY  2026-01-01T00:00:01.000Z  (stale)',
      ]);
    });

    it('says so when the ledger is empty', async () => {
      const ledger = new LedgerLock(new MemoryLedgerStore(), { logger: silentLogger() });
      assert.strictEqual(await handleListCommand(ledger), 0);
      assert.deepStrictEqual(out, ['✅ No locks held']);
    });
  });

  describe('run', () => {
    it('exits 2 without a command to run', async () => {
      assert.strictEqual(await handleRunCommand(coordinator, 'envA', []), 2);
      assert.deepStrictEqual(err, [
        'Nothing to run. Pass the command after --, e.g. statelock run prod -- terraform apply',
      ]);
    });

    it('exits 75 without running anything when the lock stays busy', async () => {
      await lock.acquire('envA', 'hostX', null);

      const code = await handleRunCommand(coordinator, 'envA', ['terraform', 'apply'], { maxAttempts: 1 });

      assert.strictEqual(code, EXIT_LOCK_UNAVAILABLE);
      assert.strictEqual(err.length, 1);
      assert.strictEqual(err[0].split('\n')[0], '❌ Lock not acquired');
      assert.strictEqual((await lock.inspect('envA'))?.owner, 'hostX');
    });

    it('exits 130 without running anything when interrupted while waiting', async () => {
      await lock.acquire('envA', 'hostX', null);
      const signals = createFakeShutdownSignals();
      const waiting = new LockCoordinator(lock, {
        clock: clock.now,
        logger: silentLogger(),
        shutdownSignals: createFakeShutdownSignals(),
        sleep: (ms, signal) => {
          signals.fire('SIGINT');
          return sleep(ms, signal);
        },
      });
      const dir = createTempDir();
      const ran = join(dir, 'ran');

      try {
        const code = await handleRunCommand(waiting, 'envA', ['touch', ran], { shutdownSignals: signals });

        assert.strictEqual(code, EXIT_CANCELLED);
        assert.deepStrictEqual(err, ['⚠️  Cancelled while waiting for lock on "envA"']);
        assert.strictEqual(existsSync(ran), false);
        assert.strictEqual(signals.subscribed(), false);
        assert.strictEqual((await lock.inspect('envA'))?.owner, 'hostX');
      } finally {
        cleanupTempDir(dir);
      }
    });

    it('hands the coordinator a cancellation signal', async () => {
      const seen: RunOptions[] = [];
      mock.method(coordinator, 'run', async (_identity: string, _owner: string | undefined, runOptions: RunOptions) => {
        seen.push(runOptions);
        return {
          result: 0,
          handle: { identity: 'envA', owner: 'hostX', acquiredAt: T0, fencingToken: 't1', ttlMs: null, strategy: 'object' },
          attempts: 1,
          state: 'done',
        };
      });

      await handleRunCommand(coordinator, 'envA', ['terraform', 'apply'], { shutdownSignals: createFakeShutdownSignals() });

      const signal = seen[0]?.signal;
      assert.ok(signal instanceof AbortSignal);
      assert.strictEqual(signal.aborted, false);
    });

    it('keeps its own output off stdout', async () => {
      mock.method(coordinator, 'run', async () => ({
        result: 3,
        handle: { identity: 'envA', owner: 'hostX', acquiredAt: T0, fencingToken: 't1', ttlMs: null, strategy: 'object' },
        attempts: 1,
        state: 'done',
      }));

      const code = await handleRunCommand(coordinator, 'envA', ['terraform', 'output', '-json'], {
        shutdownSignals: createFakeShutdownSignals(),
      });

      assert.strictEqual(code, 3);
      assert.deepStrictEqual(out, []);
      assert.deepStrictEqual(err, ['Lock on envA released']);
    });
  });
});
