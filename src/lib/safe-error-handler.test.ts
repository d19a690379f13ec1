import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { extractActionableMessage, formatErrorSafely } from './safe-error-handler.js';
import {
  AlreadyLockedError,
  BudgetExhaustedError,
  ConfigurationError,
  LockBackendError,
  LockCancelledError,
  LockLostError,
  LockNotFoundError,
  TransientLockError,
} from './errors.js';
import { T0 } from '../test-utils.js';
import type { LockHandle } from '../types.js';

const ANSI = /\u001b\[[0-9;]*m/g;

function plain(text: string): string {
  return text.replace(ANSI, '');
}

const handle: LockHandle = {
  identity: 'envA',
  owner: 'hostX',
  acquiredAt: T0,
  fencingToken: 't1',
  ttlMs: null,
  strategy: 'object',
};

describe('extractActionableMessage', () => {
  it('points at the holder when the lock stayed busy', () => {
    const busy = new AlreadyLockedError('envA', handle, false);
    const message = plain(extractActionableMessage(new BudgetExhaustedError('envA', 3, 7000, busy)));

    assert.deepStrictEqual(message.split('\n'), [
      '❌ Lock not acquired',
      '',
      'Resource "envA" is locked by hostX since 2026-01-01T00:00:00.000Z (gave up after 3 attempts, 7000ms)',
      'If the holder is gone, an operator can run: statelock unlock envA',
      '',
      'Next steps:',
      '1. Check whether hostX is still running',
      '2. Inspect the lock: statelock status envA',
      '3. Only if the holder is gone: statelock unlock envA',
    ]);
  });

  it('points at connectivity when the backend kept failing', () => {
    const flaky = new TransientLockError('envA', 'Rate exceeded');
    const lines = plain(extractActionableMessage(new BudgetExhaustedError('envA', 1, 0, flaky))).split('\n');

    assert.strictEqual(lines[2], 'Resource "envA" could not be locked: Rate exceeded (gave up after 1 attempt, 0ms)');
    assert.strictEqual(lines[6], '1. Check backend connectivity and credentials');
  });

  it('warns that a lost lock may have raced', () => {
    assert.strictEqual(
      plain(extractActionableMessage(new LockLostError(handle))),
      '⚠️  Lock lost before release\n\n' +
        'Lock on "envA" held by hostX was removed or taken over before release; ' +
        'changes made under it may have raced with another holder\n\n' +
        'Verify the protected state before trusting this run.'
    );
  });

  it('shows cancellation and missing locks on one line', () => {
    assert.strictEqual(
      plain(extractActionableMessage(new LockCancelledError('envA', 'held'))),
      '⚠️  Cancelled while holding lock on "envA" (lock released)'
    );
    assert.strictEqual(plain(extractActionableMessage(new LockNotFoundError('envA'))), 'ℹ️  No lock found for "envA"');
  });

  it('labels configuration errors', () => {
    assert.strictEqual(
      plain(extractActionableMessage(new ConfigurationError('Lock identity must be a non-empty string'))),
      '❌ Configuration error\n\nLock identity must be a non-empty string'
    );
  });

  it('explains how to fix a permission failure', () => {
    const denied = new LockBackendError('envA', 'Creating lock marker failed for "envA": AccessDenied');
    const lines = plain(extractActionableMessage(denied)).split('\n');

    assert.strictEqual(lines[0], '❌ AWS Permission Denied');
    assert.strictEqual(lines[5], '1. Verify the AWS identity: aws sts get-caller-identity');
  });

  it('passes other backend failures through', () => {
    const missing = new LockBackendError('envA', 'Reading ledger row failed for "envA": Requested resource not found');
    assert.strictEqual(
      plain(extractActionableMessage(missing)),
      '❌ Lock backend error\n\nReading ledger row failed for "envA": Requested resource not found'
    );
  });
});

describe('formatErrorSafely', () => {
  it('prints errors without a stack on one line per part', () => {
    const error = new Error('socket hang up');
    error.stack = undefined;
    assert.strictEqual(formatErrorSafely(error, { colorize: false }), 'Error:\nsocket hang up');
  });

  it('truncates long messages', () => {
    const error = new Error('x'.repeat(20));
    error.stack = undefined;
    assert.strictEqual(formatErrorSafely(error, { colorize: false, maxLength: 5 }), 'Error:\nxxxxx... [truncated]');
  });

  it('formats values that are not errors', () => {
    assert.strictEqual(formatErrorSafely('boom'), 'boom');
  });
});
