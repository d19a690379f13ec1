/**
 * Shared test utilities for statelock
 */

import { mkdtempSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { StructuredLogger } from './monitoring/structured-logger.js';
import type { ShutdownSignals } from './lib/shutdown.js';

export const T0 = new Date('2026-01-01T00:00:00.000Z');

/**
 * Manually advanced clock shared by a store and a strategy
 */
export interface TestClock {
  now: () => Date;
  advance: (ms: number) => void;
}

export function createTestClock(start: Date = T0): TestClock {
  let current = start.getTime();
  return {
    now: () => new Date(current),
    advance: (ms) => {
      current += ms;
    },
  };
}

/**
 * Logger that prints nothing
 */
export function silentLogger(): StructuredLogger {
  return new StructuredLogger({ enableConsole: false });
}

/**
 * Shutdown signal source the test can fire by hand
 */
export function createFakeShutdownSignals(): ShutdownSignals & {
  fire: (signal: NodeJS.Signals) => void;
  subscribed: () => boolean;
} {
  let listener: ((signal: NodeJS.Signals) => void) | null = null;
  return {
    subscribe(next) {
      listener = next;
      return () => {
        listener = null;
      };
    },
    fire(signal) {
      listener?.(signal);
    },
    subscribed: () => listener !== null,
  };
}

/**
 * Create a temporary directory for testing
 */
export function createTempDir(): string {
  return mkdtempSync(join(tmpdir(), 'statelock-test-'));
}

export function cleanupTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/**
 * Build an error shaped like an AWS SDK service exception
 */
export function awsError(name: string, message: string, httpStatusCode?: number): Error {
  return Object.assign(new Error(message), {
    name,
    $metadata: httpStatusCode === undefined ? {} : { httpStatusCode },
  });
}
