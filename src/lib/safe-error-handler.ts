/**
 * Safe error formatting for the CLI
 *
 * AWS SDK errors carry large metadata objects and sometimes circular
 * references; printing them raw can bury the message or throw while
 * formatting. Everything here truncates and never throws.
 *
 * @example
 * ```typescript
 * import { installGlobalErrorHandler, extractActionableMessage } from './safe-error-handler.js';
 *
 * installGlobalErrorHandler();
 *
 * try {
 *   await coordinator.run(identity, undefined, {}, operation);
 * } catch (error) {
 *   console.error(extractActionableMessage(error));
 * }
 * ```
 */

import util from 'util';
import chalk from 'chalk';
import {
  AlreadyLockedError,
  BudgetExhaustedError,
  ConfigurationError,
  LockBackendError,
  LockCancelledError,
  LockLostError,
  LockNotFoundError,
} from './errors.js';

/**
 * Maximum lengths to prevent RangeError on huge payloads
 */
const MAX_STRING_LENGTH = 50000;
const MAX_STACK_LINES = 50;
const MAX_DEPTH = 5;

/**
 * Safely format an error object for display
 *
 * @param error - The error to format
 * @param options - Formatting options
 * @returns Formatted error string (never throws)
 */
export function formatErrorSafely(
  error: unknown,
  options: {
    maxLength?: number;
    maxStackLines?: number;
    maxDepth?: number;
    colorize?: boolean;
  } = {}
): string {
  const maxLength = options.maxLength ?? MAX_STRING_LENGTH;
  const maxStackLines = options.maxStackLines ?? MAX_STACK_LINES;
  const maxDepth = options.maxDepth ?? MAX_DEPTH;
  const colorize = options.colorize ?? true;

  try {
    const parts: string[] = [];

    if (error instanceof Error) {
      const label = `${error.name}:`;
      parts.push(colorize ? chalk.red(label) : label);

      const message = error.message || 'No message';
      parts.push(message.length > maxLength ? message.substring(0, maxLength) + '... [truncated]' : message);

      if (error.stack) {
        const stackLines = error.stack.split('\n');
        const relevantLines = stackLines.slice(0, maxStackLines);
        if (stackLines.length > maxStackLines) {
          relevantLines.push(`... [${stackLines.length - maxStackLines} more lines]`);
        }
        parts.push('');
        parts.push(colorize ? chalk.dim('Stack trace:') : 'Stack trace:');
        parts.push(relevantLines.join('\n'));
      }

      // Extra own properties (AWS SDK $metadata, lock error details)
      const additional = Object.entries(error).filter(([key]) => !['name', 'message', 'stack'].includes(key));
      if (additional.length > 0) {
        parts.push('');
        parts.push(colorize ? chalk.dim('Additional properties:') : 'Additional properties:');
        for (const [key, value] of additional) {
          const inspected = util.inspect(value, {
            depth: maxDepth,
            maxStringLength: 200,
            breakLength: Infinity,
            compact: true,
          });
          parts.push(`  ${key}: ${inspected}`);
        }
      }
    } else if (error && typeof error === 'object') {
      parts.push(
        util.inspect(error, {
          depth: maxDepth,
          maxStringLength: maxLength,
          breakLength: Infinity,
          colors: colorize,
        })
      );
    } else {
      parts.push(String(error));
    }

    return parts.join('\n');
  } catch {
    return `[Error formatting failed: ${String(error)}]`;
  }
}

/**
 * Turn lock failures into a short explanation with the next step to take
 */
export function extractActionableMessage(error: unknown): string {
  if (error instanceof BudgetExhaustedError) {
    const holder = error.lastError instanceof AlreadyLockedError ? error.lastError.holder : undefined;
    return (
      chalk.red('❌ Lock not acquired\n\n') +
      error.message +
      '\n\n' +
      chalk.cyan('Next steps:\n') +
      (holder ? `1. Check whether ${holder.owner} is still running\n` : '1. Check backend connectivity and credentials\n') +
      `2. Inspect the lock: statelock status ${error.identity}\n` +
      `3. Only if the holder is gone: statelock unlock ${error.identity}`
    );
  }

  if (error instanceof LockLostError) {
    return (
      chalk.yellow('⚠️  Lock lost before release\n\n') +
      error.message +
      '\n\n' +
      chalk.cyan('Verify the protected state before trusting this run.')
    );
  }

  if (error instanceof LockCancelledError) {
    return chalk.yellow(`⚠️  ${error.message}`);
  }

  if (error instanceof LockNotFoundError) {
    return chalk.gray(`ℹ️  ${error.message}`);
  }

  if (error instanceof ConfigurationError) {
    return chalk.red('❌ Configuration error\n\n') + error.message;
  }

  if (error instanceof LockBackendError) {
    const combined = error.message.toLowerCase();
    if (combined.includes('accessdenied') || combined.includes('forbidden') || combined.includes('unauthorized')) {
      return (
        chalk.red('❌ AWS Permission Denied\n\n') +
        error.message +
        '\n\n' +
        chalk.cyan('Fix:\n') +
        '1. Verify the AWS identity: aws sts get-caller-identity\n' +
        '2. Grant read, write and delete on the lock bucket prefix or table'
      );
    }
    return chalk.red('❌ Lock backend error\n\n') + error.message;
  }

  return formatErrorSafely(error, { colorize: true });
}

/**
 * Install global handlers for unhandled rejections and uncaught exceptions
 *
 * Call once at the CLI entry point.
 */
export function installGlobalErrorHandler(options: { exitOnError?: boolean; verbose?: boolean } = {}): void {
  const exitOnError = options.exitOnError ?? true;
  const verbose = options.verbose ?? false;

  process.on('unhandledRejection', (reason) => {
    console.error('\n' + chalk.red('═'.repeat(80)));
    console.error(chalk.red.bold('🔴 UNHANDLED PROMISE REJECTION\n'));
    console.error(verbose ? formatErrorSafely(reason) : extractActionableMessage(reason));
    console.error(chalk.red('═'.repeat(80)) + '\n');

    if (exitOnError) {
      process.exit(1);
    }
  });

  process.on('uncaughtException', (error, origin) => {
    console.error('\n' + chalk.red('═'.repeat(80)));
    console.error(chalk.red.bold('🔴 UNCAUGHT EXCEPTION\n'));
    if (verbose) {
      console.error(chalk.dim('Origin:'), origin);
    }
    console.error(formatErrorSafely(error, { colorize: true }));
    console.error(chalk.red('═'.repeat(80)) + '\n');

    if (exitOnError) {
      process.exit(1);
    }
  });
}
