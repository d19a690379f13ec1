import chalk from 'chalk';
import ora from 'ora';
import { execa } from 'execa';
import { BudgetExhaustedError, LockCancelledError } from '../../lib/errors.js';
import { extractActionableMessage } from '../../lib/safe-error-handler.js';
import { processShutdownSignals, type ShutdownSignals } from '../../lib/shutdown.js';
import type { LockCoordinator, RunOptions } from '../../locks/coordinator.js';

/**
 * Exit code when the lock could not be acquired (EX_TEMPFAIL)
 */
export const EXIT_LOCK_UNAVAILABLE = 75;
export const EXIT_CANCELLED = 130;

export interface RunCommandOptions {
  owner?: string;
  ttl?: number | null;
  maxAttempts?: number;
  /** Source of Ctrl+C and friends (default: the real process) */
  shutdownSignals?: ShutdownSignals;
}

/**
 * Run a shell command while holding the lock
 *
 * Everything statelock prints goes to stderr; stdout belongs to the command.
 * A shutdown signal while waiting gives up on the lock; while the command runs it
 * is forwarded to the command, and the lock is released once it exits.
 *
 * @returns The command's exit code, or 75 / 130 if it never ran or was cancelled
 */
export async function handleRunCommand(
  coordinator: LockCoordinator,
  identity: string,
  command: string[],
  options: RunCommandOptions = {}
): Promise<number> {
  const [file, ...args] = command;
  if (file === undefined) {
    console.error(chalk.red('Nothing to run. Pass the command after --, e.g. statelock run prod -- terraform apply'));
    return 2;
  }

  const spinner = ora(`Acquiring lock on ${identity}...`).start();
  const controller = new AbortController();
  const unsubscribe = (options.shutdownSignals ?? processShutdownSignals).subscribe((signal) => {
    controller.abort(new Error(`Received ${signal}`));
  });
  const runOptions: RunOptions = {
    ttl: options.ttl,
    maxAttempts: options.maxAttempts,
    signal: controller.signal,
    onTransition: (_from, to) => {
      if (to === 'held') {
        spinner.succeed(`Lock acquired on ${identity}`);
      }
    },
  };

  try {
    const outcome = await coordinator.run(identity, options.owner, runOptions, async ({ signal }) => {
      const result = await execa(file, args, { stdio: 'inherit', reject: false, cancelSignal: signal });
      return result.exitCode ?? 1;
    });

    if (outcome.warning) {
      console.error(extractActionableMessage(outcome.warning));
    } else {
      console.error(chalk.gray(`Lock on ${identity} released`));
    }
    return outcome.result;
  } catch (error) {
    if (spinner.isSpinning) {
      spinner.fail(`Could not acquire lock on ${identity}`);
    }
    console.error(extractActionableMessage(error));

    if (error instanceof BudgetExhaustedError) {
      return EXIT_LOCK_UNAVAILABLE;
    }
    if (error instanceof LockCancelledError) {
      return EXIT_CANCELLED;
    }
    return 1;
  } finally {
    unsubscribe();
  }
}
