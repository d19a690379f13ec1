import chalk from 'chalk';
import { LockNotFoundError } from '../../lib/errors.js';
import type { LockCoordinator } from '../../locks/coordinator.js';

/**
 * Force-remove a lock (operator recovery)
 *
 * Prints the holder first, so the operator sees whose lock was broken.
 *
 * @returns Exit code: 0 when removed, 1 when there was no lock
 */
export async function handleUnlockCommand(coordinator: LockCoordinator, identity: string): Promise<number> {
  const status = await coordinator.status(identity);
  if (status.state === 'held') {
    console.log(chalk.gray(`Breaking lock held by ${status.owner} since ${status.acquiredAt.toISOString()}`));
  }

  try {
    await coordinator.forceUnlock(identity);
  } catch (error) {
    if (error instanceof LockNotFoundError) {
      console.log(chalk.gray(`ℹ️  No lock to clear for ${identity}`));
      return 1;
    }
    throw error;
  }

  console.log(chalk.green(`✅ Cleared lock for ${identity}`));
  return 0;
}
