import chalk from 'chalk';
import type { LockCoordinator } from '../../locks/coordinator.js';

/**
 * Print the lock status for one identity
 *
 * @returns Exit code: 0 when free, 1 when held
 */
export async function handleStatusCommand(coordinator: LockCoordinator, identity: string): Promise<number> {
  const status = await coordinator.status(identity);

  if (status.state === 'free') {
    console.log(chalk.green(`✅ ${identity} is free`));
    return 0;
  }

  console.log(chalk.yellow(`🔒 ${identity} is locked`));
  console.log(`   Owner:    ${chalk.bold(status.owner)}`);
  console.log(`   Since:    ${status.acquiredAt.toISOString()}`);
  if (status.ageExceedsTtl) {
    console.log(chalk.red('   Stale:    older than its TTL; the holder may have crashed'));
    console.log(chalk.gray(`   If the holder is gone: statelock unlock ${identity}`));
  }
  return 1;
}
