import chalk from 'chalk';
import { ConfigurationError } from '../../lib/errors.js';
import { LedgerLock } from '../../locks/ledger-lock.js';
import { isStale, type LockStrategy } from '../../locks/strategy.js';

/**
 * List every lock in the ledger
 *
 * Marker objects are not enumerated; only the ledger strategy supports this.
 */
export async function handleListCommand(
  strategy: LockStrategy,
  now: Date = new Date()
): Promise<number> {
  if (!(strategy instanceof LedgerLock)) {
    throw new ConfigurationError('statelock list needs the ledger strategy (strategy: "ledger")');
  }

  const records = await strategy.list();
  if (records.length === 0) {
    console.log(chalk.green('✅ No locks held'));
    return 0;
  }

  console.log(chalk.bold(`${records.length} lock${records.length === 1 ? '' : 's'} held:\n`));
  for (const record of records) {
    const stale = isStale(record.acquiredAt, record.ttlMs, now);
    const line = `  ${record.identity}  ${record.owner}  ${record.acquiredAt.toISOString()}`;
    console.log(stale ? chalk.red(`${line}  (stale)`) : line);
  }
  return 0;
}
