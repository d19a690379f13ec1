/**
 * Argument parsing for the statelock CLI
 */

import { ConfigurationError } from '../lib/errors.js';
import { parseDuration } from '../config/schema.js';

export type CliCommand = 'run' | 'status' | 'unlock' | 'list' | 'help';

export interface CliArgs {
  command: CliCommand;
  identity?: string;
  owner?: string;
  /** undefined: use configured TTL; null: no TTL */
  ttl?: number | null;
  maxAttempts?: number;
  /** Command to run under the lock (everything after `--`) */
  exec: string[];
  verbose: boolean;
}

const COMMANDS: readonly CliCommand[] = ['run', 'status', 'unlock', 'list', 'help'];

function flagValue(flags: string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  return flags.find((flag) => flag.startsWith(prefix))?.slice(prefix.length);
}

export function parseCliArgs(argv: string[]): CliArgs {
  const separator = argv.indexOf('--');
  const own = separator === -1 ? argv : argv.slice(0, separator);
  const exec = separator === -1 ? [] : argv.slice(separator + 1);

  const positional = own.filter((arg) => !arg.startsWith('--'));
  const flags = own.filter((arg) => arg.startsWith('--'));

  const name = positional[0] ?? 'help';
  const command = COMMANDS.find((candidate) => candidate === name);
  if (!command) {
    throw new ConfigurationError(`Unknown command "${name}". Run: statelock help`);
  }

  const args: CliArgs = {
    command,
    identity: positional[1],
    owner: flagValue(flags, 'owner'),
    exec,
    verbose: flags.includes('--verbose'),
  };

  const ttl = flagValue(flags, 'ttl');
  if (ttl !== undefined) {
    if (ttl === 'none') {
      args.ttl = null;
    } else {
      const parsed = parseDuration(ttl);
      if (parsed === null) {
        throw new ConfigurationError(`Invalid --ttl "${ttl}" (expected e.g. 30s, 10m, 2h or none)`);
      }
      args.ttl = parsed;
    }
  }

  const maxAttempts = flagValue(flags, 'max-attempts');
  if (maxAttempts !== undefined) {
    const parsed = Number(maxAttempts);
    if (!Number.isInteger(parsed) || parsed < 1) {
      throw new ConfigurationError(`Invalid --max-attempts "${maxAttempts}" (expected a positive integer)`);
    }
    args.maxAttempts = parsed;
  }

  if (['run', 'status', 'unlock'].includes(command) && !args.identity) {
    throw new ConfigurationError(`statelock ${command} needs a lock identity`);
  }

  return args;
}

export const USAGE = `Usage: statelock <command> [options]

Commands:
  run <identity> [--owner=<hint>] [--ttl=<duration>] [--max-attempts=<n>] -- <command...>
                       Run a command while holding the lock
  status <identity>    Show who holds the lock
  unlock <identity>    Remove the lock whoever holds it (operator recovery)
  list                 List all locks (ledger strategy only)
  help                 Show this message

Configuration is read from .statelock.json and STATELOCK_* environment variables.`;
