#!/usr/bin/env node
/**
 * statelock CLI entry point
 * Serializes state mutations through a distributed lock (S3 markers or a DynamoDB ledger)
 */

import { installGlobalErrorHandler, extractActionableMessage } from './lib/safe-error-handler.js';
installGlobalErrorHandler({
  exitOnError: true,
  verbose: process.env.DEBUG === 'true' || process.argv.includes('--verbose'),
});

import { parseCliArgs, USAGE } from './cli/args.js';
import { handleRunCommand } from './cli/commands/run.js';
import { handleStatusCommand } from './cli/commands/status.js';
import { handleUnlockCommand } from './cli/commands/unlock.js';
import { handleListCommand } from './cli/commands/list.js';
import { loadConfig } from './config/loader.js';
import { createCoordinator, createStrategy } from './config/factory.js';
import { getLogger } from './monitoring/structured-logger.js';
import { VERSION } from './version.js';

async function cli(): Promise<number> {
  const args = parseCliArgs(process.argv.slice(2));

  if (args.command === 'help') {
    console.log(USAGE);
    return 0;
  }

  const config = loadConfig(process.cwd());
  const logger = getLogger({
    minLevel: args.verbose ? 'debug' : config.logLevel,
    format: config.logFormat,
    stream: args.command === 'run' ? 'stderr' : 'split',
    version: VERSION,
  });
  const strategy = createStrategy(config, { logger });
  const coordinator = createCoordinator(config, strategy, { logger });

  // parseCliArgs guarantees an identity for these commands
  const identity = args.identity ?? '';

  switch (args.command) {
    case 'run':
      return handleRunCommand(coordinator, identity, args.exec, {
        owner: args.owner,
        ttl: args.ttl,
        maxAttempts: args.maxAttempts,
      });
    case 'status':
      return handleStatusCommand(coordinator, identity);
    case 'unlock':
      return handleUnlockCommand(coordinator, identity);
    case 'list':
      return handleListCommand(strategy);
  }
}

cli().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(extractActionableMessage(error));
    process.exitCode = 1;
  }
);
