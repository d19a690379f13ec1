/**
 * Build strategies and coordinators from validated configuration
 */

import type { S3Client } from '@aws-sdk/client-s3';
import type { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { ConfigurationError } from '../lib/errors.js';
import { LedgerLock } from '../locks/ledger-lock.js';
import { ObjectConditionalLock } from '../locks/object-lock.js';
import { LockCoordinator, type CoordinatorOptions } from '../locks/coordinator.js';
import type { LockStrategy } from '../locks/strategy.js';
import type { StructuredLogger } from '../monitoring/structured-logger.js';
import { DynamoLedgerStore } from '../stores/dynamo-ledger-store.js';
import { S3ObjectStore } from '../stores/s3-object-store.js';
import type { StateLockConfig } from './schema.js';

export interface BackendClients {
  s3?: S3Client;
  dynamodb?: DynamoDBClient;
  logger?: StructuredLogger;
}

export function createStrategy(config: StateLockConfig, clients: BackendClients = {}): LockStrategy {
  const strategyOptions = { stalePolicy: config.stalePolicy, logger: clients.logger };

  switch (config.strategy) {
    case 'object': {
      if (!config.object) {
        throw new ConfigurationError('strategy "object" needs object.bucket');
      }
      const store = new S3ObjectStore({
        bucket: config.object.bucket,
        region: config.object.region,
        client: clients.s3,
      });
      return new ObjectConditionalLock(store, { ...strategyOptions, prefix: config.object.prefix });
    }
    case 'ledger': {
      if (!config.ledger) {
        throw new ConfigurationError('strategy "ledger" needs ledger.table');
      }
      const store = new DynamoLedgerStore({
        table: config.ledger.table,
        region: config.ledger.region,
        client: clients.dynamodb,
      });
      return new LedgerLock(store, strategyOptions);
    }
  }
}

/**
 * Coordinator carrying the configured TTL and retry policy as defaults
 */
export function createCoordinator(
  config: StateLockConfig,
  strategy: LockStrategy,
  options: Omit<CoordinatorOptions, 'policy' | 'ttl'> = {}
): LockCoordinator {
  return new LockCoordinator(strategy, {
    ...options,
    ttl: config.ttl,
    policy: {
      maxAttempts: config.maxAttempts,
      maxElapsed: config.maxElapsed,
      backoffBase: config.backoffBase,
      backoffFactor: config.backoffFactor,
      backoffCapped: config.backoffCapped,
    },
  });
}
