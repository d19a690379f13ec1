/**
 * statelock
 *
 * Distributed mutual exclusion for remotely stored state objects, backed by
 * conditional writes on S3 or a DynamoDB lock ledger
 */

export type {
  LockIdentity,
  LockHandle,
  LockRecord,
  LockStatus,
  CoordinatorState,
  BackoffPolicy,
  StalePolicy,
  StrategyKind,
  Clock,
} from './types.js';

export {
  LockError,
  AlreadyLockedError,
  TransientLockError,
  LockLostError,
  LockNotFoundError,
  BudgetExhaustedError,
  LockCancelledError,
  LockBackendError,
  ConfigurationError,
  isContention,
  formatError,
  type LockErrorCode,
  type CancellationPhase,
} from './lib/errors.js';

export { nextBackoff, DEFAULT_BACKOFF_POLICY, type BackoffDecision, type BackoffProgress } from './lib/backoff.js';
export { createOwnerId } from './lib/owner.js';
export { processShutdownSignals, type ShutdownSignals } from './lib/shutdown.js';

export type { LockStrategy, StrategyOptions } from './locks/strategy.js';
export { ObjectConditionalLock, type ObjectLockOptions } from './locks/object-lock.js';
export { LedgerLock } from './locks/ledger-lock.js';
export {
  LockCoordinator,
  resolvePolicy,
  type CoordinatorOptions,
  type RunOptions,
  type RunOutcome,
  type OperationContext,
  type ProtectedOperation,
} from './locks/coordinator.js';

export {
  PreconditionFailedError,
  ObjectNotFoundError,
  type ObjectStore,
  type StoredObject,
  type ConditionalPutOptions,
} from './stores/object-store.js';
export {
  RowExistsError,
  VersionMismatchError,
  RowNotFoundError,
  type LedgerStore,
  type LedgerRow,
  type LedgerFields,
} from './stores/ledger-store.js';
export { S3ObjectStore, type S3ObjectStoreOptions } from './stores/s3-object-store.js';
export { DynamoLedgerStore, type DynamoLedgerStoreOptions } from './stores/dynamo-ledger-store.js';
export { MemoryObjectStore } from './stores/memory-object-store.js';
export { MemoryLedgerStore } from './stores/memory-ledger-store.js';

export { loadConfig, parseConfig, CONFIG_FILE_NAME } from './config/loader.js';
export { StateLockConfigSchema, parseDuration, type StateLockConfig } from './config/schema.js';
export { createStrategy, createCoordinator, type BackendClients } from './config/factory.js';

export {
  StructuredLogger,
  getLogger,
  resetLogger,
  type LoggerConfig,
  type LogLevel,
  type LogFormat,
  type LogStream,
  type LogContext,
} from './monitoring/structured-logger.js';

export { VERSION } from './version.js';
