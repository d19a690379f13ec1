/**
 * Configuration loading: `.statelock.json` in the project root, overlaid with
 * `STATELOCK_*` environment variables
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import type { ZodError } from 'zod';
import { ConfigurationError } from '../lib/errors.js';
import { StateLockConfigSchema, type StateLockConfig } from './schema.js';

export const CONFIG_FILE_NAME = '.statelock.json';

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Env values arrive as strings; plain integers become numbers so that
 * millisecond durations and counts validate
 */
function envValue(value: string): string | number {
  const trimmed = value.trim();
  return /^\d+(\.\d+)?$/.test(trimmed) ? Number(trimmed) : trimmed;
}

function readConfigFile(path: string): RawConfig {
  if (!existsSync(path)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      `Failed to parse ${path}: ${error instanceof Error ? error.message : String(error)}`,
      path
    );
  }

  if (!isRecord(parsed)) {
    throw new ConfigurationError(`${path} must contain a JSON object`, path);
  }
  return parsed;
}

/**
 * Apply STATELOCK_* variables on top of the file contents
 */
export function applyEnvOverrides(config: RawConfig, env: NodeJS.ProcessEnv): RawConfig {
  const merged: RawConfig = { ...config };

  const topLevel: Record<string, string> = {
    STATELOCK_STRATEGY: 'strategy',
    STATELOCK_TTL: 'ttl',
    STATELOCK_MAX_ATTEMPTS: 'maxAttempts',
    STATELOCK_MAX_ELAPSED: 'maxElapsed',
    STATELOCK_BACKOFF_BASE: 'backoffBase',
    STATELOCK_BACKOFF_FACTOR: 'backoffFactor',
    STATELOCK_BACKOFF_CAPPED: 'backoffCapped',
    STATELOCK_STALE_POLICY: 'stalePolicy',
    STATELOCK_LOG_LEVEL: 'logLevel',
    STATELOCK_LOG_FORMAT: 'logFormat',
  };
  for (const [variable, key] of Object.entries(topLevel)) {
    const value = env[variable];
    if (value !== undefined && value !== '') {
      merged[key] = envValue(value);
    }
  }

  const object = isRecord(merged.object) ? { ...merged.object } : {};
  if (env.STATELOCK_BUCKET) object.bucket = env.STATELOCK_BUCKET;
  if (env.STATELOCK_PREFIX) object.prefix = env.STATELOCK_PREFIX;
  if (env.STATELOCK_REGION && object.bucket !== undefined) object.region = env.STATELOCK_REGION;
  if (Object.keys(object).length > 0) merged.object = object;

  const ledger = isRecord(merged.ledger) ? { ...merged.ledger } : {};
  if (env.STATELOCK_TABLE) ledger.table = env.STATELOCK_TABLE;
  if (env.STATELOCK_REGION && ledger.table !== undefined) ledger.region = env.STATELOCK_REGION;
  if (Object.keys(ledger).length > 0) merged.ledger = ledger;

  return merged;
}

function describeIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validate a raw configuration object
 *
 * @throws {ConfigurationError} With one entry per problem in `validationErrors`
 */
export function parseConfig(raw: unknown, source?: string): StateLockConfig {
  const result = StateLockConfigSchema.safeParse(raw);
  if (!result.success) {
    const problems = describeIssues(result.error);
    throw new ConfigurationError(
      `Invalid statelock configuration${source ? ` in ${source}` : ''}:\n  - ${problems.join('\n  - ')}`,
      source,
      problems
    );
  }
  return result.data;
}

/**
 * Load and validate configuration for a project
 *
 * @param projectRoot - Directory containing `.statelock.json`
 * @param env - Environment to read overrides from
 */
export function loadConfig(projectRoot: string, env: NodeJS.ProcessEnv = process.env): StateLockConfig {
  const path = join(projectRoot, CONFIG_FILE_NAME);
  const fromFile = readConfigFile(path);
  return parseConfig(applyEnvOverrides(fromFile, env), path);
}
