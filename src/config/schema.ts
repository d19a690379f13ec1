/**
 * Configuration schema
 *
 * Durations are given in milliseconds or as strings such as "250ms", "30s",
 * "10m" or "2h". Limits that may be switched off accept "none".
 */

import { z } from 'zod';

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
};

/**
 * Parse "30s" style durations into milliseconds
 *
 * @returns Milliseconds, or null if the text is not a duration
 */
export function parseDuration(text: string): number | null {
  const match = /^(\d+(?:\.\d+)?)\s*(ms|s|m|h)$/.exec(text.trim());
  if (!match) {
    return null;
  }
  return Math.round(Number(match[1]) * UNIT_MS[match[2]]);
}

export const DurationSchema = z.union([z.number(), z.string()]).transform((value, ctx) => {
  const ms = typeof value === 'number' ? value : parseDuration(value);
  if (ms === null) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid duration "${value}" (expected e.g. 500ms, 30s, 10m, 2h)`,
    });
    return z.NEVER;
  }
  if (!Number.isInteger(ms) || ms < 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid duration ${ms} (expected a whole, non-negative number of milliseconds)`,
    });
    return z.NEVER;
  }
  return ms;
});

const OptionalDurationSchema = z.union([z.literal('none'), z.null(), DurationSchema]).transform((value) =>
  value === 'none' || value === null ? null : value
);

const OptionalCountSchema = z
  .union([z.literal('none'), z.null(), z.number().int().positive()])
  .transform((value) => (value === 'none' || value === null ? null : value));

export const StateLockConfigSchema = z
  .object({
    strategy: z.enum(['object', 'ledger']).default('object'),
    ttl: OptionalDurationSchema.default(null),
    maxAttempts: OptionalCountSchema.default(10),
    maxElapsed: OptionalDurationSchema.default(null),
    backoffBase: DurationSchema.default(1000),
    backoffFactor: z.number().min(1).default(2),
    backoffCapped: DurationSchema.default(30000),
    stalePolicy: z.enum(['report', 'reclaim']).default('report'),
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'fatal']).default('info'),
    logFormat: z.enum(['pretty', 'json']).default('pretty'),
    object: z
      .object({
        bucket: z.string().min(1),
        prefix: z.string().default('locks/'),
        region: z.string().optional(),
      })
      .optional(),
    ledger: z
      .object({
        table: z.string().min(1),
        region: z.string().optional(),
      })
      .optional(),
  })
  .superRefine((config, ctx) => {
    if (config.maxAttempts === null && config.maxElapsed === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['maxAttempts'],
        message: 'Either maxAttempts or maxElapsed must be set; waits must be bounded',
      });
    }
    if (config.backoffCapped < config.backoffBase) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['backoffCapped'],
        message: 'backoffCapped must be at least backoffBase',
      });
    }
    if (config.strategy === 'object' && !config.object) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['object'],
        message: 'strategy "object" needs object.bucket',
      });
    }
    if (config.strategy === 'ledger' && !config.ledger) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['ledger'],
        message: 'strategy "ledger" needs ledger.table',
      });
    }
  });

export type StateLockConfigInput = z.input<typeof StateLockConfigSchema>;
export type StateLockConfig = z.output<typeof StateLockConfigSchema>;
