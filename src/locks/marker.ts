/**
 * Lock marker body codec
 *
 * The marker is plain JSON so operators can read it with any storage browser.
 */

import { z } from 'zod';
import type { LockIdentity } from '../types.js';

export const LockMarkerSchema = z.object({
  identity: z.string(),
  owner: z.string().min(1),
  acquiredAt: z.string().datetime({ offset: true }),
  ttlMs: z.number().int().nonnegative().nullable().default(null),
});

export type LockMarker = z.infer<typeof LockMarkerSchema>;

export interface DecodedMarker {
  owner: string;
  acquiredAt: Date;
  ttlMs: number | null;
}

export function encodeMarker(
  identity: LockIdentity,
  owner: string,
  acquiredAt: Date,
  ttlMs: number | null
): string {
  const marker: LockMarker = {
    identity,
    owner,
    acquiredAt: acquiredAt.toISOString(),
    ttlMs,
  };
  return JSON.stringify(marker);
}

/**
 * Decode a marker body; an unreadable body still denotes a held lock
 *
 * @param body - Raw marker content
 * @param createdAt - Backend creation time, used when the body cannot be parsed
 */
export function decodeMarker(body: string, createdAt: Date): DecodedMarker {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    return { owner: 'unknown', acquiredAt: createdAt, ttlMs: null };
  }

  const parsed = LockMarkerSchema.safeParse(json);
  if (!parsed.success) {
    return { owner: 'unknown', acquiredAt: createdAt, ttlMs: null };
  }

  return {
    owner: parsed.data.owner,
    acquiredAt: new Date(parsed.data.acquiredAt),
    ttlMs: parsed.data.ttlMs,
  };
}
