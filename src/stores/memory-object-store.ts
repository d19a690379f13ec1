/**
 * In-process object store
 *
 * Each operation yields to the event loop once and then checks and mutates in a
 * single synchronous step, so concurrent callers interleave like remote clients
 * while conditional writes stay atomic. Tokens are `t1`, `t2`, ... in write order.
 */

import { setImmediate as yieldToEventLoop } from 'timers/promises';
import type { Clock } from '../types.js';
import {
  ObjectNotFoundError,
  PreconditionFailedError,
  type ConditionalPutOptions,
  type ObjectStore,
  type StoredObject,
} from './object-store.js';

export class MemoryObjectStore implements ObjectStore {
  private objects = new Map<string, StoredObject>();
  private writes = 0;

  constructor(private readonly clock: Clock = () => new Date()) {}

  async conditionalPut(key: string, body: string, options: ConditionalPutOptions): Promise<string> {
    await yieldToEventLoop();

    if (options.failIfExists && this.objects.has(key)) {
      throw new PreconditionFailedError(key);
    }

    this.writes++;
    const token = `t${this.writes}`;
    this.objects.set(key, { body, token, createdAt: this.clock() });
    return token;
  }

  async conditionalDelete(key: string, token: string): Promise<void> {
    await yieldToEventLoop();

    const current = this.objects.get(key);
    if (!current) {
      throw new ObjectNotFoundError(key);
    }
    if (current.token !== token) {
      throw new PreconditionFailedError(key);
    }
    this.objects.delete(key);
  }

  async get(key: string): Promise<StoredObject | null> {
    await yieldToEventLoop();

    const current = this.objects.get(key);
    return current ? { ...current } : null;
  }

  async delete(key: string): Promise<void> {
    await yieldToEventLoop();

    if (!this.objects.delete(key)) {
      throw new ObjectNotFoundError(key);
    }
  }

  /**
   * Keys currently stored (for assertions and local inspection)
   */
  keys(): string[] {
    return [...this.objects.keys()];
  }
}
