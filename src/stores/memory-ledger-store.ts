/**
 * In-process ledger store with atomic conditional rows (versions `v1`, `v2`, ...)
 */

import { setImmediate as yieldToEventLoop } from 'timers/promises';
import {
  RowExistsError,
  RowNotFoundError,
  VersionMismatchError,
  type LedgerFields,
  type LedgerRow,
  type LedgerStore,
} from './ledger-store.js';

export class MemoryLedgerStore implements LedgerStore {
  private rows = new Map<string, LedgerRow>();
  private inserts = 0;

  async insertIfAbsent(rowKey: string, fields: LedgerFields): Promise<string> {
    await yieldToEventLoop();

    if (this.rows.has(rowKey)) {
      throw new RowExistsError(rowKey);
    }

    this.inserts++;
    const version = `v${this.inserts}`;
    this.rows.set(rowKey, { rowKey, fields: { ...fields }, version });
    return version;
  }

  async deleteIfVersion(rowKey: string, version: string): Promise<void> {
    await yieldToEventLoop();

    const current = this.rows.get(rowKey);
    if (!current) {
      throw new RowNotFoundError(rowKey);
    }
    if (current.version !== version) {
      throw new VersionMismatchError(rowKey, version);
    }
    this.rows.delete(rowKey);
  }

  async get(rowKey: string): Promise<LedgerRow | null> {
    await yieldToEventLoop();

    const current = this.rows.get(rowKey);
    return current ? { ...current, fields: { ...current.fields } } : null;
  }

  async list(): Promise<LedgerRow[]> {
    await yieldToEventLoop();

    return [...this.rows.values()].map((row) => ({ ...row, fields: { ...row.fields } }));
  }
}
