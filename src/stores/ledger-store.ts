/**
 * Ledger (table) store capability consumed by the ledger lock strategy
 */

/**
 * Lock fields stored on a ledger row
 */
export interface LedgerFields {
  owner: string;
  /** ISO 8601 */
  acquiredAt: string;
  ttlMs: number | null;
}

export interface LedgerRow {
  rowKey: string;
  fields: LedgerFields;
  /** Version/fencing column, regenerated on every insert */
  version: string;
}

export interface LedgerStore {
  /**
   * Insert a row only if no row exists for `rowKey`
   *
   * @returns Version of the inserted row
   * @throws {RowExistsError} If a row already exists
   */
  insertIfAbsent(rowKey: string, fields: LedgerFields): Promise<string>;

  /**
   * Delete the row only if its version equals `version`
   *
   * @throws {VersionMismatchError} If the row has another version
   * @throws {RowNotFoundError} If no row exists
   */
  deleteIfVersion(rowKey: string, version: string): Promise<void>;

  /** @returns The row, or null when absent */
  get(rowKey: string): Promise<LedgerRow | null>;

  /** Every row in the ledger */
  list(): Promise<LedgerRow[]>;
}

export class RowExistsError extends Error {
  constructor(public readonly rowKey: string) {
    super(`Row "${rowKey}" already exists`);
    this.name = 'RowExistsError';
  }
}

export class VersionMismatchError extends Error {
  constructor(public readonly rowKey: string, public readonly expected: string) {
    super(`Row "${rowKey}" does not have version ${expected}`);
    this.name = 'VersionMismatchError';
  }
}

export class RowNotFoundError extends Error {
  constructor(public readonly rowKey: string) {
    super(`Row "${rowKey}" not found`);
    this.name = 'RowNotFoundError';
  }
}
