/**
 * Object store capability consumed by the object-conditional lock strategy
 */

export interface StoredObject {
  body: string;
  /** Precondition token of this object version (an ETag on S3) */
  token: string;
  createdAt: Date;
}

export interface ConditionalPutOptions {
  /** Reject the write when an object already exists at the key */
  failIfExists: boolean;
}

export interface ObjectStore {
  /**
   * Write `body` at `key`; with `failIfExists` the write is an atomic create
   *
   * @returns Precondition token of the written version
   * @throws {PreconditionFailedError} If `failIfExists` and the key exists
   */
  conditionalPut(key: string, body: string, options: ConditionalPutOptions): Promise<string>;

  /**
   * Delete `key` only if its current token equals `token`
   *
   * @throws {PreconditionFailedError} If the object was replaced
   * @throws {ObjectNotFoundError} If nothing is stored at `key`
   */
  conditionalDelete(key: string, token: string): Promise<void>;

  /** @returns The object, or null when nothing is stored at `key` */
  get(key: string): Promise<StoredObject | null>;

  /**
   * @throws {ObjectNotFoundError} If nothing is stored at `key`
   */
  delete(key: string): Promise<void>;
}

export class PreconditionFailedError extends Error {
  constructor(public readonly key: string) {
    super(`Precondition failed for object "${key}"`);
    this.name = 'PreconditionFailedError';
  }
}

export class ObjectNotFoundError extends Error {
  constructor(public readonly key: string) {
    super(`Object "${key}" not found`);
    this.name = 'ObjectNotFoundError';
  }
}
