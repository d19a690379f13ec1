/**
 * S3-backed object store
 *
 * Relies on S3 conditional writes: `If-None-Match: *` on PutObject for atomic
 * create, `If-Match: <etag>` on DeleteObject for fenced delete.
 */

import {
  S3Client,
  PutObjectCommand,
  DeleteObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
} from '@aws-sdk/client-s3';
import { hasAwsError } from '../lib/aws-errors.js';
import {
  ObjectNotFoundError,
  PreconditionFailedError,
  type ConditionalPutOptions,
  type ObjectStore,
  type StoredObject,
} from './object-store.js';

export interface S3ObjectStoreOptions {
  bucket: string;
  region?: string;
  /** Pre-configured client (credentials, endpoint); built from `region` when omitted */
  client?: S3Client;
}

function isPreconditionFailure(error: unknown): boolean {
  return hasAwsError(error, {
    names: ['PreconditionFailed', 'ConditionalRequestConflict'],
    statusCodes: [412, 409],
  });
}

function isMissingKey(error: unknown): boolean {
  // A missing bucket is also a 404, but it is a configuration problem, not a free lock
  if (hasAwsError(error, { names: ['NoSuchBucket'] })) {
    return false;
  }
  return hasAwsError(error, { names: ['NoSuchKey', 'NotFound'], statusCodes: [404] });
}

export class S3ObjectStore implements ObjectStore {
  private readonly client: S3Client;
  private readonly bucket: string;

  constructor(options: S3ObjectStoreOptions) {
    this.bucket = options.bucket;
    this.client = options.client ?? new S3Client({ region: options.region });
  }

  async conditionalPut(key: string, body: string, options: ConditionalPutOptions): Promise<string> {
    try {
      const output = await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: body,
          ContentType: 'application/json',
          CacheControl: 'no-cache, no-store, must-revalidate',
          IfNoneMatch: options.failIfExists ? '*' : undefined,
        })
      );
      if (!output.ETag) {
        throw new Error(`S3 returned no ETag for s3://${this.bucket}/${key}`);
      }
      return output.ETag;
    } catch (error) {
      if (isPreconditionFailure(error)) {
        throw new PreconditionFailedError(key);
      }
      throw error;
    }
  }

  async conditionalDelete(key: string, token: string): Promise<void> {
    try {
      await this.client.send(
        new DeleteObjectCommand({
          Bucket: this.bucket,
          Key: key,
          IfMatch: token,
        })
      );
    } catch (error) {
      if (isPreconditionFailure(error)) {
        throw new PreconditionFailedError(key);
      }
      if (isMissingKey(error)) {
        throw new ObjectNotFoundError(key);
      }
      throw error;
    }
  }

  async get(key: string): Promise<StoredObject | null> {
    try {
      const output = await this.client.send(
        new GetObjectCommand({
          Bucket: this.bucket,
          Key: key,
        })
      );
      const body = output.Body ? await output.Body.transformToString('utf-8') : '';
      return {
        body,
        token: output.ETag ?? '',
        createdAt: output.LastModified ?? new Date(0),
      };
    } catch (error) {
      if (isMissingKey(error)) {
        return null;
      }
      throw error;
    }
  }

  async delete(key: string): Promise<void> {
    try {
      // DeleteObject succeeds on missing keys, so check first to report NotFound
      await this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: key }));
      await this.client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: key }));
    } catch (error) {
      if (isMissingKey(error)) {
        throw new ObjectNotFoundError(key);
      }
      throw error;
    }
  }
}
