import { DeleteObjectCommand, GetObjectCommand, PutObjectCommand, S3Client } from '@aws-sdk/client-s3';

import { StorageError } from '../runner/errors.ts';
import type { ServiceConfig } from '../runner/job_config.ts';
import type { ObjectStorage } from './types.ts';

const DEFAULT_REGION = 'us-east-1';

export function normalizeEndpoint(endpoint: string): string {
  const trimmed = endpoint.trim();
  return /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
}

/** `path/to` and `/path/to/` both become `path/to/`; empty stays empty. */
export function normalizeKeyPrefix(prefix: string | undefined): string {
  const trimmed = (prefix ?? '').trim().replace(/^\/+/, '').replace(/\/+$/, '');
  return trimmed ? `${trimmed}/` : '';
}

// OSS, COS and MinIO are all reached through their S3-compatible endpoints.
export function createS3Client(service: ServiceConfig): S3Client {
  return new S3Client({
    region: service.region ?? DEFAULT_REGION,
    endpoint: normalizeEndpoint(service.endpoint),
    forcePathStyle: !service.virtualHostedStyle,
    credentials: {
      accessKeyId: service.accessKey,
      secretAccessKey: service.secretKey,
    },
  });
}

export class S3ObjectStorage implements ObjectStorage {
  readonly kind: string;
  readonly bucket: string;
  readonly prefix: string;
  readonly #client: S3Client;

  constructor(params: { client: S3Client; bucket: string; prefix?: string; kind?: string }) {
    this.#client = params.client;
    this.bucket = params.bucket;
    this.prefix = normalizeKeyPrefix(params.prefix);
    this.kind = params.kind ?? 's3';
  }

  static fromService(service: ServiceConfig): S3ObjectStorage {
    return new S3ObjectStorage({
      client: createS3Client(service),
      bucket: service.bucket,
      prefix: service.prefix,
      kind: service.type,
    });
  }

  objectKey(key: string): string {
    return `${this.prefix}${key}`;
  }

  async read(key: string): Promise<number> {
    let body: Uint8Array;
    try {
      const res = await this.#client.send(new GetObjectCommand({ Bucket: this.bucket, Key: this.objectKey(key) }));
      if (!res.Body) throw new Error('response has no body');
      body = await res.Body.transformToByteArray();
    } catch (err) {
      throw new StorageError('read', key, 'GetObject failed', { cause: err });
    }
    return body.byteLength;
  }

  async write(key: string, payload: Uint8Array): Promise<number> {
    try {
      await this.#client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: this.objectKey(key),
          Body: payload,
          ContentLength: payload.byteLength,
          ContentType: 'application/octet-stream',
        }),
      );
    } catch (err) {
      throw new StorageError('write', key, 'PutObject failed', { cause: err });
    }
    return payload.byteLength;
  }

  async remove(key: string): Promise<void> {
    try {
      await this.#client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: this.objectKey(key) }));
    } catch (err) {
      throw new StorageError('remove', key, 'DeleteObject failed', { cause: err });
    }
  }

  async close(): Promise<void> {
    this.#client.destroy();
  }
}
