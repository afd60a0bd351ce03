import { test } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, rm, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { DeleteObjectCommand, GetObjectCommand, PutObjectCommand } from '@aws-sdk/client-s3';
import type { S3Client } from '@aws-sdk/client-s3';

import { StorageError } from '../runner/errors.ts';
import { validateJobConfig } from '../runner/job_config.ts';
import { createObjectStorage, FsObjectStorage, MemoryObjectStorage, S3ObjectStorage } from '../storage/index.ts';
import { normalizeEndpoint, normalizeKeyPrefix } from '../storage/s3.ts';

async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), 'objbench-'));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

test('memory storage reports byte counts and rejects missing objects', async () => {
  const storage = new MemoryObjectStorage();
  assert.equal(await storage.write('a', new Uint8Array(10)), 10);
  assert.equal(await storage.read('a'), 10);

  await storage.remove('a');
  await assert.rejects(storage.read('a'), (err: unknown) => {
    assert.ok(err instanceof StorageError);
    assert.equal(err.message, 'read a: object not found');
    return true;
  });

  await storage.close();
  assert.equal(storage.closed, true);
  await assert.rejects(storage.write('b', new Uint8Array(1)), /storage is closed/);
});

test('fs storage writes files under its root', async () => {
  await withTempDir(async (dir) => {
    const storage = new FsObjectStorage(dir);
    assert.equal(await storage.write('nested/obj.bin', new Uint8Array(4096)), 4096);
    assert.equal((await stat(join(dir, 'nested', 'obj.bin'))).size, 4096);
    assert.equal(await storage.read('nested/obj.bin'), 4096);

    await storage.remove('nested/obj.bin');
    await assert.rejects(storage.read('nested/obj.bin'), (err: unknown) => {
      assert.ok(err instanceof StorageError);
      assert.equal(err.operation, 'read');
      return true;
    });
  });
});

test('fs storage rejects keys that escape the root', async () => {
  await withTempDir(async (dir) => {
    const storage = new FsObjectStorage(join(dir, 'root'));
    await assert.rejects(storage.write('../outside', new Uint8Array(1)), /escapes root/);
    await assert.rejects(storage.write('.', new Uint8Array(1)), /escapes root/);
    assert.equal(await storage.write('..dotted', new Uint8Array(3)), 3);
  });
});

test('fs storage accepts keys under the filesystem root', async () => {
  const storage = new FsObjectStorage('/');
  assert.equal(storage.rootDir, '/');
  await assert.rejects(storage.read('objbench-test-missing'), (err: unknown) => {
    assert.ok(err instanceof StorageError);
    assert.equal(err.message, 'read objbench-test-missing: read failed');
    return true;
  });
  await assert.rejects(storage.read('../etc'), /escapes root/);
});

test('normalizeEndpoint and normalizeKeyPrefix', () => {
  assert.equal(normalizeEndpoint('s3.us-east-1.amazonaws.com'), 'https://s3.us-east-1.amazonaws.com');
  assert.equal(normalizeEndpoint('http://127.0.0.1:9000'), 'http://127.0.0.1:9000');
  assert.equal(normalizeKeyPrefix(undefined), '');
  assert.equal(normalizeKeyPrefix('/'), '');
  assert.equal(normalizeKeyPrefix('path/to'), 'path/to/');
  assert.equal(normalizeKeyPrefix('/path/to/'), 'path/to/');
});

test('s3 storage sends prefixed put, get and delete commands', async () => {
  const inputs: Array<{ name: string; bucket?: string; key?: string }> = [];
  let destroyed = false;

  const client = {
    async send(command: unknown) {
      if (command instanceof PutObjectCommand) {
        inputs.push({ name: 'put', bucket: command.input.Bucket, key: command.input.Key });
        return {};
      }
      if (command instanceof GetObjectCommand) {
        inputs.push({ name: 'get', bucket: command.input.Bucket, key: command.input.Key });
        return { Body: { transformToByteArray: async () => new Uint8Array(4096) } };
      }
      if (command instanceof DeleteObjectCommand) {
        inputs.push({ name: 'delete', bucket: command.input.Bucket, key: command.input.Key });
        return {};
      }
      throw new Error('unexpected command');
    },
    destroy() {
      destroyed = true;
    },
  } as unknown as S3Client;

  const storage = new S3ObjectStorage({ client, bucket: 'bench-bucket', prefix: '/runs/' });
  assert.equal(await storage.write('obj', new Uint8Array(4096)), 4096);
  assert.equal(await storage.read('obj'), 4096);
  await storage.remove('obj');
  await storage.close();

  assert.deepEqual(inputs, [
    { name: 'put', bucket: 'bench-bucket', key: 'runs/obj' },
    { name: 'get', bucket: 'bench-bucket', key: 'runs/obj' },
    { name: 'delete', bucket: 'bench-bucket', key: 'runs/obj' },
  ]);
  assert.equal(destroyed, true);
});

test('s3 storage wraps client failures', async () => {
  const failure = new Error('AccessDenied');
  const client = {
    async send() {
      throw failure;
    },
  } as unknown as S3Client;

  const storage = new S3ObjectStorage({ client, bucket: 'b' });
  await assert.rejects(storage.read('obj'), (err: unknown) => {
    assert.ok(err instanceof StorageError);
    assert.equal(err.message, 'read obj: GetObject failed');
    assert.equal(err.cause, failure);
    return true;
  });
});

test('createObjectStorage picks the backend from the service type', async () => {
  const base = { job: { workload: 'upload', file_size: 4096, run_time: '1s' } };

  const memory = createObjectStorage(validateJobConfig({ ...base, service: { type: 'memory' } }).service);
  assert.ok(memory instanceof MemoryObjectStorage);

  const fs = createObjectStorage(validateJobConfig({ ...base, service: { type: 'fs', prefix: '/tmp/bench' } }).service);
  assert.ok(fs instanceof FsObjectStorage);
  assert.equal(fs.rootDir, '/tmp/bench');

  const minio = createObjectStorage(
    validateJobConfig({
      ...base,
      service: {
        type: 'minio',
        endpoint: 'http://127.0.0.1:9000',
        bucket: 'bench',
        prefix: 'tmp',
        access_key: 'test-access',
        secret_key: 'test-secret',
      },
    }).service,
  );
  assert.ok(minio instanceof S3ObjectStorage);
  assert.equal(minio.kind, 'minio');
  assert.equal(minio.objectKey('obj'), 'tmp/obj');
  await minio.close();
});
