import { JobError } from '../runner/errors.ts';
import { DEFAULT_FS_ROOT, type ServiceConfig } from '../runner/job_config.ts';
import { FsObjectStorage } from './fs.ts';
import { MemoryObjectStorage } from './memory.ts';
import { S3ObjectStorage } from './s3.ts';
import type { ObjectStorage } from './types.ts';

export type { ObjectStorage } from './types.ts';
export { FsObjectStorage } from './fs.ts';
export { MemoryObjectStorage } from './memory.ts';
export { S3ObjectStorage } from './s3.ts';

export function createObjectStorage(service: ServiceConfig): ObjectStorage {
  try {
    switch (service.type) {
      case 's3':
      case 'minio':
      case 'oss':
      case 'cos':
        return S3ObjectStorage.fromService(service);
      case 'fs':
        return new FsObjectStorage(service.prefix?.trim() || DEFAULT_FS_ROOT);
      case 'memory':
        return new MemoryObjectStorage();
      default: {
        const unsupported: never = service.type;
        throw new Error(`unsupported service type: ${String(unsupported)}`);
      }
    }
  } catch (err) {
    throw new JobError('storage', `failed to build ${service.type} storage`, { cause: err });
  }
}
