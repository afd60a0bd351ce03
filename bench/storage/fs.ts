import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { dirname, isAbsolute, relative, resolve, sep } from 'node:path';

import { StorageError } from '../runner/errors.ts';
import type { ObjectStorage } from './types.ts';

/** Stores each object as a file under `rootDir`; keys may contain `/`. */
export class FsObjectStorage implements ObjectStorage {
  readonly kind = 'fs';
  readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = resolve(rootDir);
  }

  async read(key: string): Promise<number> {
    const path = this.#pathFor('read', key);
    try {
      const data = await readFile(path);
      return data.byteLength;
    } catch (err) {
      throw new StorageError('read', key, 'read failed', { cause: err });
    }
  }

  async write(key: string, payload: Uint8Array): Promise<number> {
    const path = this.#pathFor('write', key);
    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, payload);
      return payload.byteLength;
    } catch (err) {
      throw new StorageError('write', key, 'write failed', { cause: err });
    }
  }

  async remove(key: string): Promise<void> {
    const path = this.#pathFor('remove', key);
    try {
      await rm(path, { force: true });
    } catch (err) {
      throw new StorageError('remove', key, 'remove failed', { cause: err });
    }
  }

  async close(): Promise<void> {}

  #pathFor(operation: 'read' | 'write' | 'remove', key: string): string {
    const path = resolve(this.rootDir, key);
    const rel = relative(this.rootDir, path);
    if (rel === '' || rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
      throw new StorageError(operation, key, `key escapes root ${this.rootDir}`);
    }
    return path;
  }
}
