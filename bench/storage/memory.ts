import { StorageError } from '../runner/errors.ts';
import type { ObjectStorage } from './types.ts';

export class MemoryObjectStorage implements ObjectStorage {
  readonly kind = 'memory';
  readonly #objects = new Map<string, Uint8Array>();
  #closed = false;

  get closed(): boolean {
    return this.#closed;
  }

  keys(): string[] {
    return [...this.#objects.keys()].sort();
  }

  async read(key: string): Promise<number> {
    this.#assertOpen('read', key);
    const object = this.#objects.get(key);
    if (!object) throw new StorageError('read', key, 'object not found');
    return object.byteLength;
  }

  async write(key: string, payload: Uint8Array): Promise<number> {
    this.#assertOpen('write', key);
    this.#objects.set(key, payload.slice());
    return payload.byteLength;
  }

  async remove(key: string): Promise<void> {
    this.#assertOpen('remove', key);
    this.#objects.delete(key);
  }

  async close(): Promise<void> {
    this.#closed = true;
  }

  #assertOpen(operation: 'read' | 'write' | 'remove', key: string): void {
    if (this.#closed) throw new StorageError(operation, key, 'storage is closed');
  }
}
