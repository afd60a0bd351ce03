/**
 * Minimal read/write capability the benchmark drives. Implementations must allow
 * concurrent calls from several workers on one instance.
 */
export interface ObjectStorage {
  readonly kind: string;
  /** Fetches the whole object and resolves to the number of bytes received. */
  read(key: string): Promise<number>;
  /** Stores the whole payload and resolves to the number of bytes accepted. */
  write(key: string, payload: Uint8Array): Promise<number>;
  remove(key: string): Promise<void>;
  /** Releases connections or handles. Safe to call more than once. */
  close(): Promise<void>;
}
