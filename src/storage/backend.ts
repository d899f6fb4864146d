/**
 * Abstract storage backend interface.
 */

export interface StorageBackend {
  /** Write data to the given key, replacing any existing value. */
  write(key: string, data: Uint8Array | string): Promise<void>;

  /** Read data from the given key. */
  read(key: string): Promise<Uint8Array>;

  /** List all keys with the given prefix ("" for everything). */
  list(prefix: string): Promise<string[]>;

  /** Check if the key exists ("" checks the backend root). */
  exists(key: string): Promise<boolean>;

  /** Human-readable location of a key, for log messages. */
  describe(key: string): string;
}
