/**
 * Minimal key-value driver used by the key-value storage backend.
 *
 * Modelled on the subset of Redis commands the backend needs: string keys,
 * hashes and unordered string sets. Missing keys read as empty.
 */
export interface SetStore {
  ping(): Promise<void>;

  get(key: string): Promise<string | undefined>;
  set(key: string, value: string): Promise<void>;

  hashSet(key: string, fields: Record<string, string>): Promise<void>;
  /** Returns undefined when the hash does not exist. */
  hashGetAll(key: string): Promise<Record<string, string> | undefined>;

  setAdd(key: string, member: string): Promise<void>;
  setMembers(key: string): Promise<string[]>;
  setSize(key: string): Promise<number>;

  delete(keys: string[]): Promise<void>;

  /** Approximate memory footprint of the whole store. */
  sizeBytes(): Promise<number>;
  close(): Promise<void>;
}
