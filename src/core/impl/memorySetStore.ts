import type { SetStore } from "../setStore.js";

/**
 * In-process SetStore.
 *
 * Data structure:
 * - strings: key -> value
 * - hashes: key -> (field -> value)
 * - sets: key -> Set<member>
 *
 * A key lives in exactly one of the three maps; writing a key under another type replaces it.
 */
export class MemorySetStore implements SetStore {
  private readonly strings = new Map<string, string>();
  private readonly hashes = new Map<string, Map<string, string>>();
  private readonly sets = new Map<string, Set<string>>();
  private closed = false;

  async ping(): Promise<void> {
    this.assertOpen();
  }

  async get(key: string): Promise<string | undefined> {
    this.assertOpen();
    return this.strings.get(key);
  }

  async set(key: string, value: string): Promise<void> {
    this.assertOpen();
    this.evict(key);
    this.strings.set(key, value);
  }

  async hashSet(key: string, fields: Record<string, string>): Promise<void> {
    this.assertOpen();
    let hash = this.hashes.get(key);
    if (!hash) {
      this.evict(key);
      hash = new Map();
      this.hashes.set(key, hash);
    }
    for (const [field, value] of Object.entries(fields)) hash.set(field, value);
  }

  async hashGetAll(key: string): Promise<Record<string, string> | undefined> {
    this.assertOpen();
    const hash = this.hashes.get(key);
    return hash ? Object.fromEntries(hash) : undefined;
  }

  async setAdd(key: string, member: string): Promise<void> {
    this.assertOpen();
    let members = this.sets.get(key);
    if (!members) {
      this.evict(key);
      members = new Set();
      this.sets.set(key, members);
    }
    members.add(member);
  }

  async setMembers(key: string): Promise<string[]> {
    this.assertOpen();
    return Array.from(this.sets.get(key) ?? []);
  }

  async setSize(key: string): Promise<number> {
    this.assertOpen();
    return this.sets.get(key)?.size ?? 0;
  }

  async delete(keys: string[]): Promise<void> {
    this.assertOpen();
    for (const key of keys) this.evict(key);
  }

  async sizeBytes(): Promise<number> {
    this.assertOpen();
    // UTF-16 code units, two bytes each
    let units = 0;
    for (const [k, v] of this.strings) units += k.length + v.length;
    for (const [k, hash] of this.hashes) {
      units += k.length;
      for (const [f, v] of hash) units += f.length + v.length;
    }
    for (const [k, members] of this.sets) {
      units += k.length;
      for (const m of members) units += m.length;
    }
    return units * 2;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private evict(key: string): void {
    this.strings.delete(key);
    this.hashes.delete(key);
    this.sets.delete(key);
  }

  private assertOpen(): void {
    if (this.closed) throw new Error("store is closed");
  }
}
