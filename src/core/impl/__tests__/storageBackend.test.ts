import { afterEach, describe, expect, it } from "vitest";
import type { BookMetadata } from "../../types.js";
import type { StorageBackend } from "../../storageBackend.js";
import { BackendConnectionError } from "../../errors.js";
import { KeyValueStorageBackend } from "../keyValueStorageBackend.js";
import { MemorySetStore } from "../memorySetStore.js";
import { SqliteStorageBackend } from "../sqliteStorageBackend.js";

function book(overrides: Partial<BookMetadata> = {}): BookMetadata {
  return {
    bookId: 1342,
    title: "Pride and Prejudice",
    author: "Jane Austen",
    language: "en",
    year: 1813,
    wordCount: 120,
    uniqueWords: 80,
    ...overrides,
  };
}

const variants: Array<[string, () => StorageBackend]> = [
  ["key-value (memory store)", () => new KeyValueStorageBackend(new MemorySetStore())],
  ["relational (sqlite)", () => new SqliteStorageBackend({ path: ":memory:" })],
];

describe.each(variants)("StorageBackend contract: %s", (_name, make) => {
  let backend: StorageBackend;

  afterEach(async () => {
    await backend.close();
  });

  it("answers a connection test", async () => {
    backend = make();
    await expect(backend.testConnection()).resolves.toBeUndefined();
  });

  it("upserts metadata, last write wins", async () => {
    backend = make();
    await backend.storeBookMetadata(book());
    await backend.storeBookMetadata(book({ title: "Pride & Prejudice", year: undefined, wordCount: 5 }));

    expect(await backend.getBookMetadata(1342)).toEqual({
      bookId: 1342,
      title: "Pride & Prejudice",
      author: "Jane Austen",
      language: "en",
      year: undefined,
      wordCount: 5,
      uniqueWords: 80,
    });
    expect((await backend.stats()).booksIndexed).toBe(1);
  });

  it("returns undefined for unknown book metadata", async () => {
    backend = make();
    expect(await backend.getBookMetadata(404)).toBeUndefined();
  });

  it("keeps word sets duplicate-free", async () => {
    backend = make();
    await backend.addWordToIndex("pride", 1342);
    await backend.addWordToIndex("pride", 1342);
    await backend.addWordToIndex("pride", 11);

    expect(await backend.getBooksForWord("pride")).toEqual(new Set([1342, 11]));
    expect(await backend.getBooksForWord("absent")).toEqual(new Set());
  });

  it("reports counts and the last update time", async () => {
    backend = make();
    const empty = await backend.stats();
    expect(empty.booksIndexed).toBe(0);
    expect(empty.distinctWords).toBe(0);
    expect(empty.lastUpdate).toBeNull();

    await backend.storeBookMetadata(book());
    await backend.storeBookMetadata(book({ bookId: 11 }));
    await backend.addWordToIndex("pride", 1342);
    await backend.addWordToIndex("alice", 11);
    await backend.addWordToIndex("alice", 1342);

    const stats = await backend.stats();
    expect(stats.booksIndexed).toBe(2);
    expect(stats.distinctWords).toBe(2);
    expect(stats.sizeBytes).toBeGreaterThan(0);
    expect(stats.lastUpdate).toMatch(/^\d{4}-\d{2}-\d{2}T/);
  });

  it("clears all metadata and word entries", async () => {
    backend = make();
    await backend.storeBookMetadata(book());
    await backend.addWordToIndex("pride", 1342);

    await backend.clearIndex();

    expect(await backend.getBookMetadata(1342)).toBeUndefined();
    expect(await backend.getBooksForWord("pride")).toEqual(new Set());
    expect(await backend.stats()).toMatchObject({ booksIndexed: 0, distinctWords: 0, lastUpdate: null });
  });
});

describe("KeyValueStorageBackend", () => {
  it("wraps store failures in BackendConnectionError", async () => {
    const store = new MemorySetStore();
    const backend = new KeyValueStorageBackend(store);
    await store.close();

    await expect(backend.testConnection()).rejects.toBeInstanceOf(BackendConnectionError);
    await expect(backend.getBooksForWord("pride")).rejects.toMatchObject({ code: "BACKEND_UNAVAILABLE" });
  });
});

describe("SqliteStorageBackend", () => {
  it("wraps driver failures in BackendConnectionError", async () => {
    const backend = new SqliteStorageBackend({ path: ":memory:" });
    await backend.close();

    await expect(backend.getBookMetadata(1)).rejects.toBeInstanceOf(BackendConnectionError);
  });
});
