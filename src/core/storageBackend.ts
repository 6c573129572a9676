import type { BookId, BookMetadata, IndexStats, Word } from "./types.js";

/**
 * Persistence for book metadata and the word -> book ids index.
 *
 * Contract notes:
 * - every write is an idempotent upsert or set-add
 * - failures surface as BackendConnectionError
 * - one instance is shared by all concurrent requests
 */
export interface StorageBackend {
  testConnection(): Promise<void>;

  storeBookMetadata(metadata: BookMetadata): Promise<void>;
  getBookMetadata(bookId: BookId): Promise<BookMetadata | undefined>;

  addWordToIndex(word: Word, bookId: BookId): Promise<void>;
  getBooksForWord(word: Word): Promise<Set<BookId>>;

  /** Wipes metadata and word entries. Not atomic for concurrent readers. */
  clearIndex(): Promise<void>;
  stats(): Promise<IndexStats>;

  close(): Promise<void>;
}
