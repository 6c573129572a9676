import type { BookId, BookMetadata, IndexStats, Word } from "../types.js";
import type { StorageBackend } from "../storageBackend.js";
import type { SetStore } from "../setStore.js";
import { BackendConnectionError } from "../errors.js";

const BOOKS_KEY = "books";
const WORDS_KEY = "words";
const LAST_UPDATE_KEY = "index:last_update";

const bookKey = (bookId: BookId) => `book:${bookId}`;
const wordKey = (word: Word) => `word:${word}`;

function toHash(m: BookMetadata): Record<string, string> {
  return {
    book_id: String(m.bookId),
    title: m.title,
    author: m.author,
    language: m.language,
    // empty string marks an unknown year
    year: m.year === undefined ? "" : String(m.year),
    word_count: String(m.wordCount),
    unique_words: String(m.uniqueWords),
  };
}

function fromHash(bookId: BookId, h: Record<string, string>): BookMetadata {
  return {
    bookId,
    title: h.title ?? "",
    author: h.author ?? "",
    language: h.language ?? "",
    year: h.year ? Number(h.year) : undefined,
    wordCount: Number(h.word_count ?? 0),
    uniqueWords: Number(h.unique_words ?? 0),
  };
}

/**
 * Storage backend over a set-oriented key-value store.
 *
 * Layout:
 * - book:<id>            hash of metadata fields
 * - word:<word>          set of book ids
 * - books / words        catalogs of every id and word written, used for stats and clearing
 * - index:last_update    ISO time of the latest metadata write
 */
export class KeyValueStorageBackend implements StorageBackend {
  constructor(private readonly store: SetStore) {}

  async testConnection(): Promise<void> {
    await this.call("ping", () => this.store.ping());
  }

  async storeBookMetadata(metadata: BookMetadata): Promise<void> {
    await this.call("storeBookMetadata", async () => {
      await this.store.hashSet(bookKey(metadata.bookId), toHash(metadata));
      await this.store.setAdd(BOOKS_KEY, String(metadata.bookId));
      await this.store.set(LAST_UPDATE_KEY, new Date().toISOString());
    });
  }

  async getBookMetadata(bookId: BookId): Promise<BookMetadata | undefined> {
    const hash = await this.call("getBookMetadata", () => this.store.hashGetAll(bookKey(bookId)));
    return hash ? fromHash(bookId, hash) : undefined;
  }

  async addWordToIndex(word: Word, bookId: BookId): Promise<void> {
    await this.call("addWordToIndex", async () => {
      await this.store.setAdd(wordKey(word), String(bookId));
      await this.store.setAdd(WORDS_KEY, word);
    });
  }

  async getBooksForWord(word: Word): Promise<Set<BookId>> {
    const members = await this.call("getBooksForWord", () => this.store.setMembers(wordKey(word)));
    return new Set(members.map(Number));
  }

  async clearIndex(): Promise<void> {
    await this.call("clearIndex", async () => {
      const [bookIds, words] = await Promise.all([
        this.store.setMembers(BOOKS_KEY),
        this.store.setMembers(WORDS_KEY),
      ]);
      await this.store.delete([
        ...bookIds.map((id) => `book:${id}`),
        ...words.map(wordKey),
        BOOKS_KEY,
        WORDS_KEY,
        LAST_UPDATE_KEY,
      ]);
    });
  }

  async stats(): Promise<IndexStats> {
    return this.call("stats", async () => {
      const [booksIndexed, distinctWords, sizeBytes, lastUpdate] = await Promise.all([
        this.store.setSize(BOOKS_KEY),
        this.store.setSize(WORDS_KEY),
        this.store.sizeBytes(),
        this.store.get(LAST_UPDATE_KEY),
      ]);
      return { booksIndexed, distinctWords, sizeBytes, lastUpdate: lastUpdate ?? null };
    });
  }

  async close(): Promise<void> {
    await this.store.close();
  }

  private async call<T>(op: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (e) {
      throw new BackendConnectionError(`key-value backend: ${op} failed`, e);
    }
  }
}
