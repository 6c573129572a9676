import { mkdirSync } from "node:fs";
import path from "node:path";

import Database from "better-sqlite3";

import type { BookId, BookMetadata, IndexStats, Word } from "../types.js";
import type { StorageBackend } from "../storageBackend.js";
import { BackendConnectionError } from "../errors.js";

export interface SqliteStorageBackendOptions {
  /** file path, or ":memory:" */
  path: string;
  /** how long a write waits on a locked database, in milliseconds */
  busyTimeoutMs?: number;
}

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS books (
    book_id      INTEGER PRIMARY KEY,
    title        TEXT NOT NULL,
    author       TEXT NOT NULL,
    language     TEXT NOT NULL,
    year         INTEGER,
    word_count   INTEGER NOT NULL,
    unique_words INTEGER NOT NULL,
    indexed_at   TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS word_index (
    word    TEXT NOT NULL,
    book_id INTEGER NOT NULL,
    PRIMARY KEY (word, book_id)
  ) WITHOUT ROWID;
`;

interface BookRow {
  book_id: number;
  title: string;
  author: string;
  language: string;
  year: number | null;
  word_count: number;
  unique_words: number;
}

interface BookParams {
  book_id: number;
  title: string;
  author: string;
  language: string;
  year: number | null;
  word_count: number;
  unique_words: number;
  indexed_at: string;
}

interface StatsRow {
  books: number;
  words: number;
  last_update: string | null;
}

function openDatabase(opts: SqliteStorageBackendOptions): Database.Database {
  try {
    if (opts.path !== ":memory:") mkdirSync(path.dirname(opts.path), { recursive: true });
    const db = new Database(opts.path, { timeout: opts.busyTimeoutMs ?? 5000 });
    if (opts.path !== ":memory:") db.pragma("journal_mode = WAL");
    db.exec(SCHEMA_SQL);
    return db;
  } catch (e) {
    throw new BackendConnectionError(`sqlite backend: cannot open ${opts.path}`, e);
  }
}

/**
 * Relational storage backend on SQLite.
 *
 * better-sqlite3 runs every statement synchronously on the event loop, so concurrent
 * requests never see a half-applied statement. Statements are prepared once.
 */
export class SqliteStorageBackend implements StorageBackend {
  private readonly db: Database.Database;
  private readonly stmts: {
    upsertBook: Database.Statement<[BookParams]>;
    selectBook: Database.Statement<[number], BookRow>;
    insertWord: Database.Statement<[string, number]>;
    selectWord: Database.Statement<[string], { book_id: number }>;
    stats: Database.Statement<[], StatsRow>;
  };

  constructor(opts: SqliteStorageBackendOptions) {
    this.db = openDatabase(opts);
    this.stmts = {
      upsertBook: this.db.prepare<BookParams>(`
        INSERT INTO books (book_id, title, author, language, year, word_count, unique_words, indexed_at)
        VALUES (@book_id, @title, @author, @language, @year, @word_count, @unique_words, @indexed_at)
        ON CONFLICT (book_id) DO UPDATE SET
          title = excluded.title,
          author = excluded.author,
          language = excluded.language,
          year = excluded.year,
          word_count = excluded.word_count,
          unique_words = excluded.unique_words,
          indexed_at = excluded.indexed_at
      `),
      selectBook: this.db.prepare<[number], BookRow>(
        "SELECT book_id, title, author, language, year, word_count, unique_words FROM books WHERE book_id = ?",
      ),
      insertWord: this.db.prepare<[string, number]>("INSERT OR IGNORE INTO word_index (word, book_id) VALUES (?, ?)"),
      selectWord: this.db.prepare<[string], { book_id: number }>("SELECT book_id FROM word_index WHERE word = ?"),
      stats: this.db.prepare<[], StatsRow>(`
        SELECT
          (SELECT COUNT(*) FROM books) AS books,
          (SELECT COUNT(DISTINCT word) FROM word_index) AS words,
          (SELECT MAX(indexed_at) FROM books) AS last_update
      `),
    };
  }

  async testConnection(): Promise<void> {
    this.call("testConnection", () => this.db.prepare("SELECT 1").get());
  }

  async storeBookMetadata(m: BookMetadata): Promise<void> {
    this.call("storeBookMetadata", () =>
      this.stmts.upsertBook.run({
        book_id: m.bookId,
        title: m.title,
        author: m.author,
        language: m.language,
        year: m.year ?? null,
        word_count: m.wordCount,
        unique_words: m.uniqueWords,
        indexed_at: new Date().toISOString(),
      }),
    );
  }

  async getBookMetadata(bookId: BookId): Promise<BookMetadata | undefined> {
    const row = this.call("getBookMetadata", () => this.stmts.selectBook.get(bookId));
    if (!row) return undefined;
    return {
      bookId: row.book_id,
      title: row.title,
      author: row.author,
      language: row.language,
      year: row.year ?? undefined,
      wordCount: row.word_count,
      uniqueWords: row.unique_words,
    };
  }

  async addWordToIndex(word: Word, bookId: BookId): Promise<void> {
    this.call("addWordToIndex", () => this.stmts.insertWord.run(word, bookId));
  }

  async getBooksForWord(word: Word): Promise<Set<BookId>> {
    const rows = this.call("getBooksForWord", () => this.stmts.selectWord.all(word));
    return new Set(rows.map((r) => r.book_id));
  }

  async clearIndex(): Promise<void> {
    this.call("clearIndex", () =>
      this.db.transaction(() => {
        this.db.prepare("DELETE FROM word_index").run();
        this.db.prepare("DELETE FROM books").run();
      })(),
    );
  }

  async stats(): Promise<IndexStats> {
    return this.call("stats", () => {
      const row = this.stmts.stats.get() ?? { books: 0, words: 0, last_update: null };
      const pageCount = Number(this.db.pragma("page_count", { simple: true }));
      const pageSize = Number(this.db.pragma("page_size", { simple: true }));
      return {
        booksIndexed: row.books,
        distinctWords: row.words,
        sizeBytes: pageCount * pageSize,
        lastUpdate: row.last_update,
      };
    });
  }

  async close(): Promise<void> {
    if (this.db.open) this.db.close();
  }

  private call<T>(op: string, fn: () => T): T {
    try {
      return fn();
    } catch (e) {
      throw new BackendConnectionError(`sqlite backend: ${op} failed`, e);
    }
  }
}
