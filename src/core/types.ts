/** Shared core types used by module contracts. */

export type BookId = number;
export type Word = string;

/** Structured metadata for one indexed book. */
export interface BookMetadata {
  bookId: BookId;
  title: string;
  author: string;
  language: string;
  year?: number;
  /** whitespace-delimited tokens in the raw body */
  wordCount: number;
  /** distinct normalized body tokens (title excluded) */
  uniqueWords: number;
}

/** Raw text of a book as handed over by the ingestion side. */
export interface BookText {
  header: string;
  body: string;
}

export interface SearchFilters {
  author?: string;
  language?: string;
  year?: number;
}

export interface SearchResult {
  bookId: BookId;
  title: string;
  author: string;
  language: string;
  year?: number;
  score: number;
  /** query tokens found in title/author */
  matches: Word[];
}

export interface SearchResponse {
  query: string;
  filters: SearchFilters;
  count: number;
  results: SearchResult[];
}

export interface IndexStats {
  booksIndexed: number;
  distinctWords: number;
  /** approximate storage footprint */
  sizeBytes: number;
  /** ISO-8601 time of the latest metadata write, null when empty */
  lastUpdate: string | null;
}

export interface RebuildFailure {
  bookId: BookId;
  code: string;
  message: string;
}

export interface RebuildReport {
  status: "rebuilt";
  booksProcessed: number;
  booksFailed: number;
  failures: RebuildFailure[];
  elapsedMs: number;
}
