import type { BookId, RebuildReport } from "./types.js";

export interface IndexBuilder {
  /** Throws NotFoundError when the book source does not know the id. */
  indexBook(bookId: BookId): Promise<void>;
  /** Clears the index and re-indexes every known book. Never throws for a single book. */
  rebuildIndex(): Promise<RebuildReport>;
}
