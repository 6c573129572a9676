import type { BookId, BookText } from "./types.js";

/** Read side of the ingestion collaborator. */
export interface BookSource {
  locate(bookId: BookId): Promise<BookText | undefined>;
  listKnownIds(): Promise<BookId[]>;
}
