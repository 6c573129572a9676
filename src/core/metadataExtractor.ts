import type { BookId, BookMetadata } from "./types.js";

/**
 * Parses a book header into metadata, best-effort.
 * Never throws; unknown fields fall back to defaults.
 */
export interface MetadataExtractor {
  extract(header: string, bookId: BookId): BookMetadata;
}
