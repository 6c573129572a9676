import type { BookId, BookMetadata } from "../types.js";
import type { MetadataExtractor } from "../metadataExtractor.js";

export const DEFAULT_LANGUAGE = "en";

const TITLE_RE = /title:[ \t]*(\S[^\n]*)/i;
const AUTHOR_RE = /author:[ \t]*(\S[^\n]*)/i;
const LANGUAGE_RE = /language:[ \t]*(\S[^\n]*)/i;
// first standalone 4-digit number on a date-labelled line
const YEAR_RE = /(?:release date|posting date|release|date):[^\n]*?(?<!\d)(\d{4})(?!\d)/i;

function capture(re: RegExp, text: string): string | undefined {
  return re.exec(text)?.[1]?.trim();
}

/**
 * Extracts `label: value` fields from a book header.
 *
 * Matching is case-insensitive and confined to a single line; the first match wins.
 */
export class HeaderMetadataExtractor implements MetadataExtractor {
  extract(header: string, bookId: BookId): BookMetadata {
    const year = capture(YEAR_RE, header);

    return {
      bookId,
      title: capture(TITLE_RE, header) ?? "",
      author: capture(AUTHOR_RE, header) ?? "",
      language: capture(LANGUAGE_RE, header) || DEFAULT_LANGUAGE,
      year: year === undefined ? undefined : Number(year),
      wordCount: 0,
      uniqueWords: 0,
    };
  }
}
