import type { BookId, BookMetadata, SearchFilters, SearchResponse, SearchResult, Word } from "../types.js";
import type { Tokenizer } from "../tokenizer.js";
import type { StorageBackend } from "../storageBackend.js";
import type { QueryEngine } from "../queryEngine.js";
import { InvalidQueryError } from "../errors.js";

export interface SearchEngineDeps {
  tokenizer: Tokenizer;
  backend: StorageBackend;
}

function passesFilters(m: BookMetadata, filters: SearchFilters): boolean {
  if (filters.author !== undefined && !m.author.toLowerCase().includes(filters.author.toLowerCase())) {
    return false;
  }
  if (filters.language !== undefined && m.language.toLowerCase() !== filters.language.toLowerCase()) {
    return false;
  }
  if (filters.year !== undefined && m.year !== filters.year) {
    return false;
  }
  return true;
}

/**
 * Keyword search over the inverted index.
 *
 * Retrieval and scoring are deliberately separate:
 * - candidates are the union of the index sets of every query word (OR)
 * - the score counts query words found as substrings of title + author only,
 *   so a book retrieved through its body alone scores 0 but is still returned
 */
export class BookSearchEngine implements QueryEngine {
  constructor(private readonly deps: SearchEngineDeps) {}

  async search(rawQuery: string, filters: SearchFilters = {}, limit?: number): Promise<SearchResponse> {
    const query = rawQuery.trim();
    if (!query) throw new InvalidQueryError();

    const words = Array.from(this.deps.tokenizer.tokenize(query));
    if (words.length === 0) return { query, filters, count: 0, results: [] };

    const candidates = await this.candidates(words);
    const metadata = await Promise.all(
      Array.from(candidates, (bookId) => this.deps.backend.getBookMetadata(bookId)),
    );

    const results: SearchResult[] = [];
    for (const m of metadata) {
      // index entries can outlive their metadata while a rebuild is clearing
      if (!m || !passesFilters(m, filters)) continue;
      results.push(score(m, words));
    }

    results.sort((a, b) => b.score - a.score || a.bookId - b.bookId);
    const page = limit === undefined ? results : results.slice(0, limit);

    return { query, filters, count: page.length, results: page };
  }

  private async candidates(words: Word[]): Promise<Set<BookId>> {
    const sets = await Promise.all(words.map((w) => this.deps.backend.getBooksForWord(w)));
    const union = new Set<BookId>();
    for (const s of sets) {
      for (const id of s) union.add(id);
    }
    return union;
  }
}

function score(m: BookMetadata, words: Word[]): SearchResult {
  const haystack = `${m.title} ${m.author}`.toLowerCase();
  const matches = words.filter((w) => haystack.includes(w));

  return {
    bookId: m.bookId,
    title: m.title,
    author: m.author,
    language: m.language,
    year: m.year,
    score: matches.length,
    matches,
  };
}
