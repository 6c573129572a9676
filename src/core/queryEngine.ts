import type { SearchFilters, SearchResponse } from "./types.js";

export interface QueryEngine {
  /** Throws InvalidQueryError for a blank query. */
  search(query: string, filters?: SearchFilters, limit?: number): Promise<SearchResponse>;
}
