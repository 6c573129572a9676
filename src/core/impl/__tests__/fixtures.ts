import type { BookId, BookText } from "../../types.js";
import type { BookSource } from "../../bookSource.js";

export class MemoryBookSource implements BookSource {
  private readonly books = new Map<BookId, BookText>();

  add(bookId: BookId, text: BookText): this {
    this.books.set(bookId, text);
    return this;
  }

  async locate(bookId: BookId): Promise<BookText | undefined> {
    return this.books.get(bookId);
  }

  async listKnownIds(): Promise<BookId[]> {
    return Array.from(this.books.keys()).sort((a, b) => a - b);
  }
}

export function header(fields: { title?: string; author?: string; language?: string; release?: string }): string {
  const lines = ["The Project Gutenberg eBook", ""];
  if (fields.title !== undefined) lines.push(`Title: ${fields.title}`);
  if (fields.author !== undefined) lines.push(`Author: ${fields.author}`);
  if (fields.release !== undefined) lines.push(`Release date: ${fields.release}`);
  if (fields.language !== undefined) lines.push(`Language: ${fields.language}`);
  return lines.join("\n");
}
