import type { Dirent } from "node:fs";
import { readdir, readFile } from "node:fs/promises";
import path from "node:path";

import type { BookId, BookText } from "../types.js";
import type { BookSource } from "../bookSource.js";

const FILE_RE = /^(\d+)_(header|body)\.txt$/;

interface BookFiles {
  header?: string;
  body?: string;
}

/**
 * Reads books written by the ingestion service.
 *
 * A book is the pair `<id>_header.txt` / `<id>_body.txt` anywhere below the root;
 * ingestion shards them into dated sub-directories. The last walk of the tree is
 * kept: `listKnownIds` always rescans, and `locate` rescans only for an id the last
 * walk did not see complete or whose files have since disappeared. A rebuild thus
 * walks the tree once.
 */
export class DatalakeBookSource implements BookSource {
  private catalog: Map<BookId, BookFiles> | undefined;

  constructor(private readonly root: string) {}

  async locate(bookId: BookId): Promise<BookText | undefined> {
    const cached = this.catalog?.get(bookId);
    if (cached?.header && cached.body) {
      const text = await readPair(cached.header, cached.body);
      if (text) return text;
    }

    const files = (await this.scan()).get(bookId);
    if (!files?.header || !files.body) return undefined;
    return readPair(files.header, files.body);
  }

  async listKnownIds(): Promise<BookId[]> {
    const ids: BookId[] = [];
    for (const [id, files] of await this.scan()) {
      if (files.header && files.body) ids.push(id);
    }
    return ids.sort((a, b) => a - b);
  }

  private async scan(): Promise<Map<BookId, BookFiles>> {
    const books = new Map<BookId, BookFiles>();

    let entries: Dirent[];
    try {
      entries = await readdir(this.root, { recursive: true, withFileTypes: true });
    } catch (e) {
      // a datalake that was never written to holds no books
      if (isErrnoException(e) && e.code === "ENOENT") {
        this.catalog = books;
        return books;
      }
      throw e;
    }

    for (const entry of entries) {
      if (!entry.isFile()) continue;
      const match = FILE_RE.exec(entry.name);
      if (!match?.[1] || !match[2]) continue;

      const id = Number(match[1]);
      const files = books.get(id) ?? {};
      // first file found wins when ingestion wrote the same book twice
      if (match[2] === "header") files.header ??= path.join(entry.parentPath ?? entry.path, entry.name);
      else files.body ??= path.join(entry.parentPath ?? entry.path, entry.name);
      books.set(id, files);
    }

    this.catalog = books;
    return books;
  }
}

/** Reads both files; undefined when either was removed after the tree was walked. */
async function readPair(headerPath: string, bodyPath: string): Promise<BookText | undefined> {
  try {
    const [header, body] = await Promise.all([readFile(headerPath, "utf8"), readFile(bodyPath, "utf8")]);
    return { header, body };
  } catch (e) {
    if (isErrnoException(e) && e.code === "ENOENT") return undefined;
    throw e;
  }
}

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && "code" in e;
}
