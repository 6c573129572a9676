import type { BookId, RebuildFailure, RebuildReport, Word } from "../types.js";
import type { Tokenizer } from "../tokenizer.js";
import type { MetadataExtractor } from "../metadataExtractor.js";
import type { StorageBackend } from "../storageBackend.js";
import type { BookSource } from "../bookSource.js";
import type { IndexBuilder } from "../indexBuilder.js";
import { NotFoundError, errorCode, errorMessage } from "../errors.js";
import { silentLogger, type Logger } from "../../logger.js";

export interface IndexerDeps {
  source: BookSource;
  tokenizer: Tokenizer;
  extractor: MetadataExtractor;
  backend: StorageBackend;
  logger?: Logger;
}

/**
 * Indexes books from a BookSource into a StorageBackend.
 *
 * Writes are idempotent, so re-indexing a book (or indexing it concurrently)
 * converges: metadata takes the latest extraction and word sets only grow.
 */
export class BookIndexer implements IndexBuilder {
  private readonly logger: Logger;

  constructor(private readonly deps: IndexerDeps) {
    this.logger = (deps.logger ?? silentLogger).child({ component: "indexer" });
  }

  async indexBook(bookId: BookId): Promise<void> {
    const text = await this.deps.source.locate(bookId);
    if (!text) throw new NotFoundError(bookId);

    const { tokenizer, backend } = this.deps;
    const metadata = this.deps.extractor.extract(text.header, bookId);
    const bodyWords = tokenizer.tokenize(text.body);
    const titleWords = tokenizer.tokenize(metadata.title);

    metadata.wordCount = tokenizer.countWords(text.body);
    // title words are indexed but not counted
    metadata.uniqueWords = bodyWords.size;

    const allWords = new Set<Word>(bodyWords);
    for (const w of titleWords) allWords.add(w);

    await backend.storeBookMetadata(metadata);
    for (const word of allWords) {
      await backend.addWordToIndex(word, bookId);
    }

    this.logger.debug("book indexed", { bookId, words: allWords.size });
  }

  async rebuildIndex(): Promise<RebuildReport> {
    const started = Date.now();
    this.logger.info("rebuild started");

    // a failed enumeration leaves the current index untouched
    const ids = await this.deps.source.listKnownIds();
    await this.deps.backend.clearIndex();

    let booksProcessed = 0;
    const failures: RebuildFailure[] = [];

    for (const bookId of ids) {
      try {
        await this.indexBook(bookId);
        booksProcessed++;
      } catch (e) {
        failures.push({ bookId, code: errorCode(e), message: errorMessage(e) });
        this.logger.warn("book failed during rebuild", { bookId, code: errorCode(e), error: errorMessage(e) });
      }
    }

    const report: RebuildReport = {
      status: "rebuilt",
      booksProcessed,
      booksFailed: failures.length,
      failures,
      elapsedMs: Date.now() - started,
    };

    this.logger.info("rebuild completed", {
      booksProcessed,
      booksFailed: report.booksFailed,
      elapsedMs: report.elapsedMs,
    });
    return report;
  }
}
