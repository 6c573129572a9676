import type { AppConfig } from "../config.js";
import type { BookSource } from "../core/bookSource.js";
import type { IndexBuilder } from "../core/indexBuilder.js";
import type { QueryEngine } from "../core/queryEngine.js";
import type { StorageBackend } from "../core/storageBackend.js";
import {
  BookIndexer,
  BookSearchEngine,
  HeaderMetadataExtractor,
  KeyValueStorageBackend,
  MemorySetStore,
  RedisSetStore,
  SqliteStorageBackend,
  WordTokenizer,
} from "../core/impl/index.js";
import { silentLogger, type Logger } from "../logger.js";

export interface Services {
  backend: StorageBackend;
  indexer: IndexBuilder;
  engine: QueryEngine;
}

export function createBackend(cfg: AppConfig["backend"], logger?: Logger): StorageBackend {
  switch (cfg.type) {
    case "redis":
      return new KeyValueStorageBackend(new RedisSetStore({ url: cfg.url, commandTimeoutMs: cfg.timeoutMs, logger }));
    case "sqlite":
      return new SqliteStorageBackend({ path: cfg.path, busyTimeoutMs: cfg.timeoutMs });
    case "memory":
      return new KeyValueStorageBackend(new MemorySetStore());
  }
}

/**
 * Wires the indexer and the search engine around one shared backend.
 *
 * Both sides get the same tokenizer instance so indexed and queried words agree.
 */
export function createServices(opts: { backend: StorageBackend; source: BookSource; logger?: Logger }): Services {
  const tokenizer = new WordTokenizer();
  const extractor = new HeaderMetadataExtractor();

  return {
    backend: opts.backend,
    indexer: new BookIndexer({
      source: opts.source,
      tokenizer,
      extractor,
      backend: opts.backend,
      logger: opts.logger ?? silentLogger,
    }),
    engine: new BookSearchEngine({ tokenizer, backend: opts.backend }),
  };
}
