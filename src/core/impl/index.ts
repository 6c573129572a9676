export { WordTokenizer } from "./wordTokenizer.js";
export { HeaderMetadataExtractor, DEFAULT_LANGUAGE } from "./headerMetadataExtractor.js";
export { MemorySetStore } from "./memorySetStore.js";
export { RedisSetStore, type RedisSetStoreOptions } from "./redisSetStore.js";
export { KeyValueStorageBackend } from "./keyValueStorageBackend.js";
export { SqliteStorageBackend, type SqliteStorageBackendOptions } from "./sqliteStorageBackend.js";
export { DatalakeBookSource } from "./datalakeBookSource.js";
export { BookIndexer, type IndexerDeps } from "./bookIndexer.js";
export { BookSearchEngine, type SearchEngineDeps } from "./bookSearchEngine.js";
