export type * from "./types.js";
export type { Tokenizer } from "./tokenizer.js";
export type { MetadataExtractor } from "./metadataExtractor.js";
export type { StorageBackend } from "./storageBackend.js";
export type { SetStore } from "./setStore.js";
export type { BookSource } from "./bookSource.js";
export type { IndexBuilder } from "./indexBuilder.js";
export type { QueryEngine } from "./queryEngine.js";
export * from "./errors.js";
export * from "./impl/index.js";
