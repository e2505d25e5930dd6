export { KnowledgeBase } from './services/knowledge-base.js';
export type { KnowledgeBaseDependencies, KnowledgeBaseStats } from './services/knowledge-base.js';
export { DatabaseService } from './services/database.js';
export { DocumentRepository, STATUS_TRANSITIONS } from './services/document-repository.js';
export { ChunkRepository } from './services/chunk-repository.js';
export { SqliteVectorStore } from './services/vector-store.js';
export type { VectorStore, VectorRecord } from './services/vector-store.js';
export { LocalBlobStore, MemoryBlobStore } from './services/blob-store.js';
export type { BlobStore } from './services/blob-store.js';
export { EmbeddingService, HttpSparseEncoder, TfidfSparseEncoder } from './services/embedding.js';
export type { SparseEncoder } from './services/embedding.js';
export { Indexer } from './services/indexer.js';
export { DocumentRegistry, contentHash } from './services/document.js';
export { IngestionPipeline, StageError } from './services/ingestion.js';
export type { ProcessOptions } from './services/ingestion.js';
export { IngestionQueue } from './services/job-queue.js';
export { MarkdownExportService } from './services/markdown-export.js';
export type { MarkdownExport, MarkdownSegment } from './services/markdown-export.js';
export { Reranker } from './services/reranker.js';
export { SearchService, rrfFuse } from './services/search.js';
export { ImagePreprocessor } from './services/image-preprocessor.js';
export { ParserChain, getFileKind, isSupportedFile, SUPPORTED_EXTENSIONS } from './parsers/chain.js';
export type { Parser } from './parsers/chain.js';
export type { ParseInput, ParseResult, ParserStrategy, FileKind } from './parsers/types.js';
export { normalizeParserResponse, normalizeBlock } from './parsers/normalize.js';
export { LayoutChunker } from './utils/chunking.js';
export { TextProcessor } from './utils/text-processing.js';
export { ConfigManager } from './utils/config.js';
export { createLogger, setVerbose, setSilent } from './utils/logger.js';
export { OpenAIProvider } from './providers/openai.js';
export { ProviderFactory } from './providers/factory.js';
export { KnowledgeBaseConfigSchema, buildConfig } from './types/config.js';
export type { KnowledgeBaseConfig, KnowledgeBaseConfigInput } from './types/config.js';
export * from './types/document.js';
export type * from './types/search.js';
export type * from './types/provider.js';
export * from './utils/errors.js';
