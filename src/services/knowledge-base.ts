import { DatabaseService } from './database.js';
import { DocumentRepository } from './document-repository.js';
import { ChunkRepository } from './chunk-repository.js';
import { SqliteVectorStore, VectorStore } from './vector-store.js';
import { BlobStore, LocalBlobStore } from './blob-store.js';
import { EmbeddingService, HttpSparseEncoder, SparseEncoder, TfidfSparseEncoder } from './embedding.js';
import { Indexer } from './indexer.js';
import { DocumentRegistry } from './document.js';
import { ImagePreprocessor } from './image-preprocessor.js';
import { IngestionPipeline, ProcessOptions } from './ingestion.js';
import { IngestionQueue, JobFailure } from './job-queue.js';
import { MarkdownExport, MarkdownExportService } from './markdown-export.js';
import { Reranker } from './reranker.js';
import { SearchService } from './search.js';
import { Parser, ParserChain } from '../parsers/chain.js';
import { ProviderFactory } from '../providers/factory.js';
import { KnowledgeBaseConfig } from '../types/config.js';
import { Document } from '../types/document.js';
import {
  AIProvider,
  EmbeddingProvider,
  TextProvider,
  TranscriptionProvider,
  VisionProvider,
} from '../types/provider.js';
import { SearchRequest, SearchResponse } from '../types/search.js';
import { LayoutChunker } from '../utils/chunking.js';
import { MigrationManager } from '../utils/migrations.js';
import { ConfigurationError, describeError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

/**
 * Collaborators that replace the ones built from configuration
 */
export interface KnowledgeBaseDependencies {
  embedding?: EmbeddingProvider;
  text?: TextProvider | null;
  vision?: VisionProvider | null;
  transcription?: TranscriptionProvider | null;
  blobStore?: BlobStore;
  parser?: Parser;
  sparseEncoder?: SparseEncoder;
}

export interface KnowledgeBaseStats {
  documents: number;
  chunks: number;
  activeChunks: number;
  vectors: number;
}

const logger = createLogger('knowledge-base');

/**
 * Public entry point: upload, background processing, retrieval and export
 */
export class KnowledgeBase {
  private constructor(
    private db: DatabaseService,
    private documents: DocumentRepository,
    private vectors: VectorStore,
    private blobStore: BlobStore,
    private registry: DocumentRegistry,
    private pipeline: IngestionPipeline,
    private searchService: SearchService,
    private exporter: MarkdownExportService,
    private queue: IngestionQueue,
    private jobOptions: Map<string, ProcessOptions>
  ) {}

  /**
   * Open the database, apply migrations and wire every service
   */
  static open(config: KnowledgeBaseConfig, deps: KnowledgeBaseDependencies = {}): KnowledgeBase {
    if (!config.database.path) {
      throw new ConfigurationError('database.path is not configured');
    }

    let shared: AIProvider | null = null;
    const configured = (): AIProvider | null => {
      if (!config.providers.openai?.apiKey) return null;
      shared ??= ProviderFactory.createFromConfig(config);
      return shared;
    };

    const embeddingProvider = deps.embedding ?? configured();
    if (!embeddingProvider) {
      throw new ConfigurationError('An embedding provider is required: configure providers.openai or pass one in');
    }
    const textProvider = deps.text === undefined ? configured() : deps.text;
    const visionProvider = deps.vision === undefined ? configured() : deps.vision;
    const transcriber = deps.transcription === undefined ? configured() : deps.transcription;

    let blobStore = deps.blobStore;
    if (!blobStore) {
      if (!config.storage.root) {
        throw new ConfigurationError('storage.root is not configured');
      }
      blobStore = new LocalBlobStore({
        root: config.storage.root,
        ...(config.storage.publicBaseUrl ? { publicBaseUrl: config.storage.publicBaseUrl } : {}),
        ...(config.storage.signingSecret ? { signingSecret: config.storage.signingSecret } : {}),
      });
    }

    const sparseEncoder = deps.sparseEncoder
      ?? (config.sparse.encoderUrl
        ? new HttpSparseEncoder(config.sparse.encoderUrl, config.sparse.apiKey)
        : new TfidfSparseEncoder());

    const db = new DatabaseService(config.database.path);
    db.initialize();
    const applied = new MigrationManager(db).migrate();
    if (applied > 0) {
      logger.debug(`Applied ${applied} migration(s)`);
    }

    const documents = new DocumentRepository(db);
    const chunks = new ChunkRepository(db);
    const vectors = new SqliteVectorStore(db);
    const embeddings = new EmbeddingService(embeddingProvider, sparseEncoder, {
      batchSize: config.providers.openai?.embeddingBatchSize ?? 10,
      maxParallel: config.processing.maxParallelEmbeddings,
    });
    const { maxEmbeddingTokens, ...chunking } = config.chunking;
    const indexer = new Indexer(db, chunks, vectors, embeddings, maxEmbeddingTokens);

    const registry = new DocumentRegistry(db, documents, chunks, vectors, blobStore, indexer);
    const pipeline = new IngestionPipeline({
      documents,
      chunks,
      vectors,
      blobStore,
      parser: deps.parser ?? ParserChain.fromConfig(config, transcriber),
      images: new ImagePreprocessor(blobStore, visionProvider, {
        captioning: config.images.captioning,
        timeoutMs: config.images.timeoutMs,
        chartMaxTokens: config.images.chartMaxTokens,
        urlExpirySeconds: config.storage.urlExpirySeconds,
      }),
      chunker: new LayoutChunker(chunking),
      indexer,
      urlExpirySeconds: config.storage.urlExpirySeconds,
    });

    const reranker = new Reranker(
      {
        url: config.reranker.url,
        model: config.reranker.model,
        timeoutMs: config.reranker.timeoutMs,
        ...(config.reranker.apiKey ? { apiKey: config.reranker.apiKey } : {}),
      },
      embeddings
    );
    const searchService = new SearchService(chunks, vectors, embeddings, reranker, config.retrieval);
    const exporter = new MarkdownExportService(documents, chunks, textProvider, {
      summaryMaxChars: config.summary.maxChars,
    });

    const jobOptions = new Map<string, ProcessOptions>();
    const queue = new IngestionQueue(
      {
        run: async (documentId) => {
          await pipeline.process(documentId, jobOptions.get(documentId) ?? {});
        },
        onSettled: (documentId) => {
          jobOptions.delete(documentId);
        },
        beforeRetry: (documentId) => {
          pipeline.reset(documentId);
        },
      },
      {
        concurrency: config.processing.maxConcurrentJobs,
        maxRetries: config.processing.maxRetries,
        retryDelayMs: config.processing.retryDelayMs,
      }
    );

    return new KnowledgeBase(
      db,
      documents,
      vectors,
      blobStore,
      registry,
      pipeline,
      searchService,
      exporter,
      queue,
      jobOptions
    );
  }

  /**
   * Register a file. Existing content in the collection is returned as is; content already
   * indexed elsewhere comes back READY.
   */
  async upload(
    collectionId: string,
    filename: string,
    bytes: Buffer,
    metadata?: Record<string, unknown>
  ): Promise<Document> {
    const result = await this.registry.register(collectionId, filename, bytes, metadata);
    return result.document;
  }

  /**
   * Queue a document for processing and return its current state
   */
  process(documentId: string, options: ProcessOptions = {}): Document {
    const document = this.registry.getOrThrow(documentId);
    if (document.status === 'UPLOADED') {
      if (!this.queue.isPending(documentId)) this.jobOptions.set(documentId, options);
      this.queue.enqueue(documentId);
    }
    return document;
  }

  /**
   * Process in the foreground; resolves with the final document or rejects with the stage error
   */
  async processNow(documentId: string, options: ProcessOptions = {}): Promise<Document> {
    return this.pipeline.process(documentId, options);
  }

  /**
   * Retire the current chunks and vectors and queue the document again
   */
  reparse(documentId: string, options: ProcessOptions = {}): Document {
    const document = this.pipeline.reset(documentId);
    this.jobOptions.set(documentId, options);
    this.queue.enqueue(documentId);
    return document;
  }

  async search(request: SearchRequest): Promise<SearchResponse> {
    return this.searchService.search(request);
  }

  async getMarkdown(documentId: string): Promise<MarkdownExport> {
    return this.exporter.getMarkdown(documentId);
  }

  /**
   * Remove vectors, chunks and the document row. Blob deletion is best effort.
   */
  async delete(documentId: string): Promise<boolean> {
    const document = this.registry.getOrThrow(documentId);
    this.vectors.deleteByDocument(documentId);
    const deleted = this.documents.delete(documentId);

    try {
      await this.blobStore.delete(document.storage_path);
    } catch (error) {
      logger.warn(`Could not delete blob ${document.storage_path}`, describeError(error));
    }
    return deleted;
  }

  getDocument(documentId: string): Document | null {
    return this.documents.getById(documentId);
  }

  listDocuments(collectionId?: string): Document[] {
    return this.documents.list(collectionId);
  }

  getFailures(): JobFailure[] {
    return this.queue.getFailures();
  }

  getStats(): KnowledgeBaseStats {
    return this.db.getStats();
  }

  async waitForIdle(): Promise<void> {
    await this.queue.waitForIdle();
  }

  async close(): Promise<void> {
    await this.waitForIdle();
    this.db.close();
  }
}
