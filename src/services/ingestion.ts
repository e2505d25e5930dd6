import { DocumentRepository } from './document-repository.js';
import { ChunkRepository } from './chunk-repository.js';
import { VectorStore } from './vector-store.js';
import { BlobStore } from './blob-store.js';
import { ImagePreprocessor } from './image-preprocessor.js';
import { Indexer } from './indexer.js';
import { Parser } from '../parsers/chain.js';
import { LayoutChunker } from '../utils/chunking.js';
import { Document, DocumentStatus, NewChunk } from '../types/document.js';
import {
  DocumentNotFoundError,
  InvalidStatusTransitionError,
  ParseError,
  describeError,
} from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

export interface IngestionDependencies {
  documents: DocumentRepository;
  chunks: ChunkRepository;
  vectors: VectorStore;
  blobStore: BlobStore;
  parser: Parser;
  images: ImagePreprocessor;
  chunker: LayoutChunker;
  indexer: Indexer;
  urlExpirySeconds: number;
}

export interface ProcessOptions {
  /** Run vision captioning even when it is disabled in configuration */
  forceCaptioning?: boolean;
  signal?: AbortSignal;
}

/**
 * Error raised inside the pipeline, tagged with the stage it happened in
 */
export class StageError extends Error {
  constructor(public stage: DocumentStatus, public original: unknown) {
    super(`${stage}: ${describeError(original)}`);
    this.name = 'StageError';
  }
}

const logger = createLogger('ingestion');

export function formatErrorLog(stage: DocumentStatus, error: unknown): string {
  const stack = error instanceof Error && error.stack ? `\n${error.stack}` : '';
  return `[${stage}] ${describeError(error)}${stack}`;
}

/**
 * Parse, preprocess, chunk and index one document, moving it through the status machine
 */
export class IngestionPipeline {
  constructor(private deps: IngestionDependencies) {}

  /**
   * Returns the document unchanged when another worker already owns it
   */
  async process(documentId: string, options: ProcessOptions = {}): Promise<Document> {
    const { documents } = this.deps;
    const document = documents.getById(documentId);
    if (!document) {
      throw new DocumentNotFoundError(documentId);
    }

    try {
      documents.transition(documentId, 'PARSING');
    } catch (error) {
      if (error instanceof InvalidStatusTransitionError) {
        logger.debug(`Skipping ${documentId}: already ${error.from}`);
        return documents.getById(documentId) ?? document;
      }
      throw error;
    }

    const startTime = Date.now();
    let stage: DocumentStatus = 'PARSING';
    try {
      const chunks = await this.parseAndChunk(document, options);
      documents.transition(documentId, 'PARSED');

      stage = 'EMBEDDING';
      documents.transition(documentId, 'EMBEDDING');
      const result = await this.deps.indexer.index(chunks, document, options.signal);

      const ready = documents.transition(documentId, 'READY');
      logger.info(
        `${document.filename} ready: ${result.chunkCount} chunks, ${result.vectorCount} vectors in ${Date.now() - startTime}ms`
      );
      return ready;
    } catch (error) {
      this.deps.vectors.deleteByDocument(documentId);
      try {
        documents.transition(documentId, 'FAILED', formatErrorLog(stage, error));
      } catch (statusError) {
        logger.warn(`Could not mark ${documentId} as FAILED`, describeError(statusError));
      }
      logger.error(`${document.filename} failed at ${stage}`, describeError(error));
      throw new StageError(stage, error);
    }
  }

  /**
   * Retire the current chunks and vectors and put the document back in UPLOADED
   */
  reset(documentId: string): Document {
    const { documents, chunks, vectors } = this.deps;
    const document = documents.getById(documentId);
    if (!document) {
      throw new DocumentNotFoundError(documentId);
    }

    const updated = documents.transition(documentId, 'UPLOADED', null);
    vectors.deleteByDocument(documentId);
    const retired = chunks.deactivateByDocument(documentId);
    logger.debug(`Reset ${documentId}: ${retired} chunks retired`);
    return updated;
  }

  private async parseAndChunk(document: Document, options: ProcessOptions): Promise<NewChunk[]> {
    const { blobStore, parser, images, chunker, documents } = this.deps;
    const bytes = await blobStore.get(document.storage_path);
    const parsed = await parser.parse({
      filename: document.filename,
      bytes,
      resolveUrl: () => blobStore.presignedUrl(document.storage_path, this.deps.urlExpirySeconds),
      ...(options.signal ? { signal: options.signal } : {}),
    });
    documents.setParserEngine(document.id, parsed.engine);

    const target = { documentId: document.id, collectionId: document.collection_id };
    const blocks = await images.preprocess(parsed.blocks, target, options.forceCaptioning ?? false);
    let chunks = blocks.length > 0 ? chunker.chunk(blocks, target) : [];
    if (chunks.length === 0) {
      chunks = chunker.chunkMarkdown(parsed.markdown, target);
    }

    if (chunks.length === 0) {
      throw new ParseError(`No content extracted from ${document.filename}`);
    }
    logger.debug(`${document.filename}: ${blocks.length} blocks -> ${chunks.length} chunks via ${parsed.engine}`);
    return chunks;
  }
}
