import crypto from 'crypto';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { DatabaseService } from './database.js';
import { DocumentRepository } from './document-repository.js';
import { ChunkRepository } from './chunk-repository.js';
import { VectorRecord, VectorStore } from './vector-store.js';
import { BlobStore } from './blob-store.js';
import { Indexer, searchableChunks } from './indexer.js';
import { Document, NewChunk } from '../types/document.js';
import { isSupportedFile } from '../parsers/chain.js';
import {
  DocumentNotFoundError,
  UnsupportedFileTypeError,
  ValidationError,
  describeError,
} from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

export interface RegisterResult {
  document: Document;
  /** false when the same content already existed in the collection */
  created: boolean;
  /** true when chunks and vectors were cloned from an indexed copy */
  fastPath: boolean;
}

export function contentHash(bytes: Buffer): string {
  return crypto.createHash('sha256').update(bytes).digest('hex');
}

export function storagePath(collectionId: string, documentId: string, filename: string): string {
  return `rag/${collectionId}/${documentId}/${path.basename(filename)}`;
}

const logger = createLogger('registry');

/**
 * Entry point for uploads: dedup by content hash, blob storage, and the cross-collection fast path
 */
export class DocumentRegistry {
  constructor(
    private db: DatabaseService,
    private documents: DocumentRepository,
    private chunks: ChunkRepository,
    private vectors: VectorStore,
    private blobStore: BlobStore,
    private indexer: Indexer
  ) {}

  async register(
    collectionId: string,
    filename: string,
    bytes: Buffer,
    metadata?: Record<string, unknown>
  ): Promise<RegisterResult> {
    if (!collectionId.trim()) {
      throw new ValidationError('collectionId is required');
    }
    if (!isSupportedFile(filename)) {
      throw new UnsupportedFileTypeError(filename);
    }
    if (bytes.length === 0) {
      throw new ValidationError(`File is empty: ${filename}`);
    }

    const hash = contentHash(bytes);
    const existing = this.documents.findByHash(collectionId, hash);
    if (existing) {
      logger.debug(`${filename} already exists in ${collectionId} as ${existing.id}`);
      return { document: existing, created: false, fastPath: false };
    }

    const id = uuidv4();
    const key = storagePath(collectionId, id, filename);
    await this.blobStore.put(key, bytes);

    let document: Document;
    try {
      document = this.documents.create({
        id,
        collection_id: collectionId,
        filename: path.basename(filename),
        content_hash: hash,
        byte_size: bytes.length,
        storage_path: key,
        metadata: metadata ?? null,
      });
    } catch (error) {
      // A concurrent upload of the same bytes won the unique (collection, hash) race
      const winner = this.documents.findByHash(collectionId, hash);
      if (winner) {
        await this.blobStore.delete(key);
        return { document: winner, created: false, fastPath: false };
      }
      throw error;
    }

    const cloned = await this.cloneFromDonor(document);
    return cloned
      ? { document: cloned, created: true, fastPath: true }
      : { document, created: true, fastPath: false };
  }

  getOrThrow(documentId: string): Document {
    const document = this.documents.getById(documentId);
    if (!document) {
      throw new DocumentNotFoundError(documentId);
    }
    return document;
  }

  /**
   * Copy chunks and vectors from a READY document with the same content.
   * Returns null, leaving the document in UPLOADED, when there is no donor or cloning fails.
   */
  async cloneFromDonor(document: Document): Promise<Document | null> {
    const donor = this.documents.findReadyDonor(document.content_hash, document.id);
    if (!donor) return null;

    const donorChunks = this.chunks.listByDocument(donor.id);
    if (donorChunks.length === 0) return null;

    try {
      const idMap = new Map(donorChunks.map((chunk) => [chunk.id, uuidv4()]));
      const clones: NewChunk[] = donorChunks.map((chunk) => ({
        id: idMap.get(chunk.id) ?? uuidv4(),
        document_id: document.id,
        collection_id: document.collection_id,
        parent_chunk_id: chunk.parent_chunk_id ? idMap.get(chunk.parent_chunk_id) ?? null : null,
        chunk_index: chunk.chunk_index,
        page_numbers: [...chunk.page_numbers],
        chunk_type: chunk.chunk_type,
        content: chunk.content,
        token_count: chunk.token_count,
      }));

      this.chunks.bulkCreate(clones);

      const searchable = searchableChunks(clones);
      const reverse = new Map([...idMap.entries()].map(([from, to]) => [to, from]));
      const donorVectors = new Map(
        this.vectors
          .getByChunkIds(searchable.flatMap((chunk) => reverse.get(chunk.id) ?? []))
          .map((record) => [record.chunkId, record])
      );

      const copied: VectorRecord[] = [];
      const missing: NewChunk[] = [];
      for (const chunk of searchable) {
        const source = donorVectors.get(reverse.get(chunk.id) ?? '');
        if (source) {
          copied.push({ ...source, chunkId: chunk.id, collectionId: document.collection_id, documentId: document.id });
        } else {
          missing.push(chunk);
        }
      }

      const embedded = await this.indexer.embedChunks(missing, document);
      this.vectors.upsert([...copied, ...embedded]);

      const ready = this.db.transaction(() => {
        this.documents.transition(document.id, 'PARSING');
        this.documents.transition(document.id, 'PARSED');
        this.documents.transition(document.id, 'EMBEDDING');
        return this.documents.transition(document.id, 'READY');
      });
      if (donor.summary) {
        this.documents.setSummary(document.id, donor.summary);
      }

      logger.info(
        `Fast path: ${document.filename} cloned from ${donor.id} (${clones.length} chunks, ${copied.length} vectors copied, ${embedded.length} embedded)`
      );
      return this.documents.getById(document.id) ?? ready;
    } catch (error) {
      logger.warn(`Fast path failed for ${document.id}, falling back to the full pipeline`, describeError(error));
      this.vectors.deleteByDocument(document.id);
      this.chunks.deactivateByDocument(document.id);
      return null;
    }
  }
}
