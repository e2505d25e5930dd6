import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { KnowledgeBase } from '../../src/services/knowledge-base.js';
import { MemoryBlobStore } from '../../src/services/blob-store.js';
import { StageError } from '../../src/services/ingestion.js';
import { ApiError, UnsupportedFileTypeError, ValidationError } from '../../src/utils/errors.js';
import { setSilent } from '../../src/utils/logger.js';
import { FakeEmbeddingProvider, StaticParser, createTestKnowledgeBase } from '../helpers/fakes.js';
import { POLICY_BYTES, POLICY_PARENT, policyBlocks } from '../helpers/fixtures.js';

/** Fails the first N embedding calls with a retryable provider error */
class FlakyEmbeddingProvider extends FakeEmbeddingProvider {
  constructor(private failuresLeft: number) {
    super();
  }

  override async batchGenerateEmbeddings(texts: string[]): Promise<number[][]> {
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      throw new ApiError('provider busy', 'fake-embedding', 503);
    }
    return super.batchGenerateEmbeddings(texts);
  }
}

describe('document ingestion', () => {
  let kb: KnowledgeBase;
  let parser: StaticParser;
  let embedding: FakeEmbeddingProvider;
  let blobStore: MemoryBlobStore;

  beforeEach(() => {
    setSilent(true);
    parser = new StaticParser(policyBlocks());
    ({ kb, embedding, blobStore } = createTestKnowledgeBase({ parser }));
  });

  afterEach(async () => {
    await kb.close();
    setSilent(false);
  });

  it('uploads, parses, chunks and indexes a document', async () => {
    const uploaded = await kb.upload('col-a', 'policy.pdf', POLICY_BYTES, { source: 'test' });
    expect(uploaded.status).toBe('UPLOADED');
    expect(uploaded.storage_path).toBe(`rag/col-a/${uploaded.id}/policy.pdf`);
    expect(blobStore.blobs.get(uploaded.storage_path)?.equals(POLICY_BYTES)).toBe(true);

    const ready = await kb.processNow(uploaded.id);

    expect(ready.status).toBe('READY');
    expect(ready.parser_engine).toBe('static');
    expect(ready.metadata).toEqual({ source: 'test' });
    expect(kb.getStats()).toEqual({ documents: 1, chunks: 4, activeChunks: 4, vectors: 3 });
    expect(embedding.embeddedTextCount).toBe(3);

    const exported = await kb.getMarkdown(uploaded.id);
    expect(exported.segments.map((segment) => segment.content)).toEqual([POLICY_PARENT]);
  });

  it('returns the existing document when the same content is uploaded twice', async () => {
    const first = await kb.upload('col-a', 'policy.pdf', POLICY_BYTES);
    const second = await kb.upload('col-a', 'policy-copy.pdf', POLICY_BYTES);

    expect(second.id).toBe(first.id);
    expect(second.filename).toBe('policy.pdf');
    expect(kb.listDocuments('col-a')).toHaveLength(1);
    expect(blobStore.blobs.size).toBe(1);
  });

  it('clones chunks and vectors when the content is indexed in another collection', async () => {
    const original = await kb.upload('col-a', 'policy.pdf', POLICY_BYTES);
    await kb.processNow(original.id);
    const embeddedBefore = embedding.embeddedTextCount;

    const copy = await kb.upload('col-b', 'policy.pdf', POLICY_BYTES);

    expect(copy.id).not.toBe(original.id);
    expect(copy.collection_id).toBe('col-b');
    expect(copy.status).toBe('READY');
    expect(parser.calls).toBe(1);
    expect(embedding.embeddedTextCount).toBe(embeddedBefore);
    expect(kb.getStats()).toEqual({ documents: 2, chunks: 8, activeChunks: 8, vectors: 6 });

    const exported = await kb.getMarkdown(copy.id);
    expect(exported.segments.map((segment) => segment.content)).toEqual([POLICY_PARENT]);
    expect(exported.segments[0]?.chunkId).not.toBe((await kb.getMarkdown(original.id)).segments[0]?.chunkId);

    const response = await kb.search({ collectionId: 'col-b', query: 'Northwind Logistics', enableRerank: false });
    expect(response.hits[0]?.documentId).toBe(copy.id);
    expect(response.hits[0]?.parentContent).toBe(POLICY_PARENT);
  });

  it('processes queued documents in the background', async () => {
    const uploaded = await kb.upload('col-a', 'policy.pdf', POLICY_BYTES);

    expect(kb.process(uploaded.id).status).toBe('UPLOADED');
    await kb.waitForIdle();

    expect(kb.getDocument(uploaded.id)?.status).toBe('READY');
    expect(kb.process(uploaded.id).status).toBe('READY');
    await kb.waitForIdle();
    expect(parser.calls).toBe(1);
  });

  it('reparses by retiring the previous chunks', async () => {
    const uploaded = await kb.upload('col-a', 'policy.pdf', POLICY_BYTES);
    await kb.processNow(uploaded.id);

    expect(kb.reparse(uploaded.id).status).toBe('UPLOADED');
    await kb.waitForIdle();

    expect(kb.getDocument(uploaded.id)?.status).toBe('READY');
    expect(parser.calls).toBe(2);
    expect(kb.getStats()).toEqual({ documents: 1, chunks: 8, activeChunks: 4, vectors: 3 });
  });

  it('marks the document FAILED with a stage log when nothing is extracted', async () => {
    const empty = createTestKnowledgeBase({ parser: new StaticParser([]) });
    try {
      const uploaded = await empty.kb.upload('col-a', 'empty.pdf', Buffer.from('%PDF-1.7 blank'));

      await expect(empty.kb.processNow(uploaded.id)).rejects.toBeInstanceOf(StageError);

      const failed = empty.kb.getDocument(uploaded.id);
      expect(failed?.status).toBe('FAILED');
      expect(failed?.error_log?.split('\n')[0]).toBe('[PARSING] ParseError: No content extracted from empty.pdf');
      expect(empty.kb.getStats().vectors).toBe(0);
    } finally {
      await empty.kb.close();
    }
  });

  it('retires the new chunks when embedding fails', async () => {
    embedding.failure = new Error('provider down');
    const uploaded = await kb.upload('col-a', 'policy.pdf', POLICY_BYTES);

    await expect(kb.processNow(uploaded.id)).rejects.toBeInstanceOf(StageError);

    const failed = kb.getDocument(uploaded.id);
    expect(failed?.status).toBe('FAILED');
    expect(failed?.error_log?.startsWith('[EMBEDDING] EmbeddingError: ')).toBe(true);
    expect(kb.getStats()).toEqual({ documents: 1, chunks: 4, activeChunks: 0, vectors: 0 });

    const response = await kb.search({ collectionId: 'col-a', query: 'Northwind Logistics', enableDense: false });
    expect(response.hits).toEqual([]);
    expect(response.pathStats.exact).toBe(0);
  });

  it('records a queue failure without retrying parse errors', async () => {
    const empty = createTestKnowledgeBase({ parser: new StaticParser([]) }, { processing: { maxRetries: 3 } });
    try {
      const uploaded = await empty.kb.upload('col-a', 'empty.pdf', Buffer.from('%PDF-1.7 blank'));
      empty.kb.process(uploaded.id);
      await empty.kb.waitForIdle();

      expect(empty.kb.getFailures()).toEqual([
        {
          documentId: uploaded.id,
          error: 'StageError: PARSING: ParseError: No content extracted from empty.pdf',
          attempts: 1,
        },
      ]);
    } finally {
      await empty.kb.close();
    }
  });

  it('retries transient embedding failures from a clean state', async () => {
    const flaky = new FlakyEmbeddingProvider(1);
    const flakyParser = new StaticParser(policyBlocks());
    const retrying = createTestKnowledgeBase(
      { parser: flakyParser, embedding: flaky },
      { processing: { maxRetries: 2 } }
    );
    try {
      const uploaded = await retrying.kb.upload('col-a', 'policy.pdf', POLICY_BYTES);
      retrying.kb.process(uploaded.id);
      await retrying.kb.waitForIdle();

      expect(retrying.kb.getDocument(uploaded.id)?.status).toBe('READY');
      expect(retrying.kb.getFailures()).toEqual([]);
      expect(flakyParser.calls).toBe(2);
      expect(retrying.kb.getStats()).toEqual({ documents: 1, chunks: 8, activeChunks: 4, vectors: 3 });
    } finally {
      await retrying.kb.close();
    }
  });

  it('validates uploads', async () => {
    await expect(kb.upload('col-a', 'tool.exe', Buffer.from('MZ'))).rejects.toBeInstanceOf(UnsupportedFileTypeError);
    await expect(kb.upload('col-a', 'empty.pdf', Buffer.alloc(0))).rejects.toBeInstanceOf(ValidationError);
    await expect(kb.upload(' ', 'policy.pdf', POLICY_BYTES)).rejects.toBeInstanceOf(ValidationError);
  });

  it('deletes a document with its chunks, vectors and blob', async () => {
    const uploaded = await kb.upload('col-a', 'policy.pdf', POLICY_BYTES);
    await kb.processNow(uploaded.id);

    expect(await kb.delete(uploaded.id)).toBe(true);

    expect(kb.getDocument(uploaded.id)).toBeNull();
    expect(kb.getStats()).toEqual({ documents: 0, chunks: 0, activeChunks: 0, vectors: 0 });
    expect(blobStore.blobs.size).toBe(0);
  });
});
