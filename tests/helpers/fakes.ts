import crypto from 'crypto';
import {
  EmbeddingProvider,
  TextGenerationOptions,
  TextGenerationResult,
  TextProvider,
  VisionProvider,
} from '../../src/types/provider.js';
import { Parser } from '../../src/parsers/chain.js';
import { ParseInput, ParseResult } from '../../src/parsers/types.js';
import { Block } from '../../src/types/document.js';
import { MemoryBlobStore } from '../../src/services/blob-store.js';
import { KnowledgeBase, KnowledgeBaseDependencies } from '../../src/services/knowledge-base.js';
import { KnowledgeBaseConfigInput, buildConfig } from '../../src/types/config.js';
import { tokenize } from '../../src/utils/sparse.js';

/**
 * Hashed bag-of-words embeddings: texts sharing words get similar vectors
 */
export class FakeEmbeddingProvider implements EmbeddingProvider {
  name = 'fake-embedding';
  readonly dimension: number;
  calls: string[][] = [];
  failure: Error | null = null;

  constructor(dimension = 64) {
    this.dimension = dimension;
  }

  async batchGenerateEmbeddings(texts: string[]): Promise<number[][]> {
    this.calls.push([...texts]);
    if (this.failure) throw this.failure;
    return texts.map((text) => this.vectorFor(text));
  }

  vectorFor(text: string): number[] {
    const vector = new Array<number>(this.dimension).fill(0);
    for (const token of tokenize(text)) {
      const slot = parseInt(crypto.createHash('md5').update(token).digest('hex').slice(0, 8), 16) % this.dimension;
      vector[slot] = (vector[slot] ?? 0) + 1;
    }
    return vector;
  }

  get embeddedTextCount(): number {
    return this.calls.reduce((sum, batch) => sum + batch.length, 0);
  }
}

export class FakeTextProvider implements TextProvider, VisionProvider {
  name = 'fake-text';
  prompts: string[] = [];
  options: Array<TextGenerationOptions | undefined> = [];
  visionAnswers: string[] = [];

  constructor(private reply = 'A short summary.') {}

  async generateText(prompt: string, options?: TextGenerationOptions): Promise<TextGenerationResult> {
    this.prompts.push(prompt);
    this.options.push(options);
    return { text: this.reply };
  }

  async describeImage(_image: Buffer, prompt: string): Promise<string> {
    this.prompts.push(prompt);
    return this.visionAnswers.shift() ?? 'OTHER';
  }
}

/**
 * Parser returning fixed blocks and counting invocations
 */
export class StaticParser implements Parser {
  calls = 0;

  constructor(private blocks: Block[], private markdown = '') {}

  async parse(_input: ParseInput): Promise<ParseResult> {
    this.calls++;
    return {
      markdown: this.markdown,
      blocks: this.blocks.map((block) => ({ ...block, pageNumbers: [...block.pageNumbers] })),
      engine: 'static',
    };
  }
}

export interface TestKnowledgeBase {
  kb: KnowledgeBase;
  embedding: FakeEmbeddingProvider;
  blobStore: MemoryBlobStore;
}

export function createTestKnowledgeBase(
  deps: KnowledgeBaseDependencies = {},
  config: KnowledgeBaseConfigInput = {}
): TestKnowledgeBase {
  const embedding = new FakeEmbeddingProvider();
  const blobStore = new MemoryBlobStore();
  const kb = KnowledgeBase.open(
    buildConfig({
      ...config,
      database: { path: ':memory:' },
      processing: { retryDelayMs: 0, maxRetries: 1, ...config.processing },
    }),
    {
      embedding,
      text: null,
      vision: null,
      transcription: null,
      blobStore,
      ...deps,
    }
  );
  return { kb, embedding, blobStore };
}
