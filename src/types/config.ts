import { z } from 'zod';

export const KnowledgeBaseConfigSchema = z.object({
  version: z.string().default('0.1.0'),
  providers: z.object({
    openai: z.object({
      apiKey: z.string(),
      baseUrl: z.string().url().optional(),
      embeddingModel: z.string().default('text-embedding-3-small'),
      embeddingDimension: z.number().int().positive().default(1536),
      embeddingBatchSize: z.number().int().min(1).max(2048).default(10),
      summaryModel: z.string().default('gpt-4o-mini'),
      visionModel: z.string().default('gpt-4o-mini'),
      transcriptionModel: z.string().default('whisper-1'),
    }).optional(),
  }).default({}),
  database: z.object({
    path: z.string().default(''),
  }).default({}),
  storage: z.object({
    root: z.string().default(''),
    publicBaseUrl: z.string().url().optional(),
    signingSecret: z.string().optional(),
    urlExpirySeconds: z.number().int().positive().default(7 * 24 * 3600),
  }).default({}),
  parsing: z.object({
    external: z.object({
      baseUrl: z.string().url().default('https://mineru.net'),
      apiToken: z.string().optional(),
      modelVersion: z.string().default('pipeline'),
      language: z.string().default('en'),
      pollIntervalMs: z.number().int().positive().default(5000),
      pollTimeoutMs: z.number().int().positive().default(600_000),
    }).default({}),
    local: z.object({
      baseUrl: z.string().url().optional(),
      backend: z.string().default('pipeline'),
      language: z.string().default('en'),
      timeoutMs: z.number().int().positive().default(600_000),
    }).default({}),
  }).default({}),
  chunking: z.object({
    maxChildTokens: z.number().int().positive().default(512),
    maxParentTokens: z.number().int().positive().default(2000),
    minParentTokens: z.number().int().positive().default(600),
    minChildren: z.number().int().positive().default(3),
    pseudoTitleMaxChars: z.number().int().positive().default(64),
    splitOnPseudoTitle: z.boolean().default(true),
    splitOnPageBreak: z.boolean().default(true),
    splitOnTypeShift: z.boolean().default(true),
    maxEmbeddingTokens: z.number().int().positive().default(2048),
  }).default({}),
  images: z.object({
    captioning: z.boolean().default(false),
    timeoutMs: z.number().int().positive().default(30_000),
    chartMaxTokens: z.number().int().positive().default(1500),
  }).default({}),
  sparse: z.object({
    encoderUrl: z.string().url().optional(),
    apiKey: z.string().optional(),
  }).default({}),
  retrieval: z.object({
    recallExact: z.number().int().positive().default(10),
    recallSparse: z.number().int().positive().default(60),
    recallDense: z.number().int().positive().default(60),
    rrfK: z.number().positive().default(60),
    rrfTop: z.number().int().positive().default(20),
    rerankThreshold: z.number().min(0).max(1).default(0.2),
    fallbackCosineThreshold: z.number().min(-1).max(1).default(0.85),
    timeoutMs: z.number().int().positive().default(30_000),
  }).default({}),
  reranker: z.object({
    url: z.string().url().default('https://api.jina.ai/v1/rerank'),
    apiKey: z.string().optional(),
    model: z.string().default('jina-reranker-v2-base-multilingual'),
    timeoutMs: z.number().int().positive().default(30_000),
  }).default({}),
  summary: z.object({
    maxChars: z.number().int().positive().default(6000),
  }).default({}),
  processing: z.object({
    maxParallelEmbeddings: z.number().int().min(1).max(20).default(4),
    maxConcurrentJobs: z.number().int().min(1).max(20).default(2),
    maxRetries: z.number().int().min(1).max(10).default(3),
    retryDelayMs: z.number().int().nonnegative().default(60_000),
  }).default({}),
});

export type KnowledgeBaseConfig = z.infer<typeof KnowledgeBaseConfigSchema>;
export type KnowledgeBaseConfigInput = z.input<typeof KnowledgeBaseConfigSchema>;
export type ChunkingConfig = KnowledgeBaseConfig['chunking'];
export type RetrievalConfig = KnowledgeBaseConfig['retrieval'];

/**
 * Parse a partial configuration, filling every default
 */
export function buildConfig(input: KnowledgeBaseConfigInput = {}): KnowledgeBaseConfig {
  return KnowledgeBaseConfigSchema.parse(input);
}
