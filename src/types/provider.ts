export interface TextGenerationOptions {
  model?: string;
  maxTokens?: number;
  temperature?: number;
  signal?: AbortSignal;
}

export interface TextGenerationResult {
  text: string;
  usage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
}

export interface EmbeddingProvider {
  name: string;
  readonly dimension: number;
  batchGenerateEmbeddings(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

export interface TextProvider {
  name: string;
  generateText(prompt: string, options?: TextGenerationOptions): Promise<TextGenerationResult>;
}

export interface VisionProvider {
  name: string;
  describeImage(image: Buffer, prompt: string, options?: TextGenerationOptions): Promise<string>;
}

export interface TranscriptionProvider {
  name: string;
  transcribeAudio(audio: Buffer, filename: string): Promise<string>;
}

export type AIProvider = EmbeddingProvider & TextProvider & VisionProvider & TranscriptionProvider;

/** Sparse vector as term-id -> weight */
export type SparseVector = Map<number, number>;
