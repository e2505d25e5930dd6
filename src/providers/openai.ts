import OpenAI, { toFile } from 'openai';
import { BaseAIProvider, RetryPolicy } from './base.js';
import { TextGenerationOptions, TextGenerationResult } from '../types/provider.js';
import { ApiError, describeError } from '../utils/errors.js';

export interface OpenAIProviderOptions {
  apiKey: string;
  baseUrl?: string;
  embeddingModel?: string;
  embeddingDimension?: number;
  summaryModel?: string;
  visionModel?: string;
  transcriptionModel?: string;
  retry?: Partial<RetryPolicy>;
}

/** Model families that accept an explicit `dimensions` parameter */
const DIMENSION_AWARE_MODELS = ['text-embedding-3', 'text-embedding-v'];

export class OpenAIProvider extends BaseAIProvider {
  name = 'openai';
  readonly dimension: number;
  private client: OpenAI;
  private embeddingModel: string;
  private summaryModel: string;
  private visionModel: string;
  private transcriptionModel: string;

  constructor(options: OpenAIProviderOptions) {
    super(options.apiKey, options.retry);
    this.client = new OpenAI({
      apiKey: options.apiKey,
      ...(options.baseUrl ? { baseURL: options.baseUrl } : {}),
    });
    this.embeddingModel = options.embeddingModel ?? 'text-embedding-3-small';
    this.dimension = options.embeddingDimension ?? 1536;
    this.summaryModel = options.summaryModel ?? 'gpt-4o-mini';
    this.visionModel = options.visionModel ?? 'gpt-4o-mini';
    this.transcriptionModel = options.transcriptionModel ?? 'whisper-1';
  }

  async batchGenerateEmbeddings(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    this.validateBatchTexts(texts);
    const sendDimensions = DIMENSION_AWARE_MODELS.some((prefix) => this.embeddingModel.includes(prefix));

    try {
      const response = await this.withRetry(
        () =>
          this.client.embeddings.create(
            {
              model: this.embeddingModel,
              input: texts,
              ...(sendDimensions ? { dimensions: this.dimension } : {}),
            },
            signal ? { signal } : undefined
          ),
        signal
      );

      return [...response.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
    } catch (error) {
      throw new ApiError(`Failed to generate batch embeddings: ${describeError(error)}`, this.name);
    }
  }

  /**
   * Generate text using OpenAI chat completion with flexible options
   */
  async generateText(prompt: string, options?: TextGenerationOptions): Promise<TextGenerationResult> {
    const opts = {
      model: this.summaryModel,
      maxTokens: 500,
      temperature: 0.1,
      ...options,
    };

    try {
      const response = await this.withRetry(
        () =>
          this.client.chat.completions.create(
            {
              model: opts.model,
              messages: [{ role: 'user', content: prompt }],
              max_tokens: opts.maxTokens,
              temperature: opts.temperature,
            },
            opts.signal ? { signal: opts.signal } : undefined
          ),
        opts.signal
      );

      const result: TextGenerationResult = {
        text: response.choices[0]?.message?.content?.trim() ?? '',
      };

      if (response.usage) {
        result.usage = {
          promptTokens: response.usage.prompt_tokens,
          completionTokens: response.usage.completion_tokens,
          totalTokens: response.usage.total_tokens,
        };
      }

      return result;
    } catch (error) {
      throw new ApiError(`Failed to generate text: ${describeError(error)}`, this.name);
    }
  }

  /**
   * Ask the vision model about an image passed inline as a data URI
   */
  async describeImage(image: Buffer, prompt: string, options?: TextGenerationOptions): Promise<string> {
    const opts = {
      model: this.visionModel,
      maxTokens: 1024,
      temperature: 0.2,
      ...options,
    };
    const dataUri = `data:${detectImageMime(image)};base64,${image.toString('base64')}`;

    try {
      const response = await this.withRetry(
        () =>
          this.client.chat.completions.create(
            {
              model: opts.model,
              messages: [
                {
                  role: 'user',
                  content: [
                    { type: 'text', text: prompt },
                    { type: 'image_url', image_url: { url: dataUri } },
                  ],
                },
              ],
              max_tokens: opts.maxTokens,
              temperature: opts.temperature,
            },
            opts.signal ? { signal: opts.signal } : undefined
          ),
        opts.signal
      );

      return response.choices[0]?.message?.content?.trim() ?? '';
    } catch (error) {
      throw new ApiError(`Failed to describe image: ${describeError(error)}`, this.name);
    }
  }

  async transcribeAudio(audio: Buffer, filename: string): Promise<string> {
    try {
      const response = await this.withRetry(async () =>
        this.client.audio.transcriptions.create({
          file: await toFile(audio, filename),
          model: this.transcriptionModel,
        })
      );
      return response.text.trim();
    } catch (error) {
      throw new ApiError(`Failed to transcribe audio: ${describeError(error)}`, this.name);
    }
  }
}

export function detectImageMime(image: Buffer): string {
  if (image.length >= 3 && image[0] === 0xff && image[1] === 0xd8 && image[2] === 0xff) return 'image/jpeg';
  if (image.subarray(0, 4).toString('ascii') === 'GIF8') return 'image/gif';
  if (image.subarray(0, 4).toString('ascii') === 'RIFF' && image.subarray(8, 12).toString('ascii') === 'WEBP') {
    return 'image/webp';
  }
  if (image.subarray(0, 2).toString('ascii') === 'BM') return 'image/bmp';
  return 'image/png';
}
