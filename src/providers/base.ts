import {
  AIProvider,
  TextGenerationOptions,
  TextGenerationResult,
} from '../types/provider.js';
import { ApiError, describeError } from '../utils/errors.js';
import { withRetry } from '../utils/retry.js';

export interface RetryPolicy {
  maxRetries: number;
  delayMs: number;
}

export abstract class BaseAIProvider implements AIProvider {
  abstract name: string;
  abstract readonly dimension: number;
  protected apiKey: string;
  protected retryPolicy: RetryPolicy;

  constructor(apiKey: string, retryPolicy: Partial<RetryPolicy> = {}) {
    this.apiKey = apiKey;
    this.retryPolicy = { maxRetries: 3, delayMs: 1000, ...retryPolicy };
  }

  abstract batchGenerateEmbeddings(texts: string[], signal?: AbortSignal): Promise<number[][]>;
  abstract generateText(prompt: string, options?: TextGenerationOptions): Promise<TextGenerationResult>;
  abstract describeImage(image: Buffer, prompt: string, options?: TextGenerationOptions): Promise<string>;
  abstract transcribeAudio(audio: Buffer, filename: string): Promise<string>;

  /**
   * Handle API errors with retry logic
   */
  protected async withRetry<T>(operation: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    try {
      return await withRetry(operation, {
        ...this.retryPolicy,
        shouldRetry: (error) => !this.isAuthError(error),
        ...(signal ? { signal } : {}),
      });
    } catch (error) {
      if (this.isAuthError(error)) {
        throw new ApiError(`Authentication failed: ${describeError(error)}`, this.name);
      }
      throw error;
    }
  }

  /**
   * Check if error is authentication related
   */
  protected isAuthError(error: unknown): boolean {
    const errorMessage = String(error).toLowerCase();
    return errorMessage.includes('unauthorized') ||
           errorMessage.includes('api key') ||
           errorMessage.includes('authentication');
  }

  /**
   * Validate batch texts input
   */
  protected validateBatchTexts(texts: string[]): void {
    if (texts.length === 0) {
      throw new ApiError('Texts array cannot be empty', this.name);
    }

    texts.forEach((text, index) => {
      if (!text || text.trim().length === 0) {
        throw new ApiError(`Invalid text at index ${index}: text cannot be empty`, this.name);
      }
    });
  }
}
