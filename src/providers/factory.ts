import { AIProvider } from '../types/provider.js';
import { KnowledgeBaseConfig } from '../types/config.js';
import { OpenAIProvider } from './openai.js';
import { ConfigurationError } from '../utils/errors.js';

export type ProviderName = 'openai';

export class ProviderFactory {
  /**
   * Create an AI provider instance
   */
  static createProvider(name: ProviderName, config: KnowledgeBaseConfig): AIProvider {
    switch (name) {
      case 'openai': {
        const openai = config.providers.openai;
        if (!openai || openai.apiKey.trim().length === 0) {
          throw new ConfigurationError('API key is required for openai provider');
        }
        return new OpenAIProvider({
          apiKey: openai.apiKey,
          ...(openai.baseUrl ? { baseUrl: openai.baseUrl } : {}),
          embeddingModel: openai.embeddingModel,
          embeddingDimension: openai.embeddingDimension,
          summaryModel: openai.summaryModel,
          visionModel: openai.visionModel,
          transcriptionModel: openai.transcriptionModel,
        });
      }
      default:
        throw new ConfigurationError(`Unsupported provider: ${String(name)}`);
    }
  }

  static getSupportedProviders(): ProviderName[] {
    return ['openai'];
  }

  static isValidProvider(name: string): name is ProviderName {
    return this.getSupportedProviders().some((provider) => provider === name);
  }

  /**
   * The first configured provider
   */
  static createFromConfig(config: KnowledgeBaseConfig): AIProvider {
    if (config.providers.openai?.apiKey) {
      return this.createProvider('openai', config);
    }
    throw new ConfigurationError('At least one provider must be configured');
  }
}
