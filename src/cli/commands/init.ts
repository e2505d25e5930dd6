import { Command } from 'commander';
import { ConfigManager } from '../../utils/config.js';
import { OpenAIProvider } from '../../providers/openai.js';
import { KnowledgeBaseConfigInput } from '../../types/config.js';
import { ProgressIndicator } from '../utils/progress.js';
import { promptConfirm, promptSecure, promptUser, promptWithDefault } from '../utils/input.js';
import { formatValidationError, validateApiKey } from '../utils/validation.js';

export function createInitCommand(): Command {
  return new Command('init')
    .description('Create the configuration file with an interactive setup')
    .option('--config-path <path>', 'Path to configuration file')
    .option('--force', 'Overwrite existing configuration')
    .action(async (options: { configPath?: string; force?: boolean }) => {
      try {
        await initializeConfiguration(options);
      } catch (error) {
        console.error(formatValidationError(error));
        process.exit(1);
      }
    });
}

async function initializeConfiguration(options: { configPath?: string; force?: boolean }): Promise<void> {
  console.log('🚀 layoutkb configuration setup');
  console.log('');

  const configManager = new ConfigManager(options.configPath);
  if (configManager.exists() && !options.force) {
    const overwrite = await promptConfirm('Configuration already exists. Overwrite it?', false);
    if (!overwrite) {
      console.log('Configuration setup cancelled.');
      return;
    }
  }

  console.log('📋 Embedding and language model provider (OpenAI-compatible)');
  const apiKey = await promptSecure('API key: ');
  validateApiKey(apiKey);
  const baseUrl = await promptUser('Base URL (empty for api.openai.com): ');
  const embeddingModel = await promptWithDefault('Embedding model', 'text-embedding-3-small');
  const dimension = Number(await promptWithDefault('Embedding dimension', '1536'));
  if (!Number.isInteger(dimension) || dimension <= 0) {
    throw new Error('Embedding dimension must be a positive integer');
  }
  console.log('');

  console.log('📋 Document parsing');
  const localParserUrl = await promptUser('Local layout parser URL (empty to skip): ');
  const externalToken = await promptSecure('Hosted parse service token (empty to skip): ');
  const captioning = await promptConfirm('Describe images with the vision model?', false);
  console.log('');

  console.log('📋 Retrieval');
  const rerankKey = await promptSecure('Reranker API key (empty to use embedding similarity): ');
  console.log('');

  const config: KnowledgeBaseConfigInput = {
    providers: {
      openai: {
        apiKey,
        ...(baseUrl ? { baseUrl } : {}),
        embeddingModel,
        embeddingDimension: dimension,
      },
    },
    database: { path: configManager.getDefaultDatabasePath() },
    storage: { root: configManager.getDefaultStorageRoot() },
    parsing: {
      local: localParserUrl ? { baseUrl: localParserUrl } : {},
      external: externalToken ? { apiToken: externalToken } : {},
    },
    images: { captioning },
    reranker: rerankKey ? { apiKey: rerankKey } : {},
  };

  const progress = new ProgressIndicator('Saving configuration...');
  progress.start();
  try {
    await configManager.save(config);
    progress.stop(`Configuration saved to ${configManager.getConfigPath()}`);
  } catch (error) {
    progress.fail('Failed to save configuration');
    throw error;
  }

  console.log('');
  if (await promptConfirm('Test the embedding provider now?', true)) {
    await testProvider(new OpenAIProvider({
      apiKey,
      ...(baseUrl ? { baseUrl } : {}),
      embeddingModel,
      embeddingDimension: dimension,
    }));
  }

  console.log('');
  console.log('✅ Setup complete!');
  console.log('');
  console.log('Next steps:');
  console.log('  1. Initialize the database: layoutkb db-init');
  console.log('  2. Upload a document: layoutkb upload <file> --collection <id> --process');
  console.log('  3. Search: layoutkb search "<query>" --collection <id>');
}

async function testProvider(provider: OpenAIProvider): Promise<void> {
  const progress = new ProgressIndicator('Requesting a test embedding...');
  progress.start();
  try {
    const [vector] = await provider.batchGenerateEmbeddings(['connection test']);
    progress.stop(`Embedding provider OK (${vector?.length ?? 0} dimensions)`);
  } catch (error) {
    progress.fail('Embedding request failed');
    console.log(`  ${formatValidationError(error)}`);
  }
}
