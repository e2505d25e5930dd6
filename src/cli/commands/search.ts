import { Command } from 'commander';
import { SearchHit, SearchResponse } from '../../types/search.js';
import { TextProcessor } from '../../utils/text-processing.js';
import { ProgressIndicator } from '../utils/progress.js';
import {
  formatValidationError,
  parseChunkTypes,
  parseTopK,
  splitList,
  validateCollectionId,
  validateQueryString,
} from '../utils/validation.js';
import { CommonOptions, withSession } from '../utils/session.js';

interface SearchCommandOptions extends CommonOptions {
  collection?: string;
  documents?: string;
  types?: string;
  topK?: string;
  rerank: boolean;
  parent: boolean;
  format: string;
}

export function createSearchCommand(): Command {
  return new Command('search')
    .description('Hybrid search (exact, sparse and dense recall with reranking) within a collection')
    .argument('<query>', 'Search query text')
    .requiredOption('-c, --collection <id>', 'Collection id')
    .option('-d, --documents <ids>', 'Comma-separated document ids to restrict the search to')
    .option('-t, --types <types>', 'Comma-separated chunk types (TEXT, TABLE, IMAGE_CAPTION, CODE)')
    .option('-k, --top-k <number>', 'Maximum number of results')
    .option('--no-rerank', 'Skip the reranking stage')
    .option('--no-parent', 'Do not attach parent context')
    .option('--format <format>', 'Output format (table|json)', 'table')
    .option('--config-path <path>', 'Path to configuration file')
    .option('-v, --verbose', 'Show debug output')
    .action(async (query: string, options: SearchCommandOptions) => {
      try {
        await runSearch(query, options);
      } catch (error) {
        console.error(formatValidationError(error));
        process.exit(1);
      }
    });
}

async function runSearch(query: string, options: SearchCommandOptions): Promise<void> {
  validateQueryString(query);
  const collectionId = validateCollectionId(options.collection);
  const topK = parseTopK(options.topK);
  const chunkTypes = parseChunkTypes(options.types);
  const documentIds = options.documents === undefined ? undefined : splitList(options.documents);
  const asJson = options.format === 'json';

  await withSession(options, async ({ kb }) => {
    if (!asJson) {
      console.log(`\n🔍 Search`);
      console.log(`📝 Query: "${query}"`);
      console.log(`🗂️  Collection: ${collectionId}`);
      if (documentIds) console.log(`📄 Documents: ${documentIds.length > 0 ? documentIds.join(', ') : '(none)'}`);
      if (chunkTypes) console.log(`🏷️  Types: ${chunkTypes.join(', ')}`);
      console.log();
    }

    const progress = asJson ? null : new ProgressIndicator('Searching...');
    progress?.start();
    const response = await kb.search({
      collectionId,
      query,
      enableRerank: options.rerank,
      useParent: options.parent,
      ...(topK !== undefined ? { topK } : {}),
      ...(chunkTypes ? { chunkTypes } : {}),
      ...(documentIds ? { documentIds } : {}),
    });
    progress?.stop();

    if (asJson) {
      console.log(JSON.stringify(response, null, 2));
      return;
    }
    displayResults(response);
  });
}

function displayResults(response: SearchResponse): void {
  if (response.hits.length === 0) {
    console.log('❌ No results found.');
    console.log('\n💡 Try:');
    console.log('  • Different keywords');
    console.log('  • Removing --types or --documents filters');
    console.log('  • --no-rerank if the rerank threshold drops everything');
    printStats(response);
    return;
  }

  console.log(`✅ Found ${response.total} results in ${response.processingTimeMs}ms\n`);
  response.hits.forEach((hit, i) => printHit(hit, i + 1));
  printStats(response);
}

function printHit(hit: SearchHit, position: number): void {
  const pages = hit.pageNumbers.length > 0 ? ` p.${hit.pageNumbers.map((page) => page + 1).join(',')}` : '';
  console.log(`${position}. [${hit.chunkType}] score ${hit.score.toFixed(4)}${pages} (${hit.sources.join('+')})`);
  console.log(`   📄 Document: ${hit.documentId}`);
  console.log(`   📖 ${TextProcessor.truncate(hit.content.replace(/\s+/g, ' '), 240)}`);
  if (hit.parentContent) {
    console.log(`   🧭 Context: ${TextProcessor.truncate(hit.parentContent.replace(/\s+/g, ' '), 160)}`);
  }
  console.log();
}

function printStats(response: SearchResponse): void {
  const { pathStats } = response;
  const parts = [
    `exact ${pathStats.exact ?? '-'}`,
    `sparse ${pathStats.sparse ?? '-'}`,
    `dense ${pathStats.dense ?? '-'}`,
    `fused ${pathStats.rrf_top ?? '-'}`,
    `reranked ${pathStats.rerank_top ?? '-'}`,
  ];
  console.log(`📊 Recall: ${parts.join(' · ')}`);
}
