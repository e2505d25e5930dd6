import { Command } from 'commander';
import { formatFileSize, formatStatus } from '../utils/progress.js';
import { formatValidationError, validateCollectionId } from '../utils/validation.js';
import { promptConfirm } from '../utils/input.js';
import { CommonOptions, withSession } from '../utils/session.js';

export function createMarkdownCommand(): Command {
  return new Command('markdown')
    .description('Print a document as Markdown, with its summary')
    .argument('<documentId>', 'Document id')
    .option('--format <format>', 'Output format (markdown|json)', 'markdown')
    .option('--config-path <path>', 'Path to configuration file')
    .option('-v, --verbose', 'Show debug output')
    .action(async (documentId: string, options: CommonOptions & { format: string }) => {
      try {
        await withSession(options, async ({ kb }) => {
          const exported = await kb.getMarkdown(documentId);
          if (options.format === 'json') {
            console.log(JSON.stringify(exported, null, 2));
            return;
          }
          console.log(`# ${exported.filename}`);
          console.log('');
          if (exported.summary) {
            console.log(`> ${exported.summary}`);
            console.log('');
          }
          console.log(exported.segments.map((segment) => segment.content).join('\n\n'));
        });
      } catch (error) {
        console.error(formatValidationError(error));
        process.exit(1);
      }
    });
}

export function createDeleteCommand(): Command {
  return new Command('delete')
    .description('Delete a document with its chunks, vectors and stored file')
    .argument('<documentId>', 'Document id')
    .option('-y, --yes', 'Skip the confirmation prompt')
    .option('--config-path <path>', 'Path to configuration file')
    .option('-v, --verbose', 'Show debug output')
    .action(async (documentId: string, options: CommonOptions & { yes?: boolean }) => {
      try {
        await withSession(options, async ({ kb }) => {
          const document = kb.getDocument(documentId);
          if (!document) {
            console.log(`❌ Document not found: ${documentId}`);
            process.exitCode = 1;
            return;
          }
          const confirmed = options.yes || (await promptConfirm(`Delete ${document.filename}?`, false));
          if (!confirmed) {
            console.log('Deletion cancelled.');
            return;
          }
          await kb.delete(documentId);
          console.log(`🗑️  Deleted ${document.filename} (${documentId})`);
        });
      } catch (error) {
        console.error(formatValidationError(error));
        process.exit(1);
      }
    });
}

export function createListCommand(): Command {
  return new Command('list')
    .description('List the documents of a collection')
    .requiredOption('-c, --collection <id>', 'Collection id')
    .option('--format <format>', 'Output format (table|json)', 'table')
    .option('--config-path <path>', 'Path to configuration file')
    .action(async (options: CommonOptions & { collection?: string; format: string }) => {
      try {
        const collectionId = validateCollectionId(options.collection);
        await withSession(options, async ({ kb }) => {
          const documents = kb.listDocuments(collectionId);
          if (options.format === 'json') {
            console.log(JSON.stringify(documents, null, 2));
            return;
          }
          if (documents.length === 0) {
            console.log(`📭 No documents in ${collectionId}`);
            return;
          }
          console.log(`📚 ${documents.length} document(s) in ${collectionId}\n`);
          for (const document of documents) {
            console.log(`${formatStatus(document.status)}  ${document.filename}  ${formatFileSize(document.byte_size)}`);
            console.log(`   🆔 ${document.id}  ⚙️  ${document.parser_engine}  🕒 ${document.updated_at}`);
          }
        });
      } catch (error) {
        console.error(formatValidationError(error));
        process.exit(1);
      }
    });
}
