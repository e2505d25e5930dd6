import { Command } from 'commander';
import { ProgressIndicator, formatDuration, formatFileSize, formatStatus } from '../utils/progress.js';
import { formatValidationError, validateCollectionId, validateFilePath } from '../utils/validation.js';
import { CommonOptions, readInputFile, withSession } from '../utils/session.js';

interface UploadOptions extends CommonOptions {
  collection?: string;
  process?: boolean;
  wait?: boolean;
  caption?: boolean;
}

export function createUploadCommand(): Command {
  return new Command('upload')
    .description('Upload a document into a collection')
    .argument('<file>', 'Path to the document')
    .requiredOption('-c, --collection <id>', 'Collection id')
    .option('--process', 'Queue the document for parsing and indexing')
    .option('--wait', 'With --process, wait until processing finishes')
    .option('--caption', 'Describe images with the vision model for this document')
    .option('--config-path <path>', 'Path to configuration file')
    .option('-v, --verbose', 'Show debug output')
    .action(async (file: string, options: UploadOptions) => {
      try {
        await uploadDocument(file, options);
      } catch (error) {
        console.error(formatValidationError(error));
        process.exit(1);
      }
    });
}

async function uploadDocument(filePath: string, options: UploadOptions): Promise<void> {
  const startTime = Date.now();
  validateFilePath(filePath);
  const collectionId = validateCollectionId(options.collection);
  const { filename, bytes } = await readInputFile(filePath);

  console.log('📄 Document upload');
  console.log(`  📁 File: ${filename} (${formatFileSize(bytes.length)})`);
  console.log(`  🗂️  Collection: ${collectionId}`);
  console.log('');

  await withSession(options, async ({ kb }) => {
    const document = await kb.upload(collectionId, filename, bytes);
    console.log(`🆔 Document: ${document.id}`);
    console.log(`📌 Status: ${formatStatus(document.status)}`);

    if (!options.process || document.status !== 'UPLOADED') {
      if (document.status === 'READY') {
        console.log('⚡ Content was already indexed; chunks and vectors were reused.');
      }
      return;
    }

    kb.process(document.id, options.caption ? { forceCaptioning: true } : {});
    if (!options.wait) {
      // The queue lives in this process, so close() still drains it before exit
      console.log('📬 Queued for processing.');
      return;
    }

    const progress = new ProgressIndicator('Parsing and indexing...');
    progress.start();
    await kb.waitForIdle();

    const final = kb.getDocument(document.id);
    if (final?.status === 'READY') {
      progress.stop(`Ready in ${formatDuration(Date.now() - startTime)}`);
    } else {
      progress.fail(`Processing ended in ${final ? final.status : 'unknown state'}`);
      if (final?.error_log) {
        console.log(final.error_log.split('\n')[0]);
      }
      process.exitCode = 1;
    }
  });
}
