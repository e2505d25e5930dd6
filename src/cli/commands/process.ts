import { Command } from 'commander';
import { KnowledgeBase } from '../../services/knowledge-base.js';
import { ProgressIndicator, formatDuration, formatStatus } from '../utils/progress.js';
import { formatValidationError } from '../utils/validation.js';
import { CommonOptions, withSession } from '../utils/session.js';

interface ProcessCommandOptions extends CommonOptions {
  caption?: boolean;
}

export function createProcessCommand(): Command {
  return new Command('process')
    .description('Parse, chunk and index an uploaded document')
    .argument('<documentId>', 'Document id')
    .option('--caption', 'Describe images with the vision model for this document')
    .option('--config-path <path>', 'Path to configuration file')
    .option('-v, --verbose', 'Show debug output')
    .action(async (documentId: string, options: ProcessCommandOptions) => {
      try {
        await withSession(options, async ({ kb }) => {
          const document = kb.process(documentId, options.caption ? { forceCaptioning: true } : {});
          if (document.status !== 'UPLOADED') {
            console.log(`ℹ️  Nothing to do: document is ${formatStatus(document.status)}`);
            return;
          }
          await reportProcessing(kb, documentId, 'Processing');
        });
      } catch (error) {
        console.error(formatValidationError(error));
        process.exit(1);
      }
    });
}

export function createReparseCommand(): Command {
  return new Command('reparse')
    .description('Retire the current chunks and vectors of a document and process it again')
    .argument('<documentId>', 'Document id')
    .option('--caption', 'Describe images with the vision model for this document')
    .option('--config-path <path>', 'Path to configuration file')
    .option('-v, --verbose', 'Show debug output')
    .action(async (documentId: string, options: ProcessCommandOptions) => {
      try {
        await withSession(options, async ({ kb }) => {
          kb.reparse(documentId, options.caption ? { forceCaptioning: true } : {});
          await reportProcessing(kb, documentId, 'Reparsing');
        });
      } catch (error) {
        console.error(formatValidationError(error));
        process.exit(1);
      }
    });
}

async function reportProcessing(kb: KnowledgeBase, documentId: string, label: string): Promise<void> {
  const startTime = Date.now();
  const progress = new ProgressIndicator(`${label} ${documentId}...`);
  progress.start();
  await kb.waitForIdle();

  const document = kb.getDocument(documentId);
  if (document?.status === 'READY') {
    progress.stop(`${document.filename} is ready (${formatDuration(Date.now() - startTime)})`);
    return;
  }

  progress.fail(`${label} ended in ${document ? formatStatus(document.status) : 'unknown state'}`);
  if (document?.error_log) {
    console.log(document.error_log.split('\n')[0]);
  }
  process.exitCode = 1;
}
