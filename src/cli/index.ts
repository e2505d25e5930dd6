#!/usr/bin/env node
import { Command } from 'commander';
import { createInitCommand } from './commands/init.js';
import { createDbInitCommand } from './commands/db-init.js';
import { createUploadCommand } from './commands/upload.js';
import { createProcessCommand, createReparseCommand } from './commands/process.js';
import { createSearchCommand } from './commands/search.js';
import { createDeleteCommand, createListCommand, createMarkdownCommand } from './commands/documents.js';

const program = new Command();

program
  .name('layoutkb')
  .description('Layout-aware document ingestion and hybrid retrieval')
  .version('0.1.0');

program.addCommand(createInitCommand());
program.addCommand(createDbInitCommand());
program.addCommand(createUploadCommand());
program.addCommand(createProcessCommand());
program.addCommand(createReparseCommand());
program.addCommand(createSearchCommand());
program.addCommand(createMarkdownCommand());
program.addCommand(createDeleteCommand());
program.addCommand(createListCommand());

program.parseAsync().catch((error: unknown) => {
  console.error('❌ Command failed:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
