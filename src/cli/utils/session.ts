import { promises as fs } from 'fs';
import path from 'path';
import { ConfigManager } from '../../utils/config.js';
import { KnowledgeBase } from '../../services/knowledge-base.js';
import { KnowledgeBaseConfig } from '../../types/config.js';
import { FileError } from '../../utils/errors.js';
import { setVerbose } from '../../utils/logger.js';

export interface CommonOptions {
  configPath?: string;
  verbose?: boolean;
}

export interface Session {
  kb: KnowledgeBase;
  config: KnowledgeBaseConfig;
}

/**
 * Load configuration and open the knowledge base for one command run
 */
export async function openSession(options: CommonOptions): Promise<Session> {
  if (options.verbose) {
    setVerbose(true);
  }
  const config = await new ConfigManager(options.configPath).load();
  return { kb: KnowledgeBase.open(config), config };
}

/**
 * Run a command body and always close the knowledge base afterwards
 */
export async function withSession<T>(options: CommonOptions, body: (session: Session) => Promise<T>): Promise<T> {
  const session = await openSession(options);
  try {
    return await body(session);
  } finally {
    await session.kb.close();
  }
}

export async function readInputFile(filePath: string): Promise<{ filename: string; bytes: Buffer }> {
  const absolutePath = path.resolve(filePath);
  try {
    const stats = await fs.stat(absolutePath);
    if (!stats.isFile()) {
      throw new FileError(`Not a file: ${absolutePath}`);
    }
    return { filename: path.basename(absolutePath), bytes: await fs.readFile(absolutePath) };
  } catch (error) {
    if (error instanceof FileError) throw error;
    throw new FileError(`Cannot read ${absolutePath}: ${String(error)}`);
  }
}
