import path from 'path';
import { FileKind, ParseInput, ParseResult, ParserStrategy } from './types.js';
import { ExternalParseService } from './external-service.js';
import { LocalLayoutService } from './local-service.js';
import { PdfTextParser } from './pdf-text.js';
import { DocxParser } from './docx.js';
import { SpreadsheetParser } from './spreadsheet.js';
import { MarkdownParser, PlainTextParser } from './text.js';
import { AudioTranscriptParser } from './audio.js';
import { KnowledgeBaseConfig } from '../types/config.js';
import { TranscriptionProvider } from '../types/provider.js';
import { ParseError, UnsupportedFileTypeError, describeError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

export const SUPPORTED_EXTENSIONS: Readonly<Record<string, FileKind>> = {
  '.pdf': 'pdf',
  '.docx': 'word',
  '.xlsx': 'spreadsheet',
  '.xls': 'spreadsheet',
  '.csv': 'csv',
  '.md': 'markdown',
  '.markdown': 'markdown',
  '.txt': 'text',
  '.text': 'text',
  '.mp3': 'audio',
  '.wav': 'audio',
  '.m4a': 'audio',
  '.webm': 'audio',
};

const logger = createLogger('parser');

export function getFileKind(filename: string): FileKind | null {
  return SUPPORTED_EXTENSIONS[path.extname(filename).toLowerCase()] ?? null;
}

export function isSupportedFile(filename: string): boolean {
  return getFileKind(filename) !== null;
}

export interface Parser {
  parse(input: ParseInput): Promise<ParseResult>;
}

/**
 * Ordered fallback lists of parsing backends per file kind
 */
export class ParserChain implements Parser {
  constructor(private strategies: Record<FileKind, ParserStrategy[]>) {}

  static fromConfig(config: KnowledgeBaseConfig, transcriber: TranscriptionProvider | null): ParserChain {
    const spreadsheet = new SpreadsheetParser();
    return new ParserChain({
      pdf: [
        new ExternalParseService(config.parsing.external),
        new LocalLayoutService(config.parsing.local),
        new PdfTextParser(),
      ],
      word: [new DocxParser()],
      spreadsheet: [spreadsheet],
      csv: [spreadsheet],
      markdown: [new MarkdownParser()],
      text: [new PlainTextParser()],
      audio: [new AudioTranscriptParser(transcriber)],
    });
  }

  strategiesFor(kind: FileKind): ParserStrategy[] {
    return this.strategies[kind].filter((strategy) => strategy.isAvailable());
  }

  /**
   * Try each available backend in order; fail only when all of them fail
   */
  async parse(input: ParseInput): Promise<ParseResult> {
    const kind = getFileKind(input.filename);
    if (!kind) {
      throw new UnsupportedFileTypeError(input.filename);
    }

    const strategies = this.strategiesFor(kind);
    const attempts: string[] = [];
    let lastError = 'no parser available';

    for (const strategy of strategies) {
      try {
        const result = await strategy.tryParse(input);
        if (result.blocks.length === 0 && !result.markdown.trim()) {
          throw new ParseError(`${strategy.name} returned no content`);
        }
        logger.debug(`${input.filename} parsed by ${strategy.name}: ${result.blocks.length} blocks, ${result.markdown.length} chars`);
        return result;
      } catch (error) {
        lastError = describeError(error);
        attempts.push(`${strategy.name}: ${lastError}`);
        logger.warn(`${strategy.name} failed for ${input.filename}, trying next backend`, lastError);
      }
    }

    throw new ParseError(`All parsers failed for ${input.filename}: ${lastError}`, attempts);
  }
}
