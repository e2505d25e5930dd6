import { Block } from '../types/document.js';

export interface ParseInput {
  filename: string;
  bytes: Buffer;
  /** Publicly reachable URL of the stored file, for services that fetch it themselves */
  resolveUrl?: () => Promise<string>;
  signal?: AbortSignal;
}

export interface ParseResult {
  markdown: string;
  blocks: Block[];
  /** Name of the backend that produced the result */
  engine: string;
}

/**
 * One parsing backend. Throws when it cannot handle the input; the chain moves on.
 */
export interface ParserStrategy {
  readonly name: string;
  isAvailable(): boolean;
  tryParse(input: ParseInput): Promise<ParseResult>;
}

export type FileKind = 'pdf' | 'word' | 'spreadsheet' | 'csv' | 'markdown' | 'text' | 'audio';
