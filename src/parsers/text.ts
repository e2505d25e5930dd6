import { ParseInput, ParseResult, ParserStrategy } from './types.js';
import { Block } from '../types/document.js';

/**
 * Decode bytes as UTF-8, falling back to GBK, then to lossy UTF-8
 */
export function decodeText(bytes: Buffer): string {
  for (const encoding of ['utf-8', 'gbk']) {
    try {
      return new TextDecoder(encoding, { fatal: true }).decode(bytes);
    } catch {
      continue;
    }
  }
  return new TextDecoder('utf-8').decode(bytes);
}

/**
 * Paragraphs of a plain text body as text blocks on page 0
 */
export function paragraphBlocks(text: string): Block[] {
  if (!text.trim()) return [];
  const blocks: Block[] = text
    .split('\n\n')
    .map((paragraph) => paragraph.trim())
    .filter((paragraph) => paragraph.length > 0)
    .map((paragraph) => ({ type: 'text', text: paragraph, pageNumbers: [0] }));
  return blocks.length > 0 ? blocks : [{ type: 'text', text, pageNumbers: [0] }];
}

export class PlainTextParser implements ParserStrategy {
  readonly name = 'plain-text';

  isAvailable(): boolean {
    return true;
  }

  async tryParse(input: ParseInput): Promise<ParseResult> {
    const text = decodeText(input.bytes);
    return { markdown: text, blocks: paragraphBlocks(text), engine: this.name };
  }
}

/**
 * Markdown keeps its text as the markdown body; blocks are left empty so the
 * chunker reads headings from the markdown itself
 */
export class MarkdownParser implements ParserStrategy {
  readonly name = 'markdown';

  isAvailable(): boolean {
    return true;
  }

  async tryParse(input: ParseInput): Promise<ParseResult> {
    return { markdown: decodeText(input.bytes), blocks: [], engine: this.name };
  }
}
