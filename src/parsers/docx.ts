import mammoth from 'mammoth';
import { ParseInput, ParseResult, ParserStrategy } from './types.js';
import { Block } from '../types/document.js';

const ELEMENT_PATTERN = /<(h[1-6]|p|table|ul|ol)\b[^>]*>([\s\S]*?)<\/\1>/gi;
const ROW_PATTERN = /<tr\b[^>]*>([\s\S]*?)<\/tr>/gi;
const CELL_PATTERN = /<t[hd]\b[^>]*>([\s\S]*?)<\/t[hd]>/gi;
const ITEM_PATTERN = /<li\b[^>]*>([\s\S]*?)<\/li>/gi;

const ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&nbsp;': ' ',
};

export function stripTags(html: string): string {
  return html
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<[^>]+>/g, '')
    .replace(/&(amp|lt|gt|quot|#39|nbsp);/g, (entity) => ENTITIES[entity] ?? entity)
    .trim();
}

export function markdownTable(rows: string[][]): string {
  if (rows.length === 0) return '';
  const width = Math.max(...rows.map((row) => row.length));
  const render = (row: string[]): string =>
    `| ${Array.from({ length: width }, (_, i) => (row[i] ?? '').replace(/\|/g, '\\|').replace(/\n/g, ' ')).join(' | ')} |`;
  const [header, ...body] = rows;
  return [render(header ?? []), `| ${Array.from({ length: width }, () => '---').join(' | ')} |`, ...body.map(render)].join('\n');
}

/**
 * Convert mammoth's HTML into heading, paragraph, list and table blocks in document order
 */
export function htmlToBlocks(html: string): Block[] {
  const blocks: Block[] = [];

  for (const match of html.matchAll(ELEMENT_PATTERN)) {
    const tag = (match[1] ?? '').toLowerCase();
    const inner = match[2] ?? '';

    if (tag === 'table') {
      const rows = [...inner.matchAll(ROW_PATTERN)].map((row) =>
        [...(row[1] ?? '').matchAll(CELL_PATTERN)].map((cell) => stripTags(cell[1] ?? ''))
      );
      const table = markdownTable(rows.filter((row) => row.length > 0));
      if (table) blocks.push({ type: 'table', text: table, pageNumbers: [0] });
      continue;
    }

    if (tag === 'ul' || tag === 'ol') {
      const items = [...inner.matchAll(ITEM_PATTERN)]
        .map((item, i) => {
          const text = stripTags(item[1] ?? '');
          return text ? `${tag === 'ol' ? `${i + 1}.` : '-'} ${text}` : '';
        })
        .filter((line) => line.length > 0);
      if (items.length > 0) blocks.push({ type: 'list', text: items.join('\n'), pageNumbers: [0] });
      continue;
    }

    const text = stripTags(inner);
    if (!text) continue;
    blocks.push({ type: tag.startsWith('h') ? 'title' : 'text', text, pageNumbers: [0] });
  }

  return blocks;
}

export function blocksToMarkdown(blocks: Block[]): string {
  return blocks.map((block) => (block.type === 'title' ? `## ${block.text}` : block.text)).join('\n\n');
}

export class DocxParser implements ParserStrategy {
  readonly name = 'docx';

  isAvailable(): boolean {
    return true;
  }

  async tryParse(input: ParseInput): Promise<ParseResult> {
    const result = await mammoth.convertToHtml({ buffer: input.bytes });
    const blocks = htmlToBlocks(result.value);
    return { markdown: blocksToMarkdown(blocks), blocks, engine: this.name };
  }
}
