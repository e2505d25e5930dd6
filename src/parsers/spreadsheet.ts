import * as XLSX from 'xlsx';
import { ParseInput, ParseResult, ParserStrategy } from './types.js';
import { Block } from '../types/document.js';
import { markdownTable } from './docx.js';
import { decodeText } from './text.js';

function cellText(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return value.toISOString();
  return String(value).trim();
}

/**
 * One title block ("Sheet: <name>") and one markdown table per non-empty sheet
 */
export function workbookToBlocks(workbook: XLSX.WorkBook): Block[] {
  const blocks: Block[] = [];

  for (const sheetName of workbook.SheetNames) {
    const sheet = workbook.Sheets[sheetName];
    if (!sheet) continue;

    const rows = XLSX.utils
      .sheet_to_json<unknown[]>(sheet, { header: 1, defval: '', blankrows: false })
      .map((row) => row.map(cellText))
      .filter((row) => row.some((cell) => cell.length > 0));
    if (rows.length === 0) continue;

    blocks.push({ type: 'title', text: `Sheet: ${sheetName}`, pageNumbers: [0] });
    blocks.push({ type: 'table', text: markdownTable(rows), pageNumbers: [0] });
  }

  return blocks;
}

function toMarkdown(blocks: Block[]): string {
  return blocks
    .map((block) => (block.type === 'title' ? `## ${block.text.replace(/^Sheet: /, '')}` : block.text))
    .join('\n\n');
}

export class SpreadsheetParser implements ParserStrategy {
  readonly name = 'spreadsheet';

  isAvailable(): boolean {
    return true;
  }

  async tryParse(input: ParseInput): Promise<ParseResult> {
    const workbook = input.filename.toLowerCase().endsWith('.csv')
      ? XLSX.read(decodeText(input.bytes), { type: 'string', raw: true })
      : XLSX.read(input.bytes, { type: 'buffer', cellDates: true });
    const blocks = workbookToBlocks(workbook);
    return { markdown: toMarkdown(blocks), blocks, engine: this.name };
  }
}
