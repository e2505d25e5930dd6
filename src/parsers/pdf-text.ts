import { getDocumentProxy } from 'unpdf';
import { ParseInput, ParseResult, ParserStrategy } from './types.js';
import { Block } from '../types/document.js';

/**
 * Last-resort PDF reader: the text layer of each page, split into paragraphs
 */
export class PdfTextParser implements ParserStrategy {
  readonly name = 'pdf-text';

  isAvailable(): boolean {
    return true;
  }

  async tryParse(input: ParseInput): Promise<ParseResult> {
    const pdf = await getDocumentProxy(new Uint8Array(input.bytes));
    const blocks: Block[] = [];

    for (let i = 1; i <= pdf.numPages; i++) {
      const page = await pdf.getPage(i);
      const textContent = await page.getTextContent();
      const text = textContent.items
        .map((item) => ('str' in item ? item.str + (item.hasEOL ? '\n' : '') : ''))
        .join('');

      for (const paragraph of text.split(/\n\s*\n/)) {
        const trimmed = paragraph.trim();
        if (trimmed) {
          blocks.push({ type: 'text', text: trimmed, pageNumbers: [i - 1] });
        }
      }
    }

    return {
      markdown: blocks.map((block) => block.text).join('\n\n'),
      blocks,
      engine: this.name,
    };
  }
}
