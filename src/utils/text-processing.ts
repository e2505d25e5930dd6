import { Chunk } from '../types/document.js';

const CJK_PATTERN = /[\u4e00-\u9fff]/g;
const IMAGE_URL_LINE = /^(https?:\/\/\S+\.(?:png|jpg|jpeg|gif|webp|bmp)(?:\?\S*)?)$/i;

export const EMBEDDING_TRUNCATION_NOTICE =
  '\n\n[... content truncated, full text is returned at retrieval time ...]';

export class TextProcessor {
  /**
   * Estimate token count. CJK ideographs count ~1.5 chars per token, everything else ~4.
   */
  static estimateTokens(text: string): number {
    if (!text) return 0;
    const cjk = (text.match(CJK_PATTERN) ?? []).length;
    const other = text.length - cjk;
    return Math.floor(cjk / 1.5 + other / 4) + 1;
  }

  /**
   * Text that goes to the embedding model for a chunk.
   * Image chunks embed only the caption that follows the URL line.
   */
  static getContentForEmbedding(
    chunk: Pick<Chunk, 'chunk_type' | 'content'>,
    maxTokens = 2048
  ): string {
    let text = chunk.content;
    if (chunk.chunk_type === 'IMAGE_CAPTION') {
      const newline = text.indexOf('\n');
      text = newline >= 0 ? text.slice(newline + 1).trim() : '';
    }

    if (!text || this.estimateTokens(text) <= maxTokens) {
      return text;
    }

    const maxChars = Math.max(0, maxTokens * 3 - 20);
    return text.slice(0, maxChars).trimEnd() + EMBEDDING_TRUNCATION_NOTICE;
  }

  /**
   * Rewrite bare image URL lines as markdown images
   */
  static renderImageLinks(content: string): string {
    return content
      .split('\n')
      .map((line) => {
        const match = IMAGE_URL_LINE.exec(line.trim());
        return match?.[1] ? `![image](${match[1]})` : line;
      })
      .join('\n');
  }

  /**
   * Cut text to a character budget, marking the cut with an ellipsis
   */
  static truncate(text: string, maxChars: number, suffix = '…'): string {
    if (text.length <= maxChars) return text;
    return text.slice(0, maxChars) + suffix;
  }
}
