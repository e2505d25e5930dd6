import { describe, it, expect } from 'vitest';
import { EMBEDDING_TRUNCATION_NOTICE, TextProcessor } from '../../src/utils/text-processing.js';

describe('TextProcessor', () => {
  describe('estimateTokens', () => {
    it('returns 0 for empty text', () => {
      expect(TextProcessor.estimateTokens('')).toBe(0);
    });

    it('counts latin text at four characters per token', () => {
      expect(TextProcessor.estimateTokens('abcd')).toBe(2);
      expect(TextProcessor.estimateTokens('a'.repeat(200))).toBe(51);
    });

    it('counts CJK ideographs at one and a half characters per token', () => {
      expect(TextProcessor.estimateTokens('你好')).toBe(2);
      expect(TextProcessor.estimateTokens('你好世界测试')).toBe(5);
    });

    it('mixes both rates', () => {
      // 2 / 1.5 + 2 / 4 = 1.83
      expect(TextProcessor.estimateTokens('ab你好')).toBe(2);
    });
  });

  describe('getContentForEmbedding', () => {
    it('embeds only the caption of an image chunk', () => {
      const text = TextProcessor.getContentForEmbedding({
        chunk_type: 'IMAGE_CAPTION',
        content: 'https://cdn.example.com/fig.png\n  Quarterly revenue chart  ',
      });
      expect(text).toBe('Quarterly revenue chart');
    });

    it('returns an empty string for an image chunk without a caption', () => {
      const text = TextProcessor.getContentForEmbedding({
        chunk_type: 'IMAGE_CAPTION',
        content: 'https://cdn.example.com/fig.png',
      });
      expect(text).toBe('');
    });

    it('keeps text within the budget unchanged', () => {
      const text = TextProcessor.getContentForEmbedding({ chunk_type: 'TEXT', content: 'Short paragraph.' }, 32);
      expect(text).toBe('Short paragraph.');
    });

    it('truncates oversized text and appends the notice', () => {
      const text = TextProcessor.getContentForEmbedding({ chunk_type: 'TEXT', content: 'a'.repeat(200) }, 32);
      expect(text).toBe('a'.repeat(76) + EMBEDDING_TRUNCATION_NOTICE);
    });
  });

  describe('renderImageLinks', () => {
    it('rewrites bare image URL lines as markdown images', () => {
      const rendered = TextProcessor.renderImageLinks('intro\nhttps://cdn.example.com/fig.png\nend');
      expect(rendered).toBe('intro\n![image](https://cdn.example.com/fig.png)\nend');
    });

    it('leaves other URLs alone', () => {
      const content = 'see https://example.com/page for details\nhttps://example.com/report.pdf';
      expect(TextProcessor.renderImageLinks(content)).toBe(content);
    });
  });

  describe('truncate', () => {
    it('appends an ellipsis when text is cut', () => {
      expect(TextProcessor.truncate('abcdef', 3)).toBe('abc…');
    });

    it('returns short text unchanged', () => {
      expect(TextProcessor.truncate('abc', 3)).toBe('abc');
    });
  });
});
