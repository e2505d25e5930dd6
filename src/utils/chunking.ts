import { v4 as uuidv4 } from 'uuid';
import { Block, BlockType, ChunkType, NewChunk } from '../types/document.js';
import { ChunkingConfig } from '../types/config.js';
import { TextProcessor } from './text-processing.js';

export type ChunkingOptions = Omit<ChunkingConfig, 'maxEmbeddingTokens'>;

export interface ChunkTarget {
  documentId: string;
  collectionId: string;
}

const DEFAULT_OPTIONS: ChunkingOptions = {
  maxChildTokens: 512,
  maxParentTokens: 2000,
  minParentTokens: 600,
  minChildren: 3,
  pseudoTitleMaxChars: 64,
  splitOnPseudoTitle: true,
  splitOnPageBreak: true,
  splitOnTypeShift: true,
};

const NOISE_TYPES: ReadonlySet<BlockType> = new Set(['header', 'footer', 'page_number', 'phonetic']);
const TABLE_FAMILY: ReadonlySet<BlockType> = new Set(['table_caption', 'table', 'table_footnote']);
const IMAGE_FAMILY: ReadonlySet<BlockType> = new Set(['image', 'image_caption', 'image_footnote', 'image_body']);
const CODE_FAMILY: ReadonlySet<BlockType> = new Set(['code', 'code_caption', 'algorithm']);

const SEPARATORS = ['\n\n', '\n', '。', '. ', '；', '; ', '，', ', '];
const FORCE_SPLIT_OVERLAP_TOKENS = 64;

const PSEUDO_TITLE_PATTERNS = [
  /^\s{0,3}#{1,6}\s+\S+/,
  /^\s*(第[一二三四五六七八九十百千万0-9]+[章节部分篇])/,
  /^\s*(\d+(?:\.\d+){0,3}|[一二三四五六七八九十]+)\s*[、.)）．]\s*\S+/,
  /^\s*(附录|目录|前言|引言|总结|结论|参考文献|致谢)\s*$/,
  /^\s*(appendix|contents|preface|introduction|summary|conclusions?|references|acknowledg(?:e)?ments?)\s*$/i,
];
const SENTENCE_END = /[。！？!?；;]$/;

const MARKDOWN_HEADING = /^(#{1,6})\s+(.+)$/gm;
const MARKDOWN_IMAGE = /!\[([^\]]*)\]\(([^)]+)\)/;

interface PendingChild {
  content: string;
  pages: number[];
  chunkType: ChunkType;
}

/**
 * Mutable state for one chunking run
 */
class ChunkingRun {
  parentId: string;
  parentContent: string[] = [];
  parentPages = new Set<number>();
  parentTokens = 0;
  children: PendingChild[] = [];
  lastType: BlockType | null = null;
  tableBuffer: Block[] = [];
  imageBuffer: Block[] = [];
  codeBuffer: Block[] = [];
  output: NewChunk[] = [];

  constructor(readonly target: ChunkTarget, private generateId: () => string) {
    this.parentId = generateId();
  }

  addToParent(content: string, pages: number[]): void {
    this.parentContent.push(content);
    pages.forEach((page) => this.parentPages.add(page));
    this.parentTokens += TextProcessor.estimateTokens(content);
  }

  emit(content: string, pages: number[], chunkType: ChunkType, id: string, parentId: string | null): void {
    this.output.push({
      id,
      document_id: this.target.documentId,
      collection_id: this.target.collectionId,
      parent_chunk_id: parentId,
      chunk_index: this.output.length,
      page_numbers: [...new Set(pages)].sort((a, b) => a - b),
      chunk_type: chunkType,
      content,
      token_count: TextProcessor.estimateTokens(content),
    });
  }

  flushParent(): void {
    if (this.parentContent.length === 0 && this.children.length === 0) return;

    if (this.parentContent.length > 0) {
      this.emit(this.parentContent.join('\n\n'), [...this.parentPages], 'TEXT', this.parentId, null);
      for (const child of this.children) {
        this.emit(child.content, child.pages, child.chunkType, this.generateId(), this.parentId);
      }
    } else {
      for (const child of this.children) {
        this.emit(child.content, child.pages, child.chunkType, this.generateId(), null);
      }
    }

    this.parentId = this.generateId();
    this.parentContent = [];
    this.parentPages = new Set();
    this.parentTokens = 0;
    this.children = [];
  }
}

export class LayoutChunker {
  private options: ChunkingOptions;
  private generateId: () => string;

  constructor(options: Partial<ChunkingOptions> = {}, generateId: () => string = uuidv4) {
    const merged = { ...DEFAULT_OPTIONS, ...options };
    this.options = {
      ...merged,
      maxChildTokens: Math.max(32, merged.maxChildTokens),
      maxParentTokens: Math.max(256, merged.maxParentTokens),
      minParentTokens: Math.max(128, merged.minParentTokens),
      minChildren: Math.max(1, merged.minChildren),
      pseudoTitleMaxChars: Math.max(16, merged.pseudoTitleMaxChars),
    };
    this.generateId = generateId;
  }

  /**
   * Turn normalized layout blocks into parent and child chunks, in emission order
   */
  chunk(blocks: Block[], target: ChunkTarget): NewChunk[] {
    const run = new ChunkingRun(target, this.generateId);

    for (const block of blocks) {
      if (NOISE_TYPES.has(block.type)) continue;

      if (!TABLE_FAMILY.has(block.type)) this.flushTables(run);
      if (!IMAGE_FAMILY.has(block.type)) this.flushImages(run);
      if (!CODE_FAMILY.has(block.type)) this.flushCode(run);

      if (TABLE_FAMILY.has(block.type)) {
        run.tableBuffer.push(block);
        continue;
      }
      if (IMAGE_FAMILY.has(block.type)) {
        run.imageBuffer.push(block);
        continue;
      }
      if (CODE_FAMILY.has(block.type)) {
        run.codeBuffer.push(block);
        continue;
      }

      this.handleTextBlock(run, block);
    }

    this.flushTables(run);
    this.flushImages(run);
    this.flushCode(run);
    run.flushParent();

    return run.output;
  }

  /**
   * Chunk plain markdown when the parser produced no block list
   */
  chunkMarkdown(markdown: string, target: ChunkTarget): NewChunk[] {
    return this.chunk(LayoutChunker.markdownToBlocks(markdown), target);
  }

  private handleTextBlock(run: ChunkingRun, block: Block): void {
    const raw = blockText(block);
    if (!raw.trim()) return;

    let text = raw;
    if (block.type === 'interline_equation') {
      text = `\n$$\n${raw}\n$$\n`;
    } else if (block.type === 'aside_text') {
      text = `(Aside: ${raw})`;
    }

    const isHeading =
      block.type === 'title' ||
      (this.options.splitOnPseudoTitle && block.type === 'text' && this.isPseudoTitle(text));

    if (isHeading) {
      run.flushParent();
      run.addToParent(text.trim(), block.pageNumbers);
      run.lastType = null;
      return;
    }

    const blockTokens = TextProcessor.estimateTokens(text);
    const { minParentTokens, minChildren, maxChildTokens } = this.options;

    if (
      run.parentContent.length > 0 &&
      run.parentTokens >= minParentTokens &&
      run.children.length >= minChildren
    ) {
      const pageBreak =
        this.options.splitOnPageBreak &&
        block.pageNumbers.length > 0 &&
        run.parentPages.size > 0 &&
        !block.pageNumbers.every((page) => run.parentPages.has(page));
      const typeShift =
        this.options.splitOnTypeShift && run.lastType !== null && run.lastType !== block.type;

      if (pageBreak || typeShift) {
        run.flushParent();
      }
    }

    this.makeRoom(run, blockTokens);
    run.addToParent(text, block.pageNumbers);
    const pieces = blockTokens > maxChildTokens ? this.recursiveSplit(text, maxChildTokens) : [text];
    for (const piece of pieces) {
      run.children.push({ content: piece, pages: block.pageNumbers, chunkType: chunkTypeFor(block.type) });
    }
    run.lastType = block.type;
  }

  /**
   * Close the current parent when the next piece would push it past maxParentTokens.
   * A single piece larger than the ceiling still gets a parent of its own.
   */
  private makeRoom(run: ChunkingRun, tokens: number): void {
    const { maxParentTokens } = this.options;
    if (
      run.parentContent.length > 0 &&
      (run.parentTokens >= maxParentTokens || run.parentTokens + tokens > maxParentTokens)
    ) {
      run.flushParent();
    }
  }

  private addPiece(run: ChunkingRun, content: string, pages: number[], chunkType: ChunkType): void {
    this.makeRoom(run, TextProcessor.estimateTokens(content));
    run.addToParent(content, pages);
    run.children.push({ content, pages, chunkType });
  }

  private flushTables(run: ChunkingRun): void {
    if (run.tableBuffer.length === 0) return;
    const buffer = run.tableBuffer;
    run.tableBuffer = [];

    const combined = buffer.map(blockText).filter((part) => part.trim()).join('\n\n').trim();
    if (!combined) return;

    this.addPiece(run, combined, buffer.flatMap((block) => block.pageNumbers), 'TABLE');
    run.lastType = 'table';
  }

  private flushImages(run: ChunkingRun): void {
    if (run.imageBuffer.length === 0) return;
    const buffer = run.imageBuffer;
    run.imageBuffer = [];

    const withoutUrl: Block[] = [];
    for (const block of buffer) {
      if (!block.imageUrl) {
        withoutUrl.push(block);
        continue;
      }
      const caption = blockText(block).trim();
      const content = caption ? `${block.imageUrl}\n${caption}` : block.imageUrl;
      this.addPiece(run, content, block.pageNumbers, 'IMAGE_CAPTION');
    }

    if (withoutUrl.length > 0) {
      const merged = withoutUrl.map(blockText).filter((part) => part.trim()).join('\n\n').trim() || '[image]';
      this.addPiece(run, merged, withoutUrl.flatMap((block) => block.pageNumbers), 'IMAGE_CAPTION');
    }

    run.lastType = 'image_caption';
  }

  private flushCode(run: ChunkingRun): void {
    if (run.codeBuffer.length === 0) return;
    const buffer = run.codeBuffer;
    run.codeBuffer = [];

    const combined = buffer.map(blockText).filter((part) => part.trim()).join('\n\n').trim();
    if (!combined) return;

    const content = `\n\`\`\`\n${combined}\n\`\`\`\n`;
    this.addPiece(run, content, buffer.flatMap((block) => block.pageNumbers), 'CODE');
    run.lastType = 'code';
  }

  /**
   * Single short line that looks like a numbered or named section heading
   */
  isPseudoTitle(text: string): boolean {
    const line = text.trim();
    if (!line || line.includes('\n')) return false;
    if (line.length > this.options.pseudoTitleMaxChars) return false;
    if (SENTENCE_END.test(line)) return false;
    return PSEUDO_TITLE_PATTERNS.some((pattern) => pattern.test(line));
  }

  /**
   * Split oversized text on progressively finer separators, then by characters
   */
  recursiveSplit(text: string, maxTokens: number): string[] {
    if (TextProcessor.estimateTokens(text) <= maxTokens) return [text];
    return this.splitBySeparators(text, maxTokens, SEPARATORS);
  }

  private splitBySeparators(text: string, maxTokens: number, separators: string[]): string[] {
    for (let i = 0; i < separators.length; i++) {
      const separator = separators[i];
      if (separator === undefined) continue;

      const parts = text.split(separator).filter((part) => part.trim());
      if (parts.length <= 1) continue;

      const remaining = separators.slice(i + 1);
      const pieces: string[] = [];
      let buffer: string[] = [];

      const flush = (): void => {
        if (buffer.length > 0) {
          pieces.push(buffer.join('\n\n'));
          buffer = [];
        }
      };

      for (const part of parts) {
        if (TextProcessor.estimateTokens(part) > maxTokens) {
          flush();
          pieces.push(...this.splitBySeparators(part, maxTokens, remaining));
          continue;
        }
        const candidate = [...buffer, part].join('\n\n');
        if (buffer.length > 0 && TextProcessor.estimateTokens(candidate) > maxTokens) {
          flush();
        }
        buffer.push(part);
      }
      flush();
      return pieces;
    }

    return forceSplit(text, maxTokens * 3, FORCE_SPLIT_OVERLAP_TOKENS * 3);
  }

  /**
   * Convert markdown into title/text/table/image_caption blocks
   */
  static markdownToBlocks(markdown: string): Block[] {
    const blocks: Block[] = [];
    const headings = [...markdown.matchAll(MARKDOWN_HEADING)];

    const pushParagraphs = (section: string): void => {
      for (const paragraph of section.split('\n\n')) {
        const trimmed = paragraph.trim();
        if (trimmed) blocks.push(paragraphBlock(trimmed));
      }
    };

    const firstIndex = headings[0]?.index ?? markdown.length;
    pushParagraphs(markdown.slice(0, firstIndex));

    headings.forEach((match, i) => {
      const start = match.index ?? 0;
      const next = headings[i + 1]?.index ?? markdown.length;
      blocks.push({ type: 'title', text: (match[2] ?? '').trim(), pageNumbers: [] });
      pushParagraphs(markdown.slice(start + match[0].length, next));
    });

    return blocks;
  }
}

function blockText(block: Block): string {
  if (TABLE_FAMILY.has(block.type) && block.tableBody && block.tableBody.trim()) {
    return block.tableBody;
  }
  return block.text;
}

function chunkTypeFor(type: BlockType): ChunkType {
  if (TABLE_FAMILY.has(type)) return 'TABLE';
  if (IMAGE_FAMILY.has(type)) return 'IMAGE_CAPTION';
  if (CODE_FAMILY.has(type)) return 'CODE';
  return 'TEXT';
}

function paragraphBlock(paragraph: string): Block {
  const pipeRows = paragraph
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 1 && line.startsWith('|') && line.endsWith('|')).length;
  if (pipeRows >= 2) {
    return { type: 'table', text: paragraph, pageNumbers: [] };
  }

  const image = MARKDOWN_IMAGE.exec(paragraph);
  if (image) {
    const url = image[2] ?? '';
    const caption = paragraph.replace(MARKDOWN_IMAGE, '').trim() || (image[1] ?? '');
    return /^https?:\/\//.test(url)
      ? { type: 'image_caption', text: caption, pageNumbers: [], imageUrl: url }
      : { type: 'image_caption', text: paragraph, pageNumbers: [] };
  }

  return { type: 'text', text: paragraph, pageNumbers: [] };
}

function forceSplit(text: string, size: number, overlap: number): string[] {
  const pieces: string[] = [];
  const step = Math.max(1, size - Math.min(overlap, Math.floor(size / 2)));
  for (let start = 0; start < text.length; start += step) {
    pieces.push(text.slice(start, start + size));
    if (start + size >= text.length) break;
  }
  return pieces;
}
