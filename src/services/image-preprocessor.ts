import { v4 as uuidv4 } from 'uuid';
import { Block, BlockType } from '../types/document.js';
import { VisionProvider } from '../types/provider.js';
import { BlobStore } from './blob-store.js';
import { describeError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

export type ImageKind = 'FLOWCHART' | 'CHART' | 'PHOTO' | 'OTHER';

export interface ImagePreprocessorOptions {
  captioning: boolean;
  timeoutMs: number;
  chartMaxTokens: number;
  urlExpirySeconds: number;
}

export interface PreprocessTarget {
  documentId: string;
  collectionId: string;
}

const IMAGE_FAMILY: ReadonlySet<BlockType> = new Set(['image', 'image_caption', 'image_footnote', 'image_body']);
const IMAGE_KINDS: readonly ImageKind[] = ['FLOWCHART', 'CHART', 'PHOTO', 'OTHER'];
const CHARS_PER_TOKEN = 3;
const CHART_TRUNCATION_SUFFIX = '\n\n[... truncated]';
const ANALYSIS_HEADER = '[Figure analysis]';
const ORIGINAL_CAPTION_PREFIX = 'Original caption: ';

export const TRIAGE_PROMPT = `Classify this image. Answer with exactly one word from this list:
FLOWCHART
CHART
PHOTO
OTHER

FLOWCHART = flowchart, architecture diagram, topology or mind map; CHART = bar, line or pie chart or other data chart; PHOTO = photograph or screenshot; OTHER = anything else.`;

export const CHART_PROMPT = `This is a data chart (bar, line, pie or table image). For retrieval:

1. List the main data as a Markdown table (rows and columns following the legend and axes).
2. State the key values, shares or trends in one or two sentences.
3. Include the title, legend and axis labels if present.

Output the table first, then the short conclusion. Nothing else.`;

export const PHOTO_PROMPT = 'Write a concise description of this image for search and understanding.';

export function flowchartPrompt(headingStack: string[]): string {
  const section = headingStack.length > 0 ? headingStack.join(' > ') : 'none';
  return `You are a senior systems analyst. Using the document context of this figure (section: ${section}):
1. Describe every core component or module shown in the diagram.
2. List the connections between them: data flow, control flow or dependencies.
3. Use precise engineering terms and answer as a Markdown list.`;
}

export function parseImageKind(answer: string): ImageKind {
  const upper = answer.trim().toUpperCase();
  return IMAGE_KINDS.find((kind) => upper.includes(kind)) ?? 'OTHER';
}

export function truncateToTokens(text: string, maxTokens: number, suffix = CHART_TRUNCATION_SUFFIX): string {
  if (Math.floor(text.length / CHARS_PER_TOKEN) <= maxTokens) return text;
  const maxChars = Math.max(0, maxTokens * CHARS_PER_TOKEN - suffix.length);
  return text.slice(0, maxChars).trimEnd() + suffix;
}

export function fuseCaption(originalCaption: string, extracted: string): string {
  const parts = [ANALYSIS_HEADER];
  if (originalCaption) parts.push(`${ORIGINAL_CAPTION_PREFIX}${originalCaption}`);
  if (extracted) parts.push(`Extracted:\n${extracted}`);
  if (!originalCaption && !extracted) parts.push('(no description available)');
  return parts.join('\n');
}

/**
 * Heading path in effect at each block position
 */
export function headingStacks(blocks: Block[]): string[][] {
  const stack: string[] = [];
  return blocks.map((block) => {
    if (block.type === 'title' && block.text.trim()) {
      stack.push(block.text.trim());
    }
    return [...stack];
  });
}

/**
 * Caption as the parser delivered it, before any analysis was fused into the block text
 */
export function originalCaptionOf(block: Block): string {
  const stored = block.imageMetadata?.['originalCaption'];
  if (typeof stored === 'string') return stored;

  const text = block.text.trim();
  if (!text.startsWith(ANALYSIS_HEADER)) return text;
  const line = text.split('\n').find((candidate) => candidate.startsWith(ORIGINAL_CAPTION_PREFIX));
  return line ? line.slice(ORIGINAL_CAPTION_PREFIX.length).trim() : '';
}

export function imageBytesOf(block: Block): Buffer | null {
  if (block.imageBytes && block.imageBytes.length > 0) return block.imageBytes;
  if (block.imageBase64) {
    const decoded = Buffer.from(block.imageBase64, 'base64');
    return decoded.length > 0 ? decoded : null;
  }
  return null;
}

function withDeadline<T>(operation: Promise<T>, ms: number, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new Error(`${label} timed out after ${ms}ms`)), ms);
    operation.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}

const logger = createLogger('images');

/**
 * Uploads image blocks to the blob store and, when enabled, replaces their text with a
 * vision-model analysis fused with the original caption
 */
export class ImagePreprocessor {
  constructor(
    private blobStore: BlobStore,
    private vision: VisionProvider | null,
    private options: ImagePreprocessorOptions
  ) {}

  async preprocess(blocks: Block[], target: PreprocessTarget, force = false): Promise<Block[]> {
    const stacks = headingStacks(blocks);
    const captioning = (this.options.captioning || force) && this.vision !== null;

    for (const [i, block] of blocks.entries()) {
      if (!IMAGE_FAMILY.has(block.type)) continue;
      const bytes = imageBytesOf(block);
      if (!bytes) continue;

      if (!block.imageUrl) {
        block.imageUrl = await this.upload(bytes, target);
      }

      const alreadyCaptioned = block.imageMetadata?.['captioned'] === true;
      if (!captioning || (alreadyCaptioned && !force)) continue;

      const caption = originalCaptionOf(block);
      try {
        const analysis = await withDeadline(
          this.analyze(bytes, caption, stacks[i] ?? []),
          this.options.timeoutMs,
          'Image analysis'
        );
        block.text = analysis.content;
        block.imageMetadata = {
          ...block.imageMetadata,
          captioned: true,
          imageKind: analysis.kind,
          originalCaption: caption,
        };
      } catch (error) {
        logger.warn(`Keeping original caption for image ${i}`, describeError(error));
      }
    }

    return blocks;
  }

  private async upload(bytes: Buffer, target: PreprocessTarget): Promise<string | undefined> {
    const key = `rag/images/${target.collectionId}/${target.documentId}/${uuidv4()}.png`;
    try {
      await this.blobStore.put(key, bytes, 'image/png');
      return await this.blobStore.presignedUrl(key, this.options.urlExpirySeconds);
    } catch (error) {
      logger.warn(`Image upload failed for ${key}`, describeError(error));
      return undefined;
    }
  }

  private async analyze(image: Buffer, caption: string, headingStack: string[]): Promise<{ content: string; kind: ImageKind }> {
    const vision = this.vision;
    if (!vision) {
      return { content: fuseCaption(caption, ''), kind: 'OTHER' };
    }

    const kind = parseImageKind(await vision.describeImage(image, TRIAGE_PROMPT, { maxTokens: 10 }));
    let extracted: string;
    if (kind === 'FLOWCHART') {
      extracted = await vision.describeImage(image, flowchartPrompt(headingStack), { maxTokens: 2048 });
    } else if (kind === 'CHART') {
      const raw = await vision.describeImage(image, CHART_PROMPT, {
        maxTokens: Math.max(1024, this.options.chartMaxTokens),
      });
      extracted = truncateToTokens(raw.trim(), this.options.chartMaxTokens);
    } else {
      extracted = await vision.describeImage(image, PHOTO_PROMPT);
    }

    return { content: fuseCaption(caption, extracted.trim()), kind };
  }
}
