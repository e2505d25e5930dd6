import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  CHART_PROMPT,
  ImagePreprocessor,
  ImagePreprocessorOptions,
  PHOTO_PROMPT,
  TRIAGE_PROMPT,
  flowchartPrompt,
  fuseCaption,
  headingStacks,
  originalCaptionOf,
  parseImageKind,
  truncateToTokens,
} from '../../src/services/image-preprocessor.js';
import { MemoryBlobStore } from '../../src/services/blob-store.js';
import { Block } from '../../src/types/document.js';
import { VisionProvider } from '../../src/types/provider.js';
import { setSilent } from '../../src/utils/logger.js';
import { FakeTextProvider } from '../helpers/fakes.js';

const options: ImagePreprocessorOptions = {
  captioning: false,
  timeoutMs: 1000,
  chartMaxTokens: 1500,
  urlExpirySeconds: 3600,
};

const target = { documentId: 'doc-1', collectionId: 'col-1' };

function figureBlocks(): Block[] {
  return [
    { type: 'title', text: 'Results', pageNumbers: [0] },
    { type: 'image', text: 'Figure 2', pageNumbers: [0], imageBytes: Buffer.from('png-bytes') },
  ];
}

class BrokenVision implements VisionProvider {
  name = 'broken-vision';

  async describeImage(): Promise<string> {
    throw new Error('vision offline');
  }
}

describe('ImagePreprocessor', () => {
  let blobStore: MemoryBlobStore;

  beforeEach(() => {
    setSilent(true);
    blobStore = new MemoryBlobStore();
  });

  afterEach(() => {
    setSilent(false);
  });

  it('uploads images without captioning when it is disabled', async () => {
    const vision = new FakeTextProvider();
    const blocks = await new ImagePreprocessor(blobStore, vision, options).preprocess(figureBlocks(), target);

    expect(vision.prompts).toEqual([]);
    expect(blocks[1]?.text).toBe('Figure 2');
    expect(blocks[1]?.imageMetadata).toBeUndefined();
    expect(blocks[1]?.imageUrl).toMatch(/^https:\/\/blobs\.local\/rag\/images\/col-1\/doc-1\/[0-9a-f-]+\.png\?expires=\d+&signature=[0-9a-f]+$/);

    const keys = [...blobStore.blobs.keys()];
    expect(keys).toHaveLength(1);
    expect(blobStore.blobs.get(keys[0] ?? '')?.toString()).toBe('png-bytes');
  });

  it('analyzes charts and fuses the result with the original caption', async () => {
    const vision = new FakeTextProvider();
    vision.visionAnswers = ['CHART', '| a | b |\n| --- | --- |\n| 1 | 2 |\n'];

    const blocks = await new ImagePreprocessor(blobStore, vision, options).preprocess(figureBlocks(), target, true);

    expect(vision.prompts).toEqual([TRIAGE_PROMPT, CHART_PROMPT]);
    expect(blocks[1]?.text).toBe('[Figure analysis]\nOriginal caption: Figure 2\nExtracted:\n| a | b |\n| --- | --- |\n| 1 | 2 |');
    expect(blocks[1]?.imageMetadata).toEqual({ captioned: true, imageKind: 'CHART', originalCaption: 'Figure 2' });
  });

  it('describes flowcharts with the enclosing section headings', async () => {
    const vision = new FakeTextProvider();
    vision.visionAnswers = ['flowchart', '- parser -> chunker'];

    const blocks = await new ImagePreprocessor(blobStore, vision, { ...options, captioning: true }).preprocess(figureBlocks(), target);

    expect(vision.prompts[1]).toBe(flowchartPrompt(['Results']));
    expect(blocks[1]?.imageMetadata).toEqual({ captioned: true, imageKind: 'FLOWCHART', originalCaption: 'Figure 2' });
  });

  it('falls back to a plain description for other images', async () => {
    const vision = new FakeTextProvider();
    vision.visionAnswers = ['something else', 'A warehouse at dusk.'];

    const blocks = await new ImagePreprocessor(blobStore, vision, { ...options, captioning: true }).preprocess(figureBlocks(), target);

    expect(vision.prompts[1]).toBe(PHOTO_PROMPT);
    expect(blocks[1]?.text).toBe(fuseCaption('Figure 2', 'A warehouse at dusk.'));
    expect(blocks[1]?.imageMetadata).toEqual({ captioned: true, imageKind: 'OTHER', originalCaption: 'Figure 2' });
  });

  it('re-captions from the original caption instead of the previous analysis', async () => {
    const vision = new FakeTextProvider();
    vision.visionAnswers = ['PHOTO', 'A forklift.', 'PHOTO', 'A forklift in a warehouse.'];
    const preprocessor = new ImagePreprocessor(blobStore, vision, options);
    const blocks = figureBlocks();

    await preprocessor.preprocess(blocks, target, true);
    await preprocessor.preprocess(blocks, target, true);

    expect(blocks[1]?.text).toBe('[Figure analysis]\nOriginal caption: Figure 2\nExtracted:\nA forklift in a warehouse.');
    expect(blocks[1]?.imageMetadata).toEqual({ captioned: true, imageKind: 'PHOTO', originalCaption: 'Figure 2' });
    expect(blobStore.blobs.size).toBe(1);
  });

  it('skips images captioned earlier unless forced', async () => {
    const vision = new FakeTextProvider();
    const blocks = figureBlocks();
    const image = blocks[1];
    if (image) image.imageMetadata = { captioned: true, imageKind: 'PHOTO' };

    await new ImagePreprocessor(blobStore, vision, { ...options, captioning: true }).preprocess(blocks, target);

    expect(vision.prompts).toEqual([]);
    expect(blocks[1]?.text).toBe('Figure 2');
  });

  it('keeps the original caption when analysis fails', async () => {
    const blocks = await new ImagePreprocessor(blobStore, new BrokenVision(), { ...options, captioning: true })
      .preprocess(figureBlocks(), target);

    expect(blocks[1]?.text).toBe('Figure 2');
    expect(blocks[1]?.imageMetadata).toBeUndefined();
    expect(blocks[1]?.imageUrl).toBeDefined();
  });

  it('leaves image blocks without bytes alone', async () => {
    const blocks = await new ImagePreprocessor(blobStore, null, options).preprocess(
      [{ type: 'image', text: 'Figure 3', pageNumbers: [1] }],
      target
    );

    expect(blocks[0]?.imageUrl).toBeUndefined();
    expect(blobStore.blobs.size).toBe(0);
  });
});

describe('image helpers', () => {
  it('parses the triage answer', () => {
    expect(parseImageKind('  chart.')).toBe('CHART');
    expect(parseImageKind('PHOTO')).toBe('PHOTO');
    expect(parseImageKind('no idea')).toBe('OTHER');
  });

  it('truncates long chart analyses to the token budget', () => {
    expect(truncateToTokens('a'.repeat(60), 20)).toBe('a'.repeat(60));
    expect(truncateToTokens('a'.repeat(90), 20)).toBe(`${'a'.repeat(43)}\n\n[... truncated]`);
  });

  it('recovers the original caption from fused text', () => {
    const fused: Block = { type: 'image', text: fuseCaption('Figure 4', 'Bars'), pageNumbers: [] };
    expect(originalCaptionOf(fused)).toBe('Figure 4');
    expect(originalCaptionOf({ type: 'image', text: fuseCaption('', 'Bars'), pageNumbers: [] })).toBe('');
    expect(originalCaptionOf({ type: 'image', text: ' Figure 5 ', pageNumbers: [] })).toBe('Figure 5');
  });

  it('builds fused captions', () => {
    expect(fuseCaption('', '')).toBe('[Figure analysis]\n(no description available)');
    expect(fuseCaption('', 'Bars')).toBe('[Figure analysis]\nExtracted:\nBars');
  });

  it('tracks the heading path per block', () => {
    const stacks = headingStacks([
      { type: 'text', text: 'intro', pageNumbers: [] },
      { type: 'title', text: 'Part A', pageNumbers: [] },
      { type: 'title', text: 'Details', pageNumbers: [] },
    ]);
    expect(stacks).toEqual([[], ['Part A'], ['Part A', 'Details']]);
  });
});
