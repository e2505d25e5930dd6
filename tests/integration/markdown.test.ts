import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { DocumentNotFoundError } from '../../src/utils/errors.js';
import { setSilent } from '../../src/utils/logger.js';
import { Block } from '../../src/types/document.js';
import { FakeTextProvider, StaticParser, createTestKnowledgeBase } from '../helpers/fakes.js';
import { POLICY_BYTES, POLICY_PARENT, policyBlocks } from '../helpers/fixtures.js';

describe('markdown export', () => {
  beforeEach(() => {
    setSilent(true);
  });

  afterEach(() => {
    setSilent(false);
  });

  it('returns top-level chunks and caches the generated summary', async () => {
    const text = new FakeTextProvider('Northwind ships fast.');
    const { kb } = createTestKnowledgeBase({ parser: new StaticParser(policyBlocks()), text });
    try {
      const document = await kb.upload('col-a', 'policy.pdf', POLICY_BYTES);
      await kb.processNow(document.id);

      const first = await kb.getMarkdown(document.id);
      expect(first.filename).toBe('policy.pdf');
      expect(first.segments.map((segment) => segment.content)).toEqual([POLICY_PARENT]);
      expect(first.segments[0]?.type).toBe('TEXT');
      expect(first.summary).toBe('Northwind ships fast.');
      expect(text.prompts).toHaveLength(1);
      expect(text.prompts[0]).toContain('Summarize the document "policy.pdf"');
      expect(text.prompts[0]).toContain('Returns are accepted within thirty days.');
      expect(kb.getDocument(document.id)?.summary).toBe('Northwind ships fast.');

      const second = await kb.getMarkdown(document.id);
      expect(second.summary).toBe('Northwind ships fast.');
      expect(text.prompts).toHaveLength(1);
    } finally {
      await kb.close();
    }
  });

  it('leaves the summary empty without a text provider', async () => {
    const { kb } = createTestKnowledgeBase({ parser: new StaticParser(policyBlocks()) });
    try {
      const document = await kb.upload('col-a', 'policy.pdf', POLICY_BYTES);
      await kb.processNow(document.id);

      const exported = await kb.getMarkdown(document.id);
      expect(exported.summary).toBe('');
      expect(kb.getDocument(document.id)?.summary).toBeNull();
    } finally {
      await kb.close();
    }
  });

  it('does not persist a blank summary', async () => {
    const text = new FakeTextProvider('   ');
    const { kb } = createTestKnowledgeBase({ parser: new StaticParser(policyBlocks()), text });
    try {
      const document = await kb.upload('col-a', 'policy.pdf', POLICY_BYTES);
      await kb.processNow(document.id);

      expect((await kb.getMarkdown(document.id)).summary).toBe('');
      await kb.getMarkdown(document.id);
      expect(text.prompts).toHaveLength(2);
    } finally {
      await kb.close();
    }
  });

  it('renders uploaded images as markdown links', async () => {
    const blocks: Block[] = [
      ...policyBlocks().filter((block) => block.type !== 'footer'),
      { type: 'image', text: 'Figure 1', pageNumbers: [2], imageBytes: Buffer.from('png-bytes') },
    ];
    const { kb, blobStore } = createTestKnowledgeBase({ parser: new StaticParser(blocks) });
    try {
      const document = await kb.upload('col-a', 'policy.pdf', POLICY_BYTES);
      await kb.processNow(document.id);

      const imageKeys = [...blobStore.blobs.keys()].filter((key) => key.startsWith(`rag/images/col-a/${document.id}/`));
      expect(imageKeys).toHaveLength(1);

      const exported = await kb.getMarkdown(document.id);
      expect(exported.segments).toHaveLength(1);
      const lines = exported.segments[0]?.content.split('\n') ?? [];
      const imageLine = lines.find((line) => line.startsWith('![image]('));
      expect(imageLine).toMatch(/^!\[image\]\(https:\/\/blobs\.local\/rag\/images\/col-a\/[^)]+\.png\?expires=\d+&signature=[0-9a-f]+\)$/);
      expect(lines[lines.indexOf(imageLine ?? '') + 1]).toBe('Figure 1');
    } finally {
      await kb.close();
    }
  });

  it('fails for unknown documents', async () => {
    const { kb } = createTestKnowledgeBase();
    try {
      await expect(kb.getMarkdown('missing')).rejects.toBeInstanceOf(DocumentNotFoundError);
    } finally {
      await kb.close();
    }
  });
});
