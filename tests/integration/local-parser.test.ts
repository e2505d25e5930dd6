import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { StageError } from '../../src/services/ingestion.js';
import { setSilent } from '../../src/utils/logger.js';
import { createTestKnowledgeBase } from '../helpers/fakes.js';

const REPORT_TABLE = '<table><tr><td>Quarter</td><td>Revenue</td></tr><tr><td>Q1</td><td>120</td></tr></table>';

function layoutResponse(): Response {
  return new Response(
    JSON.stringify({
      results: {
        report: {
          md_content: '# Quarterly Report',
          content_list: [
            { type: 'title', text: 'Quarterly Report', page_idx: 0 },
            { type: 'text', text: 'Revenue grew in every region this quarter.', page_idx: 0 },
            { type: 'table', table_body: REPORT_TABLE, page_idx: 1 },
            { type: 'text', text: 'Costs stayed flat compared to last year.', page_idx: 2 },
            { type: 'page_number', text: '3', page_idx: 2 },
          ],
        },
      },
    }),
    { status: 200, headers: { 'Content-Type': 'application/json' } }
  );
}

describe('ingestion through the local layout service', () => {
  beforeEach(() => {
    setSilent(true);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    setSilent(false);
  });

  it('parses, indexes and retrieves a table with its section context', async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => layoutResponse());
    vi.stubGlobal('fetch', fetchMock);
    const { kb } = createTestKnowledgeBase({}, { parsing: { local: { baseUrl: 'http://parser.local' } } });

    try {
      const uploaded = await kb.upload('reports', 'q1-report.pdf', Buffer.from('%PDF-1.7 quarterly report'));
      const processed = await kb.processNow(uploaded.id);

      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(fetchMock.mock.calls[0]?.[0]).toBe('http://parser.local/file_parse');
      expect(processed.status).toBe('READY');
      expect(processed.parser_engine).toBe('local-layout-service');
      expect(kb.getStats()).toEqual({ documents: 1, chunks: 4, activeChunks: 4, vectors: 3 });

      const response = await kb.search({
        collectionId: 'reports',
        query: 'Q1',
        chunkTypes: ['TABLE'],
        enableRerank: false,
      });

      expect(response.hits).toHaveLength(1);
      const [hit] = response.hits;
      expect(hit?.chunkType).toBe('TABLE');
      expect(hit?.content).toBe(REPORT_TABLE);
      expect(hit?.pageNumbers).toEqual([1]);
      expect(hit?.sources[0]).toBe('exact');
      expect(hit?.parentContent).toBe(
        [
          'Quarterly Report',
          'Revenue grew in every region this quarter.',
          REPORT_TABLE,
          'Costs stayed flat compared to last year.',
        ].join('\n\n')
      );
    } finally {
      await kb.close();
    }
  });

  it('fails the document when the service errors and no other backend can read it', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('busy', { status: 503 })));
    const { kb } = createTestKnowledgeBase({}, { parsing: { local: { baseUrl: 'http://parser.local' } } });

    try {
      const uploaded = await kb.upload('reports', 'broken.pdf', Buffer.from('not really a pdf'));
      await expect(kb.processNow(uploaded.id)).rejects.toBeInstanceOf(StageError);

      const processed = kb.getDocument(uploaded.id);
      expect(processed?.status).toBe('FAILED');
      expect(processed?.error_log?.split('\n')[0]).toMatch(/^\[PARSING\] ParseError: All parsers failed for broken\.pdf: /);
    } finally {
      await kb.close();
    }
  });
});
