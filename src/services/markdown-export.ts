import { DocumentRepository } from './document-repository.js';
import { ChunkRepository } from './chunk-repository.js';
import { ChunkType, Document } from '../types/document.js';
import { TextProvider } from '../types/provider.js';
import { TextProcessor } from '../utils/text-processing.js';
import { DocumentNotFoundError, describeError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

export interface MarkdownSegment {
  chunkId: string;
  type: ChunkType;
  content: string;
}

export interface MarkdownExport {
  documentId: string;
  filename: string;
  segments: MarkdownSegment[];
  summary: string;
}

export interface MarkdownExportOptions {
  summaryMaxChars: number;
  summaryMaxTokens: number;
  summaryTemperature: number;
}

const logger = createLogger('markdown');

export function buildSummaryPrompt(filename: string, content: string): string {
  return `Summarize the document "${filename}" in 2 to 4 sentences. Cover its subject, its main points and who it is for. Answer with the summary only.

Document content:
${content}`;
}

/**
 * Reassembles a document from its top-level chunks and attaches a cached summary
 */
export class MarkdownExportService {
  private options: MarkdownExportOptions;

  constructor(
    private documents: DocumentRepository,
    private chunks: ChunkRepository,
    private textProvider: TextProvider | null,
    options?: Partial<MarkdownExportOptions>
  ) {
    this.options = {
      summaryMaxChars: 6000,
      summaryMaxTokens: 500,
      summaryTemperature: 0.3,
      ...options,
    };
  }

  async getMarkdown(documentId: string): Promise<MarkdownExport> {
    const document = this.documents.getById(documentId);
    if (!document) {
      throw new DocumentNotFoundError(documentId);
    }

    // Parents and standalone chunks; children repeat text their parent already holds
    const segments: MarkdownSegment[] = this.chunks
      .listByDocument(documentId)
      .filter((chunk) => chunk.parent_chunk_id === null)
      .map((chunk) => ({
        chunkId: chunk.id,
        type: chunk.chunk_type,
        content: TextProcessor.renderImageLinks(chunk.content),
      }));

    const summary = document.summary ?? (await this.summarize(document, segments));

    return { documentId, filename: document.filename, segments, summary };
  }

  /**
   * Generate and persist a summary. Returns "" when no provider is configured or generation fails.
   */
  async summarize(document: Document, segments: MarkdownSegment[]): Promise<string> {
    if (!this.textProvider || segments.length === 0) return '';

    const content = TextProcessor.truncate(
      segments.map((segment) => segment.content).join('\n\n'),
      this.options.summaryMaxChars
    );

    try {
      const result = await this.textProvider.generateText(buildSummaryPrompt(document.filename, content), {
        maxTokens: this.options.summaryMaxTokens,
        temperature: this.options.summaryTemperature,
      });
      const summary = result.text.trim();
      if (summary) {
        this.documents.setSummary(document.id, summary);
      }
      return summary;
    } catch (error) {
      logger.warn(`Summary generation failed for ${document.id}`, describeError(error));
      return '';
    }
  }
}
