import { ParseInput, ParseResult, ParserStrategy } from './types.js';
import {
  decodeBase64Image,
  injectImages,
  isRecord,
  normalizeParserResponse,
  toBlocks,
} from './normalize.js';
import { requestJson } from '../utils/http.js';
import { createLogger } from '../utils/logger.js';

export interface LocalLayoutServiceOptions {
  baseUrl?: string;
  backend: string;
  language: string;
  timeoutMs: number;
}

const logger = createLogger('parser:local');

/**
 * Self-hosted layout analysis service (`POST /file_parse`, multipart upload)
 */
export class LocalLayoutService implements ParserStrategy {
  readonly name = 'local-layout-service';

  constructor(private options: LocalLayoutServiceOptions) {}

  isAvailable(): boolean {
    return Boolean(this.options.baseUrl);
  }

  async tryParse(input: ParseInput): Promise<ParseResult> {
    const base = (this.options.baseUrl ?? '').replace(/\/+$/, '');
    const form = new FormData();
    form.append('files', new Blob([new Uint8Array(input.bytes)], { type: 'application/pdf' }), input.filename);
    form.append('return_md', 'true');
    form.append('return_content_list', 'true');
    form.append('return_images', 'true');
    form.append('lang_list', this.options.language);
    form.append('backend', this.options.backend);

    logger.debug(`POST ${base}/file_parse (${input.bytes.length} bytes)`);
    const result = await requestJson(`${base}/file_parse`, this.name, {
      method: 'POST',
      body: form,
      timeoutMs: this.options.timeoutMs,
      ...(input.signal ? { signal: input.signal } : {}),
    });

    const normalized = normalizeParserResponse(result);
    const injected = injectImages(normalized.rawBlocks, extractResponseImages(result));
    if (injected > 0) {
      logger.debug(`Attached ${injected} images from the response`);
    }

    return {
      markdown: normalized.markdown,
      blocks: toBlocks(normalized.rawBlocks),
      engine: this.name,
    };
  }
}

/**
 * Images returned inline as `results.<name>.images: { "images/0.png": "<base64>" }`
 */
export function extractResponseImages(result: unknown): Map<string, Buffer> {
  const images = new Map<string, Buffer>();
  if (!isRecord(result)) return images;

  const results = result['results'];
  const first = Array.isArray(results) ? results[0] : isRecord(results) ? Object.values(results)[0] : undefined;
  if (!isRecord(first) || !isRecord(first['images'])) return images;

  for (const [name, value] of Object.entries(first['images'])) {
    if (typeof value !== 'string') continue;
    const decoded = decodeBase64Image(value);
    if (decoded) images.set(name, decoded);
  }
  return images;
}
