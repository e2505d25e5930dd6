import JSZip from 'jszip';
import { ParseInput, ParseResult, ParserStrategy } from './types.js';
import { RawBlock, findBlockList, injectImages, isRecord, toBlocks } from './normalize.js';
import { request, requestJson } from '../utils/http.js';
import { ParseError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { sleep } from '../utils/retry.js';

export interface ExternalParseServiceOptions {
  baseUrl: string;
  apiToken?: string;
  modelVersion: string;
  language: string;
  pollIntervalMs: number;
  pollTimeoutMs: number;
}

const IMAGE_EXTENSIONS = ['.png', '.jpg', '.jpeg', '.gif', '.webp', '.bmp'];
const FAILED_STATES = new Set(['failed', 'error', 'failure']);

const logger = createLogger('parser:external');

function pickString(record: Record<string, unknown>, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === 'string' && value) return value;
    if (typeof value === 'number') return String(value);
  }
  return undefined;
}

function unwrapData(body: unknown): Record<string, unknown> {
  if (!isRecord(body)) return {};
  const data = body['data'];
  return isRecord(data) ? data : body;
}

/**
 * Hosted extraction API: create a task for a public file URL, poll until a result
 * archive is ready, then read markdown, block list and images out of the archive.
 */
export class ExternalParseService implements ParserStrategy {
  readonly name = 'external-parse-service';

  constructor(private options: ExternalParseServiceOptions) {}

  isAvailable(): boolean {
    return Boolean(this.options.apiToken?.trim());
  }

  private headers(): Record<string, string> {
    return {
      'Content-Type': 'application/json',
      Authorization: `Bearer ${this.options.apiToken ?? ''}`,
    };
  }

  async tryParse(input: ParseInput): Promise<ParseResult> {
    if (!input.resolveUrl) {
      throw new ParseError('External parsing needs a public file URL');
    }
    const fileUrl = await input.resolveUrl();
    const base = this.options.baseUrl.replace(/\/+$/, '');

    const created = await requestJson(`${base}/api/v4/extract/task`, this.name, {
      method: 'POST',
      headers: this.headers(),
      body: JSON.stringify({
        url: fileUrl,
        model_version: this.options.modelVersion,
        language: this.options.language,
        enable_formula: true,
        enable_table: true,
      }),
      timeoutMs: 60_000,
      ...(input.signal ? { signal: input.signal } : {}),
    });

    const taskId = pickString(unwrapData(created), 'task_id', 'id', 'taskId');
    if (!taskId) {
      throw new ParseError('External parse service returned no task id');
    }
    logger.debug(`Created task ${taskId} for ${input.filename}`);

    const archiveUrl = await this.waitForResult(`${base}/api/v4/extract/task/${taskId}`, input.signal);
    const archive = await request(archiveUrl, this.name, {
      timeoutMs: 120_000,
      ...(input.signal ? { signal: input.signal } : {}),
    });
    const result = await readResultArchive(Buffer.from(await archive.arrayBuffer()));

    return { ...result, engine: this.name };
  }

  private async waitForResult(url: string, signal?: AbortSignal): Promise<string> {
    const started = Date.now();

    while (Date.now() - started < this.options.pollTimeoutMs) {
      await sleep(this.options.pollIntervalMs);
      if (signal?.aborted) {
        throw new ParseError('External parsing aborted');
      }

      const body = await requestJson(url, this.name, {
        headers: this.headers(),
        timeoutMs: 30_000,
        ...(signal ? { signal } : {}),
      });
      const task = unwrapData(body);
      const archiveUrl = pickString(task, 'full_zip_url', 'fullZipUrl', 'result_url');
      if (archiveUrl) return archiveUrl;

      const state = (pickString(task, 'status', 'state') ?? '').toLowerCase();
      if (FAILED_STATES.has(state)) {
        throw new ParseError(`External parse task failed: ${pickString(task, 'message', 'err_msg') ?? state}`);
      }
      logger.debug(`Task state=${state || 'pending'} after ${Math.round((Date.now() - started) / 1000)}s`);
    }

    throw new ParseError('External parse task timed out');
  }
}

/**
 * Read markdown (all .md members, sorted, joined by blank lines), the first JSON member that
 * holds a block list, and every image member from a result archive
 */
export async function readResultArchive(data: Buffer): Promise<{ markdown: string; blocks: ReturnType<typeof toBlocks> }> {
  const zip = await JSZip.loadAsync(data);
  const names = Object.keys(zip.files)
    .filter((name) => !zip.files[name]?.dir)
    .sort();

  const markdownParts: string[] = [];
  let rawBlocks: RawBlock[] = [];
  const images = new Map<string, Buffer>();

  for (const name of names) {
    const entry = zip.file(name);
    if (!entry) continue;
    const lower = name.toLowerCase();

    if (lower.endsWith('.md')) {
      markdownParts.push(await entry.async('string'));
    } else if (lower.endsWith('.json') && rawBlocks.length === 0) {
      try {
        const found = findBlockList(JSON.parse(await entry.async('string')));
        if (found && found.length > 0) {
          rawBlocks = found;
          logger.debug(`Block list found in ${name}: ${found.length} blocks`);
        }
      } catch (error) {
        logger.debug(`Skipping ${name}: ${String(error)}`);
      }
    } else if (IMAGE_EXTENSIONS.some((ext) => lower.endsWith(ext))) {
      images.set(name, await entry.async('nodebuffer'));
    }
  }

  injectImages(rawBlocks, images);
  return { markdown: markdownParts.join('\n\n'), blocks: toBlocks(rawBlocks) };
}
