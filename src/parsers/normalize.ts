import { Block, BlockType, BLOCK_TYPES } from '../types/document.js';

export type RawBlock = Record<string, unknown>;

export interface NormalizedResponse {
  markdown: string;
  rawBlocks: RawBlock[];
}

const NUMERIC_BLOCK_TYPES: Record<number, BlockType> = {
  0: 'text',
  1: 'title',
  2: 'text',
  3: 'table',
  4: 'image',
  5: 'image_caption',
};

const BLOCK_TYPE_ALIASES: Record<string, BlockType> = {
  heading: 'title',
  figure: 'image',
  img: 'image',
  picture: 'image',
  figure_caption: 'image_caption',
  caption: 'image_caption',
  equation: 'interline_equation',
};

const IMAGE_TYPES = new Set(['image', 'image_caption', 'image_footnote', 'image_body', 'figure', 'img', 'picture']);
const IMAGE_PATH_KEYS = ['img_path', 'image_path', 'path', 'image_save_path', 'save_path', 'image_src'];
const BLOCK_LIST_KEYS = ['content_list', 'items', 'content_list_v2', 'contentList', 'blocks', 'contentListV2'];
const BLOCK_HINT_KEYS = ['text', 'type', 'content', 'md', 'page_idx', 'content_type'];
const CAPTION_KEYS = ['img_caption', 'image_caption', 'table_caption'];
const MAX_SEARCH_DEPTH = 4;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isBlockType(value: string): value is BlockType {
  return (BLOCK_TYPES as readonly string[]).includes(value);
}

function stringField(record: Record<string, unknown>, ...keys: string[]): string {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === 'string' && value.trim()) return value;
  }
  return '';
}

/**
 * Map the type names and numeric codes used by different layout parsers onto the closed block union
 */
export function normalizeBlockType(raw: unknown): BlockType {
  if (typeof raw === 'number') {
    return NUMERIC_BLOCK_TYPES[raw] ?? 'text';
  }
  const name = String(raw ?? '').trim().toLowerCase();
  const alias = BLOCK_TYPE_ALIASES[name];
  if (alias) return alias;
  return isBlockType(name) ? name : 'text';
}

export function normalizePageNumbers(raw: unknown): number[] {
  if (typeof raw === 'number' && Number.isFinite(raw)) return [Math.trunc(raw)];
  if (Array.isArray(raw)) {
    return raw.map((page) => Number(page)).filter((page) => Number.isFinite(page)).map(Math.trunc);
  }
  if (typeof raw === 'string' && raw.trim() && Number.isFinite(Number(raw))) return [Math.trunc(Number(raw))];
  return [];
}

function rawType(block: RawBlock): unknown {
  return block['type'] ?? block['content_type'] ?? block['block_type'] ?? 'text';
}

function rawTypeName(block: RawBlock): string {
  const type = rawType(block);
  return typeof type === 'string' ? type.trim().toLowerCase() : '';
}

function captionText(block: RawBlock): string {
  for (const key of CAPTION_KEYS) {
    const value = block[key];
    if (Array.isArray(value)) {
      const lines = value.filter((line): line is string => typeof line === 'string' && line.trim().length > 0);
      if (lines.length > 0) return lines.join('\n');
    }
  }
  return '';
}

/**
 * Coerce one parser block into the shared Block shape
 */
export function normalizeBlock(raw: RawBlock): Block {
  const type = normalizeBlockType(rawType(raw));
  const text = (stringField(raw, 'text', 'content', 'md') || captionText(raw)).trim();
  const block: Block = {
    type,
    text,
    pageNumbers: normalizePageNumbers(raw['page_idx'] ?? raw['page_no'] ?? 0),
  };

  const tableBody = stringField(raw, 'table_body');
  if (tableBody) block.tableBody = tableBody;

  const bytes = raw['image_bytes'];
  if (Buffer.isBuffer(bytes) && bytes.length > 0) block.imageBytes = bytes;

  const base64 = stringField(raw, 'b64_image', 'base64_image');
  if (base64) block.imageBase64 = base64;

  const imagePath = stringField(raw, ...IMAGE_PATH_KEYS);
  if (imagePath) block.imagePath = imagePath;

  const imageUrl = stringField(raw, '_image_url', 'image_url');
  if (imageUrl) block.imageUrl = imageUrl;

  return block;
}

function parseBlockList(value: unknown): RawBlock[] {
  let list = value;
  if (typeof list === 'string') {
    try {
      list = JSON.parse(list);
    } catch {
      return [];
    }
  }
  if (isRecord(list)) {
    list = list['content_list'] ?? list['items'] ?? [];
  }
  return Array.isArray(list) ? list.filter(isRecord) : [];
}

/**
 * Unwrap a layout service response: `results` as a list or a keyed map, markdown under
 * `markdown | md | md_content`, and the block list as an array or a JSON string.
 */
export function normalizeParserResponse(result: unknown): NormalizedResponse {
  if (!isRecord(result)) {
    return { markdown: typeof result === 'string' ? result : '', rawBlocks: [] };
  }

  let body: Record<string, unknown> = result;
  const results = result['results'];
  const first = Array.isArray(results) ? results[0] : isRecord(results) ? Object.values(results)[0] : undefined;
  if (isRecord(first)) {
    body = first;
  }

  const markdown = stringField(body, 'markdown', 'md', 'md_content', 'text');
  const contentList = parseBlockList(body['content_list']);
  return {
    markdown,
    rawBlocks: contentList.length > 0 ? contentList : pdfInfoBlocks(body['pdf_info']),
  };
}

/**
 * Per-page intermediate layout: each page carries `preproc_blocks`, `blocks` or `layout_dets`
 */
export function pdfInfoBlocks(pdfInfo: unknown): RawBlock[] {
  if (!Array.isArray(pdfInfo)) return [];
  const blocks: RawBlock[] = [];

  pdfInfo.forEach((page, position) => {
    if (!isRecord(page)) return;
    const pageIdx = page['page_idx'] ?? page['page_no'] ?? position;
    const list = ['preproc_blocks', 'blocks', 'layout_dets']
      .map((key) => page[key])
      .find((value): value is unknown[] => Array.isArray(value) && value.length > 0);

    for (const item of list ?? []) {
      if (!isRecord(item)) continue;
      const text = item['text'];
      if (typeof text === 'string' && text.trim()) {
        blocks.push({ type: item['type'] ?? item['category_type'] ?? 'text', text, page_idx: pageIdx });
      }
    }
  });

  return blocks;
}

export function isLikelyBlockList(value: unknown): value is RawBlock[] {
  if (!Array.isArray(value) || value.length === 0) return false;
  const first: unknown = value[0];
  return isRecord(first) && BLOCK_HINT_KEYS.some((key) => key in first);
}

/**
 * Locate a block list anywhere in a parsed JSON document, tolerating prefixed,
 * camel-cased and nested wrappers
 */
export function findBlockList(value: unknown, depth = 0): RawBlock[] | null {
  if (depth > MAX_SEARCH_DEPTH) return null;
  if (Array.isArray(value)) {
    return isLikelyBlockList(value) ? value.filter(isRecord) : null;
  }
  if (!isRecord(value)) return null;

  for (const key of BLOCK_LIST_KEYS) {
    const candidate = value[key];
    if (isLikelyBlockList(candidate)) return candidate.filter(isRecord);
  }

  for (const key of ['results', 'data']) {
    const wrapper = value[key];
    if (isLikelyBlockList(wrapper)) return wrapper.filter(isRecord);
    if (isRecord(wrapper)) {
      for (const nested of Object.values(wrapper)) {
        const found = findBlockList(nested, depth + 1);
        if (found && found.length > 0) return found;
      }
    }
  }

  const values = Object.values(value);
  if (values.length === 1) {
    return findBlockList(values[0], depth + 1);
  }
  return null;
}

function needsImage(block: RawBlock): boolean {
  if (Buffer.isBuffer(block['image_bytes']) || stringField(block, 'b64_image', 'base64_image')) return false;
  return IMAGE_TYPES.has(rawTypeName(block)) || Boolean(stringField(block, ...IMAGE_PATH_KEYS));
}

function normalizePath(value: string): string {
  return value.trim().replace(/\\/g, '/').replace(/^(\.\/)+/, '');
}

/**
 * Attach image bytes to image blocks by matching their relative path against the given
 * names (exact, base name or path suffix). Unmatched image blocks take the remaining
 * images in order.
 */
export function injectImages(blocks: RawBlock[], images: Map<string, Buffer>): number {
  if (blocks.length === 0 || images.size === 0) return 0;

  const names = [...images.keys()].sort(
    (a, b) => a.split('/').length - b.split('/').length || a.localeCompare(b)
  );
  const used = new Set<string>();
  const pending: RawBlock[] = [];
  let injected = 0;

  const findByPath = (relPath: string): string | undefined => {
    const wanted = normalizePath(relPath);
    const baseName = wanted.split('/').pop() ?? wanted;
    return (
      names.find((name) => normalizePath(name) === wanted) ??
      names.find((name) => normalizePath(name).endsWith(`/${wanted}`)) ??
      names.find((name) => normalizePath(name) === baseName) ??
      names.find((name) => normalizePath(name).endsWith(`/${baseName}`))
    );
  };

  for (const block of blocks) {
    if (!needsImage(block)) continue;
    const relPath = stringField(block, ...IMAGE_PATH_KEYS);
    const match = relPath ? findByPath(relPath) : undefined;
    const bytes = match ? images.get(match) : undefined;
    if (match && bytes) {
      block['image_bytes'] = bytes;
      used.add(match);
      injected++;
    } else if (IMAGE_TYPES.has(rawTypeName(block))) {
      pending.push(block);
    }
  }

  const remaining = names.filter((name) => !used.has(name));
  for (const block of pending) {
    const name = remaining.shift();
    if (name === undefined) break;
    const bytes = images.get(name);
    if (bytes) {
      block['image_bytes'] = bytes;
      injected++;
    }
  }

  return injected;
}

/**
 * Decode base64 image payloads, stripping a data URI prefix
 */
export function decodeBase64Image(value: string): Buffer | null {
  let payload = value.trim();
  if (payload.startsWith('data:')) {
    const comma = payload.indexOf(',');
    payload = comma >= 0 ? payload.slice(comma + 1) : '';
  }
  if (!payload) return null;
  const decoded = Buffer.from(payload, 'base64');
  return decoded.length > 0 ? decoded : null;
}

export function toBlocks(rawBlocks: RawBlock[]): Block[] {
  return rawBlocks.map(normalizeBlock);
}
