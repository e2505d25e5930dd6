export const DOCUMENT_STATUSES = ['UPLOADED', 'PARSING', 'PARSED', 'EMBEDDING', 'READY', 'FAILED'] as const;
export type DocumentStatus = (typeof DOCUMENT_STATUSES)[number];

export const CHUNK_TYPES = ['TEXT', 'TABLE', 'IMAGE_CAPTION', 'CODE'] as const;
export type ChunkType = (typeof CHUNK_TYPES)[number];

export const BLOCK_TYPES = [
  'title',
  'text',
  'list',
  'ref_text',
  'page_footnote',
  'aside_text',
  'interline_equation',
  'table',
  'table_caption',
  'table_footnote',
  'image',
  'image_caption',
  'image_footnote',
  'image_body',
  'code',
  'code_caption',
  'algorithm',
  'header',
  'footer',
  'page_number',
  'phonetic',
] as const;
export type BlockType = (typeof BLOCK_TYPES)[number];

/**
 * Normalized parser output unit. Every backend response is coerced into this shape.
 */
export interface Block {
  type: BlockType;
  text: string;
  pageNumbers: number[];
  tableBody?: string;
  imageBytes?: Buffer;
  imageBase64?: string;
  imagePath?: string;
  imageUrl?: string;
  imageMetadata?: Record<string, unknown>;
}

export interface Document {
  id: string;
  collection_id: string;
  filename: string;
  content_hash: string;
  byte_size: number;
  storage_path: string;
  parser_engine: string;
  parser_version: string;
  chunking_strategy: string;
  status: DocumentStatus;
  error_log: string | null;
  metadata: Record<string, unknown> | null;
  summary: string | null;
  created_at: string;
  updated_at: string;
}

export interface Chunk {
  id: string;
  document_id: string;
  collection_id: string;
  parent_chunk_id: string | null;
  chunk_index: number;
  page_numbers: number[];
  chunk_type: ChunkType;
  content: string;
  token_count: number;
  is_active: boolean;
  created_at?: string;
}

export type NewChunk = Omit<Chunk, 'is_active' | 'created_at'>;

export function isChunkType(value: string): value is ChunkType {
  return (CHUNK_TYPES as readonly string[]).includes(value);
}

export function isDocumentStatus(value: string): value is DocumentStatus {
  return (DOCUMENT_STATUSES as readonly string[]).includes(value);
}
