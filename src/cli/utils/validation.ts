import { CHUNK_TYPES, ChunkType, isChunkType } from '../../types/document.js';
import { isSupportedFile, SUPPORTED_EXTENSIONS } from '../../parsers/chain.js';
import { KnowledgeBaseError, ValidationError } from '../../utils/errors.js';

export function validateApiKey(apiKey: string): void {
  if (!apiKey || apiKey.trim().length === 0) {
    throw new ValidationError('API key cannot be empty');
  }
  if (apiKey.trim().length < 8) {
    throw new ValidationError('API key appears to be too short');
  }
}

export function validateFilePath(filePath: string): void {
  if (!filePath || filePath.trim().length === 0) {
    throw new ValidationError('File path cannot be empty');
  }
  if (filePath.startsWith('/etc/') || filePath.startsWith('/proc/') || filePath.startsWith('/sys/')) {
    throw new ValidationError('Cannot access system directories');
  }
  if (!isSupportedFile(filePath)) {
    throw new ValidationError(
      `Unsupported file type. Supported: ${Object.keys(SUPPORTED_EXTENSIONS).join(', ')}`
    );
  }
}

export function validateQueryString(query: string): void {
  if (!query || query.trim().length === 0) {
    throw new ValidationError('Search query cannot be empty');
  }
  if (query.trim().length > 1000) {
    throw new ValidationError('Search query is too long (max: 1000 characters)');
  }
}

export function validateCollectionId(collectionId: string | undefined): string {
  if (!collectionId || collectionId.trim().length === 0) {
    throw new ValidationError('A collection id is required (--collection <id>)');
  }
  return collectionId.trim();
}

export function parseTopK(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0 || parsed > 100) {
    throw new ValidationError('Top-k must be an integer between 1 and 100');
  }
  return parsed;
}

/**
 * "TABLE,text" -> ['TABLE', 'TEXT']
 */
export function parseChunkTypes(value: string | undefined): ChunkType[] | undefined {
  if (value === undefined) return undefined;
  return splitList(value).map((item) => {
    const upper = item.toUpperCase();
    if (!isChunkType(upper)) {
      throw new ValidationError(`Unknown chunk type "${item}". Expected one of: ${CHUNK_TYPES.join(', ')}`);
    }
    return upper;
  });
}

/**
 * A comma-separated list. An empty string yields [] so the caller can ask for "no documents".
 */
export function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function formatValidationError(error: unknown): string {
  if (error instanceof ValidationError) {
    return `❌ Validation Error: ${error.message}`;
  }
  if (error instanceof KnowledgeBaseError) {
    return `❌ ${error.name}${error.code ? ` [${error.code}]` : ''}: ${error.message}`;
  }
  if (error instanceof Error) {
    return `❌ Error: ${error.message}`;
  }
  return `❌ Unknown error: ${String(error)}`;
}
