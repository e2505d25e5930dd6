export class KnowledgeBaseError extends Error {
  constructor(message: string, public code?: string) {
    super(message);
    this.name = 'KnowledgeBaseError';
  }
}

export class ConfigurationError extends KnowledgeBaseError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigurationError';
  }
}

export class DatabaseError extends KnowledgeBaseError {
  constructor(message: string) {
    super(message, 'DATABASE_ERROR');
    this.name = 'DatabaseError';
  }
}

export class ApiError extends KnowledgeBaseError {
  constructor(message: string, public provider?: string, public status?: number) {
    super(message, 'API_ERROR');
    this.name = 'ApiError';
  }
}

export class ValidationError extends KnowledgeBaseError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

export class FileError extends KnowledgeBaseError {
  constructor(message: string) {
    super(message, 'FILE_ERROR');
    this.name = 'FileError';
  }
}

export class UnsupportedFileTypeError extends KnowledgeBaseError {
  constructor(public filename: string) {
    super(`Unsupported file type: ${filename}`, 'UNSUPPORTED_FILE_TYPE');
    this.name = 'UnsupportedFileTypeError';
  }
}

export class DocumentNotFoundError extends KnowledgeBaseError {
  constructor(public documentId: string) {
    super(`Document not found: ${documentId}`, 'DOCUMENT_NOT_FOUND');
    this.name = 'DocumentNotFoundError';
  }
}

export class InvalidStatusTransitionError extends KnowledgeBaseError {
  constructor(public documentId: string, public from: string, public to: string) {
    super(`Document ${documentId} cannot move from ${from} to ${to}`, 'INVALID_STATUS_TRANSITION');
    this.name = 'InvalidStatusTransitionError';
  }
}

export class ParseError extends KnowledgeBaseError {
  constructor(message: string, public attempts: string[] = []) {
    super(message, 'PARSE_ERROR');
    this.name = 'ParseError';
  }
}

export class EmbeddingError extends KnowledgeBaseError {
  constructor(message: string, public chunkIds: string[] = []) {
    super(message, 'EMBEDDING_ERROR');
    this.name = 'EmbeddingError';
  }
}

/**
 * Render an unknown thrown value as "Name: message"
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
