import { ChunkType } from './document.js';

export type RecallSource = 'exact' | 'sparse' | 'dense';

export interface SearchRequest {
  collectionId: string;
  query: string;
  /** `[]` means "nothing selected" and yields no hits; omit to search the whole collection */
  documentIds?: string[];
  topK?: number;
  chunkTypes?: ChunkType[];
  useParent?: boolean;
  enableExact?: boolean;
  enableSparse?: boolean;
  enableDense?: boolean;
  enableRerank?: boolean;
  rerankThreshold?: number;
  fallbackCosineThreshold?: number;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface RecallFilter {
  collectionId: string;
  documentIds?: string[];
  chunkTypes?: ChunkType[];
}

export interface RecallCandidate {
  chunkId: string;
  score: number;
  source: RecallSource;
}

export interface FusedCandidate {
  chunkId: string;
  score: number;
  sources: RecallSource[];
}

export interface SearchHit {
  chunkId: string;
  documentId: string;
  content: string;
  chunkType: ChunkType;
  pageNumbers: number[];
  score: number;
  rerankScore: number | null;
  sources: RecallSource[];
  parentContent: string | null;
}

export interface PathStats {
  exact?: number;
  sparse?: number;
  dense?: number;
  rrf_top?: number;
  rerank_top?: number;
}

export interface SearchResponse {
  query: string;
  hits: SearchHit[];
  total: number;
  pathStats: PathStats;
  processingTimeMs: number;
}
