export * from './schemas';

import type { ChunkRecord } from './schemas';

/**
 * A ranked retrieval hit as returned over the wire.
 * `score` is a squared Euclidean distance: lower means more similar.
 */
export interface SearchHit extends ChunkRecord {
  score: number;
  rank: number;
}

export interface SearchResponse {
  query: string;
  results: SearchHit[];
}

export interface AskResponse {
  answer: string;
  sources: Pick<SearchHit, 'chunkId' | 'sourceId' | 'pageNumber' | 'score'>[];
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface StoreStats {
  totalVectors: number;
  dimension: number;
  regions: Record<string, number>;
  categories: Record<string, number>;
}

export interface HealthResponse {
  status: 'ok' | 'empty';
  store: StoreStats;
}
