import type { SearchHit } from '@coverage-rag/types';
import { Chunk } from './Chunk';

/**
 * A chunk ranked against a query. `score` is a squared Euclidean distance,
 * so LOWER is MORE similar; do not compare it with cosine similarities.
 */
export class SearchResult {
    constructor(
        public readonly chunk: Chunk,
        public readonly score: number,
        public readonly rank: number
    ) {}

    toHit(): SearchHit {
        return { ...this.chunk.toRecord(), score: this.score, rank: this.rank };
    }
}
