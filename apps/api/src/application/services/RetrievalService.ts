import { SearchResult } from '../../domain/entities/SearchResult';
import { VectorStore, type PositionFilter } from '../../domain/entities/VectorStore';
import { ConfigError } from '../../domain/errors/PipelineErrors';
import { EmbeddingService } from './EmbeddingService';
import logger from '../../infrastructure/logger';

export interface RetrievalFilter {
    region?: string;
    category?: string;
}

export class RetrievalService {
    constructor(
        private vectorStore: VectorStore,
        private embeddingService: EmbeddingService
    ) {}

    /**
     * Ranks stored chunks against a query, closest first. Returns
     * min(k, eligible chunks) results; an empty store yields [].
     * Scores are squared distances: lower is more similar.
     */
    async retrieve(query: string, k: number, filter: RetrievalFilter = {}): Promise<SearchResult[]> {
        if (!Number.isInteger(k) || k < 1) {
            throw new ConfigError(`k must be a positive integer, got ${k}`);
        }
        if (this.vectorStore.size === 0) {
            return [];
        }

        const startTime = Date.now();
        const queryVector = await this.embeddingService.embedOne(query);
        const hits = this.vectorStore.search(queryVector, k, this.toPositionFilter(filter));

        const results = hits.map(hit => new SearchResult(
            this.vectorStore.metadataAt(hit.position),
            hit.score,
            hit.rank
        ));

        logger.info('Retrieval completed', {
            latency: Date.now() - startTime,
            query: query.substring(0, 50),
            k,
            returned: results.length,
        });
        return results;
    }

    private toPositionFilter(filter: RetrievalFilter): PositionFilter | undefined {
        if (filter.region === undefined && filter.category === undefined) {
            return undefined;
        }
        const eligible = this.vectorStore.positionsWhere(chunk =>
            (filter.region === undefined || chunk.region === filter.region) &&
            (filter.category === undefined || chunk.category === filter.category)
        );
        return position => eligible.has(position);
    }
}
