import type { SearchResponse } from '@coverage-rag/types';
import { RetrievalService, type RetrievalFilter } from '../services/RetrievalService';

export class SearchDocuments {
    constructor(private retrievalService: RetrievalService) {}

    async execute(query: string, k: number, filter: RetrievalFilter = {}): Promise<SearchResponse> {
        const results = await this.retrievalService.retrieve(query, k, filter);
        return { query, results: results.map(result => result.toHit()) };
    }
}
