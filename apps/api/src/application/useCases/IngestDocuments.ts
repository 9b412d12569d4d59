import { Chunk } from '../../domain/entities/Chunk';
import { Page } from '../../domain/entities/Page';
import { VectorStore } from '../../domain/entities/VectorStore';
import { ParseInputError } from '../../domain/errors/PipelineErrors';
import { ChunkingService, type ChunkStats } from '../services/ChunkingService';
import { EmbeddingService } from '../services/EmbeddingService';
import { MetadataTaggingService, type MetadataSummary } from '../services/MetadataTaggingService';
import { NormalizationService } from '../services/NormalizationService';
import logger from '../../infrastructure/logger';

export interface IngestionReport {
    pagesReceived: number;
    pagesSkipped: number;
    pagesIndexed: number;
    chunkStats: ChunkStats;
    metadata: MetadataSummary;
    dimension: number;
    storeDirectory: string;
}

/**
 * Offline build: pages -> normalize -> segment -> tag -> embed -> build -> save.
 * Every chunk is embedded and both artifacts are written before the store
 * changes, so a model or disk failure leaves the previous store (in memory
 * and on disk) as it was.
 */
export class IngestDocuments {
    constructor(
        private normalizer: NormalizationService,
        private chunker: ChunkingService,
        private tagger: MetadataTaggingService,
        private embedder: EmbeddingService,
        private vectorStore: VectorStore,
        private storeDirectory: string
    ) {}

    async execute(records: unknown[]): Promise<IngestionReport> {
        const pages = this.parsePages(records);
        const cleaned = this.normalizer.normalizePages(pages);
        const segmented = this.chunker.chunkPages(cleaned);

        const chunks: Chunk[] = segmented.flatMap(({ page, chunks: texts }) => this.tagger.tag(texts, page));
        this.warnOnDuplicateIds(chunks);

        const embedded = await this.embedder.embedChunks(chunks);
        await this.vectorStore.buildAndSave(
            embedded.map(e => e.embedding),
            embedded.map(e => e.chunk),
            this.storeDirectory
        );

        const report: IngestionReport = {
            pagesReceived: records.length,
            pagesSkipped: records.length - pages.length,
            pagesIndexed: segmented.length,
            chunkStats: this.chunker.getChunkStats(chunks.map(chunk => chunk.text)),
            metadata: this.tagger.summarizeMetadata(chunks),
            dimension: this.vectorStore.dimension ?? 0,
            storeDirectory: this.storeDirectory,
        };
        logger.info('Ingestion completed', { ...report });
        return report;
    }

    /** Invalid records are skipped with a warning; other errors propagate. */
    private parsePages(records: unknown[]): Page[] {
        const pages: Page[] = [];
        for (const record of records) {
            try {
                pages.push(Page.create(record));
            } catch (error) {
                if (!(error instanceof ParseInputError)) {
                    throw error;
                }
                logger.warn('Skipping unparseable page', { sourceId: error.sourceId, reason: error.message });
            }
        }
        if (pages.length > 0) {
            logger.debug('Pages accepted', { pages: pages.length, skipped: records.length - pages.length });
        }
        return pages;
    }

    private warnOnDuplicateIds(chunks: Chunk[]): void {
        const seen = new Map<string, string>();
        for (const chunk of chunks) {
            const owner = seen.get(chunk.chunkId);
            if (owner !== undefined) {
                logger.warn('Duplicate chunk id', { chunkId: chunk.chunkId, sources: [owner, chunk.sourceId] });
            } else {
                seen.set(chunk.chunkId, chunk.sourceId);
            }
        }
    }
}
