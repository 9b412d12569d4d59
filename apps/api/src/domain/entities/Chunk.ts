import type { ChunkRecord } from '@coverage-rag/types';

export const UNKNOWN_LABEL = 'unknown';

export class Chunk {
    constructor(
        public readonly text: string,
        public readonly sourceId: string,
        public readonly pageNumber: number,
        public readonly chunkIndex: number,
        public readonly chunkId: string,
        public readonly region: string,
        public readonly category: string
    ) {}

    static fromRecord(record: ChunkRecord): Chunk {
        return new Chunk(
            record.text,
            record.sourceId,
            record.pageNumber,
            record.chunkIndex,
            record.chunkId,
            record.region,
            record.category
        );
    }

    toRecord(): ChunkRecord {
        return {
            text: this.text,
            sourceId: this.sourceId,
            pageNumber: this.pageNumber,
            chunkIndex: this.chunkIndex,
            chunkId: this.chunkId,
            region: this.region,
            category: this.category,
        };
    }
}

export interface EmbeddedChunk {
    chunk: Chunk;
    embedding: number[];
}
