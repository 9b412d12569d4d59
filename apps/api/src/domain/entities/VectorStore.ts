import type { StoreStats } from '@coverage-rag/types';
import { Chunk } from './Chunk';

export interface VectorHit {
    position: number;
    score: number;
    rank: number;
}

/** Restricts a search to the positions it accepts. */
export type PositionFilter = (position: number) => boolean;

/**
 * Exact nearest-neighbour store over an ordered vector index and its parallel
 * metadata table. Position i of the index always describes metadata entry i.
 */
export abstract class VectorStore {
    abstract build(vectors: number[][], metadata: Chunk[]): void;
    abstract save(directory: string): Promise<void>;
    /** Build, then write; the new state is visible only once the write succeeded. */
    abstract buildAndSave(vectors: number[][], metadata: Chunk[], directory: string): Promise<void>;
    abstract load(directory: string): Promise<void>;
    abstract search(queryVector: number[], k: number, accept?: PositionFilter): VectorHit[];
    abstract metadataAt(position: number): Chunk;
    abstract positionsWhere(predicate: (chunk: Chunk) => boolean): Set<number>;
    abstract get size(): number;
    abstract get dimension(): number | undefined;
    abstract getStats(): StoreStats;
}
