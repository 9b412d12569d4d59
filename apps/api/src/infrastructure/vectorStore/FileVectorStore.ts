import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import path from 'path';
import { storedMetadataSchema, type StoreStats, type StoredMetadata } from '@coverage-rag/types';
import { Chunk } from '../../domain/entities/Chunk';
import { VectorStore, type PositionFilter, type VectorHit } from '../../domain/entities/VectorStore';
import { AppError } from '../../domain/errors/AppError';
import {
    ConfigError,
    CorruptStoreError,
    DimensionMismatchError,
} from '../../domain/errors/PipelineErrors';
import { FlatIndex } from './FlatIndex';
import logger from '../logger';

export interface FileVectorStoreConfig {
    /** Fixed embedding dimension; when omitted the first build or load decides it. */
    dimension?: number;
    indexFile: string;
    metadataFile: string;
}

interface StoreState {
    index: FlatIndex;
    metadata: Chunk[];
}

interface ArtifactPaths {
    indexPath: string;
    metadataPath: string;
}

export const DEFAULT_STORE_FILES: FileVectorStoreConfig = {
    indexFile: 'index.bin',
    metadataFile: 'metadata.json',
};

/**
 * Vector store persisted as two artifacts: a binary flat index and a JSON
 * metadata table in the same order, tied together by a shared build id.
 * Readers only ever see a fully built or fully loaded state; build, load and
 * buildAndSave swap it in one assignment.
 */
export class FileVectorStore extends VectorStore {
    private state: StoreState | null = null;

    constructor(private config: FileVectorStoreConfig = DEFAULT_STORE_FILES) {
        super();
    }

    get size(): number {
        return this.state?.index.size ?? 0;
    }

    get dimension(): number | undefined {
        return this.state?.index.dimension ?? this.config.dimension;
    }

    build(vectors: number[][], metadata: Chunk[]): void {
        this.state = this.createState(vectors, metadata);
    }

    async save(directory: string): Promise<void> {
        await this.writeState(this.requireState(), directory);
    }

    /**
     * Builds and writes a new store; the in-memory state changes only after
     * both artifacts are in place, so a failed write leaves readers on the
     * previous store.
     */
    async buildAndSave(vectors: number[][], metadata: Chunk[], directory: string): Promise<void> {
        const state = this.createState(vectors, metadata);
        await this.writeState(state, directory);
        this.state = state;
    }

    async load(directory: string): Promise<void> {
        const { indexPath, metadataPath } = this.artifactPaths(directory);

        const [indexBytes, metadataBytes] = await Promise.all([
            this.readArtifact(indexPath),
            this.readArtifact(metadataPath),
        ]);
        if (!indexBytes && !metadataBytes) {
            throw new AppError(`Vector store not found in ${directory}`, 404, 'STORE_NOT_FOUND');
        }
        if (!indexBytes || !metadataBytes) {
            const missing = indexBytes ? metadataPath : indexPath;
            logger.error('Vector store is missing one artifact', { missing });
            throw new CorruptStoreError(`Vector store artifact ${missing} is missing; rebuild the store`);
        }

        const index = FlatIndex.fromBuffer(indexBytes);
        const stored = this.parseMetadata(metadataBytes.toString('utf-8'), metadataPath);

        if (stored.buildId !== index.buildId) {
            logger.error('Vector store artifacts come from different builds', {
                indexBuild: index.buildId,
                metadataBuild: stored.buildId,
            });
            throw new CorruptStoreError(
                `Index build ${index.buildId} does not match metadata build ${stored.buildId}; rebuild the store`
            );
        }
        if (index.size !== stored.chunks.length) {
            logger.error('Vector store artifacts disagree', { vectors: index.size, metadata: stored.chunks.length });
            throw new CorruptStoreError(
                `Index has ${index.size} vectors but metadata has ${stored.chunks.length} entries; rebuild the store`
            );
        }
        if (this.config.dimension !== undefined && index.size > 0 && index.dimension !== this.config.dimension) {
            throw new DimensionMismatchError(this.config.dimension, index.dimension, 'loaded index');
        }

        this.state = { index, metadata: stored.chunks.map(record => Chunk.fromRecord(record)) };
        logger.info('Vector store loaded', { indexPath, vectors: index.size, dimension: index.dimension });
    }

    /**
     * Squared Euclidean search: a LOWER score means a CLOSER match.
     * Asking for more results than stored returns everything, ranked.
     */
    search(queryVector: number[], k: number, accept?: PositionFilter): VectorHit[] {
        if (!Number.isInteger(k) || k < 1) {
            throw new ConfigError(`k must be a positive integer, got ${k}`);
        }
        if (!this.state || this.state.index.size === 0) {
            return [];
        }
        return this.state.index.search(queryVector, k, accept);
    }

    metadataAt(position: number): Chunk {
        const chunk = this.state?.metadata[position];
        if (!chunk) {
            throw new AppError(`No metadata at position ${position}`, 500, 'POSITION_OUT_OF_RANGE');
        }
        return chunk;
    }

    vectorAt(position: number): number[] {
        const state = this.requireState();
        if (position < 0 || position >= state.index.size) {
            throw new AppError(`No vector at position ${position}`, 500, 'POSITION_OUT_OF_RANGE');
        }
        return state.index.vectorAt(position);
    }

    positionsWhere(predicate: (chunk: Chunk) => boolean): Set<number> {
        const positions = new Set<number>();
        this.state?.metadata.forEach((chunk, position) => {
            if (predicate(chunk)) {
                positions.add(position);
            }
        });
        return positions;
    }

    getStats(): StoreStats {
        const regions: Record<string, number> = {};
        const categories: Record<string, number> = {};
        for (const chunk of this.state?.metadata ?? []) {
            regions[chunk.region] = (regions[chunk.region] ?? 0) + 1;
            categories[chunk.category] = (categories[chunk.category] ?? 0) + 1;
        }
        return {
            totalVectors: this.size,
            dimension: this.dimension ?? 0,
            regions,
            categories,
        };
    }

    private createState(vectors: number[][], metadata: Chunk[]): StoreState {
        if (vectors.length !== metadata.length) {
            throw new DimensionMismatchError(metadata.length, vectors.length, 'vector count vs metadata count');
        }
        const dimension = this.config.dimension ?? vectors[0]?.length ?? 0;
        const index = FlatIndex.fromVectors(vectors, dimension);

        logger.info('Vector index built', { vectors: index.size, dimension, buildId: index.buildId });
        return { index, metadata: [...metadata] };
    }

    private async writeState(state: StoreState, directory: string): Promise<void> {
        const { indexPath, metadataPath } = this.artifactPaths(directory);
        const stored: StoredMetadata = {
            buildId: state.index.buildId,
            chunks: state.metadata.map(chunk => chunk.toRecord()),
        };

        await mkdir(directory, { recursive: true });
        await writeFile(`${indexPath}.tmp`, state.index.toBuffer());
        await writeFile(`${metadataPath}.tmp`, JSON.stringify(stored, null, 2), 'utf-8');
        await rename(`${indexPath}.tmp`, indexPath);
        await rename(`${metadataPath}.tmp`, metadataPath);

        logger.info('Vector store saved', { indexPath, metadataPath, vectors: state.index.size, buildId: stored.buildId });
    }

    private artifactPaths(directory: string): ArtifactPaths {
        return {
            indexPath: path.join(directory, this.config.indexFile),
            metadataPath: path.join(directory, this.config.metadataFile),
        };
    }

    private requireState(): StoreState {
        if (!this.state) {
            throw new AppError('Vector store has not been built or loaded', 409, 'STORE_NOT_READY');
        }
        return this.state;
    }

    private async readArtifact(filePath: string): Promise<Buffer | null> {
        try {
            return await readFile(filePath);
        } catch (error) {
            if (isMissingFile(error)) {
                return null;
            }
            throw error;
        }
    }

    private parseMetadata(text: string, metadataPath: string): StoredMetadata {
        let raw: unknown;
        try {
            raw = JSON.parse(text);
        } catch {
            throw new CorruptStoreError(`Metadata file ${metadataPath} is not valid JSON`);
        }
        const parsed = storedMetadataSchema.safeParse(raw);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            throw new CorruptStoreError(
                `Metadata file ${metadataPath} is malformed at ${issue?.path.join('.') || 'root'}: ${issue?.message ?? 'invalid'}`
            );
        }
        return parsed.data;
    }
}

function isMissingFile(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
