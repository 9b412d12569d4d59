import { Chunk, EmbeddedChunk } from '../../domain/entities/Chunk';
import { ConfigError, DimensionMismatchError, ModelUnavailableError } from '../../domain/errors/PipelineErrors';
import type { VectorProvider } from '../providers/VectorProvider';
import logger from '../../infrastructure/logger';

export interface EmbeddingServiceConfig {
    batchSize: number;
    /** Expected vector length; when omitted the first vector fixes it. */
    dimension?: number;
}

export class EmbeddingService {
    private fixedDimension: number | undefined;

    constructor(
        private vectorProvider: VectorProvider,
        private config: EmbeddingServiceConfig = { batchSize: 32 }
    ) {
        if (!Number.isInteger(config.batchSize) || config.batchSize <= 0) {
            throw new ConfigError(`Embedding batch size must be a positive integer, got ${config.batchSize}`);
        }
        this.fixedDimension = config.dimension;
    }

    get dimension(): number | undefined {
        return this.fixedDimension;
    }

    /**
     * Embeds texts in batches of `batchSize`, one batch in flight at a time.
     * The batch size never changes the vector produced for a given text.
     */
    async embedMany(texts: string[]): Promise<number[][]> {
        const vectors: number[][] = [];

        for (let start = 0; start < texts.length; start += this.config.batchSize) {
            const batch = texts.slice(start, start + this.config.batchSize);
            const batchVectors = await this.embedBatch(batch);
            for (const vector of batchVectors) {
                this.checkDimension(vector);
                vectors.push(vector);
            }
        }

        return vectors;
    }

    async embedOne(text: string): Promise<number[]> {
        const [vector] = await this.embedMany([text]);
        if (!vector) {
            throw new ModelUnavailableError('Embedding model returned no vector for the query');
        }
        return vector;
    }

    async embedChunks(chunks: Chunk[]): Promise<EmbeddedChunk[]> {
        logger.info('Generating embeddings', { chunks: chunks.length, batchSize: this.config.batchSize });
        const vectors = await this.embedMany(chunks.map(chunk => chunk.text));
        return chunks.map((chunk, i) => ({ chunk, embedding: vectors[i] }));
    }

    private async embedBatch(batch: string[]): Promise<number[][]> {
        let vectors: number[][];
        try {
            vectors = await this.vectorProvider.generateEmbeddings(batch);
        } catch (error) {
            if (error instanceof ModelUnavailableError) {
                throw error;
            }
            logger.error('Embedding request failed', { batchSize: batch.length, error });
            throw new ModelUnavailableError('Embedding model is unavailable', error);
        }

        if (!Array.isArray(vectors) || vectors.length !== batch.length) {
            throw new ModelUnavailableError(
                `Embedding model returned ${Array.isArray(vectors) ? vectors.length : 0} vectors for ${batch.length} texts`
            );
        }
        return vectors;
    }

    private checkDimension(vector: number[]): void {
        if (this.fixedDimension === undefined) {
            this.fixedDimension = vector.length;
            return;
        }
        if (vector.length !== this.fixedDimension) {
            throw new DimensionMismatchError(this.fixedDimension, vector.length, 'embedding output');
        }
    }
}
