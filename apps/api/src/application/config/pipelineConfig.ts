import { z } from 'zod';
import { ConfigError } from '../../domain/errors/PipelineErrors';

export type ChunkingMode = 'smart' | 'fixed';

export interface NormalizationConfig {
    removeBoilerplate: boolean;
    /** Running headers/footers: strings match whole lines case-insensitively, RegExps are tested per line. */
    runningHeaders: ReadonlyArray<string | RegExp>;
}

export interface ChunkingConfig {
    targetSize: number;
    overlap: number;
    mode: ChunkingMode;
}

export interface EmbeddingConfig {
    model: string;
    baseUrl: string;
    batchSize: number;
    dimension?: number;
}

export interface StoreConfig {
    directory: string;
    indexFile: string;
    metadataFile: string;
}

export interface PipelineConfig {
    normalization: NormalizationConfig;
    chunking: ChunkingConfig;
    embedding: EmbeddingConfig;
    store: StoreConfig;
    llm: { model: string; baseUrl: string };
    server: { port: number; corsOrigin: string };
}

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
    CHUNK_SIZE: positiveInt(500),
    CHUNK_OVERLAP: positiveInt(50),
    CHUNK_MODE: z.enum(['smart', 'fixed']).default('smart'),
    REMOVE_BOILERPLATE: z.enum(['true', 'false']).default('true'),
    RUNNING_HEADERS: z.string().default('Confidential'),
    EMBEDDING_MODEL: z.string().min(1).default('nomic-embed-text'),
    EMBEDDING_DIMENSION: z.coerce.number().int().positive().optional(),
    EMBEDDING_BATCH_SIZE: positiveInt(32),
    OLLAMA_BASE_URL: z.string().url().default('http://127.0.0.1:11434'),
    LLM_MODEL: z.string().min(1).default('phi3:mini'),
    STORE_DIR: z.string().min(1).default('data/processed'),
    INDEX_FILE: z.string().min(1).default('index.bin'),
    METADATA_FILE: z.string().min(1).default('metadata.json'),
    PORT: positiveInt(6060),
    CORS_ORIGIN: z.string().default('*'),
});

/**
 * Reads the pipeline configuration from an environment map.
 * Empty strings count as unset so `.env` placeholders fall back to defaults.
 */
export function loadPipelineConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
    const present = Object.fromEntries(
        Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
    );
    const parsed = envSchema.safeParse(present);
    if (!parsed.success) {
        const details = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
        throw new ConfigError(`Invalid configuration: ${details}`);
    }
    const e = parsed.data;

    const config: PipelineConfig = {
        normalization: {
            removeBoilerplate: e.REMOVE_BOILERPLATE === 'true',
            runningHeaders: e.RUNNING_HEADERS.split('|').map(h => h.trim()).filter(h => h.length > 0),
        },
        chunking: { targetSize: e.CHUNK_SIZE, overlap: e.CHUNK_OVERLAP, mode: e.CHUNK_MODE },
        embedding: {
            model: e.EMBEDDING_MODEL,
            baseUrl: e.OLLAMA_BASE_URL,
            batchSize: e.EMBEDDING_BATCH_SIZE,
            dimension: e.EMBEDDING_DIMENSION,
        },
        store: { directory: e.STORE_DIR, indexFile: e.INDEX_FILE, metadataFile: e.METADATA_FILE },
        llm: { model: e.LLM_MODEL, baseUrl: e.OLLAMA_BASE_URL },
        server: { port: e.PORT, corsOrigin: e.CORS_ORIGIN },
    };

    validateChunkingConfig(config.chunking.targetSize, config.chunking.overlap);
    return config;
}

/**
 * Segmenter parameters: both positive integers, overlap strictly below targetSize.
 */
export function validateChunkingConfig(targetSize: number, overlap: number): void {
    if (!Number.isInteger(targetSize) || targetSize <= 0) {
        throw new ConfigError(`Chunk target size must be a positive integer, got ${targetSize}`);
    }
    if (!Number.isInteger(overlap) || overlap <= 0) {
        throw new ConfigError(`Chunk overlap must be a positive integer, got ${overlap}`);
    }
    if (overlap >= targetSize) {
        throw new ConfigError(`Chunk overlap (${overlap}) must be smaller than target size (${targetSize})`);
    }
}
