import { randomUUID } from 'crypto';
import type { PositionFilter, VectorHit } from '../../domain/entities/VectorStore';
import { CorruptStoreError, DimensionMismatchError } from '../../domain/errors/PipelineErrors';

const MAGIC = 'VIDX';
const FORMAT_VERSION = 2;
const BUILD_ID_BYTES = 36;
const HEADER_BYTES = 16 + BUILD_ID_BYTES;
const FLOAT_BYTES = 4;

interface Candidate {
    position: number;
    score: number;
}

/**
 * Exact squared-Euclidean index over float32 vectors stored back to back.
 * Build and search are both linear in size * dimension.
 *
 * Binary layout (little endian): "VIDX", u32 version, u32 dimension,
 * u32 count, 36 ASCII bytes of build id, then count * dimension f32 values.
 * The build id is shared with the metadata table written alongside.
 */
export class FlatIndex {
    private constructor(
        public readonly dimension: number,
        public readonly size: number,
        public readonly buildId: string,
        private readonly data: Float32Array
    ) {}

    /** Every call stamps a fresh build id. */
    static fromVectors(vectors: number[][], dimension: number): FlatIndex {
        const data = new Float32Array(vectors.length * dimension);
        vectors.forEach((vector, i) => {
            if (vector.length !== dimension) {
                throw new DimensionMismatchError(dimension, vector.length, `vector ${i}`);
            }
            data.set(vector, i * dimension);
        });
        return new FlatIndex(dimension, vectors.length, randomUUID(), data);
    }

    static fromBuffer(buffer: Buffer): FlatIndex {
        if (buffer.length < HEADER_BYTES || buffer.toString('ascii', 0, 4) !== MAGIC) {
            throw new CorruptStoreError('Index file is not a vector index');
        }
        const version = buffer.readUInt32LE(4);
        if (version !== FORMAT_VERSION) {
            throw new CorruptStoreError(`Unsupported index format version ${version}`);
        }
        const dimension = buffer.readUInt32LE(8);
        const size = buffer.readUInt32LE(12);
        const buildId = buffer.toString('ascii', 16, HEADER_BYTES);
        const expectedBytes = HEADER_BYTES + size * dimension * FLOAT_BYTES;
        if (buffer.length !== expectedBytes) {
            throw new CorruptStoreError(
                `Index file holds ${buffer.length} bytes, expected ${expectedBytes} for ${size} vectors of dimension ${dimension}`
            );
        }

        const data = new Float32Array(size * dimension);
        for (let i = 0; i < data.length; i++) {
            data[i] = buffer.readFloatLE(HEADER_BYTES + i * FLOAT_BYTES);
        }
        return new FlatIndex(dimension, size, buildId, data);
    }

    toBuffer(): Buffer {
        const buffer = Buffer.alloc(HEADER_BYTES + this.data.length * FLOAT_BYTES);
        buffer.write(MAGIC, 0, 'ascii');
        buffer.writeUInt32LE(FORMAT_VERSION, 4);
        buffer.writeUInt32LE(this.dimension, 8);
        buffer.writeUInt32LE(this.size, 12);
        buffer.write(this.buildId, 16, 'ascii');
        this.data.forEach((value, i) => buffer.writeFloatLE(value, HEADER_BYTES + i * FLOAT_BYTES));
        return buffer;
    }

    vectorAt(position: number): number[] {
        const start = position * this.dimension;
        return Array.from(this.data.subarray(start, start + this.dimension));
    }

    /**
     * Returns the k closest accepted positions, ascending by distance.
     * Equal distances keep insertion order, so any top-k1 list is a prefix
     * of the top-k2 list for k1 < k2.
     */
    search(query: number[], k: number, accept?: PositionFilter): VectorHit[] {
        if (query.length !== this.dimension) {
            throw new DimensionMismatchError(this.dimension, query.length, 'search query');
        }
        // Compared in float32, like the stored vectors.
        const q = Float32Array.from(query);
        const best: Candidate[] = [];

        for (let position = 0; position < this.size; position++) {
            if (accept && !accept(position)) {
                continue;
            }
            const score = this.squaredDistance(q, position);
            if (best.length === k && score >= best[k - 1].score) {
                continue;
            }
            best.splice(this.insertionPoint(best, score), 0, { position, score });
            if (best.length > k) {
                best.pop();
            }
        }

        return best.map((candidate, rank) => ({ ...candidate, rank }));
    }

    private squaredDistance(q: Float32Array, position: number): number {
        const offset = position * this.dimension;
        let sum = 0;
        for (let d = 0; d < this.dimension; d++) {
            const diff = this.data[offset + d] - q[d];
            sum += diff * diff;
        }
        return sum;
    }

    // First slot whose score is strictly greater: later inserts go after ties.
    private insertionPoint(best: Candidate[], score: number): number {
        let low = 0;
        let high = best.length;
        while (low < high) {
            const mid = (low + high) >>> 1;
            if (best[mid].score <= score) {
                low = mid + 1;
            } else {
                high = mid;
            }
        }
        return low;
    }
}
