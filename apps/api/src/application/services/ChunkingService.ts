import { Page } from '../../domain/entities/Page';
import { validateChunkingConfig, type ChunkingConfig } from '../config/pipelineConfig';

export interface PageSegments {
    page: Page;
    chunks: string[];
}

export interface ChunkStats {
    totalChunks: number;
    avgChunkSize: number;
    minChunkSize: number;
    maxChunkSize: number;
    totalChars: number;
}

// A unit ends after terminal punctuation followed by whitespace; the
// delimiter stays with the unit it closes.
const UNIT_BOUNDARY = /[.!?:]\s+/g;

export const DEFAULT_CHUNKING_CONFIG: ChunkingConfig = {
    targetSize: 500,
    overlap: 50,
    mode: 'smart',
};

export class ChunkingService {
    constructor(private config: ChunkingConfig = DEFAULT_CHUNKING_CONFIG) {
        validateChunkingConfig(config.targetSize, config.overlap);
    }

    /**
     * Splits normalized text into overlapping chunks in reading order.
     * Parameters default to the configured ones and are checked on every call.
     */
    segment(
        text: string,
        targetSize: number = this.config.targetSize,
        overlap: number = this.config.overlap
    ): string[] {
        validateChunkingConfig(targetSize, overlap);

        if (!text || text.trim().length === 0) {
            return [];
        }

        return this.config.mode === 'fixed'
            ? this.segmentFixed(text, targetSize, overlap)
            : this.segmentBySentences(text, targetSize, overlap);
    }

    chunkPages(pages: Page[]): PageSegments[] {
        return pages
            .map(page => ({ page, chunks: this.segment(page.rawText) }))
            .filter(segments => segments.chunks.length > 0);
    }

    getChunkStats(chunks: string[]): ChunkStats {
        if (chunks.length === 0) {
            return { totalChunks: 0, avgChunkSize: 0, minChunkSize: 0, maxChunkSize: 0, totalChars: 0 };
        }
        const sizes = chunks.map(chunk => chunk.length);
        const totalChars = sizes.reduce((sum, size) => sum + size, 0);
        return {
            totalChunks: chunks.length,
            avgChunkSize: Math.floor(totalChars / chunks.length),
            minChunkSize: Math.min(...sizes),
            maxChunkSize: Math.max(...sizes),
            totalChars,
        };
    }

    /**
     * Splits text into sentence-like units, each keeping its delimiter and
     * the whitespace after it.
     */
    splitUnits(text: string): string[] {
        const units: string[] = [];
        let start = 0;

        for (const match of text.matchAll(UNIT_BOUNDARY)) {
            const end = (match.index ?? 0) + match[0].length;
            units.push(text.substring(start, end));
            start = end;
        }
        if (start < text.length) {
            units.push(text.substring(start));
        }

        return units.filter(unit => unit.trim().length > 0);
    }

    /**
     * Greedy sentence packing. A unit longer than targetSize becomes a chunk
     * of its own rather than being cut.
     */
    private segmentBySentences(text: string, targetSize: number, overlap: number): string[] {
        const chunks: string[] = [];
        let buffer = '';

        for (const unit of this.splitUnits(text)) {
            if (buffer.length + unit.length <= targetSize) {
                buffer += unit;
                continue;
            }

            const closed = buffer.trim();
            if (closed.length === 0) {
                buffer = unit;
                continue;
            }

            chunks.push(closed);
            buffer = this.seedNextBuffer(closed, unit, targetSize, overlap);
        }

        const last = buffer.trim();
        if (last.length > 0) {
            chunks.push(last);
        }

        return chunks;
    }

    /**
     * The next chunk opens with the tail of the one just closed, unless that
     * would push it past targetSize or the closed chunk is no longer than the
     * overlap itself.
     */
    private seedNextBuffer(closed: string, unit: string, targetSize: number, overlap: number): string {
        if (closed.length <= overlap) {
            return unit;
        }
        const seeded = closed.slice(-overlap) + unit;
        return seeded.length <= targetSize ? seeded : unit;
    }

    private segmentFixed(text: string, targetSize: number, overlap: number): string[] {
        const chunks: string[] = [];
        const step = targetSize - overlap;

        for (let start = 0; start < text.length; start += step) {
            const chunk = text.substring(start, start + targetSize);
            if (chunk.trim().length > 0) {
                chunks.push(chunk);
            }
            if (start + targetSize >= text.length) {
                break;
            }
        }

        return chunks;
    }
}
