import { Chunk, UNKNOWN_LABEL } from '../../domain/entities/Chunk';
import { ParseInputError } from '../../domain/errors/PipelineErrors';
import regionTable from '../data/regions.json';
import logger from '../../infrastructure/logger';

/** One entry of an ordered detection table; the first rule that matches wins. */
export interface LabelRule {
    label: string;
    matches(source: string): boolean;
}

export interface PageContext {
    sourceId: string;
    pageNumber: number;
}

export interface MetadataOverrides {
    region?: string;
    category?: string;
}

export interface MetadataFilter {
    region?: string;
    category?: string;
    pageNumber?: number;
}

export interface MetadataSummary {
    totalChunks: number;
    regions: Record<string, number>;
    categories: Record<string, number>;
    uniquePages: number;
    pageRange: string;
}

interface RegionTable {
    codes: string[];
    names: Array<{ name: string; code: string }>;
}

const CHUNK_ID_PREFIX_LENGTH = 20;

function tokensOf(source: string): Set<string> {
    return new Set(source.toUpperCase().split(/[^A-Z0-9]+/).filter(token => token.length > 0));
}

/**
 * Region codes match whole tokens of the path ("Oscar_4T_NC_STND" -> NC);
 * full names match as substrings with separators read as spaces. Names are
 * tried longest first so "west virginia" is not read as "virginia".
 */
export function buildRegionRules(table: RegionTable = regionTable): LabelRule[] {
    const codeRules: LabelRule[] = table.codes.map(code => ({
        label: code,
        matches: (source: string) => tokensOf(source).has(code.toUpperCase()),
    }));

    const nameRules: LabelRule[] = [...table.names]
        .sort((a, b) => b.name.length - a.name.length)
        .map(({ name, code }) => ({
            label: code,
            matches: (source: string) => source.toLowerCase().replace(/[_\-.]+/g, ' ').includes(name),
        }));

    return [...codeRules, ...nameRules];
}

function keywordRule(label: string, keywords: string[]): LabelRule {
    return {
        label,
        matches: (source: string) => {
            const lower = source.toLowerCase();
            return keywords.some(keyword => lower.includes(keyword));
        },
    };
}

export const DEFAULT_CATEGORY_RULES: LabelRule[] = [
    keywordRule('formulary', ['formulary', 'drug', 'medication', 'tier']),
    keywordRule('faq', ['faq', 'question', 'answer']),
    keywordRule('network', ['network', 'provider', 'doctor', 'physician']),
    keywordRule('summary', ['summary', 'benefit', 'coverage']),
];

export function detectLabel(source: string, rules: LabelRule[]): string {
    return rules.find(rule => rule.matches(source))?.label ?? UNKNOWN_LABEL;
}

/**
 * `{prefix}-p{page}-c{index}` where prefix is the file name without its
 * .pdf extension, cut to 20 characters, with anything outside [A-Za-z0-9_-]
 * replaced by '-'.
 */
export function generateChunkId(sourceId: string, pageNumber: number, chunkIndex: number): string {
    const fileName = sourceId.split(/[\\/]/).pop() ?? sourceId;
    const prefix = fileName
        .replace(/\.pdf$/i, '')
        .substring(0, CHUNK_ID_PREFIX_LENGTH)
        .replace(/[^A-Za-z0-9_-]/g, '-');
    return `${prefix}-p${pageNumber}-c${chunkIndex}`;
}

export class MetadataTaggingService {
    constructor(
        private regionRules: LabelRule[] = buildRegionRules(),
        private categoryRules: LabelRule[] = DEFAULT_CATEGORY_RULES
    ) {}

    /**
     * Turns the chunk strings of one page into Chunk records. Chunk indexes
     * follow the order of `chunks`, so re-tagging the same input reproduces
     * the same ids.
     */
    tag(chunks: readonly string[], context: PageContext, overrides: MetadataOverrides = {}): Chunk[] {
        this.validateContext(context);

        const region = overrides.region ?? detectLabel(context.sourceId, this.regionRules);
        const category = overrides.category ?? detectLabel(context.sourceId, this.categoryRules);

        if (region === UNKNOWN_LABEL || category === UNKNOWN_LABEL) {
            logger.debug('Metadata defaulted to unknown', { sourceId: context.sourceId, region, category });
        }

        return chunks.map((text, index) => new Chunk(
            text,
            context.sourceId,
            context.pageNumber,
            index,
            generateChunkId(context.sourceId, context.pageNumber, index),
            region,
            category
        ));
    }

    filterChunks(chunks: Chunk[], filter: MetadataFilter): Chunk[] {
        return chunks.filter(chunk =>
            (filter.region === undefined || chunk.region === filter.region) &&
            (filter.category === undefined || chunk.category === filter.category) &&
            (filter.pageNumber === undefined || chunk.pageNumber === filter.pageNumber)
        );
    }

    summarizeMetadata(chunks: Chunk[]): MetadataSummary {
        const regions: Record<string, number> = {};
        const categories: Record<string, number> = {};
        const pages = new Set<number>();

        for (const chunk of chunks) {
            regions[chunk.region] = (regions[chunk.region] ?? 0) + 1;
            categories[chunk.category] = (categories[chunk.category] ?? 0) + 1;
            pages.add(chunk.pageNumber);
        }

        const sortedPages = [...pages].sort((a, b) => a - b);
        return {
            totalChunks: chunks.length,
            regions,
            categories,
            uniquePages: pages.size,
            pageRange: sortedPages.length > 0
                ? `${sortedPages[0]}-${sortedPages[sortedPages.length - 1]}`
                : 'N/A',
        };
    }

    private validateContext(context: PageContext): void {
        if (typeof context.sourceId !== 'string' || context.sourceId.trim().length === 0) {
            throw new ParseInputError('Page context is missing sourceId');
        }
        if (!Number.isInteger(context.pageNumber) || context.pageNumber < 1) {
            throw new ParseInputError(
                `Page context for ${context.sourceId} has invalid pageNumber ${context.pageNumber}`,
                context.sourceId
            );
        }
    }
}
