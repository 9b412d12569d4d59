import { describe, it, expect, beforeEach } from 'vitest';
import {
    MetadataTaggingService,
    buildRegionRules,
    DEFAULT_CATEGORY_RULES,
    detectLabel,
    generateChunkId,
} from '../src/application/services/MetadataTaggingService';
import { ParseInputError } from '../src/domain/errors/PipelineErrors';

describe('MetadataTaggingService', () => {
    let tagger: MetadataTaggingService;

    beforeEach(() => {
        tagger = new MetadataTaggingService();
    });

    describe('region detection', () => {
        const regionRules = buildRegionRules();

        it.each([
            ['Oscar_4T_NC_STND_Member_Doc__January_2026__as_of_11182025.pdf', 'NC'],
            ['Texas-Drug-Formulary-2026.pdf', 'TX'],
            ['florida-faq-2026.pdf', 'FL'],
            ['CA_Provider_Network.pdf', 'CA'],
            ['west-virginia-summary-of-benefits.pdf', 'WV'],
            ['arkansas-plan.pdf', 'AR'],
            ['unknown-document.pdf', 'unknown'],
        ])('should label %s as %s', (sourceId, expected) => {
            expect(detectLabel(sourceId, regionRules)).toBe(expected);
        });

        it('should not read a code out of the middle of a word', () => {
            expect(detectLabel('formulary-guide.pdf', regionRules)).toBe('unknown');
        });
    });

    describe('category detection', () => {
        it.each([
            ['Texas-Drug-Formulary-2026.pdf', 'formulary'],
            ['florida-faq-2026.pdf', 'faq'],
            ['CA_Provider_Network.pdf', 'network'],
            ['west-virginia-summary-of-benefits.pdf', 'summary'],
            ['unknown-document.pdf', 'unknown'],
        ])('should label %s as %s', (sourceId, expected) => {
            expect(detectLabel(sourceId, DEFAULT_CATEGORY_RULES)).toBe(expected);
        });

        it('should apply the first matching rule', () => {
            expect(detectLabel('NC-drug-network.pdf', DEFAULT_CATEGORY_RULES)).toBe('formulary');
        });

        it('should accept custom rule tables', () => {
            const custom = new MetadataTaggingService([], [{ label: 'custom', matches: () => true }]);

            const [chunk] = custom.tag(['text'], { sourceId: 'any.pdf', pageNumber: 1 });

            expect(chunk.region).toBe('unknown');
            expect(chunk.category).toBe('custom');
        });
    });

    describe('generateChunkId', () => {
        it('should cut the file name to 20 characters', () => {
            expect(generateChunkId('Oscar_4T_NC_STND_Member_Doc__January_2026__as_of_11182025.pdf', 23, 2))
                .toBe('Oscar_4T_NC_STND_Mem-p23-c2');
        });

        it('should use the base name and replace unsafe characters', () => {
            expect(generateChunkId('data/raw/NC FAQ (2026).pdf', 5, 0)).toBe('NC-FAQ--2026--p5-c0');
        });
    });

    describe('tag', () => {
        it('should number chunks in order and label them from the source', () => {
            const chunks = tagger.tag(['first', 'second'], { sourceId: 'NC-formulary-2026.pdf', pageNumber: 3 });

            expect(chunks.map(c => c.chunkId)).toEqual(['NC-formulary-2026-p3-c0', 'NC-formulary-2026-p3-c1']);
            expect(chunks.map(c => c.chunkIndex)).toEqual([0, 1]);
            expect(chunks[1].text).toBe('second');
            expect(chunks[1].region).toBe('NC');
            expect(chunks[1].category).toBe('formulary');
            expect(chunks[1].pageNumber).toBe(3);
        });

        it('should reproduce the same records for the same input', () => {
            const context = { sourceId: 'TX-faq.pdf', pageNumber: 2 };

            expect(tagger.tag(['a', 'b'], context)).toEqual(tagger.tag(['a', 'b'], context));
        });

        it('should let overrides win over detection', () => {
            const [chunk] = tagger.tag(['text'], { sourceId: 'NC-formulary.pdf', pageNumber: 1 }, { region: 'SC' });

            expect(chunk.region).toBe('SC');
            expect(chunk.category).toBe('formulary');
        });

        it('should reject a context without a source id', () => {
            expect(() => tagger.tag(['text'], { sourceId: ' ', pageNumber: 1 })).toThrow(ParseInputError);
        });

        it('should reject a context with an invalid page number', () => {
            expect(() => tagger.tag(['text'], { sourceId: 'plan.pdf', pageNumber: 0 })).toThrow(ParseInputError);
        });

        it('should return nothing for no chunks', () => {
            expect(tagger.tag([], { sourceId: 'plan.pdf', pageNumber: 1 })).toEqual([]);
        });
    });

    describe('filterChunks and summarizeMetadata', () => {
        it('should filter by every given field', () => {
            const chunks = [
                ...tagger.tag(['a', 'b'], { sourceId: 'NC-formulary.pdf', pageNumber: 1 }),
                ...tagger.tag(['c'], { sourceId: 'TX-faq.pdf', pageNumber: 4 }),
            ];

            expect(tagger.filterChunks(chunks, { region: 'NC' }).map(c => c.text)).toEqual(['a', 'b']);
            expect(tagger.filterChunks(chunks, { category: 'faq', pageNumber: 4 }).map(c => c.text)).toEqual(['c']);
            expect(tagger.filterChunks(chunks, {})).toHaveLength(3);
        });

        it('should count labels and pages', () => {
            const chunks = [
                ...tagger.tag(['a', 'b'], { sourceId: 'NC-formulary.pdf', pageNumber: 7 }),
                ...tagger.tag(['c'], { sourceId: 'TX-faq.pdf', pageNumber: 2 }),
            ];

            expect(tagger.summarizeMetadata(chunks)).toEqual({
                totalChunks: 3,
                regions: { NC: 2, TX: 1 },
                categories: { formulary: 2, faq: 1 },
                uniquePages: 2,
                pageRange: '2-7',
            });
        });

        it('should report N/A for an empty list', () => {
            expect(tagger.summarizeMetadata([]).pageRange).toBe('N/A');
        });
    });
});
