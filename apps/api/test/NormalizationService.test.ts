import { describe, it, expect, beforeEach } from 'vitest';
import { NormalizationService } from '../src/application/services/NormalizationService';
import { Page } from '../src/domain/entities/Page';

describe('NormalizationService', () => {
    let normalizer: NormalizationService;

    beforeEach(() => {
        normalizer = new NormalizationService();
    });

    describe('spaced-out words', () => {
        it('should collapse a word extracted one letter at a time', () => {
            expect(normalizer.normalize('M e t f o r m i n')).toBe('Metformin');
        });

        it('should collapse the run inside a sentence', () => {
            expect(normalizer.normalize('Take M e t f o r m i n daily.')).toBe('Take Metformin daily.');
        });

        it('should leave ordinary short words alone', () => {
            expect(normalizer.normalize('Pay a $10 copay for Tier 1 drugs.')).toBe('Pay a $10 copay for Tier 1 drugs.');
        });
    });

    describe('boilerplate removal', () => {
        it('should drop a bracketed page marker line between body lines', () => {
            const raw = [
                'Members pay a $10 copay for Tier 1 drugs.',
                'Oscar Health Insurance | Page 23 | January 2026',
                'Prior authorization is required for Tier 4.',
            ].join('\n');

            expect(normalizer.normalize(raw)).toBe(
                'Members pay a $10 copay for Tier 1 drugs.\nPrior authorization is required for Tier 4.'
            );
        });

        it('should drop standalone page numbers but keep numbers inside sentences', () => {
            const raw = 'Your copay is 23 dollars per visit.\n23\nNext paragraph text.';

            expect(normalizer.normalize(raw)).toBe('Your copay is 23 dollars per visit.\nNext paragraph text.');
        });

        it('should drop "Page N of M" and "N of M" lines', () => {
            const raw = 'Page 4 of 12\nCovered services.\n4 of 12';

            expect(normalizer.normalize(raw)).toBe('Covered services.');
        });

        it('should drop configured running headers given as strings or patterns', () => {
            const custom = new NormalizationService({
                removeBoilerplate: true,
                runningHeaders: ['Acme Health Plan', /^Effective \d{2}\/\d{2}\/\d{4}$/],
            });
            const raw = 'ACME HEALTH PLAN\nCovered services are listed here.\nEffective 01/01/2026';

            expect(custom.normalize(raw)).toBe('Covered services are listed here.');
        });

        it('should keep page furniture when removal is disabled', () => {
            const custom = new NormalizationService({ removeBoilerplate: false, runningHeaders: [] });

            expect(custom.normalize('Intro text.\nPage 7\nMore text.')).toBe('Intro text.\nPage 7 More text.');
        });
    });

    describe('encoding repair', () => {
        it('should repair a mis-decoded em dash and fold it to ASCII', () => {
            expect(normalizer.normalize('Metformin \u00e2\u20ac\u201d diabetes medication')).toBe(
                'Metformin -- diabetes medication'
            );
        });

        it('should fold curly quotes, ellipses and non-breaking spaces', () => {
            expect(normalizer.normalize('Member\u2019s \u201cguide\u201d and\u00a0more\u2026')).toBe(
                'Member\'s "guide" and more...'
            );
        });

        it('should repair a mis-decoded apostrophe', () => {
            expect(normalizer.repairEncoding('Member\u00e2\u20ac\u2122s guide')).toBe("Member's guide");
        });
    });

    describe('reflow', () => {
        it('should join layout-wrapped lines into one paragraph line', () => {
            const raw = 'Drug coverage for\ngeneric medications\nis listed below.';

            expect(normalizer.normalize(raw)).toBe('Drug coverage for generic medications is listed below.');
        });

        it('should keep a single blank line between paragraphs', () => {
            const raw = 'First paragraph line\n\n\n\nSecond paragraph.';

            expect(normalizer.normalize(raw)).toBe('First paragraph line\n\nSecond paragraph.');
        });

        it('should treat a trailing colon as the end of a line', () => {
            expect(normalizer.normalize('Tier 1:\nMetformin')).toBe('Tier 1:\nMetformin');
        });
    });

    describe('whitespace', () => {
        it('should collapse tabs and repeated spaces', () => {
            expect(normalizer.normalize('Copay:   $10\tper   visit')).toBe('Copay: $10 per visit');
        });

        it('should normalize carriage returns', () => {
            expect(normalizer.normalize('Line one.\r\nLine two.\rLine three.')).toBe('Line one.\nLine two.\nLine three.');
        });
    });

    describe('totality', () => {
        it('should return an empty string for empty or blank input', () => {
            expect(normalizer.normalize('')).toBe('');
            expect(normalizer.normalize('   \n\t ')).toBe('');
        });

        it('should return an empty string for a page that is only boilerplate', () => {
            expect(normalizer.normalize('Page 3\n\n12')).toBe('');
        });

        it('should not throw on a non-string value', () => {
            expect(normalizer.normalize(undefined as unknown as string)).toBe('');
        });

        it('should pass control characters through', () => {
            expect(normalizer.normalize('\u0001\u0002 data')).toBe('\u0001\u0002 data');
        });

        it('should be deterministic', () => {
            const raw = 'Page 1\nM e t f o r m i n \u00e2\u20ac\u201d Tier 1\ncopay applies.';

            expect(normalizer.normalize(raw)).toBe(normalizer.normalize(raw));
        });
    });

    describe('normalizePages', () => {
        it('should clean each page and drop the ones left empty', () => {
            const pages = [
                new Page('plan.pdf', 1, 'Page 3'),
                new Page('plan.pdf', 2, 'Real   text.'),
            ];

            const result = normalizer.normalizePages(pages);

            expect(result).toHaveLength(1);
            expect(result[0].pageNumber).toBe(2);
            expect(result[0].rawText).toBe('Real text.');
        });
    });
});
