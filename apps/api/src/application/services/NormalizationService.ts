import { Page } from '../../domain/entities/Page';
import type { NormalizationConfig } from '../config/pipelineConfig';

/**
 * Mis-decoded UTF-8 sequences (read as Windows-1252) mapped back to the
 * character that was meant. Applied before the typographic folds below.
 */
const MOJIBAKE_REPAIRS: ReadonlyArray<readonly [string, string]> = [
    ['\u00e2\u20ac\u201d', '\u2014'], // em dash
    ['\u00e2\u20ac\u201c', '\u2013'], // en dash
    ['\u00e2\u20ac\u2122', '\u2019'],
    ['\u00e2\u20ac\u02dc', '\u2018'],
    ['\u00e2\u20ac\u0153', '\u201c'],
    ['\u00e2\u20ac\u009d', '\u201d'],
    ['\u00e2\u20ac\u00a2', '\u2022'], // bullet
    ['\u00e2\u20ac\u00a6', '\u2026'],
    ['\u00c2\u00a0', ' '],
    ['\u00c2 ', ' '],
];

const TYPOGRAPHIC_FOLDS: ReadonlyArray<readonly [string, string]> = [
    ['\u2014', '--'],
    ['\u2013', '-'],
    ['\u2018', "'"],
    ['\u2019', "'"],
    ['\u201c', '"'],
    ['\u201d', '"'],
    ['\u2026', '...'],
    ['\u00a0', ' '],
];

const PAGE_NUMBER_LINE = /^(?:page\s+\d+(?:\s+of\s+\d+)?|\d+\s+of\s+\d+|\d+)$/i;
const BRACKETED_PAGE_MARKER = /\|\s*page\s+\d+(?:\s+of\s+\d+)?\s*\|/i;

// Three or more single letters/digits separated by spaces: "M e t f o r m i n".
const SPACED_OUT_WORD = /(?<![\p{L}\p{N}])[\p{L}\p{N}](?:[ \t]+[\p{L}\p{N}]){2,}(?![\p{L}\p{N}])/gu;

const SENTENCE_TERMINAL = /[.!?:]$/;

export const DEFAULT_NORMALIZATION_CONFIG: NormalizationConfig = {
    removeBoilerplate: true,
    runningHeaders: ['Confidential'],
};

export class NormalizationService {
    constructor(private config: NormalizationConfig = DEFAULT_NORMALIZATION_CONFIG) {}

    /**
     * Cleans raw extracted page text for segmentation. Deterministic and
     * total: any string input yields a string, possibly empty.
     */
    normalize(rawText: string): string {
        if (typeof rawText !== 'string' || rawText.trim().length === 0) {
            return '';
        }

        let text = this.repairEncoding(rawText);
        if (this.config.removeBoilerplate) {
            text = this.removeBoilerplate(text);
        }
        text = this.collapseSpacedWords(text);
        text = this.reflowLines(text);
        return this.normalizeWhitespace(text);
    }

    /**
     * Returns cleaned copies of the pages, dropping those left empty.
     */
    normalizePages(pages: Page[]): Page[] {
        return pages
            .map(page => page.withText(this.normalize(page.rawText)))
            .filter(page => page.rawText.length > 0);
    }

    repairEncoding(text: string): string {
        let repaired = text;
        for (const [from, to] of [...MOJIBAKE_REPAIRS, ...TYPOGRAPHIC_FOLDS]) {
            repaired = repaired.split(from).join(to);
        }
        return repaired;
    }

    /**
     * Drops page furniture line by line. Only whole lines go: a number that
     * sits inside a sentence is never touched.
     */
    removeBoilerplate(text: string): string {
        return text
            .split(/\r\n|\r|\n/)
            .filter(line => !this.isBoilerplateLine(line.trim()))
            .join('\n');
    }

    collapseSpacedWords(text: string): string {
        let previous: string;
        let current = text;
        do {
            previous = current;
            current = current.replace(SPACED_OUT_WORD, run => run.replace(/[ \t]+/g, ''));
        } while (current !== previous);
        return current;
    }

    /**
     * Joins layout-wrapped lines into paragraphs. A line ending in . ! ? or :
     * closes its paragraph line; blank lines survive as a single blank line.
     */
    reflowLines(text: string): string {
        const output: string[] = [];
        let paragraph: string[] = [];

        const flush = () => {
            if (paragraph.length > 0) {
                output.push(paragraph.join(' '));
                paragraph = [];
            }
        };

        for (const rawLine of text.split(/\r\n|\r|\n/)) {
            const line = rawLine.trim();
            if (line.length === 0) {
                flush();
                if (output.length > 0 && output[output.length - 1] !== '') {
                    output.push('');
                }
                continue;
            }
            paragraph.push(line);
            if (SENTENCE_TERMINAL.test(line)) {
                flush();
            }
        }
        flush();

        return output.join('\n');
    }

    normalizeWhitespace(text: string): string {
        return text
            .replace(/\t/g, ' ')
            .replace(/\r\n?/g, '\n')
            .split('\n')
            .map(line => line.replace(/ {2,}/g, ' ').trim())
            .join('\n')
            .replace(/\n{3,}/g, '\n\n')
            .trim();
    }

    private isBoilerplateLine(line: string): boolean {
        if (line.length === 0) {
            return false;
        }
        if (PAGE_NUMBER_LINE.test(line) || BRACKETED_PAGE_MARKER.test(line)) {
            return true;
        }
        return this.config.runningHeaders.some(header =>
            typeof header === 'string'
                ? header.toLowerCase() === line.toLowerCase()
                : line.search(header) !== -1
        );
    }
}
