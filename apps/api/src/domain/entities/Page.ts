import { pageSchema } from '@coverage-rag/types';
import { ParseInputError } from '../errors/PipelineErrors';

export class Page {
    constructor(
        public readonly sourceId: string,
        public readonly pageNumber: number,
        public readonly rawText: string
    ) {}

    /**
     * Builds a Page from an untrusted record (parser output, JSON file).
     * Throws ParseInputError naming the first offending field.
     */
    static create(input: unknown): Page {
        const parsed = pageSchema.safeParse(input);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            const field = issue?.path.join('.') || 'page';
            throw new ParseInputError(`Invalid page record (${field}): ${issue?.message ?? 'malformed'}`, sourceIdOf(input));
        }
        return new Page(parsed.data.sourceId, parsed.data.pageNumber, parsed.data.rawText);
    }

    withText(text: string): Page {
        return new Page(this.sourceId, this.pageNumber, text);
    }
}

function sourceIdOf(input: unknown): string | undefined {
    if (typeof input === 'object' && input !== null && 'sourceId' in input) {
        const { sourceId } = input;
        return typeof sourceId === 'string' ? sourceId : undefined;
    }
    return undefined;
}
