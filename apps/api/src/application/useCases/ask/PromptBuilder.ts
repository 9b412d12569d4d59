import type { ChatMessage } from '@coverage-rag/types';
import { SearchResult } from '../../../domain/entities/SearchResult';

export class PromptBuilder {
    buildContext(results: SearchResult[]): string {
        return results
            .map((result, i) => {
                const { sourceId, pageNumber, region, category, text } = result.chunk;
                return `[Source ${i + 1}] ${sourceId}, page ${pageNumber} (region: ${region}, type: ${category})\n${text}`;
            })
            .join('\n\n');
    }

    build(question: string, results: SearchResult[]): ChatMessage[] {
        return [
            {
                role: 'system',
                content: `You are an assistant for health insurance plan documents.
        Answer the user's question using ONLY the context below.

        CONTEXT:
        ${this.buildContext(results)}

        INSTRUCTIONS:
        - If the answer is not in the context, say that the documents do not cover it.
        - Cite sources as [Source N].
        - Do not mix details from different regions or plans unless the question asks for a comparison.`,
            },
            { role: 'user', content: question },
        ];
    }
}
