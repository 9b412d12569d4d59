import type { AskResponse } from '@coverage-rag/types';
import { ModelUnavailableError } from '../../../domain/errors/PipelineErrors';
import type { LLMProvider } from '../../providers/LLMProvider';
import { RetrievalService, type RetrievalFilter } from '../../services/RetrievalService';
import { PromptBuilder } from './PromptBuilder';
import logger from '../../../infrastructure/logger';

export const NO_CONTEXT_ANSWER = 'The indexed documents do not contain information about this question.';

/**
 * Grounded answering: retrieval first, then one generation call over the
 * ranked context.
 */
export class AskQuestion {
    constructor(
        private retrievalService: RetrievalService,
        private llmProvider: LLMProvider,
        private promptBuilder: PromptBuilder = new PromptBuilder()
    ) {}

    async execute(question: string, k: number, filter: RetrievalFilter = {}): Promise<AskResponse> {
        const results = await this.retrievalService.retrieve(question, k, filter);
        if (results.length === 0) {
            return { answer: NO_CONTEXT_ANSWER, sources: [] };
        }

        let answer: string;
        try {
            answer = await this.llmProvider.generateResponse(this.promptBuilder.build(question, results));
        } catch (error) {
            logger.error('Answer generation failed', { error, question: question.substring(0, 50) });
            throw new ModelUnavailableError('Answer generation model is unavailable', error);
        }

        return {
            answer,
            sources: results.map(({ chunk, score }) => ({
                chunkId: chunk.chunkId,
                sourceId: chunk.sourceId,
                pageNumber: chunk.pageNumber,
                score,
            })),
        };
    }
}
