import { describe, it, expect, vi } from 'vitest';
import { AskQuestion, NO_CONTEXT_ANSWER } from '../src/application/useCases/ask/AskQuestion';
import { PromptBuilder } from '../src/application/useCases/ask/PromptBuilder';
import { SearchDocuments } from '../src/application/useCases/SearchDocuments';
import { RetrievalService } from '../src/application/services/RetrievalService';
import { LLMProvider } from '../src/application/providers/LLMProvider';
import { Chunk } from '../src/domain/entities/Chunk';
import { SearchResult } from '../src/domain/entities/SearchResult';
import { ModelUnavailableError } from '../src/domain/errors/PipelineErrors';

const results = [
    new SearchResult(
        new Chunk('Metformin is a Tier 1 drug.', 'NC-formulary.pdf', 23, 0, 'NC-formulary-p23-c0', 'NC', 'formulary'),
        0.25,
        0
    ),
    new SearchResult(
        new Chunk('A copay is a fixed amount.', 'TX-faq.pdf', 2, 1, 'TX-faq-p2-c1', 'TX', 'faq'),
        1.5,
        1
    ),
];

describe('PromptBuilder', () => {
    it('should label each context entry with its source, page and tags', () => {
        expect(new PromptBuilder().buildContext(results)).toBe(
            '[Source 1] NC-formulary.pdf, page 23 (region: NC, type: formulary)\nMetformin is a Tier 1 drug.\n\n' +
            '[Source 2] TX-faq.pdf, page 2 (region: TX, type: faq)\nA copay is a fixed amount.'
        );
    });

    it('should send the question as the user message', () => {
        const messages = new PromptBuilder().build('Is metformin covered?', results);

        expect(messages).toHaveLength(2);
        expect(messages[0].role).toBe('system');
        expect(messages[0].content).toContain('[Source 2] TX-faq.pdf, page 2');
        expect(messages[1]).toEqual({ role: 'user', content: 'Is metformin covered?' });
    });
});

describe('AskQuestion', () => {
    it('should answer from retrieved context and list the sources', async () => {
        const retrievalService = {
            retrieve: vi.fn().mockResolvedValue(results),
        } as unknown as RetrievalService;
        const llmProvider = {
            generateResponse: vi.fn().mockResolvedValue('Yes, metformin is Tier 1 [Source 1].'),
        } as unknown as LLMProvider;

        const response = await new AskQuestion(retrievalService, llmProvider)
            .execute('Is metformin covered?', 2, { region: 'NC' });

        expect(retrievalService.retrieve).toHaveBeenCalledWith('Is metformin covered?', 2, { region: 'NC' });
        expect(llmProvider.generateResponse).toHaveBeenCalledTimes(1);
        expect(response).toEqual({
            answer: 'Yes, metformin is Tier 1 [Source 1].',
            sources: [
                { chunkId: 'NC-formulary-p23-c0', sourceId: 'NC-formulary.pdf', pageNumber: 23, score: 0.25 },
                { chunkId: 'TX-faq-p2-c1', sourceId: 'TX-faq.pdf', pageNumber: 2, score: 1.5 },
            ],
        });
    });

    it('should not call the model when nothing was retrieved', async () => {
        const retrievalService = {
            retrieve: vi.fn().mockResolvedValue([]),
        } as unknown as RetrievalService;
        const llmProvider = {
            generateResponse: vi.fn(),
        } as unknown as LLMProvider;

        const response = await new AskQuestion(retrievalService, llmProvider).execute('Anything?', 5);

        expect(response).toEqual({ answer: NO_CONTEXT_ANSWER, sources: [] });
        expect(llmProvider.generateResponse).not.toHaveBeenCalled();
    });

    it('should raise ModelUnavailableError when generation fails', async () => {
        const retrievalService = {
            retrieve: vi.fn().mockResolvedValue(results),
        } as unknown as RetrievalService;
        const llmProvider = {
            generateResponse: vi.fn().mockRejectedValue(new Error('connect ECONNREFUSED')),
        } as unknown as LLMProvider;

        await expect(new AskQuestion(retrievalService, llmProvider).execute('Is metformin covered?', 2))
            .rejects.toThrow(ModelUnavailableError);
    });
});

describe('SearchDocuments', () => {
    it('should return flattened hits in rank order', async () => {
        const retrievalService = {
            retrieve: vi.fn().mockResolvedValue(results),
        } as unknown as RetrievalService;

        const response = await new SearchDocuments(retrievalService).execute('metformin', 2);

        expect(response.query).toBe('metformin');
        expect(response.results[0]).toEqual({
            text: 'Metformin is a Tier 1 drug.',
            sourceId: 'NC-formulary.pdf',
            pageNumber: 23,
            chunkIndex: 0,
            chunkId: 'NC-formulary-p23-c0',
            region: 'NC',
            category: 'formulary',
            score: 0.25,
            rank: 0,
        });
        expect(response.results.map(hit => hit.rank)).toEqual([0, 1]);
    });
});
