import { ChatOllama } from '@langchain/ollama';
import { AIMessage, HumanMessage, SystemMessage, type MessageContent } from '@langchain/core/messages';
import type { ChatMessage } from '@coverage-rag/types';
import type { LLMProvider } from '../../application/providers/LLMProvider';
import logger from '../logger';

export interface OllamaChatConfig {
    model: string;
    baseUrl: string;
}

export class OllamaLLMProvider implements LLMProvider {
    private model: ChatOllama;

    constructor(config: OllamaChatConfig) {
        this.model = new ChatOllama({
            model: config.model,
            baseUrl: config.baseUrl,
            temperature: 0,
        });
    }

    async generateResponse(messages: ChatMessage[]): Promise<string> {
        const langChainMessages = messages.map((m) => {
            if (m.role === 'system') return new SystemMessage(m.content);
            if (m.role === 'assistant') return new AIMessage(m.content);
            return new HumanMessage(m.content);
        });

        const response = await this.model.invoke(langChainMessages);
        const text = contentToText(response.content);

        logger.debug('generateResponse completed', { characters: text.length });
        return text;
    }
}

function contentToText(content: MessageContent): string {
    if (typeof content === 'string') {
        return content;
    }
    return content
        .map(part => (part.type === 'text' && 'text' in part && typeof part.text === 'string' ? part.text : ''))
        .join('');
}
