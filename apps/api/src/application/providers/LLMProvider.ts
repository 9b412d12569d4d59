import type { ChatMessage } from '@coverage-rag/types';

export interface LLMProvider {
    generateResponse(messages: ChatMessage[]): Promise<string>;
}
