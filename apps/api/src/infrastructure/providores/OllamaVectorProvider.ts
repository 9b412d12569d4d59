import { OllamaEmbeddings } from '@langchain/ollama';
import type { VectorProvider } from '../../application/providers/VectorProvider';

export interface OllamaEmbeddingConfig {
    model: string;
    baseUrl: string;
}

export class OllamaVectorProvider implements VectorProvider {
    private embeddings: OllamaEmbeddings;

    constructor(config: OllamaEmbeddingConfig) {
        this.embeddings = new OllamaEmbeddings({
            model: config.model,
            baseUrl: config.baseUrl,
        });
    }

    async generateEmbeddings(texts: string[]): Promise<number[][]> {
        return this.embeddings.embedDocuments(texts);
    }
}
