import { SConstructor, UseCaseProvider } from '../application/useCases/UseCaseProvider';
import type { PipelineConfig } from '../application/config/pipelineConfig';
import type { LLMProvider } from '../application/providers/LLMProvider';
import type { VectorProvider } from '../application/providers/VectorProvider';
import { NormalizationService } from '../application/services/NormalizationService';
import { ChunkingService } from '../application/services/ChunkingService';
import { MetadataTaggingService } from '../application/services/MetadataTaggingService';
import { EmbeddingService } from '../application/services/EmbeddingService';
import { RetrievalService } from '../application/services/RetrievalService';
import { IngestDocuments } from '../application/useCases/IngestDocuments';
import { SearchDocuments } from '../application/useCases/SearchDocuments';
import { AskQuestion } from '../application/useCases/ask/AskQuestion';
import { FileVectorStore } from './vectorStore/FileVectorStore';
import { OllamaVectorProvider } from './providores/OllamaVectorProvider';
import { OllamaLLMProvider } from './providores/OllamaLLMProvider';

export interface CoreProviders {
    vectorProvider?: VectorProvider;
    llmProvider?: LLMProvider;
}

export class Core {
    public useCases = new UseCaseProvider();
    public readonly vectorStore: FileVectorStore;
    private vectorProvider: VectorProvider;
    private llmProvider: LLMProvider;
    private embeddingService: EmbeddingService;

    constructor(private config: PipelineConfig, providers: CoreProviders = {}) {
        this.vectorProvider = providers.vectorProvider ?? new OllamaVectorProvider(config.embedding);
        this.llmProvider = providers.llmProvider ?? new OllamaLLMProvider(config.llm);
        this.vectorStore = new FileVectorStore({
            dimension: config.embedding.dimension,
            indexFile: config.store.indexFile,
            metadataFile: config.store.metadataFile,
        });
        this.embeddingService = new EmbeddingService(this.vectorProvider, {
            batchSize: config.embedding.batchSize,
            dimension: config.embedding.dimension,
        });

        this.initializeServices();
    }

    private initializeServices() {
        const retrievalService = new RetrievalService(this.vectorStore, this.embeddingService);

        this.useCases.register(IngestDocuments, () => new IngestDocuments(
            new NormalizationService(this.config.normalization),
            new ChunkingService(this.config.chunking),
            new MetadataTaggingService(),
            this.embeddingService,
            this.vectorStore,
            this.config.store.directory,
        ));
        this.useCases.register(SearchDocuments, () => new SearchDocuments(retrievalService));
        this.useCases.register(AskQuestion, () => new AskQuestion(retrievalService, this.llmProvider));
    }

    public async loadStore(): Promise<void> {
        await this.vectorStore.load(this.config.store.directory);
    }

    public getUseCase<T>(serviceType: SConstructor<T>): T {
        return this.useCases.get(serviceType);
    }
}
