import { SConstructor, UseCaseProvider } from '../application/useCases/UseCaseProvider';
import { LLMProvider } from '../application/providers/LLMProvider';
import { VectorProvider } from '../application/providers/VectorProvider';
import { ChunkingService } from '../application/services/ChunkingService';
import { EmbeddingService } from '../application/services/EmbeddingService';
import { RetrievalService } from '../application/services/RetrievalService';
import { IndexTranscript } from '../application/useCases/IndexTranscript';
import { BackfillTranscripts } from '../application/useCases/BackfillTranscripts';
import { ListChatLogs } from '../application/useCases/ListChatLogs';
import { Chat } from '../application/useCases/chat/Chat';
import { AnswerSynthesizer } from '../application/useCases/chat/AnswerSynthesizer';
import { PromptBuilder } from '../application/useCases/chat/PromptBuilder';
import { ChatLogRepository } from '../domain/entities/ChatLogRepository';
import { VectorStore } from '../domain/entities/VectorStore';
import { RagConfig } from './config/ragConfig';
import { OllamaLLMProvider } from './providores/OllamaLLMProvider';
import { OllamaVectorProvider } from './providores/OllamaVectorProvider';
import { createPersistence } from './db/createPersistence';
import { InMemoryChatLogRepository } from './repositories/InMemoryChatLogRepository';
import logger from './logger';

export interface CoreDependencies {
    store?: VectorStore;
    chatLog?: ChatLogRepository;
    llmProvider?: LLMProvider;
    vectorProvider?: VectorProvider;
}

const RETRY_BASE_DELAY_MS = 1000;

/**
 * Composition root. The vector backend is chosen here, once, from configuration.
 */
export class Core {
    public useCases = new UseCaseProvider();
    public readonly store: VectorStore;
    public readonly chatLog: ChatLogRepository;
    private llmProvider: LLMProvider;
    private vectorProvider: VectorProvider;

    constructor(public readonly config: RagConfig, dependencies: CoreDependencies = {}) {
        const persistence = dependencies.store
            ? { store: dependencies.store, chatLog: new InMemoryChatLogRepository() }
            : createPersistence(config.store);
        this.store = persistence.store;
        this.chatLog = dependencies.chatLog ?? persistence.chatLog;
        this.llmProvider = dependencies.llmProvider ?? new OllamaLLMProvider({
            model: config.ollama.completionModel,
            baseUrl: config.ollama.baseUrl,
        });
        this.vectorProvider = dependencies.vectorProvider ?? new OllamaVectorProvider({
            model: config.ollama.embeddingModel,
            baseUrl: config.ollama.baseUrl,
        });

        this.initializeServices();
    }

    private initializeServices() {
        const { config } = this;
        const embeddings = new EmbeddingService(this.vectorProvider, {
            dimension: config.embedding.dimension,
            batchSize: config.embedding.batchSize,
        });

        this.useCases.register(IndexTranscript, () => new IndexTranscript(
            new ChunkingService(config.chunking),
            embeddings,
            this.store,
            {
                enabled: config.enabled,
                embeddingAttempts: config.embedding.maxRetries,
                retryDelayMs: RETRY_BASE_DELAY_MS,
            }
        ));
        this.useCases.register(BackfillTranscripts, () => new BackfillTranscripts(
            this.getUseCase(IndexTranscript),
            this.store
        ));
        this.useCases.register(Chat, () => new Chat(
            new RetrievalService(embeddings, this.store, config.retrieval),
            new AnswerSynthesizer(this.llmProvider, new PromptBuilder(config.historyTurns)),
            {
                enabled: config.enabled,
                retrievalAttempts: 2,
                retryDelayMs: RETRY_BASE_DELAY_MS,
                dateFilter: config.retrieval.dateFilter,
            },
            { chatLog: config.chatLog.enabled ? this.chatLog : undefined }
        ));
        this.useCases.register(ListChatLogs, () => new ListChatLogs(this.chatLog));
    }

    /**
     * Creates the chat log table, then the vector index for the configured
     * dimension. The index is skipped when RAG is disabled.
     */
    async start(): Promise<void> {
        if (this.config.chatLog.enabled) {
            await this.chatLog.ensureSchema();
        }
        if (!this.config.enabled) {
            logger.warn('RAG disabled, vector index not initialised');
            return;
        }
        await this.store.ensureIndex(this.config.embedding.dimension);
    }

    async stop(): Promise<void> {
        await this.store.close();
    }

    public getUseCase<T>(serviceType: SConstructor<T>): T {
        return this.useCases.get(serviceType);
    }
}
