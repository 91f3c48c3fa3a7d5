import { randomUUID } from 'crypto';
import type { DocumentMetadata, IngestionOutcome } from '@transcript-rag/types';
import { Chunk } from '../../domain/entities/Chunk';
import { VectorStore } from '../../domain/entities/VectorStore';
import { AppError } from '../../domain/errors/AppError';
import { EmbeddingProviderError } from '../../domain/errors/RagErrors';
import { ChunkingService } from '../services/ChunkingService';
import { EmbeddingService } from '../services/EmbeddingService';
import { KeyedLock } from '../utils/KeyedLock';
import { withRetry } from '../utils/retry';
import logger from '../../infrastructure/logger';

export interface IngestionSettings {
    enabled: boolean;
    embeddingAttempts: number;
    retryDelayMs: number;
}

type IngestionOrigin = 'save' | 'backfill';

/**
 * Chunk → embed → store for one transcript. The only writer of chunk sets.
 */
export class IndexTranscript {
    private locks = new KeyedLock();

    constructor(
        private chunking: ChunkingService,
        private embeddings: EmbeddingService,
        private store: VectorStore,
        private settings: IngestionSettings
    ) {}

    get enabled(): boolean {
        return this.settings.enabled;
    }

    async execute(
        documentId: string,
        text: string,
        metadata: DocumentMetadata = {},
        fields?: Record<string, string>
    ): Promise<IngestionOutcome> {
        return this.ingest(documentId, text, metadata, fields, 'save');
    }

    /**
     * Same as `execute`, for migration tooling that indexes historical transcripts.
     */
    async backfill(
        documentId: string,
        text: string,
        metadata: DocumentMetadata = {},
        fields?: Record<string, string>
    ): Promise<IngestionOutcome> {
        return this.ingest(documentId, text, metadata, fields, 'backfill');
    }

    async remove(documentId: string): Promise<IngestionOutcome> {
        this.validateDocumentId(documentId);
        if (!this.settings.enabled) return { status: 'disabled', documentId };

        await this.locks.run(documentId, () => this.store.deleteDocument(documentId));
        logger.info('Transcript chunks removed', { documentId });

        return { status: 'cleared', documentId };
    }

    private async ingest(
        documentId: string,
        text: string,
        metadata: DocumentMetadata,
        fields: Record<string, string> | undefined,
        origin: IngestionOrigin
    ): Promise<IngestionOutcome> {
        this.validateDocumentId(documentId);

        if (!this.settings.enabled) {
            logger.debug('RAG disabled, skipping ingestion', { documentId, origin });
            return { status: 'disabled', documentId };
        }

        return this.locks.run(documentId, async () => {
            const startedAt = Date.now();
            const segments = Array.from(this.chunking.chunk(text, fields));

            if (segments.length === 0) {
                await this.store.deleteDocument(documentId);
                logger.info('Transcript has no content, prior chunks cleared', { documentId, origin });
                return { status: 'cleared', documentId };
            }

            const vectors = await this.embed(segments.map(segment => segment.content));
            const createdAt = new Date();

            const chunks = segments.map((segment, i) => {
                const embedding = vectors[i];
                if (!embedding) {
                    throw new EmbeddingProviderError('Missing embedding for chunk', i, i + 1);
                }
                return new Chunk(randomUUID(), documentId, segment.ordinal, segment.content, metadata, embedding, createdAt);
            });

            await this.store.upsertChunks(documentId, chunks);

            logger.info('Transcript indexed', {
                documentId,
                origin,
                chunkCount: chunks.length,
                durationMs: Date.now() - startedAt,
            });

            return { status: 'indexed', documentId, chunkCount: chunks.length };
        });
    }

    private async embed(texts: string[]): Promise<number[][]> {
        const vectors: number[][] = [];

        for (const batch of this.embeddings.batches(texts)) {
            const batchVectors = await withRetry(
                () => this.embeddings.embedBatch(batch),
                {
                    maxAttempts: this.settings.embeddingAttempts,
                    baseDelayMs: this.settings.retryDelayMs,
                    shouldRetry: error => error instanceof EmbeddingProviderError,
                    label: `Embedding batch ${batch.start}..${batch.end - 1}`,
                }
            );
            vectors.push(...batchVectors);
        }

        return vectors;
    }

    private validateDocumentId(documentId: string): void {
        if (documentId.trim().length === 0) {
            throw new AppError('Document id is required', 400);
        }
    }
}
