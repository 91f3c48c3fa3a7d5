import { describe, it, expect, beforeEach, vi } from 'vitest';
import { EmbeddingService } from '../src/application/services/EmbeddingService';
import { RetrievalService } from '../src/application/services/RetrievalService';
import { RetrievalResult } from '../src/domain/entities/RetrievalResult';
import { InMemoryVectorStore } from '../src/infrastructure/vectorStores/InMemoryVectorStore';
import { createVectorProvider, keywordVector, makeChunk } from './fakes';

describe('RetrievalService', () => {
    let store: InMemoryVectorStore;
    let retrieval: RetrievalService;

    beforeEach(async () => {
        store = new InMemoryVectorStore();
        await store.ensureIndex(3);
        const embeddings = new EmbeddingService(
            createVectorProvider(keywordVector(['budget', 'launch'])),
            { dimension: 3, batchSize: 8 }
        );
        retrieval = new RetrievalService(embeddings, store, { defaultK: 2, maxK: 3 });
    });

    it.each([
        [undefined, 2],
        [Number.NaN, 2],
        [Number.POSITIVE_INFINITY, 2],
        [0, 1],
        [-4, 1],
        [2.9, 2],
        [50, 3],
    ])('should clamp k=%s to %s', (k, expected) => {
        expect(retrieval.clampK(k)).toBe(expected);
    });

    it('should return the closest chunks as retrieval results', async () => {
        // Arrange
        await store.upsertChunks('meeting-1', [
            makeChunk('meeting-1', 0, [1, 0, 0], 'The budget was approved'),
            makeChunk('meeting-1', 1, [0, 1, 0], 'Launch moves to June'),
        ]);

        // Act
        const results = await retrieval.retrieve('what about the launch?', 1);

        // Assert
        expect(results).toHaveLength(1);
        expect(results[0]).toBeInstanceOf(RetrievalResult);
        expect(results[0]).toMatchObject({ documentId: 'meeting-1', ordinal: 1, content: 'Launch moves to June', distance: 0 });
        expect(results[0]?.score).toBe(1);
    });

    it('should return an empty list for an empty store', async () => {
        expect(await retrieval.retrieve('anything')).toEqual([]);
    });

    describe('hybrid retrieval', () => {
        beforeEach(async () => {
            // Both chunks sit on the query's axis; only the second one shares its words.
            await store.upsertChunks('meeting-1', [
                makeChunk('meeting-1', 0, [1, 0, 0], 'Opening remarks'),
                makeChunk('meeting-1', 1, [0.8, 0.6, 0], 'The budget review was postponed'),
            ]);
        });

        it('should blend vector similarity and keyword relevance with alpha', async () => {
            const results = await retrieval.retrieve('budget review', 2, { hybrid: true, alpha: 0.5 });

            expect(results.map(result => result.ordinal)).toEqual([1, 0]);
            expect(results[0]?.score).toBeCloseTo(0.5 * 0.8 + 0.5 * 1, 10);
            expect(results[1]?.score).toBeCloseTo(0.5, 10);
        });

        it('should rank by vector similarity alone when alpha is one', async () => {
            const results = await retrieval.retrieve('budget review', 2, { hybrid: true, alpha: 1 });

            expect(results.map(result => result.ordinal)).toEqual([0, 1]);
        });

        it('should fetch candidates from both searches', async () => {
            const topK = vi.spyOn(store, 'topK');
            const textSearch = vi.spyOn(store, 'textSearch');

            await retrieval.retrieve('budget review', 2, { hybrid: true });

            expect(topK).toHaveBeenCalledWith([1, 0, 0], 6);
            expect(textSearch).toHaveBeenCalledWith('budget review', [1, 0, 0], 6);
        });

        it('should report the configured mode unless the request overrides it', () => {
            const configured = new RetrievalService(
                new EmbeddingService(createVectorProvider(keywordVector(['budget', 'launch'])), { dimension: 3, batchSize: 8 }),
                store,
                { defaultK: 2, maxK: 3, hybrid: true, alpha: 0.3 }
            );

            expect(configured.mode()).toEqual({ hybrid: true, alpha: 0.3 });
            expect(configured.mode({ hybrid: false, alpha: 4 })).toEqual({ hybrid: false, alpha: 1 });
        });
    });

    describe('date filtering', () => {
        it('should keep only chunks recorded inside the range', async () => {
            // Arrange
            await store.upsertChunks('monday', [
                makeChunk('monday', 0, [1, 0, 0], 'budget monday', { recordedAt: '2024-05-13T09:00:00Z' }),
            ]);
            await store.upsertChunks('friday', [
                makeChunk('friday', 0, [1, 0, 0], 'budget friday', { recordedAt: '2024-05-10T09:00:00Z' }),
            ]);
            await store.upsertChunks('undated', [makeChunk('undated', 0, [1, 0, 0], 'budget')]);
            const topK = vi.spyOn(store, 'topK');

            // Act
            const results = await retrieval.retrieve('budget', 2, { dateRange: { start: '2024-05-13', end: '2024-05-15' } });

            // Assert
            expect(results.map(result => result.documentId)).toEqual(['monday']);
            expect(topK).toHaveBeenCalledWith([1, 0, 0], 6);
        });
    });
});
