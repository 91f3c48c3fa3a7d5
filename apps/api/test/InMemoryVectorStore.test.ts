import { describe, it, expect, beforeEach } from 'vitest';
import { AppError } from '../src/domain/errors/AppError';
import { ConfigError, DimensionMismatchError } from '../src/domain/errors/RagErrors';
import { InMemoryVectorStore, cosineDistance } from '../src/infrastructure/vectorStores/InMemoryVectorStore';
import { makeChunk } from './fakes';

class CountingStore extends InMemoryVectorStore {
    created = 0;
    failures = 0;

    protected async createIndex(): Promise<void> {
        await new Promise(resolve => setTimeout(resolve, 5));
        if (this.failures > 0) {
            this.failures--;
            throw new Error('database starting up');
        }
        this.created++;
    }
}

describe('InMemoryVectorStore', () => {
    let store: InMemoryVectorStore;

    beforeEach(async () => {
        store = new InMemoryVectorStore();
        await store.ensureIndex(3);
    });

    describe('ensureIndex', () => {
        it('should create the index once under concurrent first calls', async () => {
            const counting = new CountingStore();

            await Promise.all(Array.from({ length: 5 }, () => counting.ensureIndex(1536)));
            await counting.ensureIndex(1536);

            expect(counting.created).toBe(1);
            expect(counting.dimension).toBe(1536);
        });

        it('should reject another dimension and keep the original index', async () => {
            // Arrange
            const counting = new CountingStore();
            await counting.ensureIndex(1536);

            // Act
            const error = await counting.ensureIndex(768).catch((e: unknown) => e);

            // Assert
            expect(error).toBeInstanceOf(DimensionMismatchError);
            expect(error).toMatchObject({ expected: 1536, actual: 768 });
            expect(counting.dimension).toBe(1536);
            expect(counting.created).toBe(1);
            await expect(counting.topK(new Array<number>(1536).fill(0.1), 3)).resolves.toEqual([]);
        });

        it('should allow another attempt after a failed initialisation', async () => {
            const counting = new CountingStore();
            counting.failures = 1;

            await expect(counting.ensureIndex(8)).rejects.toThrow('database starting up');
            await counting.ensureIndex(8);

            expect(counting.created).toBe(1);
        });

        it('should reject an invalid dimension', async () => {
            await expect(new InMemoryVectorStore().ensureIndex(0)).rejects.toBeInstanceOf(ConfigError);
        });

        it('should refuse queries before initialisation', async () => {
            await expect(new InMemoryVectorStore().topK([1, 0, 0], 1)).rejects.toBeInstanceOf(ConfigError);
        });
    });

    describe('upsertChunks', () => {
        it('should replace the whole chunk set of a document', async () => {
            // Arrange
            await store.upsertChunks('A', [makeChunk('A', 0, [1, 0, 0], 'c1'), makeChunk('A', 1, [0, 1, 0], 'c2')]);

            // Act
            await store.upsertChunks('A', [makeChunk('A', 0, [0, 0, 1], 'c3')]);

            // Assert
            const matches = await store.topK([1, 1, 1], 10);
            expect(matches.map(m => m.content)).toEqual(['c3']);
        });

        it('should leave other documents untouched', async () => {
            await store.upsertChunks('A', [makeChunk('A', 0, [1, 0, 0])]);
            await store.upsertChunks('B', [makeChunk('B', 0, [0, 1, 0])]);

            await store.upsertChunks('A', []);

            expect(await store.countChunks('A')).toBe(0);
            expect(await store.countChunks('B')).toBe(1);
        });

        it('should reject chunks of another document or with a wrong vector length', async () => {
            await expect(store.upsertChunks('A', [makeChunk('B', 0, [1, 0, 0])])).rejects.toBeInstanceOf(AppError);
            await expect(store.upsertChunks('A', [makeChunk('A', 0, [1, 0])])).rejects.toBeInstanceOf(DimensionMismatchError);
            expect(await store.countChunks()).toBe(0);
        });

        it('should reject duplicate ordinals', async () => {
            const chunks = [makeChunk('A', 0, [1, 0, 0]), makeChunk('A', 0, [0, 1, 0])];

            await expect(store.upsertChunks('A', chunks)).rejects.toHaveProperty('statusCode', 400);
        });
    });

    describe('topK', () => {
        it('should return nothing for an empty store', async () => {
            expect(await store.topK([1, 0, 0], 5)).toEqual([]);
        });

        it('should order by distance, then document id, then ordinal', async () => {
            // Arrange
            await store.upsertChunks('b', [makeChunk('b', 1, [1, 0, 0]), makeChunk('b', 0, [1, 0, 0])]);
            await store.upsertChunks('a', [makeChunk('a', 0, [1, 0, 0]), makeChunk('a', 1, [0, 1, 0])]);

            // Act
            const matches = await store.topK([1, 0, 0], 4);

            // Assert
            expect(matches.map(m => `${m.documentId}:${m.ordinal}`)).toEqual(['a:0', 'b:0', 'b:1', 'a:1']);
            expect(matches.map(m => m.distance)).toEqual([0, 0, 0, 1]);
        });

        it('should return at most k matches', async () => {
            await store.upsertChunks('a', [0, 1, 2, 3].map(i => makeChunk('a', i, [1, i, 0])));

            expect(await store.topK([1, 0, 0], 2)).toHaveLength(2);
            expect(await store.topK([1, 0, 0], 0)).toEqual([]);
        });

        it('should reject a query vector of the wrong dimension', async () => {
            await expect(store.topK([1, 0], 1)).rejects.toBeInstanceOf(DimensionMismatchError);
        });
    });

    describe('textSearch', () => {
        it('should rank by shared query words and scale by the best match', async () => {
            // Arrange
            await store.upsertChunks('a', [
                makeChunk('a', 0, [1, 0, 0], 'Budget approved.'),
                makeChunk('a', 1, [0, 1, 0], 'The launch budget, again: budget!'),
                makeChunk('a', 2, [0, 0, 1], 'Nothing related'),
            ]);

            // Act
            const matches = await store.textSearch('launch BUDGET', [1, 0, 0], 5);

            // Assert
            expect(matches.map(m => [m.chunkId, m.textScore, m.distance])).toEqual([
                ['a-1', 1, 1],
                ['a-0', 0.5, 0],
            ]);
        });

        it('should return nothing for a query without words', async () => {
            await store.upsertChunks('a', [makeChunk('a', 0, [1, 0, 0], 'Budget approved.')]);

            expect(await store.textSearch('? !', [1, 0, 0], 5)).toEqual([]);
        });
    });

    describe('cosineDistance', () => {
        it('should be 0 for parallel, 1 for orthogonal and zero vectors', () => {
            expect(cosineDistance([2, 0], [5, 0])).toBe(0);
            expect(cosineDistance([1, 0], [0, 1])).toBe(1);
            expect(cosineDistance([0, 0], [1, 1])).toBe(1);
        });
    });
});
