import { describe, it, expect } from 'vitest';
import { EmbeddingService } from '../src/application/services/EmbeddingService';
import { DimensionMismatchError, EmbeddingProviderError } from '../src/domain/errors/RagErrors';
import { createVectorProvider } from './fakes';

const lengthVector = (text: string) => [text.length, 1, 0];

describe('EmbeddingService', () => {
    it('should split texts into batches of the configured size', () => {
        const service = new EmbeddingService(createVectorProvider(lengthVector), { dimension: 3, batchSize: 2 });

        const batches = service.batches(['a', 'b', 'c', 'd', 'e']);

        expect(batches).toEqual([
            { start: 0, end: 2, texts: ['a', 'b'] },
            { start: 2, end: 4, texts: ['c', 'd'] },
            { start: 4, end: 5, texts: ['e'] },
        ]);
    });

    it('should return one vector per text in input order', async () => {
        // Arrange
        const provider = createVectorProvider(lengthVector);
        const service = new EmbeddingService(provider, { dimension: 3, batchSize: 2 });

        // Act
        const vectors = await service.embedTexts(['a', 'bb', 'ccc']);

        // Assert
        expect(vectors).toEqual([[1, 1, 0], [2, 1, 0], [3, 1, 0]]);
        expect(provider.generateEmbeddings).toHaveBeenCalledTimes(2);
        expect(provider.generateEmbeddings).toHaveBeenNthCalledWith(2, ['ccc']);
    });

    it('should report the failing batch range', async () => {
        // Arrange
        const provider = createVectorProvider(lengthVector);
        provider.generateEmbeddings
            .mockResolvedValueOnce([[1, 1, 0], [1, 1, 0]])
            .mockRejectedValueOnce(new Error('connection refused'));
        const service = new EmbeddingService(provider, { dimension: 3, batchSize: 2 });

        // Act
        const error = await service.embedTexts(['a', 'b', 'c', 'd']).catch((e: unknown) => e);

        // Assert
        expect(error).toBeInstanceOf(EmbeddingProviderError);
        expect(error).toMatchObject({ batchStart: 2, batchEnd: 4, statusCode: 502 });
        expect(error).toHaveProperty('message', 'Embedding provider failed: connection refused (texts 2..3)');
    });

    it('should reject a batch with a missing vector', async () => {
        const provider = createVectorProvider(lengthVector);
        provider.generateEmbeddings.mockResolvedValueOnce([[1, 1, 0]]);
        const service = new EmbeddingService(provider, { dimension: 3, batchSize: 8 });

        await expect(service.embedTexts(['a', 'b'])).rejects.toBeInstanceOf(EmbeddingProviderError);
    });

    it('should never coerce a vector of the wrong dimension', async () => {
        const provider = createVectorProvider(() => [0.5, 0.5]);
        const service = new EmbeddingService(provider, { dimension: 3, batchSize: 8 });

        const error = await service.embedTexts(['a']).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(DimensionMismatchError);
        expect(error).toMatchObject({ expected: 3, actual: 2 });
    });

    it('should check the query vector dimension', async () => {
        const service = new EmbeddingService(createVectorProvider(() => [1, 0, 0, 0]), { dimension: 3, batchSize: 8 });

        await expect(service.embedQuery('question')).rejects.toBeInstanceOf(DimensionMismatchError);
    });

    it('should wrap query embedding failures', async () => {
        const provider = createVectorProvider(lengthVector);
        provider.generateEmbedding.mockRejectedValueOnce(new Error('timeout'));
        const service = new EmbeddingService(provider, { dimension: 3, batchSize: 8 });

        await expect(service.embedQuery('question')).rejects.toThrow('Embedding provider failed: timeout (texts 0..0)');
    });
});
