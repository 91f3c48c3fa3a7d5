import type { VectorProvider } from '../providers/VectorProvider';
import { DimensionMismatchError, EmbeddingProviderError, describeError } from '../../domain/errors/RagErrors';

export interface EmbeddingConfig {
    dimension: number;
    batchSize: number;
}

export interface EmbeddingBatch {
    start: number;
    end: number;
    texts: string[];
}

/**
 * Batches texts through the embedding provider, keeping output order aligned
 * with input order and checking every vector against the deployment dimension.
 */
export class EmbeddingService {
    constructor(
        private vectorProvider: VectorProvider,
        private config: EmbeddingConfig
    ) {}

    get dimension(): number {
        return this.config.dimension;
    }

    batches(texts: string[]): EmbeddingBatch[] {
        const size = Math.max(1, this.config.batchSize);
        const batches: EmbeddingBatch[] = [];

        for (let start = 0; start < texts.length; start += size) {
            const end = Math.min(start + size, texts.length);
            batches.push({ start, end, texts: texts.slice(start, end) });
        }

        return batches;
    }

    async embedBatch(batch: EmbeddingBatch): Promise<number[][]> {
        let vectors: number[][];
        try {
            vectors = await this.vectorProvider.generateEmbeddings(batch.texts);
        } catch (error) {
            throw new EmbeddingProviderError(
                `Embedding provider failed: ${describeError(error)}`,
                batch.start,
                batch.end,
                error
            );
        }

        if (vectors.length !== batch.texts.length) {
            throw new EmbeddingProviderError(
                `Embedding provider returned ${vectors.length} vectors for ${batch.texts.length} texts`,
                batch.start,
                batch.end
            );
        }

        vectors.forEach((vector, offset) => this.assertDimension(vector, `text ${batch.start + offset}`));
        return vectors;
    }

    /**
     * Embeds all texts. Any failing batch aborts the call; no partial result is returned.
     */
    async embedTexts(texts: string[]): Promise<number[][]> {
        const vectors: number[][] = [];
        for (const batch of this.batches(texts)) {
            vectors.push(...await this.embedBatch(batch));
        }
        return vectors;
    }

    async embedQuery(text: string): Promise<number[]> {
        let vector: number[];
        try {
            vector = await this.vectorProvider.generateEmbedding(text);
        } catch (error) {
            throw new EmbeddingProviderError(`Embedding provider failed: ${describeError(error)}`, 0, 1, error);
        }
        this.assertDimension(vector, 'query');
        return vector;
    }

    private assertDimension(vector: number[], context: string): void {
        if (vector.length !== this.config.dimension) {
            throw new DimensionMismatchError(this.config.dimension, vector.length, context);
        }
    }
}
