import type { DocumentMetadata } from '@transcript-rag/types';
import { AppError } from '../errors/AppError';
import { ConfigError, DimensionMismatchError } from '../errors/RagErrors';
import { Chunk } from './Chunk';

export interface ChunkMatch {
    chunkId: string;
    documentId: string;
    ordinal: number;
    content: string;
    metadata: DocumentMetadata;
    distance: number;
}

export interface TextMatch extends ChunkMatch {
    /** Keyword relevance scaled to [0, 1] against the best match of the same query. */
    textScore: number;
}

export type VectorBackend = 'postgres' | 'libsql' | 'memory';

/**
 * Chunk + vector persistence. Every backend honours the same contract:
 *
 * - `ensureIndex` is idempotent and safe under concurrent first use; an
 *   existing index of another dimension raises DimensionMismatchError.
 * - `upsertChunks` replaces the whole chunk set of one document atomically.
 * - `topK` orders by ascending cosine distance, then document id, then ordinal.
 * - `textSearch` returns chunks sharing at least one term with the query,
 *   best keyword match first, each with its cosine distance to `queryVector`.
 */
export abstract class VectorStore {
    abstract readonly backend: VectorBackend;

    private initialisation?: { dimension: number; promise: Promise<void> };
    private readyDimension?: number;

    abstract upsertChunks(documentId: string, chunks: Chunk[]): Promise<void>;
    abstract topK(queryVector: number[], k: number): Promise<ChunkMatch[]>;
    abstract textSearch(query: string, queryVector: number[], limit: number): Promise<TextMatch[]>;
    abstract deleteDocument(documentId: string): Promise<void>;
    abstract countChunks(documentId?: string): Promise<number>;
    abstract close(): Promise<void>;

    /**
     * Creates the backing table and cosine index for `dimension`, once.
     * Calls made while the first one is in flight share its result.
     */
    async ensureIndex(dimension: number): Promise<void> {
        if (!Number.isInteger(dimension) || dimension < 1) {
            throw new ConfigError(`Embedding dimension must be a positive integer, got ${dimension}`);
        }

        const current = this.initialisation;
        if (current) {
            if (current.dimension !== dimension) {
                throw new DimensionMismatchError(current.dimension, dimension, 'vector index');
            }
            return current.promise;
        }

        const promise = this.createIndex(dimension).then(
            () => {
                this.readyDimension = dimension;
            },
            (error: unknown) => {
                this.initialisation = undefined;
                throw error;
            }
        );
        this.initialisation = { dimension, promise };
        return promise;
    }

    get dimension(): number | undefined {
        return this.readyDimension;
    }

    /**
     * Backend-specific DDL. Must leave an existing index of another
     * dimension untouched and raise DimensionMismatchError.
     */
    protected abstract createIndex(dimension: number): Promise<void>;

    protected requireDimension(): number {
        if (this.readyDimension === undefined) {
            throw new ConfigError('Vector index is not initialised, call ensureIndex first');
        }
        return this.readyDimension;
    }

    protected checkVector(vector: readonly number[], context: string): void {
        const expected = this.requireDimension();
        if (vector.length !== expected) {
            throw new DimensionMismatchError(expected, vector.length, context);
        }
    }

    protected checkChunks(documentId: string, chunks: readonly Chunk[]): void {
        const ordinals = new Set<number>();

        for (const chunk of chunks) {
            if (chunk.documentId !== documentId) {
                throw new AppError(`Chunk ${chunk.id} belongs to document ${chunk.documentId}, not ${documentId}`, 400);
            }
            if (ordinals.has(chunk.ordinal)) {
                throw new AppError(`Duplicate ordinal ${chunk.ordinal} for document ${documentId}`, 400);
            }
            ordinals.add(chunk.ordinal);
            this.checkVector(chunk.embedding, `chunk ${chunk.ordinal} of ${documentId}`);
        }
    }
}

/**
 * Ties on distance are broken by document id, then ordinal.
 */
export const compareMatches = (a: ChunkMatch, b: ChunkMatch): number => {
    if (a.distance !== b.distance) return a.distance - b.distance;
    if (a.documentId !== b.documentId) return a.documentId < b.documentId ? -1 : 1;
    return a.ordinal - b.ordinal;
};

const compareTextMatches = (a: TextMatch, b: TextMatch): number =>
    b.textScore - a.textScore || compareMatches(a, b);

/**
 * Scales raw backend ranks by the best one and drops non-matching rows.
 */
export const rankTextMatches = (rows: ReadonlyArray<ChunkMatch & { rank: number }>): TextMatch[] => {
    const best = rows.reduce((max, row) => Math.max(max, row.rank), 0);
    if (best <= 0) return [];

    return rows
        .filter(row => row.rank > 0)
        .map(({ rank, ...match }) => ({ ...match, textScore: rank / best }))
        .sort(compareTextMatches);
};

const MAX_SEARCH_TERMS = 32;

/**
 * Lower-cased words of a free-text query, without duplicates or single characters.
 */
export const searchTerms = (text: string): string[] => {
    const words = text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
    return [...new Set(words.filter(word => word.length > 1))].slice(0, MAX_SEARCH_TERMS);
};
