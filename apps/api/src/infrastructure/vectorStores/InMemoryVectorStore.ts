import { Chunk } from '../../domain/entities/Chunk';
import { ChunkMatch, TextMatch, VectorStore, compareMatches, rankTextMatches, searchTerms } from '../../domain/entities/VectorStore';

export const cosineDistance = (a: readonly number[], b: readonly number[]): number => {
    let dot = 0;
    let normA = 0;
    let normB = 0;

    for (let i = 0; i < a.length; i++) {
        const x = a[i] ?? 0;
        const y = b[i] ?? 0;
        dot += x * y;
        normA += x * x;
        normB += y * y;
    }

    if (normA === 0 || normB === 0) return 1;
    return 1 - dot / (Math.sqrt(normA) * Math.sqrt(normB));
};

/**
 * Exact search over an in-process map. For development and tests.
 */
export class InMemoryVectorStore extends VectorStore {
    readonly backend = 'memory' as const;
    private documents = new Map<string, Chunk[]>();

    protected async createIndex(): Promise<void> {}

    async upsertChunks(documentId: string, chunks: Chunk[]): Promise<void> {
        this.checkChunks(documentId, chunks);

        if (chunks.length === 0) {
            this.documents.delete(documentId);
            return;
        }
        this.documents.set(documentId, [...chunks]);
    }

    async topK(queryVector: number[], k: number): Promise<ChunkMatch[]> {
        this.checkVector(queryVector, 'query');
        if (k < 1) return [];

        return this.matches(queryVector).sort(compareMatches).slice(0, k);
    }

    /**
     * Ranks by the number of distinct query terms among the chunk's words.
     */
    async textSearch(query: string, queryVector: number[], limit: number): Promise<TextMatch[]> {
        this.checkVector(queryVector, 'query');
        const terms = searchTerms(query);
        if (terms.length === 0 || limit < 1) return [];

        const ranked = this.matches(queryVector).map(match => {
            const words = new Set(searchTerms(match.content));
            return { ...match, rank: terms.filter(term => words.has(term)).length };
        });

        return rankTextMatches(ranked).slice(0, limit);
    }

    async deleteDocument(documentId: string): Promise<void> {
        this.documents.delete(documentId);
    }

    async countChunks(documentId?: string): Promise<number> {
        if (documentId !== undefined) {
            return this.documents.get(documentId)?.length ?? 0;
        }
        let total = 0;
        for (const chunks of this.documents.values()) total += chunks.length;
        return total;
    }

    async close(): Promise<void> {
        this.documents.clear();
    }

    private matches(queryVector: number[]): ChunkMatch[] {
        const matches: ChunkMatch[] = [];
        for (const chunks of this.documents.values()) {
            for (const chunk of chunks) {
                matches.push({
                    chunkId: chunk.id,
                    documentId: chunk.documentId,
                    ordinal: chunk.ordinal,
                    content: chunk.content,
                    metadata: chunk.metadata,
                    distance: cosineDistance(chunk.embedding, queryVector),
                });
            }
        }
        return matches;
    }
}
