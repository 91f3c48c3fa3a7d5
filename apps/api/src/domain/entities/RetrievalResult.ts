import type { DocumentMetadata, SourceReference } from '@transcript-rag/types';

/** Cosine similarity clamped to [0, 1]. */
export const similarity = (distance: number): number => Math.min(1, Math.max(0, 1 - distance));

export class RetrievalResult {
    constructor(
        public readonly chunkId: string,
        public readonly documentId: string,
        public readonly ordinal: number,
        public readonly content: string,
        public readonly metadata: DocumentMetadata,
        public readonly distance: number,
        /** Ranking score in [0, 1]; cosine similarity unless a hybrid blend supplied one. */
        public readonly score: number = similarity(distance)
    ) {}

    toSource(citation: number): SourceReference {
        return {
            citation,
            chunkId: this.chunkId,
            documentId: this.documentId,
            ordinal: this.ordinal,
            content: this.content,
            distance: this.distance,
            score: this.score,
            metadata: this.metadata,
        };
    }
}
