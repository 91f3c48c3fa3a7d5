import type { DocumentMetadata } from '@transcript-rag/types';

export class Chunk {
    constructor(
        public readonly id: string,
        public readonly documentId: string,
        public readonly ordinal: number,
        public readonly content: string,
        public readonly metadata: DocumentMetadata,
        public readonly embedding: number[],
        public readonly createdAt: Date
    ) {}
}
