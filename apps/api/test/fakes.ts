import type { ChatMessage, DocumentMetadata } from '@transcript-rag/types';
import { vi } from 'vitest';
import { LLMProvider } from '../src/application/providers/LLMProvider';
import { VectorProvider } from '../src/application/providers/VectorProvider';
import { Chunk } from '../src/domain/entities/Chunk';

/**
 * Embeds by keyword: each marker owns one axis, anything else maps to the last axis.
 */
export const keywordVector = (markers: string[]) => (text: string): number[] => {
    const vector = new Array<number>(markers.length + 1).fill(0);
    const index = markers.findIndex(marker => text.includes(marker));
    vector[index === -1 ? markers.length : index] = 1;
    return vector;
};

export const createVectorProvider = (embed: (text: string) => number[]) => {
    const provider = {
        generateEmbedding: vi.fn(async (text: string) => embed(text)),
        generateEmbeddings: vi.fn(async (texts: string[]) => texts.map(embed)),
    } satisfies VectorProvider;
    return provider;
};

export interface FakeStreamOptions {
    /** Fragment index at which the stream throws; equal to the fragment count to fail after the last one. */
    failAt?: number;
    error?: Error;
}

/**
 * Completion provider that streams fixed fragments and tracks how many streams are open.
 */
export class FakeLLMProvider implements LLMProvider {
    openStreams = 0;
    streamCalls = 0;
    prompts: ChatMessage[][] = [];

    constructor(
        private fragments: string[],
        private options: FakeStreamOptions = {}
    ) {}

    async *generateStream(messages: ChatMessage[], signal?: AbortSignal): AsyncIterable<string> {
        this.prompts.push(messages);
        this.streamCalls++;
        this.openStreams++;

        const { failAt, error = new Error('completion backend unavailable') } = this.options;
        try {
            for (let i = 0; i < this.fragments.length; i++) {
                if (failAt === i) throw error;
                if (signal?.aborted) return;
                yield this.fragments[i] ?? '';
            }
            if (failAt === this.fragments.length) throw error;
        } finally {
            this.openStreams--;
        }
    }
}

export const makeChunk = (
    documentId: string,
    ordinal: number,
    embedding: number[],
    content: string = `${documentId} chunk ${ordinal}`,
    metadata: DocumentMetadata = {}
): Chunk => new Chunk(
    `${documentId}-${ordinal}`,
    documentId,
    ordinal,
    content,
    metadata,
    embedding,
    new Date('2024-05-01T10:00:00Z')
);
