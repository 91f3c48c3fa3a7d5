import type { VectorProvider } from '../../application/providers/VectorProvider';
import { OllamaEmbeddings } from '@langchain/ollama';

export interface OllamaEmbeddingOptions {
    model: string;
    baseUrl: string;
}

export class OllamaVectorProvider implements VectorProvider {
    private embeddings: OllamaEmbeddings;

    constructor({ model, baseUrl }: OllamaEmbeddingOptions) {
        this.embeddings = new OllamaEmbeddings({ model, baseUrl });
    }

    async generateEmbedding(text: string): Promise<number[]> {
        return this.embeddings.embedQuery(text);
    }

    async generateEmbeddings(texts: string[]): Promise<number[][]> {
        if (texts.length === 0) return [];
        return this.embeddings.embedDocuments(texts);
    }
}
