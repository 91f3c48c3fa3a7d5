import type { ChatMessage } from '@transcript-rag/types';

export interface LLMProvider {
    /**
     * Streams completion fragments. Breaking out of the iteration (or aborting
     * `signal`) must release the underlying connection.
     */
    generateStream(messages: ChatMessage[], signal?: AbortSignal): AsyncIterable<string>;
}
