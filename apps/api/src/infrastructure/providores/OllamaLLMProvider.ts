import { LLMProvider } from '../../application/providers/LLMProvider';
import { ChatOllama } from '@langchain/ollama';
import { AIMessage, HumanMessage, MessageContent, SystemMessage } from '@langchain/core/messages';
import type { ChatMessage } from '@transcript-rag/types';

export interface OllamaCompletionOptions {
    model: string;
    baseUrl: string;
    temperature?: number;
}

const toLangChain = (messages: ChatMessage[]) => messages.map((m) => {
    if (m.role === 'system') return new SystemMessage(m.content);
    if (m.role === 'assistant') return new AIMessage(m.content);
    return new HumanMessage(m.content);
});

const textOf = (content: MessageContent): string => {
    if (typeof content === 'string') return content;
    return content
        .map(part => ('text' in part && typeof part.text === 'string' ? part.text : ''))
        .join('');
};

export class OllamaLLMProvider implements LLMProvider {
    private model: ChatOllama;

    constructor({ model, baseUrl, temperature = 0 }: OllamaCompletionOptions) {
        this.model = new ChatOllama({ model, baseUrl, temperature });
    }

    async *generateStream(messages: ChatMessage[], signal?: AbortSignal): AsyncIterable<string> {
        const stream = await this.model.stream(toLangChain(messages), { signal });

        for await (const chunk of stream) {
            if (signal?.aborted) return;
            yield textOf(chunk.content);
        }
    }
}
