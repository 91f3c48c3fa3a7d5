import type { HistoryTurn } from '@transcript-rag/types';
import { LLMProvider } from '../../providers/LLMProvider';
import { RetrievalResult } from '../../../domain/entities/RetrievalResult';
import { SynthesisInterruptedError, SynthesisProviderError, describeError } from '../../../domain/errors/RagErrors';
import { Citation, extractCitations } from '../../services/CitationExtractor';
import { PromptBuilder } from './PromptBuilder';
import logger from '../../../infrastructure/logger';

export type SynthesisEvent =
    | { type: 'token'; content: string }
    | { type: 'done'; answer: string; citations: Citation<RetrievalResult>[] };

export interface SynthesisOptions {
    signal?: AbortSignal;
}

export class AnswerSynthesizer {
    constructor(
        private llm: LLMProvider,
        private promptBuilder: PromptBuilder
    ) {}

    /**
     * Streams the answer as `token` events and finishes with a single `done`
     * event carrying the full text and the cited subset of `results`.
     *
     * Cancelling (aborting `signal` or returning early from the iteration)
     * releases the provider stream and discards the partial answer: no `done`
     * event is produced. A provider failure before the first fragment raises
     * SynthesisProviderError; after it, SynthesisInterruptedError.
     */
    async *synthesize(
        question: string,
        results: readonly RetrievalResult[],
        history: readonly HistoryTurn[] = [],
        options: SynthesisOptions = {}
    ): AsyncGenerator<SynthesisEvent> {
        const { signal } = options;
        if (signal?.aborted) return;

        const messages = this.promptBuilder.build(question, results, history);

        let iterator: AsyncIterator<string>;
        try {
            iterator = this.llm.generateStream(messages, signal)[Symbol.asyncIterator]();
        } catch (error) {
            throw new SynthesisProviderError(`Completion provider failed: ${describeError(error)}`, error);
        }

        let answer = '';
        let fragments = 0;
        let exhausted = false;

        try {
            while (true) {
                let step: IteratorResult<string>;
                try {
                    step = await iterator.next();
                } catch (error) {
                    if (signal?.aborted) return;
                    if (fragments === 0) {
                        throw new SynthesisProviderError(`Completion provider failed: ${describeError(error)}`, error);
                    }
                    throw new SynthesisInterruptedError(fragments, error);
                }

                if (step.done) {
                    exhausted = true;
                    break;
                }
                if (signal?.aborted) return;
                if (!step.value) continue;

                answer += step.value;
                fragments++;
                yield { type: 'token', content: step.value };
            }
        } finally {
            if (!exhausted) {
                await this.release(iterator);
            }
        }

        if (signal?.aborted) return;

        yield {
            type: 'done',
            answer,
            citations: extractCitations(answer, results),
        };
    }

    private async release(iterator: AsyncIterator<string>): Promise<void> {
        try {
            await iterator.return?.();
        } catch (error) {
            logger.warn('Failed to release completion stream', { error: describeError(error) });
        }
    }
}
