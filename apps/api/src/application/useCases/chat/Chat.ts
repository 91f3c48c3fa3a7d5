import type { ChatResponse, ChatStreamEvent, DisabledResponse, HistoryTurn } from '@transcript-rag/types';
import { RetrievalMode, RetrievalService } from '../../services/RetrievalService';
import { AnswerSynthesizer } from './AnswerSynthesizer';
import { ChatContext } from './ChatContext';
import { withRetry } from '../../utils/retry';
import { parseDateRange } from '../../utils/dateRange';
import { ChatLogRepository } from '../../../domain/entities/ChatLogRepository';
import { describeError, isTransientError } from '../../../domain/errors/RagErrors';
import { AppError } from '../../../domain/errors/AppError';
import logger from '../../../infrastructure/logger';

export const RAG_DISABLED_MESSAGE = 'Transcript question answering is disabled (RAG_ENABLED=false).';

export interface ChatSettings {
    enabled: boolean;
    retrievalAttempts: number;
    retryDelayMs: number;
    /** Restrict retrieval to recording dates named in the question. */
    dateFilter?: boolean;
}

export interface ChatDependencies {
    chatLog?: ChatLogRepository;
    now?: () => Date;
}

export interface AskOptions {
    k?: number;
    history?: HistoryTurn[];
    signal?: AbortSignal;
    hybrid?: boolean;
    alpha?: number;
}

/**
 * Answers one question: retrieve the best chunks, then stream a
 * citation-grounded answer over them. Completed answers are written to the
 * chat log when one is configured.
 */
export class Chat {
    private chatLog?: ChatLogRepository;
    private now: () => Date;

    constructor(
        private retrieval: RetrievalService,
        private synthesizer: AnswerSynthesizer,
        private settings: ChatSettings,
        dependencies: ChatDependencies = {}
    ) {
        this.chatLog = dependencies.chatLog;
        this.now = dependencies.now ?? (() => new Date());
    }

    async execute(question: string, options: AskOptions = {}): Promise<ChatResponse | DisabledResponse> {
        const ctx = new ChatContext(question, options.history, options.signal);

        for await (const event of this.run(ctx, options)) {
            if (event.type === 'disabled') {
                return { status: 'disabled', message: event.message };
            }
        }

        if (ctx.signal?.aborted) {
            throw new AppError('Answer generation was cancelled', 499);
        }

        return ctx.toResponse();
    }

    executeStream(question: string, options: AskOptions = {}): AsyncGenerator<ChatStreamEvent> {
        return this.run(new ChatContext(question, options.history, options.signal), options);
    }

    private async *run(ctx: ChatContext, options: AskOptions): AsyncGenerator<ChatStreamEvent> {
        if (!this.settings.enabled) {
            yield { type: 'disabled', message: RAG_DISABLED_MESSAGE };
            return;
        }

        const mode = this.retrieval.mode(options);
        const dateRange = this.settings.dateFilter ? parseDateRange(ctx.question, this.now()) : undefined;
        if (dateRange) {
            logger.info('Restricting retrieval to recording dates', { ...dateRange });
        }

        // Retrieval may be retried; synthesis is not, since its output is already streamed.
        ctx.results = await withRetry(
            () => this.retrieval.retrieve(ctx.question, options.k, { ...mode, dateRange }),
            {
                maxAttempts: this.settings.retrievalAttempts,
                baseDelayMs: this.settings.retryDelayMs,
                shouldRetry: isTransientError,
                label: 'Retrieval',
            }
        );
        if (ctx.signal?.aborted) return;

        if (ctx.results.length === 0) {
            logger.info('No chunks matched the question; answering from an empty context');
        }

        yield { type: 'sources', sources: ctx.sources() };

        const stream = this.synthesizer.synthesize(ctx.question, ctx.results, ctx.history, { signal: ctx.signal });

        for await (const event of stream) {
            if (event.type === 'token') {
                yield event;
                continue;
            }

            ctx.answer = event.answer;
            ctx.citations = event.citations;
            await this.record(ctx, mode);

            yield { type: 'done', answer: ctx.answer, citations: ctx.citedSources() };
        }
    }

    private async record(ctx: ChatContext, mode: RetrievalMode): Promise<void> {
        if (!this.chatLog || ctx.signal?.aborted) return;

        try {
            await this.chatLog.save({
                question: ctx.question,
                answer: ctx.answer,
                sources: ctx.sources(),
                hybrid: mode.hybrid,
                alpha: mode.hybrid ? mode.alpha : null,
                createdAt: this.now(),
            });
        } catch (error) {
            // Logging failures never fail the answer.
            logger.warn('Failed to save chat log entry', { error: describeError(error) });
        }
    }
}
