import type { ChatResponse, HistoryTurn, SourceReference } from '@transcript-rag/types';
import { RetrievalResult } from '../../../domain/entities/RetrievalResult';
import { Citation } from '../../services/CitationExtractor';

export class ChatContext {
    constructor(
        public question: string,
        public history: HistoryTurn[] = [],
        public signal?: AbortSignal
    ) {}

    results: RetrievalResult[] = [];

    answer = '';
    citations: Citation<RetrievalResult>[] = [];

    sources(): SourceReference[] {
        return this.results.map((result, i) => result.toSource(i + 1));
    }

    citedSources(): SourceReference[] {
        return this.citations.map(({ citation, result }) => result.toSource(citation));
    }

    toResponse(): ChatResponse {
        return {
            answer: this.answer,
            citations: this.citedSources(),
            sources: this.sources(),
        };
    }
}
