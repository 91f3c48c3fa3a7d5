import type { ChatMessage, HistoryTurn } from '@transcript-rag/types';
import { RetrievalResult } from '../../../domain/entities/RetrievalResult';
import { sanitizeInput } from '../../utils/sanitizeInput';

export const SYSTEM_PREAMBLE = `You are an assistant that answers questions about recorded conversations using ONLY the numbered transcript excerpts supplied in the user message.

RULES:
- Every factual statement must come from the numbered context. Cite the excerpt that supports it as [#n], using the numbers exactly as given.
- Do not speculate beyond the context. When the context does not contain the information needed, say clearly that it is missing.
- Keep the conversation coherent with the earlier turns, but never treat earlier answers as evidence.
- Write dates as YYYY-MM-DD when they are known.

OUTPUT FORMAT:
1) Answer: the key points as a bulleted list (at most 5 items).
2) Evidence: the [#n] excerpts you relied on, each with a short quote or summary.
3) Gaps in knowledge: missing information, assumptions or uncertainties.`;

export const EMPTY_CONTEXT = '(no matching transcript excerpts were found)';

export class PromptBuilder {
    constructor(private historyTurns: number = 10) {}

    build(question: string, results: readonly RetrievalResult[], history: readonly HistoryTurn[] = []): ChatMessage[] {
        const messages: ChatMessage[] = [{ role: 'system', content: SYSTEM_PREAMBLE }];

        for (const turn of this.recentHistory(history)) {
            messages.push(turn);
        }

        messages.push({
            role: 'user',
            content: `CONTEXT (numbered):\n${this.buildContext(results)}\n\nQUESTION:\n${sanitizeInput(question)}`,
        });

        return messages;
    }

    /**
     * One entry per result, numbered from 1 in result order. These numbers are
     * the ones the model must cite.
     */
    buildContext(results: readonly RetrievalResult[]): string {
        if (results.length === 0) return EMPTY_CONTEXT;

        return results
            .map((result, i) => `${this.header(result, i + 1)}\n${result.content}`)
            .join('\n\n');
    }

    private header(result: RetrievalResult, citation: number): string {
        const parts = [`document: ${result.documentId}`];

        for (const key of Object.keys(result.metadata).sort()) {
            const value = result.metadata[key];
            if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
                if (String(value).length > 0) parts.push(`${key}: ${value}`);
            }
        }

        return `[#${citation} score: ${result.score.toFixed(3)}] ${parts.join(' / ')}`;
    }

    private recentHistory(history: readonly HistoryTurn[]): ChatMessage[] {
        if (this.historyTurns <= 0) return [];

        return history
            .slice(-this.historyTurns)
            .map(turn => ({ role: turn.role, content: sanitizeInput(turn.content) }))
            .filter(turn => turn.content.length > 0);
    }
}
