import type { SourceReference } from '@transcript-rag/types';

export interface NewChatLogEntry {
    question: string;
    answer: string;
    sources: SourceReference[];
    hybrid: boolean;
    /** Vector weight of the hybrid blend; null for vector-only retrieval. */
    alpha: number | null;
    createdAt: Date;
}

export interface ChatLogEntry extends NewChatLogEntry {
    id: string;
}

export interface ChatLogFilter {
    /** Case-insensitive substring of the question or the answer. */
    keyword?: string;
    hybrid?: boolean;
    limit: number;
}

/**
 * Answered questions, newest first.
 */
export abstract class ChatLogRepository {
    abstract ensureSchema(): Promise<void>;
    abstract save(entry: NewChatLogEntry): Promise<ChatLogEntry>;
    abstract list(filter: ChatLogFilter): Promise<ChatLogEntry[]>;
}
