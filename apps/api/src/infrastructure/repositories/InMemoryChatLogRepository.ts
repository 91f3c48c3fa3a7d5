import { randomUUID } from 'crypto';
import { ChatLogEntry, ChatLogFilter, ChatLogRepository, NewChatLogEntry } from '../../domain/entities/ChatLogRepository';

export class InMemoryChatLogRepository extends ChatLogRepository {
    private entries: ChatLogEntry[] = [];

    async ensureSchema(): Promise<void> {}

    async save(entry: NewChatLogEntry): Promise<ChatLogEntry> {
        const saved = { ...entry, id: randomUUID() };
        this.entries.push(saved);
        return saved;
    }

    async list({ keyword, hybrid, limit }: ChatLogFilter): Promise<ChatLogEntry[]> {
        const needle = keyword?.toLowerCase();

        return this.entries
            .filter(entry => hybrid === undefined || entry.hybrid === hybrid)
            .filter(entry => needle === undefined
                || entry.question.toLowerCase().includes(needle)
                || entry.answer.toLowerCase().includes(needle))
            .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
            .slice(0, limit);
    }
}
