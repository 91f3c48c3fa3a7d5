import { randomUUID } from 'crypto';
import { SQL, and, desc, eq, or, sql } from 'drizzle-orm';
import { ChatLogEntry, ChatLogFilter, ChatLogRepository, NewChatLogEntry } from '../../domain/entities/ChatLogRepository';
import { StoreReadError, StoreWriteError, describeError } from '../../domain/errors/RagErrors';
import { LibsqlDatabase, withBusyRetry } from '../db/libsql';
import { chatLogs } from '../db/libsqlSchema';
import { CHAT_LOGS_CREATED_INDEX, CHAT_LOGS_TABLE } from '../db/schema';

export class LibsqlChatLogRepository extends ChatLogRepository {
    constructor(private db: LibsqlDatabase) {
        super();
    }

    async ensureSchema(): Promise<void> {
        await withBusyRetry(async () => {
            await this.db.run(sql.raw(`
                CREATE TABLE IF NOT EXISTS ${CHAT_LOGS_TABLE} (
                    id TEXT PRIMARY KEY,
                    question TEXT NOT NULL,
                    answer TEXT NOT NULL,
                    sources TEXT NOT NULL DEFAULT '[]',
                    hybrid INTEGER NOT NULL,
                    alpha REAL,
                    created_at INTEGER NOT NULL
                )
            `));
            await this.db.run(sql.raw(
                `CREATE INDEX IF NOT EXISTS ${CHAT_LOGS_CREATED_INDEX} ON ${CHAT_LOGS_TABLE} (created_at)`
            ));
        }, 'Chat log schema creation');
    }

    async save(entry: NewChatLogEntry): Promise<ChatLogEntry> {
        const saved = { ...entry, id: randomUUID() };
        try {
            await this.db.insert(chatLogs).values(saved);
        } catch (error) {
            throw new StoreWriteError(`Failed to save chat log entry: ${describeError(error)}`, error);
        }
        return saved;
    }

    async list({ keyword, hybrid, limit }: ChatLogFilter): Promise<ChatLogEntry[]> {
        const conditions: SQL[] = [];
        if (keyword !== undefined) {
            const needle = keyword.toLowerCase();
            // lower() folds ASCII only.
            const matches = or(
                sql`instr(lower(${chatLogs.question}), ${needle}) > 0`,
                sql`instr(lower(${chatLogs.answer}), ${needle}) > 0`
            );
            if (matches) conditions.push(matches);
        }
        if (hybrid !== undefined) {
            conditions.push(eq(chatLogs.hybrid, hybrid));
        }

        try {
            return await this.db
                .select()
                .from(chatLogs)
                .where(and(...conditions))
                .orderBy(desc(chatLogs.createdAt))
                .limit(limit);
        } catch (error) {
            throw new StoreReadError(`Failed to list chat log entries: ${describeError(error)}`, error);
        }
    }
}
