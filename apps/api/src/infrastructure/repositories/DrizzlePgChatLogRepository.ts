import { randomUUID } from 'crypto';
import { SQL, and, desc, eq, or, sql } from 'drizzle-orm';
import { ChatLogEntry, ChatLogFilter, ChatLogRepository, NewChatLogEntry } from '../../domain/entities/ChatLogRepository';
import { StoreReadError, StoreWriteError, describeError } from '../../domain/errors/RagErrors';
import { PostgresDatabase } from '../db/postgres';
import { CHAT_LOGS_CREATED_INDEX, CHAT_LOGS_TABLE, chatLogs } from '../db/schema';

// Serialises schema creation across processes sharing the database.
const SCHEMA_LOCK_KEY = 7_412_803_118;

export class DrizzlePgChatLogRepository extends ChatLogRepository {
    constructor(private db: PostgresDatabase) {
        super();
    }

    async ensureSchema(): Promise<void> {
        await this.db.transaction(async (tx) => {
            await tx.execute(sql`SELECT pg_advisory_xact_lock(${SCHEMA_LOCK_KEY})`);
            await tx.execute(sql.raw(`
                CREATE TABLE IF NOT EXISTS ${CHAT_LOGS_TABLE} (
                    id uuid PRIMARY KEY,
                    question text NOT NULL,
                    answer text NOT NULL,
                    sources jsonb NOT NULL DEFAULT '[]'::jsonb,
                    hybrid boolean NOT NULL,
                    alpha double precision,
                    created_at timestamptz NOT NULL DEFAULT now()
                )
            `));
            await tx.execute(sql.raw(
                `CREATE INDEX IF NOT EXISTS ${CHAT_LOGS_CREATED_INDEX} ON ${CHAT_LOGS_TABLE} (created_at)`
            ));
        });
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
            const matches = or(
                sql`strpos(lower(${chatLogs.question}), ${needle}) > 0`,
                sql`strpos(lower(${chatLogs.answer}), ${needle}) > 0`
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
