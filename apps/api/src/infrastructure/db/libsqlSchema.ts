import type { SourceReference } from '@transcript-rag/types';
import { sqliteTable, text, integer, real, index } from 'drizzle-orm/sqlite-core';
import { CHAT_LOGS_CREATED_INDEX, CHAT_LOGS_TABLE } from './schema';

export const chatLogs = sqliteTable(CHAT_LOGS_TABLE, {
    id: text('id').primaryKey(),
    question: text('question').notNull(),
    answer: text('answer').notNull(),
    sources: text('sources', { mode: 'json' }).$type<SourceReference[]>().notNull(),
    hybrid: integer('hybrid', { mode: 'boolean' }).notNull(),
    alpha: real('alpha'),
    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
}, (table) => ([
    index(CHAT_LOGS_CREATED_INDEX).on(table.createdAt),
]));
