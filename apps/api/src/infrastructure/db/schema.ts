import type { DocumentMetadata, SourceReference } from '@transcript-rag/types';
import {
    pgTable,
    uuid,
    text,
    timestamp,
    vector,
    integer,
    jsonb,
    boolean,
    doublePrecision,
    index,
    uniqueIndex,
} from 'drizzle-orm/pg-core';

export const CHUNKS_TABLE = 'rag_chunks';
export const EMBEDDING_INDEX = 'rag_chunks_embedding_idx';
export const DOCUMENT_ORDINAL_INDEX = 'rag_chunks_document_ordinal_idx';
export const FULL_TEXT_INDEX = 'rag_chunks_content_fts_idx';
export const FULL_TEXT_TABLE = 'rag_chunks_fts';
export const CHAT_LOGS_TABLE = 'rag_chat_logs';
export const CHAT_LOGS_CREATED_INDEX = 'rag_chat_logs_created_at_idx';

/**
 * The vector column width is a deployment setting, so the table is built per dimension.
 */
export const createChunksTable = (dimensions: number) => pgTable(CHUNKS_TABLE, {
    id: uuid('id').primaryKey(),
    documentId: text('document_id').notNull(),
    ordinal: integer('ordinal').notNull(),
    content: text('content').notNull(),
    metadata: jsonb('metadata').$type<DocumentMetadata>().notNull(),
    embedding: vector('embedding', { dimensions }).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
}, (table) => ([
    uniqueIndex(DOCUMENT_ORDINAL_INDEX).on(table.documentId, table.ordinal),
    index(EMBEDDING_INDEX).using('hnsw', table.embedding.op('vector_cosine_ops')),
]));

export type ChunksTable = ReturnType<typeof createChunksTable>;

export const chatLogs = pgTable(CHAT_LOGS_TABLE, {
    id: uuid('id').primaryKey(),
    question: text('question').notNull(),
    answer: text('answer').notNull(),
    sources: jsonb('sources').$type<SourceReference[]>().notNull(),
    hybrid: boolean('hybrid').notNull(),
    alpha: doublePrecision('alpha'),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
}, (table) => ([
    index(CHAT_LOGS_CREATED_INDEX).on(table.createdAt),
]));
