import { asc, cosineDistance, count, desc, eq, sql } from 'drizzle-orm';
import { Chunk } from '../../domain/entities/Chunk';
import { ChunkMatch, TextMatch, VectorStore, rankTextMatches, searchTerms } from '../../domain/entities/VectorStore';
import { DimensionMismatchError, StoreReadError, StoreWriteError, describeError } from '../../domain/errors/RagErrors';
import { PostgresDatabase } from '../db/postgres';
import {
    CHUNKS_TABLE,
    ChunksTable,
    DOCUMENT_ORDINAL_INDEX,
    EMBEDDING_INDEX,
    FULL_TEXT_INDEX,
    createChunksTable,
} from '../db/schema';
import logger from '../logger';

// Serialises index creation across processes sharing the database.
const INDEX_LOCK_KEY = 7_412_803_117;

export class PgVectorStore extends VectorStore {
    readonly backend = 'postgres' as const;
    private table?: ChunksTable;

    constructor(
        private db: PostgresDatabase,
        private onClose: () => Promise<void> = async () => undefined
    ) {
        super();
    }

    protected async createIndex(dimension: number): Promise<void> {
        await this.db.transaction(async (tx) => {
            await tx.execute(sql`SELECT pg_advisory_xact_lock(${INDEX_LOCK_KEY})`);
            await tx.execute(sql`CREATE EXTENSION IF NOT EXISTS vector`);

            const existing = await tx.execute<{ dimension: number }>(sql`
                SELECT a.atttypmod AS dimension
                FROM pg_attribute a
                WHERE a.attrelid = to_regclass(${CHUNKS_TABLE})
                  AND a.attname = 'embedding'
                  AND NOT a.attisdropped
            `);

            const stored = existing.rows[0]?.dimension;
            if (stored !== undefined && Number(stored) !== dimension) {
                throw new DimensionMismatchError(Number(stored), dimension, `existing ${CHUNKS_TABLE}.embedding column`);
            }

            // `dimension` is a validated integer, safe to inline into DDL.
            await tx.execute(sql.raw(`
                CREATE TABLE IF NOT EXISTS ${CHUNKS_TABLE} (
                    id uuid PRIMARY KEY,
                    document_id text NOT NULL,
                    ordinal integer NOT NULL,
                    content text NOT NULL,
                    metadata jsonb NOT NULL DEFAULT '{}'::jsonb,
                    embedding vector(${dimension}) NOT NULL,
                    created_at timestamptz NOT NULL DEFAULT now()
                )
            `));
            await tx.execute(sql.raw(
                `CREATE UNIQUE INDEX IF NOT EXISTS ${DOCUMENT_ORDINAL_INDEX} ON ${CHUNKS_TABLE} (document_id, ordinal)`
            ));
            await tx.execute(sql.raw(
                `CREATE INDEX IF NOT EXISTS ${EMBEDDING_INDEX} ON ${CHUNKS_TABLE} USING hnsw (embedding vector_cosine_ops)`
            ));
            await tx.execute(sql.raw(
                `CREATE INDEX IF NOT EXISTS ${FULL_TEXT_INDEX} ON ${CHUNKS_TABLE} USING gin (to_tsvector('simple', content))`
            ));
        });

        this.table = createChunksTable(dimension);
        logger.info('Vector index ready', { backend: this.backend, dimension });
    }

    async upsertChunks(documentId: string, chunks: Chunk[]): Promise<void> {
        this.checkChunks(documentId, chunks);
        const table = this.chunksTable();

        try {
            await this.db.transaction(async (tx) => {
                await tx.delete(table).where(eq(table.documentId, documentId));
                if (chunks.length === 0) return;

                await tx.insert(table).values(chunks.map(chunk => ({
                    id: chunk.id,
                    documentId: chunk.documentId,
                    ordinal: chunk.ordinal,
                    content: chunk.content,
                    metadata: chunk.metadata,
                    embedding: chunk.embedding,
                    createdAt: chunk.createdAt,
                })));
            });
        } catch (error) {
            throw new StoreWriteError(`Failed to write chunks for document ${documentId}: ${describeError(error)}`, error);
        }
    }

    async topK(queryVector: number[], k: number): Promise<ChunkMatch[]> {
        this.checkVector(queryVector, 'query');
        if (k < 1) return [];

        const table = this.chunksTable();
        const distance = sql<number>`${cosineDistance(table.embedding, queryVector)}`;

        try {
            const rows = await this.db
                .select({
                    chunkId: table.id,
                    documentId: table.documentId,
                    ordinal: table.ordinal,
                    content: table.content,
                    metadata: table.metadata,
                    distance,
                })
                .from(table)
                .orderBy(asc(distance), asc(table.documentId), asc(table.ordinal))
                .limit(k);

            return rows.map(row => ({ ...row, distance: Number(row.distance) }));
        } catch (error) {
            throw new StoreReadError(`Nearest-neighbour query failed: ${describeError(error)}`, error);
        }
    }

    /**
     * `simple` configuration: no stemming or stop words, so transcripts in
     * any language match on their literal words. Terms are OR-ed.
     */
    async textSearch(query: string, queryVector: number[], limit: number): Promise<TextMatch[]> {
        this.checkVector(queryVector, 'query');
        const terms = searchTerms(query);
        if (terms.length === 0 || limit < 1) return [];

        const table = this.chunksTable();
        const document = sql`to_tsvector('simple', ${table.content})`;
        const tsQuery = sql`to_tsquery('simple', ${terms.join(' | ')})`;
        const rank = sql<number>`ts_rank_cd(${document}, ${tsQuery})`;
        const distance = sql<number>`${cosineDistance(table.embedding, queryVector)}`;

        try {
            const rows = await this.db
                .select({
                    chunkId: table.id,
                    documentId: table.documentId,
                    ordinal: table.ordinal,
                    content: table.content,
                    metadata: table.metadata,
                    distance,
                    rank,
                })
                .from(table)
                .where(sql`${document} @@ ${tsQuery}`)
                .orderBy(desc(rank), asc(table.documentId), asc(table.ordinal))
                .limit(limit);

            return rankTextMatches(rows.map(row => ({ ...row, distance: Number(row.distance), rank: Number(row.rank) })));
        } catch (error) {
            throw new StoreReadError(`Keyword query failed: ${describeError(error)}`, error);
        }
    }

    async deleteDocument(documentId: string): Promise<void> {
        const table = this.chunksTable();
        try {
            await this.db.delete(table).where(eq(table.documentId, documentId));
        } catch (error) {
            throw new StoreWriteError(`Failed to delete chunks for document ${documentId}: ${describeError(error)}`, error);
        }
    }

    async countChunks(documentId?: string): Promise<number> {
        const table = this.chunksTable();
        try {
            const rows = await this.db
                .select({ value: count() })
                .from(table)
                .where(documentId === undefined ? undefined : eq(table.documentId, documentId));
            return rows[0]?.value ?? 0;
        } catch (error) {
            throw new StoreReadError(`Failed to count chunks: ${describeError(error)}`, error);
        }
    }

    async close(): Promise<void> {
        await this.onClose();
    }

    private chunksTable(): ChunksTable {
        if (!this.table) {
            this.table = createChunksTable(this.requireDimension());
        }
        return this.table;
    }
}
