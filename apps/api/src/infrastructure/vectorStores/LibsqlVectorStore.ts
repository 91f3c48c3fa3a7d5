import { sql } from 'drizzle-orm';
import { z } from 'zod';
import { Chunk } from '../../domain/entities/Chunk';
import { ChunkMatch, TextMatch, VectorStore, rankTextMatches, searchTerms } from '../../domain/entities/VectorStore';
import { DimensionMismatchError, StoreReadError, StoreWriteError, describeError } from '../../domain/errors/RagErrors';
import { LibsqlDatabase, withBusyRetry } from '../db/libsql';
import { CHUNKS_TABLE, EMBEDDING_INDEX, FULL_TEXT_TABLE } from '../db/schema';
import logger from '../logger';

const matchRowSchema = z.object({
    chunkId: z.string(),
    documentId: z.string(),
    ordinal: z.coerce.number(),
    content: z.string(),
    metadata: z.string().transform(value => JSON.parse(value)).pipe(z.record(z.unknown())),
    distance: z.coerce.number(),
});

const textRowSchema = matchRowSchema.extend({ relevance: z.coerce.number() });

const countRowSchema = z.object({ value: z.coerce.number() });

type SqlReader = Pick<LibsqlDatabase, 'all'>;
type SqlWriter = Pick<LibsqlDatabase, 'all' | 'run'>;

const F32_BLOB_PATTERN = /F32_BLOB\s*\(\s*(\d+)\s*\)/i;

const table = sql.raw(CHUNKS_TABLE);
const fullTextTable = sql.raw(FULL_TEXT_TABLE);

// vector_top_k is approximate; the exact distances re-rank a wider candidate pool.
const CANDIDATE_FACTOR = 2;

/**
 * libSQL native vectors: `F32_BLOB(D)` column, DiskANN index through
 * `libsql_vector_idx`, candidates from `vector_top_k`. Keyword search goes
 * through an FTS5 table kept in sync by triggers, or substring matching
 * where the build has no FTS5.
 */
export class LibsqlVectorStore extends VectorStore {
    readonly backend = 'libsql' as const;
    private fullText = false;

    constructor(
        private db: LibsqlDatabase,
        private onClose: () => Promise<void> = async () => undefined
    ) {
        super();
    }

    protected async createIndex(dimension: number): Promise<void> {
        this.fullText = await withBusyRetry(() => this.createSchema(dimension), 'Vector index creation');
        logger.info('Vector index ready', { backend: this.backend, dimension, fullText: this.fullText });
    }

    private async createSchema(dimension: number): Promise<boolean> {
        try {
            return await this.db.transaction(async (tx) => {
                await this.verifyDimension(tx, dimension);

                // `dimension` is a validated integer, safe to inline into DDL.
                await tx.run(sql.raw(`
                    CREATE TABLE IF NOT EXISTS ${CHUNKS_TABLE} (
                        id TEXT PRIMARY KEY,
                        document_id TEXT NOT NULL,
                        ordinal INTEGER NOT NULL,
                        content TEXT NOT NULL,
                        metadata TEXT NOT NULL DEFAULT '{}',
                        embedding F32_BLOB(${dimension}) NOT NULL,
                        created_at TEXT NOT NULL,
                        UNIQUE (document_id, ordinal)
                    )
                `));
                await tx.run(sql.raw(
                    `CREATE INDEX IF NOT EXISTS ${EMBEDDING_INDEX} ON ${CHUNKS_TABLE} (libsql_vector_idx(embedding, 'metric=cosine'))`
                ));
                return this.createFullTextIndex(tx);
            }, { behavior: 'immediate' });
        } catch (error) {
            if (error instanceof DimensionMismatchError || !/already exists/i.test(describeError(error))) {
                throw error;
            }
            // Another process won the race; accept its index if the width matches.
            logger.debug('Vector index created concurrently, verifying', { backend: this.backend });
            await this.verifyDimension(this.db, dimension);
            return this.hasTable(this.db, FULL_TEXT_TABLE);
        }
    }

    private async createFullTextIndex(tx: SqlWriter): Promise<boolean> {
        if (await this.hasTable(tx, FULL_TEXT_TABLE)) return true;

        try {
            await tx.run(sql.raw(
                `CREATE VIRTUAL TABLE ${FULL_TEXT_TABLE} USING fts5(content, content='${CHUNKS_TABLE}', content_rowid='rowid')`
            ));
        } catch (error) {
            logger.warn('FTS5 unavailable, keyword search falls back to substring matching', {
                backend: this.backend,
                error: describeError(error),
            });
            return false;
        }

        await tx.run(sql.raw(`
            CREATE TRIGGER IF NOT EXISTS ${FULL_TEXT_TABLE}_insert AFTER INSERT ON ${CHUNKS_TABLE} BEGIN
                INSERT INTO ${FULL_TEXT_TABLE} (rowid, content) VALUES (new.rowid, new.content);
            END
        `));
        await tx.run(sql.raw(`
            CREATE TRIGGER IF NOT EXISTS ${FULL_TEXT_TABLE}_delete AFTER DELETE ON ${CHUNKS_TABLE} BEGIN
                INSERT INTO ${FULL_TEXT_TABLE} (${FULL_TEXT_TABLE}, rowid, content) VALUES ('delete', old.rowid, old.content);
            END
        `));
        await tx.run(sql.raw(`
            CREATE TRIGGER IF NOT EXISTS ${FULL_TEXT_TABLE}_update AFTER UPDATE OF content ON ${CHUNKS_TABLE} BEGIN
                INSERT INTO ${FULL_TEXT_TABLE} (${FULL_TEXT_TABLE}, rowid, content) VALUES ('delete', old.rowid, old.content);
                INSERT INTO ${FULL_TEXT_TABLE} (rowid, content) VALUES (new.rowid, new.content);
            END
        `));
        // Chunks written before the FTS table existed.
        await tx.run(sql.raw(`INSERT INTO ${FULL_TEXT_TABLE} (${FULL_TEXT_TABLE}) VALUES ('rebuild')`));
        return true;
    }

    async upsertChunks(documentId: string, chunks: Chunk[]): Promise<void> {
        this.checkChunks(documentId, chunks);

        try {
            await this.db.transaction(async (tx) => {
                await tx.run(sql`DELETE FROM ${table} WHERE document_id = ${documentId}`);

                for (const chunk of chunks) {
                    await tx.run(sql`
                        INSERT INTO ${table} (id, document_id, ordinal, content, metadata, embedding, created_at)
                        VALUES (
                            ${chunk.id},
                            ${chunk.documentId},
                            ${chunk.ordinal},
                            ${chunk.content},
                            ${JSON.stringify(chunk.metadata)},
                            vector32(${JSON.stringify(chunk.embedding)}),
                            ${chunk.createdAt.toISOString()}
                        )
                    `);
                }
            });
        } catch (error) {
            throw new StoreWriteError(`Failed to write chunks for document ${documentId}: ${describeError(error)}`, error);
        }
    }

    async topK(queryVector: number[], k: number): Promise<ChunkMatch[]> {
        this.checkVector(queryVector, 'query');
        const limit = Math.trunc(k);
        if (limit < 1) return [];

        const vector = JSON.stringify(queryVector);

        // libSQL binds JS numbers as REAL; vector_top_k and LIMIT take integers only.
        try {
            const rows = await this.db.all(sql`
                SELECT
                    c.id AS chunkId,
                    c.document_id AS documentId,
                    c.ordinal AS ordinal,
                    c.content AS content,
                    c.metadata AS metadata,
                    vector_distance_cos(c.embedding, vector32(${vector})) AS distance
                FROM vector_top_k(${EMBEDDING_INDEX}, vector32(${vector}), CAST(${limit * CANDIDATE_FACTOR} AS INTEGER)) AS v
                JOIN ${table} AS c ON c.rowid = v.id
                ORDER BY distance ASC, c.document_id ASC, c.ordinal ASC
                LIMIT CAST(${limit} AS INTEGER)
            `);

            return rows.map(row => matchRowSchema.parse(row));
        } catch (error) {
            throw new StoreReadError(`Nearest-neighbour query failed: ${describeError(error)}`, error);
        }
    }

    async textSearch(query: string, queryVector: number[], limit: number): Promise<TextMatch[]> {
        this.checkVector(queryVector, 'query');
        const terms = searchTerms(query);
        const size = Math.trunc(limit);
        if (terms.length === 0 || size < 1) return [];

        const vector = JSON.stringify(queryVector);
        const columns = sql`
            c.id AS chunkId,
            c.document_id AS documentId,
            c.ordinal AS ordinal,
            c.content AS content,
            c.metadata AS metadata,
            vector_distance_cos(c.embedding, vector32(${vector})) AS distance
        `;

        try {
            const rows = this.fullText
                ? await this.db.all(sql`
                    SELECT ${columns}, -bm25(${fullTextTable}) AS relevance
                    FROM ${fullTextTable}
                    JOIN ${table} AS c ON c.rowid = ${fullTextTable}.rowid
                    WHERE ${fullTextTable} MATCH ${terms.map(term => `"${term}"`).join(' OR ')}
                    ORDER BY relevance DESC, c.document_id ASC, c.ordinal ASC
                    LIMIT CAST(${size} AS INTEGER)
                `)
                : await this.db.all(sql`
                    SELECT * FROM (
                        SELECT ${columns}, ${sql.join(terms.map(term => sql`(instr(lower(c.content), ${term}) > 0)`), sql` + `)} AS relevance
                        FROM ${table} AS c
                    )
                    WHERE relevance > 0
                    ORDER BY relevance DESC, documentId ASC, ordinal ASC
                    LIMIT CAST(${size} AS INTEGER)
                `);

            return rankTextMatches(rows.map(row => {
                const { relevance, ...match } = textRowSchema.parse(row);
                return { ...match, rank: relevance };
            }));
        } catch (error) {
            throw new StoreReadError(`Keyword query failed: ${describeError(error)}`, error);
        }
    }

    async deleteDocument(documentId: string): Promise<void> {
        this.requireDimension();
        try {
            await this.db.run(sql`DELETE FROM ${table} WHERE document_id = ${documentId}`);
        } catch (error) {
            throw new StoreWriteError(`Failed to delete chunks for document ${documentId}: ${describeError(error)}`, error);
        }
    }

    async countChunks(documentId?: string): Promise<number> {
        this.requireDimension();
        const filter = documentId === undefined ? sql.empty() : sql` WHERE document_id = ${documentId}`;

        try {
            const rows = await this.db.all(sql`SELECT count(*) AS value FROM ${table}${filter}`);
            const first = rows[0];
            return first === undefined ? 0 : countRowSchema.parse(first).value;
        } catch (error) {
            throw new StoreReadError(`Failed to count chunks: ${describeError(error)}`, error);
        }
    }

    async close(): Promise<void> {
        await this.onClose();
    }

    private async hasTable(reader: SqlReader, name: string): Promise<boolean> {
        const rows = await reader.all(sql`SELECT name FROM sqlite_master WHERE type = 'table' AND name = ${name}`);
        return rows.length > 0;
    }

    private async verifyDimension(reader: SqlReader, dimension: number): Promise<void> {
        const rows = await reader.all(
            sql`SELECT sql AS ddl FROM sqlite_master WHERE type = 'table' AND name = ${CHUNKS_TABLE}`
        );
        const ddl = z.object({ ddl: z.string() }).safeParse(rows[0]);
        if (!ddl.success) return;

        const match = F32_BLOB_PATTERN.exec(ddl.data.ddl);
        const stored = match?.[1] === undefined ? undefined : Number(match[1]);
        if (stored !== undefined && stored !== dimension) {
            throw new DimensionMismatchError(stored, dimension, `existing ${CHUNKS_TABLE}.embedding column`);
        }
    }
}
