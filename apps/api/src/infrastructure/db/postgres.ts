import { drizzle, NodePgDatabase } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';
import logger from '../logger';

export type PostgresDatabase = NodePgDatabase;

export interface PostgresConnection {
    pool: Pool;
    db: PostgresDatabase;
}

export function createPostgresConnection(connectionString: string): PostgresConnection {
    const pool = new Pool({
        connectionString,
        min: 2,
        max: 20,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
    });

    pool.on('error', (err) => {
        logger.error('Unexpected database pool error', { error: err.message });
    });

    pool.on('connect', () => {
        logger.debug('New database connection established');
    });

    pool.on('remove', () => {
        logger.debug('Database connection removed from pool');
    });

    return { pool, db: drizzle(pool) };
}
