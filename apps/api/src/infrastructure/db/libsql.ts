import { createClient, Client } from '@libsql/client';
import { drizzle, LibSQLDatabase } from 'drizzle-orm/libsql';
import { withRetry } from '../../application/utils/retry';
import { describeError } from '../../domain/errors/RagErrors';

export type LibsqlDatabase = LibSQLDatabase;

export interface LibsqlConnection {
    client: Client;
    db: LibsqlDatabase;
}

export function createLibsqlConnection(url: string, authToken?: string): LibsqlConnection {
    const client = createClient({ url, authToken });
    return { client, db: drizzle(client) };
}

const BUSY_PATTERN = /SQLITE_BUSY|SQLITE_LOCKED|database is locked|database table is locked/i;

export const isBusyError = (error: unknown): boolean => BUSY_PATTERN.test(describeError(error));

/**
 * Another connection holding the write lock fails the statement at once
 * instead of waiting; schema changes back off and try again.
 */
export const withBusyRetry = <T>(operation: () => Promise<T>, label: string): Promise<T> =>
    withRetry(operation, {
        maxAttempts: 10,
        baseDelayMs: 50,
        maxDelayMs: 1000,
        shouldRetry: isBusyError,
        label,
    });
