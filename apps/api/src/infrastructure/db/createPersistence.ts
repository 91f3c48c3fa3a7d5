import { ChatLogRepository } from '../../domain/entities/ChatLogRepository';
import { VectorStore } from '../../domain/entities/VectorStore';
import { StoreConfig } from '../config/ragConfig';
import { DrizzlePgChatLogRepository } from '../repositories/DrizzlePgChatLogRepository';
import { InMemoryChatLogRepository } from '../repositories/InMemoryChatLogRepository';
import { LibsqlChatLogRepository } from '../repositories/LibsqlChatLogRepository';
import { InMemoryVectorStore } from '../vectorStores/InMemoryVectorStore';
import { LibsqlVectorStore } from '../vectorStores/LibsqlVectorStore';
import { PgVectorStore } from '../vectorStores/PgVectorStore';
import { createLibsqlConnection } from './libsql';
import { createPostgresConnection } from './postgres';

export interface Persistence {
    /** Owns the connection; closing it closes the chat log too. */
    store: VectorStore;
    chatLog: ChatLogRepository;
}

export function createPersistence(config: StoreConfig): Persistence {
    switch (config.backend) {
        case 'postgres': {
            const { pool, db } = createPostgresConnection(config.databaseUrl);
            return {
                store: new PgVectorStore(db, () => pool.end()),
                chatLog: new DrizzlePgChatLogRepository(db),
            };
        }
        case 'libsql': {
            const { client, db } = createLibsqlConnection(config.url, config.authToken);
            return {
                store: new LibsqlVectorStore(db, async () => client.close()),
                chatLog: new LibsqlChatLogRepository(db),
            };
        }
        case 'memory':
            return { store: new InMemoryVectorStore(), chatLog: new InMemoryChatLogRepository() };
    }
}
