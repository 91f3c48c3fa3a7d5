import { z } from 'zod';
import { ConfigError } from '../../domain/errors/RagErrors';

export type StoreConfig =
    | { backend: 'postgres'; databaseUrl: string }
    | { backend: 'libsql'; url: string; authToken?: string }
    | { backend: 'memory' };

export interface RagConfig {
    enabled: boolean;
    store: StoreConfig;
    ollama: {
        baseUrl: string;
        embeddingModel: string;
        completionModel: string;
    };
    embedding: {
        dimension: number;
        batchSize: number;
        maxRetries: number;
    };
    chunking: {
        chunkSize: number;
        chunkOverlap: number;
    };
    retrieval: {
        defaultK: number;
        maxK: number;
        hybrid: boolean;
        alpha: number;
        candidateMultiplier: number;
        dateFilter: boolean;
    };
    chatLog: {
        enabled: boolean;
    };
    historyTurns: number;
    server: {
        port: number;
        corsOrigin: string;
    };
}

const flag = (fallback: 'true' | 'false') => z
    .enum(['true', 'false', '1', '0'])
    .default(fallback)
    .transform(value => value === 'true' || value === '1');

const integer = (min: number) => z.coerce.number().int().min(min);

const envSchema = z.object({
    RAG_ENABLED: flag('true'),
    VECTOR_BACKEND: z.enum(['postgres', 'libsql', 'memory']).default('postgres'),
    DATABASE_URL: z.string().optional(),
    LIBSQL_URL: z.string().optional(),
    LIBSQL_AUTH_TOKEN: z.string().optional(),
    EMBEDDING_MODEL: z.string().default('nomic-embed-text'),
    EMBEDDING_DIMENSION: integer(1),
    COMPLETION_MODEL: z.string().default('llama3.1'),
    OLLAMA_BASE_URL: z.string().url().default('http://127.0.0.1:11434'),
    RAG_TOP_K_DEFAULT: integer(1).default(5),
    RAG_TOP_K_MAX: integer(1).default(20),
    RAG_CHUNK_SIZE: integer(1).default(600),
    RAG_CHUNK_OVERLAP: integer(0).default(120),
    RAG_EMBEDDING_BATCH_SIZE: integer(1).default(64),
    RAG_EMBEDDING_MAX_RETRIES: integer(1).max(10).default(3),
    RAG_HISTORY_TURNS: integer(0).default(10),
    RAG_HYBRID_ENABLED: flag('false'),
    RAG_HYBRID_ALPHA: z.coerce.number().min(0).max(1).default(0.6),
    RAG_CANDIDATE_MULTIPLIER: integer(1).max(20).default(3),
    RAG_DATE_FILTER: flag('true'),
    RAG_CHAT_LOG_ENABLED: flag('true'),
    PORT: integer(1).max(65535).default(6060),
    CORS_ORIGIN: z.string().default('*'),
}).superRefine((env, ctx) => {
    if (env.VECTOR_BACKEND === 'postgres' && !env.DATABASE_URL) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['DATABASE_URL'], message: 'required when VECTOR_BACKEND=postgres' });
    }
    if (env.VECTOR_BACKEND === 'libsql' && !env.LIBSQL_URL) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['LIBSQL_URL'], message: 'required when VECTOR_BACKEND=libsql' });
    }
    if (env.RAG_CHUNK_OVERLAP >= env.RAG_CHUNK_SIZE) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['RAG_CHUNK_OVERLAP'], message: 'must be smaller than RAG_CHUNK_SIZE' });
    }
    if (env.RAG_TOP_K_DEFAULT > env.RAG_TOP_K_MAX) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['RAG_TOP_K_DEFAULT'], message: 'must not exceed RAG_TOP_K_MAX' });
    }
});

type Env = z.infer<typeof envSchema>;

const storeConfig = (env: Env): StoreConfig => {
    if (env.VECTOR_BACKEND === 'postgres' && env.DATABASE_URL) {
        return { backend: 'postgres', databaseUrl: env.DATABASE_URL };
    }
    if (env.VECTOR_BACKEND === 'libsql' && env.LIBSQL_URL) {
        return { backend: 'libsql', url: env.LIBSQL_URL, authToken: env.LIBSQL_AUTH_TOKEN };
    }
    return { backend: 'memory' };
};

/**
 * Reads the deployment configuration from environment variables.
 * Empty values count as unset.
 */
export function loadRagConfig(source: NodeJS.ProcessEnv = process.env): RagConfig {
    const present = Object.fromEntries(
        Object.entries(source).filter(([, value]) => value !== undefined && value.trim() !== '')
    );

    const parsed = envSchema.safeParse(present);
    if (!parsed.success) {
        const details = parsed.error.issues
            .map(issue => `${issue.path.join('.') || 'env'}: ${issue.message}`)
            .join('; ');
        throw new ConfigError(`Invalid configuration: ${details}`);
    }

    const env = parsed.data;
    return {
        enabled: env.RAG_ENABLED,
        store: storeConfig(env),
        ollama: {
            baseUrl: env.OLLAMA_BASE_URL,
            embeddingModel: env.EMBEDDING_MODEL,
            completionModel: env.COMPLETION_MODEL,
        },
        embedding: {
            dimension: env.EMBEDDING_DIMENSION,
            batchSize: env.RAG_EMBEDDING_BATCH_SIZE,
            maxRetries: env.RAG_EMBEDDING_MAX_RETRIES,
        },
        chunking: {
            chunkSize: env.RAG_CHUNK_SIZE,
            chunkOverlap: env.RAG_CHUNK_OVERLAP,
        },
        retrieval: {
            defaultK: env.RAG_TOP_K_DEFAULT,
            maxK: env.RAG_TOP_K_MAX,
            hybrid: env.RAG_HYBRID_ENABLED,
            alpha: env.RAG_HYBRID_ALPHA,
            candidateMultiplier: env.RAG_CANDIDATE_MULTIPLIER,
            dateFilter: env.RAG_DATE_FILTER,
        },
        chatLog: {
            enabled: env.RAG_CHAT_LOG_ENABLED,
        },
        historyTurns: env.RAG_HISTORY_TURNS,
        server: {
            port: env.PORT,
            corsOrigin: env.CORS_ORIGIN,
        },
    };
}
