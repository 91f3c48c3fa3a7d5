import logger from '../../infrastructure/logger';
import { describeError } from '../../domain/errors/RagErrors';

export interface RetryOptions {
    maxAttempts: number;
    baseDelayMs?: number;
    maxDelayMs?: number;
    shouldRetry?: (error: unknown) => boolean;
    label?: string;
    sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Exponential backoff with jitter, capped at `maxDelayMs`.
 */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
    const baseBackoffMs = Math.pow(2, attempt - 1) * baseDelayMs;
    const jitterMs = Math.random() * baseDelayMs;
    return Math.min(maxDelayMs, baseBackoffMs + jitterMs);
}

export async function withRetry<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
    const {
        maxAttempts,
        baseDelayMs = 1000,
        maxDelayMs = 10000,
        shouldRetry = () => true,
        label = 'operation',
        sleep = defaultSleep,
    } = options;

    for (let attempt = 1; ; attempt++) {
        try {
            return await operation(attempt);
        } catch (error) {
            if (attempt >= maxAttempts || !shouldRetry(error)) {
                throw error;
            }

            const backoffMs = backoffDelay(attempt, baseDelayMs, maxDelayMs);
            logger.warn(`${label} failed, retrying with exponential backoff`, {
                attempt,
                maxAttempts,
                backoffMs: Math.round(backoffMs),
                error: describeError(error),
            });

            await sleep(backoffMs);
        }
    }
}
