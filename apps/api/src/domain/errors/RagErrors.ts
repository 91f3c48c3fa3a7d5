import { AppError } from './AppError';

/**
 * Invalid or missing deployment configuration. Fatal at startup, never retried.
 */
export class ConfigError extends AppError {
    constructor(message: string) {
        super(message, 500);
    }
}

/**
 * A vector (or an existing index) does not have the configured dimension D.
 * Vectors are never truncated or padded to fit.
 */
export class DimensionMismatchError extends AppError {
    constructor(
        public readonly expected: number,
        public readonly actual: number,
        context: string = 'vector'
    ) {
        super(`Dimension mismatch for ${context}: expected ${expected}, got ${actual}`, 500);
    }
}

export class EmbeddingProviderError extends AppError {
    constructor(
        message: string,
        public readonly batchStart: number,
        public readonly batchEnd: number,
        cause?: unknown
    ) {
        super(`${message} (texts ${batchStart}..${batchEnd - 1})`, 502, { cause });
    }
}

export class SynthesisProviderError extends AppError {
    constructor(message: string, cause?: unknown) {
        super(message, 502, { cause });
    }
}

/**
 * The completion stream failed after fragments were already delivered.
 */
export class SynthesisInterruptedError extends SynthesisProviderError {
    constructor(
        public readonly fragmentsEmitted: number,
        cause?: unknown
    ) {
        super(`Completion stream failed after ${fragmentsEmitted} fragment(s)`, cause);
    }
}

export class StoreWriteError extends AppError {
    constructor(message: string, cause?: unknown) {
        super(message, 503, { cause });
    }
}

export class StoreReadError extends AppError {
    constructor(message: string, cause?: unknown) {
        super(message, 503, { cause });
    }
}

export const describeError = (error: unknown): string =>
    error instanceof Error ? error.message : String(error);

/**
 * Provider and store failures that may succeed on a later attempt.
 */
export const isTransientError = (error: unknown): boolean =>
    error instanceof EmbeddingProviderError
    || error instanceof StoreReadError
    || error instanceof StoreWriteError;
