import { ConfigError } from '../../domain/errors/RagErrors';

export interface ChunkingConfig {
    chunkSize: number;      // L, characters per segment
    chunkOverlap: number;   // O, characters shared with the previous segment
}

export interface TextSegment {
    ordinal: number;
    content: string;
    start: number;
    end: number;
}

/**
 * Splits transcript text into overlapping fixed-size windows.
 *
 * Positions are counted in code points so that surrogate pairs are never
 * split. Segment i + 1 starts exactly `chunkOverlap` characters before the end
 * of segment i; the last segment may be shorter than `chunkSize`.
 */
export class ChunkingService {
    constructor(private config: ChunkingConfig) {
        ChunkingService.validate(config);
    }

    static validate({ chunkSize, chunkOverlap }: ChunkingConfig): void {
        if (!Number.isInteger(chunkSize) || chunkSize < 1) {
            throw new ConfigError(`Chunk size must be a positive integer, got ${chunkSize}`);
        }
        if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0) {
            throw new ConfigError(`Chunk overlap must be a non-negative integer, got ${chunkOverlap}`);
        }
        if (chunkOverlap >= chunkSize) {
            throw new ConfigError(
                `Chunk overlap (${chunkOverlap}) must be smaller than chunk size (${chunkSize})`
            );
        }
    }

    /**
     * Returns a lazy sequence of segments. Each iteration starts over from the
     * beginning, so the sequence can be consumed any number of times.
     */
    chunk(text: string, fields?: Record<string, string>): Iterable<TextSegment> {
        const source = ChunkingService.composeSource(text, fields);
        const { chunkSize, chunkOverlap } = this.config;

        return {
            *[Symbol.iterator]() {
                const chars = Array.from(source);
                const total = chars.length;
                let start = 0;
                let ordinal = 0;

                while (start < total) {
                    const end = Math.min(start + chunkSize, total);
                    const content = chars.slice(start, end).join('');

                    if (content.trim().length > 0) {
                        yield { ordinal: ordinal++, content, start, end };
                    }
                    if (end === total) return;

                    start = end - chunkOverlap;
                }
            },
        };
    }

    /**
     * Appends the structured summary fields as `key: value` lines, sorted by key.
     */
    static composeSource(text: string, fields?: Record<string, string>): string {
        const fieldLines = Object.keys(fields ?? {})
            .sort()
            .map(key => [key, fields?.[key]?.trim() ?? ''] as const)
            .filter(([, value]) => value.length > 0)
            .map(([key, value]) => `${key}: ${value}`);

        if (fieldLines.length === 0) return text;
        if (text.trim().length === 0) return fieldLines.join('\n');

        return `${text}\n\n${fieldLines.join('\n')}`;
    }
}
