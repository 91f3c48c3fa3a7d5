import { createReadStream } from 'fs';
import { createInterface } from 'readline';
import { transcriptRecordSchema } from '@transcript-rag/types';
import type { TranscriptRecord } from '@transcript-rag/types';
import { TranscriptEntry, TranscriptSource } from '../../domain/entities/TranscriptSource';
import { AppError } from '../../domain/errors/AppError';
import { describeError } from '../../domain/errors/RagErrors';

/**
 * Reads a JSON-lines export: one `{ documentId, text, metadata?, fields? }` object per line.
 * Blank lines are skipped; a malformed line is yielded as unreadable and reading goes on.
 */
export class JsonlTranscriptSource implements TranscriptSource {
    constructor(private input: string | NodeJS.ReadableStream) {}

    async *records(): AsyncIterable<TranscriptEntry> {
        const stream = typeof this.input === 'string'
            ? createReadStream(this.input, { encoding: 'utf8' })
            : this.input;
        const lines = createInterface({ input: stream, crlfDelay: Infinity });

        let lineNumber = 0;
        try {
            for await (const line of lines) {
                lineNumber++;
                if (line.trim().length === 0) continue;
                yield JsonlTranscriptSource.read(line, lineNumber);
            }
        } finally {
            lines.close();
        }
    }

    static read(line: string, lineNumber: number): TranscriptEntry {
        try {
            return JsonlTranscriptSource.parse(line, lineNumber);
        } catch (error) {
            return { unreadable: true, reference: `line ${lineNumber}`, message: describeError(error) };
        }
    }

    static parse(line: string, lineNumber: number): TranscriptRecord {
        let raw: unknown;
        try {
            raw = JSON.parse(line);
        } catch (error) {
            throw new AppError(`Line ${lineNumber} is not valid JSON: ${describeError(error)}`, 400);
        }

        const parsed = transcriptRecordSchema.safeParse(raw);
        if (!parsed.success) {
            const details = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
            throw new AppError(`Line ${lineNumber} is not a transcript record: ${details}`, 400);
        }
        return parsed.data;
    }
}
