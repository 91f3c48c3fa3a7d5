import { describe, it, expect } from 'vitest';
import { Readable } from 'stream';
import { TranscriptEntry } from '../src/domain/entities/TranscriptSource';
import { JsonlTranscriptSource } from '../src/infrastructure/sources/JsonlTranscriptSource';

const readAll = async (source: JsonlTranscriptSource) => {
    const records: TranscriptEntry[] = [];
    for await (const record of source.records()) records.push(record);
    return records;
};

describe('JsonlTranscriptSource', () => {
    it('should read one record per line and skip blank lines', async () => {
        const input = Readable.from([
            '{"documentId": 7, "text": "hello"}\n',
            '\n',
            '{"documentId": "call-b", "text": "bye", "metadata": {"speaker": "Ana"}, "fields": {"summary": "short"}}\n',
        ]);

        const records = await readAll(new JsonlTranscriptSource(input));

        expect(records).toEqual([
            { documentId: '7', text: 'hello', metadata: {} },
            { documentId: 'call-b', text: 'bye', metadata: { speaker: 'Ana' }, fields: { summary: 'short' } },
        ]);
    });

    it('should yield malformed lines as unreadable and read on', async () => {
        const input = Readable.from([
            '{"documentId": "a", "text": "ok"}\n',
            '{"documentId": "b"}\n',
            '{"documentId": "c", "text": "still read"}\n',
        ]);

        const records = await readAll(new JsonlTranscriptSource(input));

        expect(records).toEqual([
            { documentId: 'a', text: 'ok', metadata: {} },
            { unreadable: true, reference: 'line 2', message: 'Line 2 is not a transcript record: text: Required' },
            { documentId: 'c', text: 'still read', metadata: {} },
        ]);
    });

    it('should reject lines that are not JSON', () => {
        expect(() => JsonlTranscriptSource.parse('not json', 3)).toThrow(/^Line 3 is not valid JSON/);
    });
});
