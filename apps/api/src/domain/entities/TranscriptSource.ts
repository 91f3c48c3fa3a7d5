import type { TranscriptRecord } from '@transcript-rag/types';

/**
 * An entry the source could not turn into a record, e.g. a malformed export line.
 */
export interface UnreadableRecord {
    unreadable: true;
    reference: string;
    message: string;
}

export type TranscriptEntry = TranscriptRecord | UnreadableRecord;

export const isUnreadable = (entry: TranscriptEntry): entry is UnreadableRecord => 'unreadable' in entry;

/**
 * Read side of the transcript persistence owned by the host application.
 */
export interface TranscriptSource {
    records(): AsyncIterable<TranscriptEntry>;
}
