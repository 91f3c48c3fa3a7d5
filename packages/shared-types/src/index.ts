export * from './schemas';

/**
 * Chat message in the shape the completion providers consume
 */
export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * Earlier conversation turn sent by the client
 */
export interface HistoryTurn {
  role: 'user' | 'assistant';
  content: string;
}

/**
 * Free-form document metadata (tags, path, recording date...)
 */
export type DocumentMetadata = Record<string, unknown>;

/**
 * Retrieved source, as shown next to the answer
 */
export interface SourceReference {
  citation: number;
  chunkId: string;
  documentId: string;
  ordinal: number;
  content: string;
  distance: number;
  score: number;
  metadata: DocumentMetadata;
}

/**
 * Complete (non-streamed) answer
 */
export interface ChatResponse {
  answer: string;
  citations: SourceReference[];
  sources: SourceReference[];
}

export interface DisabledResponse {
  status: 'disabled';
  message: string;
}

/**
 * Answer stream event
 */
export type ChatStreamEvent =
  | { type: 'sources'; sources: SourceReference[] }
  | { type: 'token'; content: string }
  | { type: 'done'; answer: string; citations: SourceReference[] }
  | { type: 'disabled'; message: string };

/**
 * Answered question as stored in the chat log
 */
export interface ChatLogRecord {
  id: string;
  question: string;
  answer: string;
  sources: SourceReference[];
  hybrid: boolean;
  alpha: number | null;
  createdAt: string;
}

export type StreamErrorCode = 'RETRIEVAL_ERROR' | 'SYNTHESIS_ERROR';

/**
 * Result of indexing one document
 */
export type IngestionOutcome =
  | { status: 'indexed'; documentId: string; chunkCount: number }
  | { status: 'cleared'; documentId: string }
  | { status: 'disabled'; documentId: string };

export interface BackfillReport {
  processed: number;
  indexed: number;
  cleared: number;
  disabled: number;
  failed: { documentId: string; message: string }[];
  /** Chunks stored across all documents once the run ends; null while the index is not initialised. */
  chunkCount: number | null;
}
