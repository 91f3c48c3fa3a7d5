import { z } from 'zod';

export const historyTurnSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
});

export const askQuestionSchema = z.object({
  question: z.string().trim().min(1, 'Question cannot be empty'),
  k: z.number().int().optional(),
  history: z.array(historyTurnSchema).max(100).optional(),
  hybrid: z.boolean().optional(),
  alpha: z.number().min(0).max(1).optional(),
});

export const indexDocumentSchema = z.object({
  text: z.string(),
  metadata: z.record(z.unknown()).optional(),
  fields: z.record(z.string()).optional(),
});

export const transcriptRecordSchema = z.object({
  documentId: z.union([z.string().min(1), z.number().int()]).transform(String),
  text: z.string(),
  metadata: z.record(z.unknown()).default({}),
  fields: z.record(z.string()).optional(),
});

export const chatLogQuerySchema = z.object({
  keyword: z.string().trim().min(1).optional(),
  hybrid: z.enum(['true', 'false']).transform(value => value === 'true').optional(),
  limit: z.coerce.number().int().min(1).max(200).default(20),
});

export type AskQuestionRequest = z.infer<typeof askQuestionSchema>;
export type IndexDocumentRequest = z.infer<typeof indexDocumentSchema>;
export type TranscriptRecord = z.infer<typeof transcriptRecordSchema>;
export type ChatLogQuery = z.infer<typeof chatLogQuerySchema>;
