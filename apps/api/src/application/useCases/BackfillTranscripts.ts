import type { BackfillReport } from '@transcript-rag/types';
import { TranscriptSource, isUnreadable } from '../../domain/entities/TranscriptSource';
import { VectorStore } from '../../domain/entities/VectorStore';
import { ConfigError, DimensionMismatchError, describeError } from '../../domain/errors/RagErrors';
import { IndexTranscript } from './IndexTranscript';
import logger from '../../infrastructure/logger';

export class BackfillTranscripts {
    constructor(
        private indexTranscript: IndexTranscript,
        private store: VectorStore,
        private progressEvery: number = 50
    ) {}

    /**
     * Indexes every record of `source`. Per-document failures are collected in
     * the report, as are entries the source could not read; configuration and
     * dimension errors abort the run.
     */
    async execute(source: TranscriptSource): Promise<BackfillReport> {
        const report: BackfillReport = { processed: 0, indexed: 0, cleared: 0, disabled: 0, failed: [], chunkCount: null };

        for await (const record of source.records()) {
            if (isUnreadable(record)) {
                report.failed.push({ documentId: record.reference, message: record.message });
                logger.warn('Skipping unreadable transcript entry', { reference: record.reference, error: record.message });
                this.advance(report);
                continue;
            }

            try {
                const outcome = await this.indexTranscript.backfill(
                    record.documentId,
                    record.text,
                    record.metadata,
                    record.fields
                );
                report[outcome.status]++;
            } catch (error) {
                if (error instanceof ConfigError || error instanceof DimensionMismatchError) {
                    throw error;
                }
                report.failed.push({ documentId: record.documentId, message: describeError(error) });
                logger.error('Backfill failed for transcript', {
                    documentId: record.documentId,
                    error: describeError(error),
                });
            }

            this.advance(report);
        }

        report.chunkCount = this.store.dimension === undefined ? null : await this.store.countChunks();

        logger.info('Backfill completed', {
            processed: report.processed,
            indexed: report.indexed,
            cleared: report.cleared,
            failed: report.failed.length,
            chunkCount: report.chunkCount,
        });

        return report;
    }

    private advance(report: BackfillReport): void {
        report.processed++;
        if (report.processed % this.progressEvery === 0) {
            logger.info('Backfill progress', { processed: report.processed, failed: report.failed.length });
        }
    }
}
