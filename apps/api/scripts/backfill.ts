import 'dotenv/config';
import { Core } from '../src/infrastructure/Core';
import { loadRagConfig } from '../src/infrastructure/config/ragConfig';
import { BackfillTranscripts } from '../src/application/useCases/BackfillTranscripts';
import { IndexTranscript } from '../src/application/useCases/IndexTranscript';
import { JsonlTranscriptSource } from '../src/infrastructure/sources/JsonlTranscriptSource';

// Usage: npm run backfill -- <transcripts.jsonl>
async function backfill() {
    const file = process.argv[2];
    if (!file) {
        console.error('Usage: backfill <transcripts.jsonl>');
        process.exit(2);
    }

    const core = new Core(loadRagConfig());
    if (!core.getUseCase(IndexTranscript).enabled) {
        console.error('RAG is disabled (RAG_ENABLED=false), nothing to backfill.');
        process.exit(1);
    }

    try {
        await core.start();
        console.log(`Backfilling transcripts from ${file}...`);

        const report = await core.getUseCase(BackfillTranscripts).execute(new JsonlTranscriptSource(file));
        console.log(JSON.stringify(report, null, 2));

        process.exitCode = report.failed.length > 0 ? 1 : 0;
    } catch (error) {
        console.error('Backfill aborted:', error);
        process.exitCode = 1;
    } finally {
        await core.stop();
    }
}

backfill().catch((error) => {
    console.error('Backfill failed to start:', error);
    process.exit(1);
});
