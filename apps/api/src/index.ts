import 'dotenv/config';
import { App } from './app';
import { Core } from './infrastructure/Core';
import { loadRagConfig } from './infrastructure/config/ragConfig';
import { describeError } from './domain/errors/RagErrors';
import logger from './infrastructure/logger';

async function main() {
    const core = new Core(loadRagConfig());
    await core.start();

    const server = new App(core).listen();

    const shutdown = (signal: string) => {
        logger.info('Shutting down', { signal });
        server.close(() => {
            core.stop()
                .then(() => process.exit(0))
                .catch((error: unknown) => {
                    logger.error('Failed to close vector store', { error: describeError(error) });
                    process.exit(1);
                });
        });
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
    logger.error('Failed to start server', { error: describeError(error) });
    process.exit(1);
});
