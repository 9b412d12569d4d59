import 'dotenv/config';
import { App } from './app';
import { loadPipelineConfig } from './application/config/pipelineConfig';
import { Core } from './infrastructure/Core';
import { AppError } from './domain/errors/AppError';
import logger from './infrastructure/logger';

async function main() {
    const config = loadPipelineConfig();
    const core = new Core(config);

    try {
        await core.loadStore();
    } catch (error) {
        // A missing store is served empty; a corrupt one is refused.
        if (!(error instanceof AppError) || error.code !== 'STORE_NOT_FOUND') {
            throw error;
        }
        logger.warn('Starting without a vector store', { directory: config.store.directory, reason: error.message });
    }

    new App(core, config.server).listen();
}

main().catch((error) => {
    logger.error('Failed to start server', { error });
    process.exitCode = 1;
});
