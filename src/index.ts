// src/index.ts

import dotenv from 'dotenv';
dotenv.config();

import { app } from './app';
import { PostScheduler } from './scheduler/post-scheduler';
import { createServiceLogger } from './utils/logger';

const logger = createServiceLogger('Main');

const scheduler = new PostScheduler({
    runCycle: () => app.runPostCycle()
});

const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    scheduler.stop();
    app.shutdown();
    process.exit(0);
};

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

const main = async (): Promise<void> => {
    const result = await app.initialize();
    if (!result.successful) {
        logger.error('Failed to start application', undefined, { error: result.error });
        process.exit(1);
    }

    await scheduler.start();
};

main().catch((error: unknown) => {
    logger.error('Fatal error', error);
    process.exit(1);
});
