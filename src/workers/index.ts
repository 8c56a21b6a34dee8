/**
 * Worker registration and management
 */
import { Worker } from 'bullmq';
import { logger } from '../observability/logger.js';
import { createCollectWorker } from './collect.worker.js';
import { createExportWorker } from './export.worker.js';
import { createRunWorker } from './run.worker.js';

const workers: Worker[] = [];

/**
 * Create every worker; they start consuming as soon as they exist
 */
export function startWorkers(): void {
    if (workers.length > 0) return;

    logger.info('Starting all workers...');
    workers.push(createRunWorker(), createCollectWorker(), createExportWorker());
}

export async function closeWorkers(): Promise<void> {
    logger.info('Closing all workers...');

    await Promise.all(
        workers.map(async (worker) => {
            try {
                await worker.close();
                logger.info(`Worker closed for queue: ${worker.name}`);
            } catch (error) {
                logger.error(`Error closing worker for queue: ${worker.name}`, error);
            }
        })
    );

    workers.length = 0;
    logger.info('All workers closed');
}

export { createWorker } from './base-worker.js';
