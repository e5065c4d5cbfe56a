/**
 * Task Queue - Main entry point
 *
 * Usage:
 *   const service = initializeTaskQueue({ workerCount: 5, processingDelayMs: 120_000 });
 *   const task = await service.createTask({ title: 'Report', description: 'Build the weekly report' });
 *   // ... later
 *   await shutdownTaskQueue({ timeoutMs: 5000, reason: 'SIGTERM' });
 */

export * from './types';
export * from './errors';
export * from './task';
export * from './task-store';
export * from './id-generator';
export * from './bounded-queue';
export * from './task-service';
export * from './startup';
export { WorkerPool, DEFAULT_WORKER_COUNT, DEFAULT_QUEUE_CAPACITY, DEFAULT_PROCESSING_DELAY_MS, TASK_SUCCESS_RESULT } from './worker';
