/**
 * Task Queue Startup - build the process-wide task service
 */

import { TaskService, type TaskServiceContract, type TaskServiceOptions } from './task-service';
import { InMemoryTaskStore, type TaskRepository } from './task-store';
import type { ShutdownOptions } from './types';
import { getLogger } from '~/lib/log/logger';

const log = getLogger({ module: 'TaskQueueStartup' });

let service: TaskServiceContract | null = null;

export interface InitializeTaskQueueOptions extends TaskServiceOptions {
  repository?: TaskRepository;
}

/**
 * Initialize the task queue and start its workers.
 * Replaces any previously initialized service; shut that one down first.
 */
export function initializeTaskQueue(options: InitializeTaskQueueOptions = {}): TaskServiceContract {
  const { repository, ...serviceOptions } = options;
  log.info({}, 'initializing');

  service = new TaskService(repository ?? new InMemoryTaskStore(), serviceOptions);

  log.info({}, 'initialization complete');
  return service;
}

/**
 * Install a service directly (e.g. a test double)
 */
export function setTaskService(next: TaskServiceContract | null): void {
  service = next;
}

export function getTaskService(): TaskServiceContract {
  if (!service) {
    throw new Error('Task queue is not initialized');
  }
  return service;
}

/**
 * Gracefully shut the task queue down
 * @throws ShutdownTimeoutError
 */
export async function shutdownTaskQueue(options: ShutdownOptions): Promise<void> {
  if (!service) {
    return;
  }
  await service.shutdown(options);
  log.info({ reason: options.reason }, 'task queue drained');
}
