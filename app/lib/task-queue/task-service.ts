/**
 * Task Service - validation and orchestration between the store and the worker pool
 */

import { InvalidTaskIdError, QueueClosedError } from './errors';
import { newTask } from './task';
import type { TaskRepository } from './task-store';
import type {
  CreateTaskRequest,
  ShutdownOptions,
  Task,
  TaskFilter,
  TaskStats,
  WorkerPoolConfig,
  WorkerPoolStatus,
} from './types';
import { WorkerPool } from './worker';
import { getLogger } from '~/lib/log/logger';

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

/**
 * Task ids are base-10 signed 64-bit integers
 */
export function isValidTaskId(id: string): boolean {
  if (!/^[+-]?\d+$/.test(id)) {
    return false;
  }
  const value = BigInt(id);
  return value >= INT64_MIN && value <= INT64_MAX;
}

export interface TaskServiceContract {
  createTask(request: CreateTaskRequest, signal?: AbortSignal): Promise<Task>;
  listTasks(filter?: TaskFilter): Promise<Task[]>;
  getTask(id: string): Promise<Task>;
  deleteTask(id: string): Promise<void>;
  getStats(): Promise<TaskStats>;
  getWorkerStatus(): WorkerPoolStatus;
  shutdown(options: ShutdownOptions): Promise<void>;
}

export interface TaskServiceOptions extends WorkerPoolConfig {
  /** Aborting this signal stops the workers the same way shutdown does */
  signal?: AbortSignal;
}

export class TaskService implements TaskServiceContract {
  private readonly pool: WorkerPool;
  private readonly log = getLogger({ module: 'TaskService' });

  constructor(
    private readonly repo: TaskRepository,
    options: TaskServiceOptions = {}
  ) {
    const { signal, ...poolConfig } = options;
    this.pool = new WorkerPool(repo, poolConfig, signal);
    this.pool.start();
  }

  /**
   * Store a new pending task and hand it to the worker pool.
   * Resolves as soon as the task is queued; processing happens in the background.
   */
  async createTask(request: CreateTaskRequest, signal?: AbortSignal): Promise<Task> {
    if (!this.pool.isAccepting()) {
      throw new QueueClosedError();
    }

    const task = await this.repo.create(newTask(request.title, request.description));
    this.log.info({ taskId: task.id, status: task.status }, 'task created');

    await this.pool.enqueue(task.id, signal);
    return task;
  }

  async listTasks(filter?: TaskFilter): Promise<Task[]> {
    return this.repo.list(filter);
  }

  async getTask(id: string): Promise<Task> {
    if (!isValidTaskId(id)) {
      throw new InvalidTaskIdError(id);
    }

    const task = await this.repo.get(id);
    this.log.debug({ taskId: task.id, status: task.status }, 'task retrieved');
    return task;
  }

  async deleteTask(id: string): Promise<void> {
    if (!isValidTaskId(id)) {
      throw new InvalidTaskIdError(id);
    }

    await this.repo.delete(id);
    this.log.info({ taskId: id }, 'task deleted');
  }

  async getStats(): Promise<TaskStats> {
    const by_status = await this.repo.count();
    const total = Object.values(by_status).reduce((sum, n) => sum + n, 0);
    return { total, by_status };
  }

  getWorkerStatus(): WorkerPoolStatus {
    return this.pool.getStatus();
  }

  /**
   * Stop accepting work and wait for in-flight tasks.
   * @throws ShutdownTimeoutError when workers are still busy after timeoutMs
   */
  async shutdown(options: ShutdownOptions): Promise<void> {
    this.log.info({ reason: options.reason, timeoutMs: options.timeoutMs }, 'shutting down task service');
    await this.pool.shutdown(options);
  }
}
