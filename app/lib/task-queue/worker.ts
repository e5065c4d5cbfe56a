/**
 * Worker pool - fixed set of workers draining a bounded queue of task ids
 */

import { BoundedQueue } from './bounded-queue';
import { EnqueueCancelledError, QueueClosedError, ShutdownTimeoutError } from './errors';
import { transitionTask } from './task';
import type { TaskRepository } from './task-store';
import type { ShutdownOptions, Task, WorkerPoolConfig, WorkerPoolStatus } from './types';
import { getLogger } from '~/lib/log/logger';

export const DEFAULT_WORKER_COUNT = 5;
export const DEFAULT_QUEUE_CAPACITY = 100;
export const DEFAULT_PROCESSING_DELAY_MS = 120_000;
export const TASK_SUCCESS_RESULT = 'Task completed successfully';

type StopCause = 'shutdown' | 'cancelled';
type TaskOutcome = 'completed' | 'abandoned' | 'skipped' | 'interrupted';

/**
 * Resolve true after ms, or false as soon as the signal aborts
 */
function sleep(ms: number, signal: AbortSignal): Promise<boolean> {
  if (signal.aborted) {
    return Promise.resolve(false);
  }

  return new Promise<boolean>(resolve => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

export class WorkerPool {
  private config: Required<WorkerPoolConfig>;
  private queue: BoundedQueue<string>;
  private stopController = new AbortController();
  private stopCause: StopCause | null = null;
  private started = false;
  private busyWorkers = 0;
  private workers = new Set<Promise<void>>();
  private logger = getLogger({ module: 'WorkerPool' });

  constructor(
    private readonly store: TaskRepository,
    config: WorkerPoolConfig = {},
    private readonly signal?: AbortSignal
  ) {
    this.config = {
      workerCount: Math.max(1, Math.floor(config.workerCount ?? DEFAULT_WORKER_COUNT)),
      queueCapacity: Math.max(1, Math.floor(config.queueCapacity ?? DEFAULT_QUEUE_CAPACITY)),
      processingDelayMs: Math.max(0, config.processingDelayMs ?? DEFAULT_PROCESSING_DELAY_MS),
    };
    this.queue = new BoundedQueue<string>(this.config.queueCapacity);
  }

  /**
   * Start the workers
   */
  start(): void {
    if (this.started) {
      this.logger.debug({}, 'worker pool already started');
      return;
    }
    this.started = true;

    if (this.signal) {
      if (this.signal.aborted) {
        this.stop('cancelled');
      } else {
        this.signal.addEventListener('abort', this.onParentAbort, { once: true });
      }
    }

    for (let workerId = 0; workerId < this.config.workerCount; workerId++) {
      const loop: Promise<void> = this.runWorker(workerId)
        .catch(error => {
          this.logger.error({ err: error, workerId }, 'worker crashed');
        })
        .finally(() => {
          this.workers.delete(loop);
        });
      this.workers.add(loop);
    }

    this.logger.info(
      {
        workerCount: this.config.workerCount,
        queueCapacity: this.config.queueCapacity,
        processingDelayMs: this.config.processingDelayMs,
      },
      'worker pool started'
    );
  }

  /**
   * Queue a task id for processing.
   *
   * Tries a non-blocking enqueue first. When the queue is full and the caller's
   * signal has already fired, fails with EnqueueCancelledError; otherwise waits
   * for space with no upper bound.
   */
  async enqueue(taskId: string, signal?: AbortSignal): Promise<void> {
    if (this.queue.tryPut(taskId)) {
      this.logger.info({ taskId }, 'task queued for processing');
      return;
    }

    if (signal?.aborted) {
      throw new EnqueueCancelledError(taskId, signal.reason);
    }

    this.logger.warn({ taskId }, 'task queue is full, task will be processed when space is available');
    await this.queue.put(taskId);
    this.logger.info({ taskId }, 'task queued for processing');
  }

  /**
   * Whether new work is still accepted
   */
  isAccepting(): boolean {
    return !this.queue.isClosed;
  }

  isRunning(): boolean {
    return this.started && this.workers.size > 0;
  }

  getStatus(): WorkerPoolStatus {
    return {
      running: this.isRunning(),
      stopping: this.stopCause !== null,
      workerCount: this.config.workerCount,
      busyWorkers: this.busyWorkers,
      queued: this.queue.size,
      queueCapacity: this.config.queueCapacity,
      processingDelayMs: this.config.processingDelayMs,
    };
  }

  /**
   * Signal every worker to stop and wait for in-flight tasks, bounded by timeoutMs.
   * Workers that miss the deadline are not killed; they finish in the background.
   */
  async shutdown(options: ShutdownOptions): Promise<void> {
    this.logger.info({ reason: options.reason }, 'worker pool shutting down');
    this.stop('shutdown');

    if (this.workers.size === 0) {
      this.logger.info({}, 'worker pool shutdown complete (no running workers)');
      return;
    }

    const finished = await this.waitForWorkers(options.timeoutMs);
    if (!finished) {
      this.logger.warn(
        { pending: this.workers.size, timeoutMs: options.timeoutMs },
        'worker pool shutdown timed out while waiting for workers'
      );
      throw new ShutdownTimeoutError(options.timeoutMs, this.workers.size);
    }

    this.logger.info({}, 'worker pool shutdown complete');
  }

  private onParentAbort = (): void => {
    this.stop('cancelled');
  };

  private stop(cause: StopCause): void {
    if (this.stopCause !== null) return;
    this.stopCause = cause;
    this.signal?.removeEventListener('abort', this.onParentAbort);
    this.stopController.abort(new Error(`worker pool stopped: ${cause}`));
    this.queue.close();
  }

  private isStopped(): boolean {
    return this.stopController.signal.aborted;
  }

  private logWorkerStop(workerId: number): void {
    if (this.stopCause === 'cancelled') {
      this.logger.info({ workerId }, 'worker stopping due to context cancellation');
    } else {
      this.logger.info({ workerId }, 'worker stopping due to shutdown signal');
    }
  }

  private async runWorker(workerId: number): Promise<void> {
    this.logger.info({ workerId }, 'worker started');

    for (;;) {
      if (this.isStopped()) {
        this.logWorkerStop(workerId);
        return;
      }

      let taskId: string;
      try {
        taskId = await this.queue.take(this.stopController.signal);
      } catch (error) {
        if (this.isStopped() || error instanceof QueueClosedError) {
          this.logWorkerStop(workerId);
          return;
        }
        throw error;
      }

      if (this.isStopped()) {
        this.logger.info({ workerId, taskId }, 'worker stopping, dequeued task left pending');
        return;
      }

      this.busyWorkers++;
      let outcome: TaskOutcome;
      try {
        outcome = await this.processTask(workerId, taskId);
      } finally {
        this.busyWorkers--;
      }

      if (outcome === 'interrupted') {
        return;
      }
    }
  }

  private async processTask(workerId: number, taskId: string): Promise<TaskOutcome> {
    let task: Task;
    try {
      task = await this.store.get(taskId);
    } catch (error) {
      this.logger.warn({ err: error, workerId, taskId }, 'queued task not found, skipping');
      return 'skipped';
    }

    // Stop may have landed while the store read was pending
    if (this.isStopped()) {
      this.logger.info({ workerId, taskId }, 'worker stopping, dequeued task left pending');
      return 'interrupted';
    }

    let processing: Task;
    try {
      processing = transitionTask(task, 'processing');
      await this.store.update(processing);
    } catch (error) {
      this.logger.error({ err: error, workerId, taskId }, 'failed to update task status');
      return 'abandoned';
    }

    this.logger.info(
      { workerId, taskId, startedAt: processing.started_at },
      'task processing started'
    );

    const finished = await sleep(this.config.processingDelayMs, this.stopController.signal);
    if (!finished) {
      this.logger.info({ workerId, taskId, cause: this.stopCause }, 'task processing cancelled');
      return 'interrupted';
    }

    // Not cancellable from here on
    const completed: Task = {
      ...transitionTask(processing, 'completed'),
      result: TASK_SUCCESS_RESULT,
    };
    try {
      await this.store.update(completed);
    } catch (error) {
      this.logger.error({ err: error, workerId, taskId }, 'failed to update task status');
      return 'abandoned';
    }

    this.logger.info(
      { workerId, taskId, result: completed.result, duration: completed.duration_label },
      'task completed'
    );
    return 'completed';
  }

  private async waitForWorkers(timeoutMs: number): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<boolean>(resolve => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });

    try {
      return await Promise.race([
        Promise.allSettled(Array.from(this.workers)).then(() => true),
        timedOut,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }
}
