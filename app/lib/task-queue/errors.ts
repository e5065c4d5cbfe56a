/**
 * Task queue error types
 */

import type { TaskStatus } from './types';

export type TaskQueueErrorCode =
  | 'TASK_NOT_FOUND'
  | 'INVALID_TASK_ID'
  | 'INVALID_TRANSITION'
  | 'ENQUEUE_CANCELLED'
  | 'QUEUE_CLOSED'
  | 'SHUTDOWN_TIMEOUT';

export class TaskQueueError extends Error {
  constructor(
    public readonly code: TaskQueueErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TaskQueueError';
  }
}

export class TaskNotFoundError extends TaskQueueError {
  constructor(public readonly taskId: string) {
    super('TASK_NOT_FOUND', `task not found: ${taskId}`);
    this.name = 'TaskNotFoundError';
  }
}

export class InvalidTaskIdError extends TaskQueueError {
  constructor(public readonly taskId: string) {
    super('INVALID_TASK_ID', `invalid task ID format: ${JSON.stringify(taskId)}`);
    this.name = 'InvalidTaskIdError';
  }
}

export class InvalidTransitionError extends TaskQueueError {
  constructor(
    public readonly from: TaskStatus,
    public readonly to: TaskStatus
  ) {
    super('INVALID_TRANSITION', `cannot transition task from ${from} to ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

/**
 * The queue was full and the caller gave up before space became available
 */
export class EnqueueCancelledError extends TaskQueueError {
  constructor(public readonly taskId: string, cause?: unknown) {
    super('ENQUEUE_CANCELLED', `task queue is full, enqueue of task ${taskId} cancelled`, { cause });
    this.name = 'EnqueueCancelledError';
  }
}

export class QueueClosedError extends TaskQueueError {
  constructor() {
    super('QUEUE_CLOSED', 'task queue is shut down');
    this.name = 'QueueClosedError';
  }
}

/**
 * Graceful shutdown did not finish before the caller's deadline.
 * Workers still running keep running in the background.
 */
export class ShutdownTimeoutError extends TaskQueueError {
  constructor(
    public readonly timeoutMs: number,
    public readonly pendingWorkers: number
  ) {
    super(
      'SHUTDOWN_TIMEOUT',
      `shutdown deadline of ${timeoutMs}ms exceeded with ${pendingWorkers} worker(s) still running`
    );
    this.name = 'ShutdownTimeoutError';
  }
}
