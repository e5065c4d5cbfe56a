/**
 * Task entity - construction, state machine and duration
 */

import { InvalidTransitionError } from './errors';
import type { Task, TaskResponse, TaskStatus } from './types';

/**
 * Legal transitions. processing -> processing is a re-entry and keeps started_at.
 */
const TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  pending: ['processing'],
  processing: ['processing', 'completed', 'failed'],
  completed: [],
  failed: [],
};

export function isTerminalStatus(status: TaskStatus): boolean {
  return status === 'completed' || status === 'failed';
}

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * Build a pending task. The id is left empty; the store assigns it.
 */
export function newTask(title: string, description: string, now: number = Date.now()): Task {
  return {
    id: '',
    title,
    description,
    status: 'pending',
    created_at: now,
  };
}

/**
 * Apply a status transition and return the updated task.
 * The input task is not modified.
 */
export function transitionTask(task: Task, status: TaskStatus, now: number = Date.now()): Task {
  if (!canTransition(task.status, status)) {
    throw new InvalidTransitionError(task.status, status);
  }

  const next: Task = { ...task, status };

  if (status === 'processing' && next.started_at === undefined) {
    next.started_at = now;
  }

  if (isTerminalStatus(status)) {
    next.completed_at = now;
    next.duration_label = formatDuration(getTaskDuration(next, now));
  }

  return next;
}

/**
 * Processing time in milliseconds: (completed_at or now) - started_at, 0 before start
 */
export function getTaskDuration(task: Task, now: number = Date.now()): number {
  if (task.started_at === undefined) {
    return 0;
  }
  const end = task.completed_at ?? now;
  return Math.max(0, end - task.started_at);
}

/**
 * Format milliseconds as e.g. "250ms", "1.5s", "2m30s", "1h0m0s"
 */
export function formatDuration(ms: number): string {
  const total = Math.max(0, Math.round(ms));
  if (total === 0) return '0s';
  if (total < 1000) return `${total}ms`;

  const hours = Math.floor(total / 3_600_000);
  const minutes = Math.floor((total % 3_600_000) / 60_000);
  const seconds = (total % 60_000) / 1000;

  if (hours > 0) return `${hours}h${minutes}m${seconds}s`;
  if (minutes > 0) return `${minutes}m${seconds}s`;
  return `${seconds}s`;
}

export function toTaskResponse(task: Task, now: number = Date.now()): TaskResponse {
  const response: TaskResponse = {
    id: task.id,
    title: task.title,
    description: task.description,
    status: task.status,
    created_at: new Date(task.created_at).toISOString(),
  };

  if (task.result) response.result = task.result;
  if (task.error) response.error = task.error;
  if (task.started_at !== undefined) {
    response.started_at = new Date(task.started_at).toISOString();
    response.duration = getTaskDuration(task, now);
  }
  if (task.completed_at !== undefined) {
    response.completed_at = new Date(task.completed_at).toISOString();
  }

  return response;
}
