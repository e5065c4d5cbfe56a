/**
 * Task Queue Type Definitions
 */

/**
 * Task status values
 */
export type TaskStatus = 'pending' | 'processing' | 'completed' | 'failed';

export const TASK_STATUSES: readonly TaskStatus[] = ['pending', 'processing', 'completed', 'failed'];

/**
 * Task record held by the store. Timestamps are epoch milliseconds.
 */
export interface Task {
  id: string;
  title: string;
  description: string;
  status: TaskStatus;
  created_at: number;
  started_at?: number;
  completed_at?: number;
  /** Human-readable duration, recomputed on entering a terminal state */
  duration_label?: string;
  result?: string;
  error?: string;
}

/**
 * Validated creation request
 */
export interface CreateTaskRequest {
  title: string;
  description: string;
}

export interface TaskFilter {
  status?: TaskStatus;
}

/**
 * Task JSON as served over HTTP
 */
export interface TaskResponse {
  id: string;
  title: string;
  description: string;
  status: TaskStatus;
  result?: string;
  error?: string;
  created_at: string;
  started_at?: string;
  completed_at?: string;
  /** milliseconds */
  duration?: number;
}

/**
 * Worker pool configuration
 */
export interface WorkerPoolConfig {
  /** Number of concurrent workers (default: 5, minimum 1) */
  workerCount?: number;

  /** Queue capacity (default: 100) */
  queueCapacity?: number;

  /** Simulated processing time per task in milliseconds (default: 120000) */
  processingDelayMs?: number;
}

export interface WorkerPoolStatus {
  running: boolean;
  stopping: boolean;
  workerCount: number;
  busyWorkers: number;
  queued: number;
  queueCapacity: number;
  processingDelayMs: number;
}

export interface ShutdownOptions {
  timeoutMs: number;
  reason?: string;
}

/**
 * Task statistics
 */
export interface TaskStats {
  total: number;
  by_status: Record<TaskStatus, number>;
}
