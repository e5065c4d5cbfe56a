/**
 * Task Store - CRUD operations over the in-memory task collection
 */

import { TaskNotFoundError } from './errors';
import { SequentialIdGenerator, type IdGenerator } from './id-generator';
import type { Task, TaskFilter, TaskStatus } from './types';

/**
 * Storage contract used by the service and the worker pool.
 * Implementations hand out copies; callers never hold a reference to the stored value.
 */
export interface TaskRepository {
  /** Assign the next id, store the task and return the stored copy */
  create(task: Task): Promise<Task>;
  list(filter?: TaskFilter): Promise<Task[]>;
  /** @throws TaskNotFoundError */
  get(id: string): Promise<Task>;
  /** Replace the stored task with the same id. @throws TaskNotFoundError */
  update(task: Task): Promise<Task>;
  /** @throws TaskNotFoundError */
  delete(id: string): Promise<void>;
  /** Number of stored tasks per status */
  count(): Promise<Record<TaskStatus, number>>;
}

/**
 * In-memory store. None of the methods awaits before touching the map,
 * so each one runs to completion inside a single event loop turn.
 */
export class InMemoryTaskStore implements TaskRepository {
  private readonly tasks = new Map<string, Task>();
  private readonly ids: IdGenerator;

  constructor(ids: IdGenerator = new SequentialIdGenerator()) {
    this.ids = ids;
  }

  async create(task: Task): Promise<Task> {
    const stored: Task = { ...task, id: this.ids.next() };
    this.tasks.set(stored.id, stored);
    return { ...stored };
  }

  async list(filter?: TaskFilter): Promise<Task[]> {
    const result: Task[] = [];
    for (const task of this.tasks.values()) {
      if (filter?.status && task.status !== filter.status) continue;
      result.push({ ...task });
    }
    return result;
  }

  async get(id: string): Promise<Task> {
    const task = this.tasks.get(id);
    if (!task) {
      throw new TaskNotFoundError(id);
    }
    return { ...task };
  }

  async update(task: Task): Promise<Task> {
    if (!this.tasks.has(task.id)) {
      throw new TaskNotFoundError(task.id);
    }
    const stored: Task = { ...task };
    this.tasks.set(stored.id, stored);
    return { ...stored };
  }

  async delete(id: string): Promise<void> {
    if (!this.tasks.delete(id)) {
      throw new TaskNotFoundError(id);
    }
  }

  async count(): Promise<Record<TaskStatus, number>> {
    const counts = { pending: 0, processing: 0, completed: 0, failed: 0 };
    for (const task of this.tasks.values()) {
      counts[task.status]++;
    }
    return counts;
  }
}
