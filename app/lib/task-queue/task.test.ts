import { describe, expect, it } from 'vitest';
import { InvalidTransitionError } from './errors';
import {
  canTransition,
  formatDuration,
  getTaskDuration,
  isTerminalStatus,
  newTask,
  toTaskResponse,
  transitionTask,
} from './task';

const T0 = Date.UTC(2024, 0, 15, 10, 0, 0);

describe('newTask', () => {
  it('builds a pending task without an id or timestamps beyond created_at', () => {
    const task = newTask('T', 'D', T0);
    expect(task).toEqual({
      id: '',
      title: 'T',
      description: 'D',
      status: 'pending',
      created_at: T0,
    });
  });
});

describe('transitionTask', () => {
  it('sets started_at when entering processing', () => {
    const task = transitionTask(newTask('T', 'D', T0), 'processing', T0 + 10);
    expect(task.status).toBe('processing');
    expect(task.started_at).toBe(T0 + 10);
    expect(task.completed_at).toBeUndefined();
  });

  it('keeps the first started_at on processing re-entry', () => {
    const first = transitionTask(newTask('T', 'D', T0), 'processing', T0 + 10);
    const again = transitionTask(first, 'processing', T0 + 500);
    expect(again.started_at).toBe(T0 + 10);
  });

  it('sets completed_at and the duration label when completing', () => {
    const processing = transitionTask(newTask('T', 'D', T0), 'processing', T0);
    const done = transitionTask(processing, 'completed', T0 + 1500);
    expect(done.status).toBe('completed');
    expect(done.completed_at).toBe(T0 + 1500);
    expect(done.duration_label).toBe('1.5s');
  });

  it('allows processing -> failed', () => {
    const processing = transitionTask(newTask('T', 'D', T0), 'processing', T0);
    const failed = transitionTask(processing, 'failed', T0 + 250);
    expect(failed.status).toBe('failed');
    expect(failed.completed_at).toBe(T0 + 250);
    expect(failed.duration_label).toBe('250ms');
  });

  it('does not modify the input task', () => {
    const pending = newTask('T', 'D', T0);
    transitionTask(pending, 'processing', T0 + 1);
    expect(pending.status).toBe('pending');
    expect(pending.started_at).toBeUndefined();
  });

  it('rejects transitions out of terminal states', () => {
    const processing = transitionTask(newTask('T', 'D', T0), 'processing', T0);
    const done = transitionTask(processing, 'completed', T0 + 1);
    expect(() => transitionTask(done, 'processing', T0 + 2)).toThrow(InvalidTransitionError);
    expect(() => transitionTask(done, 'failed', T0 + 2)).toThrow(InvalidTransitionError);
  });

  it('rejects skipping processing', () => {
    expect(() => transitionTask(newTask('T', 'D', T0), 'completed', T0)).toThrow(
      'cannot transition task from pending to completed'
    );
  });
});

describe('status helpers', () => {
  it('reports terminal states', () => {
    expect(isTerminalStatus('completed')).toBe(true);
    expect(isTerminalStatus('failed')).toBe(true);
    expect(isTerminalStatus('pending')).toBe(false);
    expect(isTerminalStatus('processing')).toBe(false);
  });

  it('knows the legal transitions', () => {
    expect(canTransition('pending', 'processing')).toBe(true);
    expect(canTransition('pending', 'failed')).toBe(false);
    expect(canTransition('failed', 'completed')).toBe(false);
  });
});

describe('getTaskDuration', () => {
  it('is 0 before processing starts', () => {
    expect(getTaskDuration(newTask('T', 'D', T0), T0 + 10_000)).toBe(0);
  });

  it('grows with the clock while processing', () => {
    const processing = transitionTask(newTask('T', 'D', T0), 'processing', T0);
    expect(getTaskDuration(processing, T0 + 300)).toBe(300);
    expect(getTaskDuration(processing, T0 + 900)).toBe(900);
  });

  it('is frozen once completed', () => {
    const processing = transitionTask(newTask('T', 'D', T0), 'processing', T0);
    const done = transitionTask(processing, 'completed', T0 + 400);
    expect(getTaskDuration(done, T0 + 400)).toBe(400);
    expect(getTaskDuration(done, T0 + 60_000)).toBe(400);
  });

  it('never goes negative', () => {
    const processing = transitionTask(newTask('T', 'D', T0), 'processing', T0 + 100);
    expect(getTaskDuration(processing, T0)).toBe(0);
  });
});

describe('formatDuration', () => {
  it.each([
    [0, '0s'],
    [250, '250ms'],
    [1500, '1.5s'],
    [150_000, '2m30s'],
    [3_600_000, '1h0m0s'],
  ])('formats %d ms as %s', (ms, expected) => {
    expect(formatDuration(ms)).toBe(expected);
  });
});

describe('toTaskResponse', () => {
  it('omits processing fields for a pending task', () => {
    const task = { ...newTask('T', 'D', T0), id: '1' };
    expect(toTaskResponse(task, T0 + 5)).toEqual({
      id: '1',
      title: 'T',
      description: 'D',
      status: 'pending',
      created_at: '2024-01-15T10:00:00.000Z',
    });
  });

  it('renders timestamps, result and duration for a completed task', () => {
    const processing = transitionTask({ ...newTask('T', 'D', T0), id: '7' }, 'processing', T0 + 1000);
    const done = { ...transitionTask(processing, 'completed', T0 + 3000), result: 'ok' };
    expect(toTaskResponse(done, T0 + 10_000)).toEqual({
      id: '7',
      title: 'T',
      description: 'D',
      status: 'completed',
      result: 'ok',
      created_at: '2024-01-15T10:00:00.000Z',
      started_at: '2024-01-15T10:00:01.000Z',
      completed_at: '2024-01-15T10:00:03.000Z',
      duration: 2000,
    });
  });
});
