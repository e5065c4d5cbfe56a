import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import * as tasks from "./api.tasks";
import * as taskById from "./api.tasks.$id";
import * as stats from "./api.stats";
import * as workerStatus from "./api.worker.status";
import { initializeTaskQueue, setTaskService, shutdownTaskQueue } from "~/lib/task-queue";

const BASE = "http://localhost/api/v1/tasks";

function post(body: string) {
  return tasks.action({
    request: new Request(BASE, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body,
    }),
    params: {},
  });
}

function getById(id: string | undefined) {
  return taskById.loader({ request: new Request(`${BASE}/${id ?? ""}`), params: { id } });
}

function deleteById(id: string | undefined) {
  return taskById.action({
    request: new Request(`${BASE}/${id ?? ""}`, { method: "DELETE" }),
    params: { id },
  });
}

describe("/api/v1/tasks", () => {
  beforeEach(() => {
    initializeTaskQueue({ workerCount: 1, processingDelayMs: 0 });
  });

  afterEach(async () => {
    await shutdownTaskQueue({ timeoutMs: 1000 });
    setTaskService(null);
  });

  it("creates a pending task", async () => {
    const response = await post(JSON.stringify({ title: "T", description: "D" }));
    expect(response.status).toBe(201);

    const body = await response.json();
    expect(body).toMatchObject({ id: "1", title: "T", description: "D", status: "pending" });
    expect(body).not.toHaveProperty("started_at");
    expect(body).not.toHaveProperty("duration");
  });

  it("rejects malformed JSON", async () => {
    const response = await post("{not json");
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: "Invalid request body" });
  });

  it("rejects missing or empty fields", async () => {
    const missing = await post(JSON.stringify({ title: "T" }));
    expect(missing.status).toBe(400);
    expect(await missing.json()).toMatchObject({ error: "Invalid request body" });

    const empty = await post(JSON.stringify({ title: "", description: "D" }));
    expect(empty.status).toBe(400);
  });

  it("answers 405 for other methods on the collection", async () => {
    const response = await tasks.action({ request: new Request(BASE, { method: "PUT" }), params: {} });
    expect(response.status).toBe(405);
    expect(await response.json()).toEqual({ error: "Method not allowed" });
  });

  it("lists tasks and filters by status", async () => {
    await post(JSON.stringify({ title: "A", description: "a" }));
    await post(JSON.stringify({ title: "B", description: "b" }));

    const all = await tasks.loader({ request: new Request(BASE), params: {} });
    expect(all.status).toBe(200);
    expect(await all.json()).toHaveLength(2);

    await vi.waitFor(async () => {
      const done = await tasks.loader({ request: new Request(`${BASE}?status=completed`), params: {} });
      expect(await done.json()).toHaveLength(2);
    });
  });

  it("rejects an unknown status filter", async () => {
    const response = await tasks.loader({ request: new Request(`${BASE}?status=done`), params: {} });
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: "Invalid status filter" });
  });

  it("returns a completed task with its result", async () => {
    await post(JSON.stringify({ title: "T", description: "D" }));

    await vi.waitFor(async () => {
      const response = await getById("1");
      expect(await response.json()).toMatchObject({ status: "completed" });
    });

    const response = await getById("1");
    expect(response.status).toBe(200);
    const body = await response.json();
    expect(body).toMatchObject({ id: "1", result: "Task completed successfully" });
    expect(body).toHaveProperty("started_at");
    expect(body).toHaveProperty("completed_at");
    expect(body).toHaveProperty("duration");
  });

  it("maps id errors to 400 and 404", async () => {
    const malformed = await getById("abc");
    expect(malformed.status).toBe(400);
    expect(await malformed.json()).toEqual({ error: "Invalid task ID format" });

    const missing = await getById("42");
    expect(missing.status).toBe(404);
    expect(await missing.json()).toEqual({ error: "Task not found" });

    const word = await getById("stats");
    expect(word.status).toBe(400);
    expect(await word.json()).toEqual({ error: "Invalid task ID format" });

    const noId = await getById(undefined);
    expect(noId.status).toBe(400);
    expect(await noId.json()).toEqual({ error: "Task ID is required" });
  });

  it("deletes a task", async () => {
    await post(JSON.stringify({ title: "T", description: "D" }));

    const response = await deleteById("1");
    expect(response.status).toBe(204);
    expect(response.body).toBeNull();

    expect((await getById("1")).status).toBe(404);
    expect((await deleteById("1")).status).toBe(404);
    expect((await deleteById("x1")).status).toBe(400);
  });

  it("answers 405 for other methods on a single task", async () => {
    const response = await taskById.action({
      request: new Request(`${BASE}/1`, { method: "PATCH" }),
      params: { id: "1" },
    });
    expect(response.status).toBe(405);
  });

  it("reports stats", async () => {
    await post(JSON.stringify({ title: "A", description: "a" }));
    await post(JSON.stringify({ title: "B", description: "b" }));

    await vi.waitFor(async () => {
      const response = await stats.loader({ request: new Request("http://localhost/api/v1/stats"), params: {} });
      expect(await response.json()).toEqual({
        total: 2,
        by_status: { pending: 0, processing: 0, completed: 2, failed: 0 },
        queued: 0,
        queue_capacity: 100,
      });
    });
  });

  it("reports worker status", async () => {
    const response = await workerStatus.loader({
      request: new Request("http://localhost/api/v1/worker/status"),
      params: {},
    });
    expect(await response.json()).toEqual({
      running: true,
      stopping: false,
      worker_count: 1,
      busy_workers: 0,
      queued: 0,
      queue_capacity: 100,
      processing_delay_ms: 0,
    });
  });

  it("fails to create after shutdown", async () => {
    await shutdownTaskQueue({ timeoutMs: 1000 });

    const response = await post(JSON.stringify({ title: "T", description: "D" }));
    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ error: "Failed to create task" });
  });

  it("answers 500 when the task queue is not initialized", async () => {
    await shutdownTaskQueue({ timeoutMs: 1000 });
    setTaskService(null);

    const response = await tasks.loader({ request: new Request(BASE), params: {} });
    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ error: "Failed to list tasks" });
  });
});
