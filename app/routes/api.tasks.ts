import { z } from "zod";
import type { RouteArgs } from "~/lib/http/request-handler";
import { methodNotAllowed } from "~/lib/http/request-handler";
import { getTaskService, toTaskResponse, TASK_STATUSES } from "~/lib/task-queue";
import type { TaskFilter, TaskStatus } from "~/lib/task-queue";
import { getLogger } from "~/lib/log/logger";

const log = getLogger({ module: "ApiTasks" });

const CreateTaskSchema = z.object({
  title: z.string().min(1),
  description: z.string().min(1),
});

function isTaskStatus(value: string): value is TaskStatus {
  return TASK_STATUSES.some(status => status === value);
}

export async function loader({ request }: RouteArgs) {
  try {
    const url = new URL(request.url);
    const status = url.searchParams.get("status");

    const filter: TaskFilter = {};
    if (status) {
      if (!isTaskStatus(status)) {
        return Response.json({ error: "Invalid status filter" }, { status: 400 });
      }
      filter.status = status;
    }

    const tasks = await getTaskService().listTasks(filter);
    const now = Date.now();
    return Response.json(tasks.map(task => toTaskResponse(task, now)));
  } catch (error) {
    log.error({ err: error }, "list tasks failed");
    return Response.json({ error: "Failed to list tasks" }, { status: 500 });
  }
}

export async function action({ request }: RouteArgs) {
  if (request.method !== "POST") {
    return methodNotAllowed();
  }

  let body: unknown;
  try {
    body = await request.json();
  } catch {
    return Response.json({ error: "Invalid request body" }, { status: 400 });
  }

  const parsed = CreateTaskSchema.safeParse(body);
  if (!parsed.success) {
    return Response.json(
      { error: "Invalid request body", details: parsed.error.issues },
      { status: 400 }
    );
  }

  try {
    const task = await getTaskService().createTask(parsed.data, request.signal);
    return Response.json(toTaskResponse(task), { status: 201 });
  } catch (error) {
    log.error({ err: error }, "create task failed");
    return Response.json({ error: "Failed to create task" }, { status: 500 });
  }
}
