import type { RouteArgs } from "~/lib/http/request-handler";
import { getTaskService } from "~/lib/task-queue";
import { getLogger } from "~/lib/log/logger";

const log = getLogger({ module: "ApiTaskStats" });

export async function loader({ request: _request }: RouteArgs) {
  try {
    const service = getTaskService();
    const stats = await service.getStats();
    const worker = service.getWorkerStatus();

    return Response.json({
      ...stats,
      queued: worker.queued,
      queue_capacity: worker.queueCapacity,
    });
  } catch (error) {
    log.error({ err: error }, "get task stats failed");
    return Response.json({ error: "Failed to fetch task statistics" }, { status: 500 });
  }
}
