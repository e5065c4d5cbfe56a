import type { RouteArgs } from "~/lib/http/request-handler";
import { getTaskService } from "~/lib/task-queue";
import { getLogger } from "~/lib/log/logger";

const log = getLogger({ module: "ApiWorkerStatus" });

export async function loader({ request: _request }: RouteArgs) {
  try {
    const status = getTaskService().getWorkerStatus();

    return Response.json({
      running: status.running,
      stopping: status.stopping,
      worker_count: status.workerCount,
      busy_workers: status.busyWorkers,
      queued: status.queued,
      queue_capacity: status.queueCapacity,
      processing_delay_ms: status.processingDelayMs,
    });
  } catch (error) {
    log.error({ err: error }, "get worker status failed");
    return Response.json({ error: "Failed to fetch worker status" }, { status: 500 });
  }
}
