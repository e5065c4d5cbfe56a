import type { RouteModule } from "~/lib/http/request-handler";
import * as tasks from "./routes/api.tasks";
import * as taskById from "./routes/api.tasks.$id";
import * as stats from "./routes/api.stats";
import * as workerStatus from "./routes/api.worker.status";

export interface RouteConfigEntry {
  path: string;
  module: RouteModule;
}

function route(path: string, module: RouteModule): RouteConfigEntry {
  return { path, module };
}

export default [
  route("/api/v1/tasks", tasks),
  route("/api/v1/tasks/:id", taskById),
  route("/api/v1/stats", stats),
  route("/api/v1/worker/status", workerStatus),
] satisfies RouteConfigEntry[];
