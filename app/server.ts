/**
 * Express Server Entry Point
 *
 * All initialization happens here before the server accepts HTTP requests:
 * configuration, logging, then the task queue.
 */

import type { Server } from "http";
import compression from "compression";
import express from "express";
import type { ErrorRequestHandler } from "express";
import morgan from "morgan";
import routes from "./routes";
import { loadConfig } from "~/lib/config/storage";
import { isDevelopment, type AppConfig } from "~/lib/config/settings";
import { createRequestHandler } from "~/lib/http/request-handler";
import { configureLogger, getLogger, getLogLevel, setLogLevel } from "~/lib/log/logger";
import { initializeTaskQueue, shutdownTaskQueue } from "~/lib/task-queue";

const log = getLogger({ module: "Server" });

let server: Server | null = null;
let shuttingDown = false;

/**
 * Initialize all services before accepting requests
 */
async function initialize(): Promise<AppConfig> {
  // 1. Load configuration
  const config = await loadConfig();

  // 2. Apply logger sinks, then the level
  configureLogger(config.logger);
  setLogLevel(config.logger.level);
  log.info({ env: config.server.env, level: getLogLevel() }, "configuration loaded");

  // 3. Initialize task queue and start workers
  log.info({}, "initializing task queue");
  initializeTaskQueue({
    workerCount: config.taskQueue.workerCount,
    queueCapacity: config.taskQueue.queueCapacity,
    processingDelayMs: config.taskQueue.processingDelayMs,
  });
  log.info({}, "task queue ready");

  return config;
}

function createApp(config: AppConfig) {
  const app = express();

  // Trust proxy for correct client IP
  app.set("trust proxy", true);

  app.use(compression());

  if (isDevelopment(config)) {
    app.use(morgan("dev"));
  }

  // Request logging
  app.use((req, res, next) => {
    const start = process.hrtime.bigint();
    res.on("finish", () => {
      const latencyMs = Number(process.hrtime.bigint() - start) / 1e6;
      log.info(
        {
          method: req.method,
          path: req.path,
          status: res.statusCode,
          latencyMs: Math.round(latencyMs * 100) / 100,
          clientIp: req.ip,
        },
        "HTTP request"
      );
    });
    next();
  });

  // Route modules parse bodies themselves
  app.use(express.text({ type: "*/*", limit: "1mb" }));

  for (const { path, module } of routes) {
    app.all(path, createRequestHandler(module));
  }

  app.use((_req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  const errorHandler: ErrorRequestHandler = (err, _req, res, _next) => {
    log.error({ err }, "unhandled request error");
    if (res.headersSent) {
      res.end();
      return;
    }
    res.status(500).json({ error: "Internal server error" });
  };
  app.use(errorHandler);

  return app;
}

function closeServer(): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!server) {
      resolve();
      return;
    }
    server.close(error => (error ? reject(error) : resolve()));
  });
}

/**
 * Graceful shutdown handler
 */
async function shutdown(signal: string, config: AppConfig) {
  if (shuttingDown) return;
  shuttingDown = true;
  log.info({ signal }, "shutdown initiated");

  let exitCode = 0;

  // Stop accepting new requests, then drain the workers
  const serverClosed = closeServer().catch(error => {
    log.error({ err: error }, "error shutting down server");
    exitCode = 1;
  });

  try {
    await shutdownTaskQueue({ timeoutMs: config.taskQueue.shutdownTimeoutMs, reason: signal });
  } catch (error) {
    log.error({ err: error }, "error shutting down task service");
    exitCode = 1;
  }

  await serverClosed;
  log.info({ exitCode }, "server stopped");
  process.exit(exitCode);
}

/**
 * Main entry point
 */
async function main() {
  const config = await initialize();
  const app = createApp(config);

  server = app.listen(config.server.port, () => {
    log.info({ port: config.server.port }, "server listening");
  });

  process.on("SIGINT", () => void shutdown("SIGINT", config));
  process.on("SIGTERM", () => void shutdown("SIGTERM", config));

  process.on("uncaughtException", (error) => {
    log.error({ err: error }, "uncaught exception");
    void shutdown("uncaughtException", config);
  });

  process.on("unhandledRejection", (reason) => {
    log.error({ err: reason }, "unhandled rejection");
  });
}

main().catch((error) => {
  log.error({ err: error }, "failed to start server");
  process.exit(1);
});
