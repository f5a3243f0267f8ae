/**
 * Main Entry Point
 * Upserts the recurring pipeline job and starts the BullMQ worker
 */

import "dotenv/config";
import http from "http";
import { AppConfig } from "./core/config";
import { toError } from "./core/errors";
import {
  closeConnection,
  createPipelineQueue,
  createPipelineWorker,
  scheduleRecurringPipeline,
} from "./core/services";
import { Logger } from "./core/utils/logger";

// Health check server
const server = http.createServer((req, res) => {
  if (req.url === "/healthz") {
    res.writeHead(200, { "Content-Type": "text/plain" });
    res.end("ok");
  } else {
    res.writeHead(404);
    res.end();
  }
});

async function main() {
  Logger.info("Starting monster pipeline in queue mode");

  const queue = createPipelineQueue();
  await scheduleRecurringPipeline(queue, AppConfig.pipelineDefaults());

  const worker = createPipelineWorker();

  server.listen(AppConfig.HEALTH_PORT, () => {
    Logger.info("Health check endpoint listening on /healthz", {
      port: AppConfig.HEALTH_PORT,
    });
  });

  const shutdown = async () => {
    Logger.info("Graceful shutdown initiated");
    setTimeout(() => {
      Logger.warn("Forced exit after 5s");
      process.exit(1);
    }, 5000).unref();
    await worker.close();
    await queue.close();
    await closeConnection();
    server.close(() => {
      Logger.info("Health server closed");
      process.exit(0);
    });
  };

  const onSignal = () => {
    shutdown().catch((e) => {
      Logger.error("Shutdown failed", toError(e));
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  Logger.info("🚀 Worker is ready and listening for jobs");
}

main().catch((e) => {
  Logger.error("Startup failed", toError(e));
  process.exit(1);
});
