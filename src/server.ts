// src/server.ts
// Purpose: Process bootstrap. Builds the container, serves HTTP, resumes
// interrupted batches and shuts down in order on SIGINT / SIGTERM.

import http from "http";
import { loadConfig } from "@/config/app.config";
import { createContainer } from "@/container";
import { errorMeta, log } from "@/lib/observability/logger";
import { createApp } from "./app";

const config = loadConfig();
const container = createContainer(config);
const app = createApp(container);

////////////////////////////////////////////////////////////////
// HTTP SERVER
////////////////////////////////////////////////////////////////

const server = http.createServer(app);

server.listen(config.port, () => {
  log("INFO", "SERVER_STARTED", { port: config.port, mode: config.mode });

  container.batches
    .resumeInterrupted()
    .then((resumed) => {
      if (resumed > 0) log("INFO", "BATCHES_RESUMED", { resumed });
    })
    .catch((err: unknown) => {
      log("ERROR", "BATCH_RESUME_FAILED", errorMeta(err));
    });
});

////////////////////////////////////////////////////////////////
// GRACEFUL SHUTDOWN
////////////////////////////////////////////////////////////////

let shuttingDown = false;

function closeServer(): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

async function shutdown(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;
  log("INFO", "SERVER_SHUTDOWN_STARTED", { signal });

  try {
    await closeServer();
    await container.close();
    log("INFO", "SERVER_SHUTDOWN_COMPLETED");
    process.exit(0);
  } catch (err) {
    log("ERROR", "SERVER_SHUTDOWN_FAILED", errorMeta(err));
    process.exit(1);
  }
}

process.on("SIGINT", () => void shutdown("SIGINT"));
process.on("SIGTERM", () => void shutdown("SIGTERM"));
