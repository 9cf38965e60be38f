// Invoice inbox sync - HTTP service entry point
import { serve } from "@hono/node-server";
import { createApp } from "./api/app.js";
import { loadConfig } from "./config/index.js";
import { createLogger } from "./lib/logger.js";
import { createRuntime } from "./runtime.js";
import { Scheduler } from "./scheduler/index.js";

async function main() {
  const config = loadConfig();
  const logger = createLogger(config.log.level);
  logger.info("Invoice inbox sync starting...");

  const { service, verifier, database } = await createRuntime(config, logger);
  logger.info({ mailbox: service.mailboxAddress }, "Mailbox connected");

  const scheduler = new Scheduler(service, {
    watchRenewalIntervalMs: config.scheduler.watchRenewalIntervalMs,
    fullSyncIntervalMs: config.scheduler.fullSyncIntervalMs,
    logger: logger.child({ component: "scheduler" }),
  });
  if (config.scheduler.enabled) {
    scheduler.start();
  }

  const app = createApp({ service, verifier, adminToken: config.admin.token, logger });
  if (!config.admin.token) {
    logger.warn("ADMIN_TOKEN is not set; admin routes are open");
  }

  const server = serve({ fetch: app.fetch, port: config.server.port, hostname: config.server.host }, (info) => {
    logger.info({ host: config.server.host, port: info.port }, "HTTP server listening");
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info({ signal }, "Shutting down gracefully...");
    scheduler.stop();
    server.close((error) => {
      if (error) {
        logger.error({ err: error }, "HTTP server close failed");
      }
      database.close();
      process.exit(error ? 1 : 0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((error) => {
  console.error("Failed to start application:", error);
  process.exit(1);
});
