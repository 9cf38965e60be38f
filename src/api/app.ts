import { Hono } from "hono";
import { logger as requestLogger } from "hono/logger";
import { ZodError } from "zod";
import { AuthRejectedError, StateUnavailableError, errorMessage } from "../lib/errors.js";
import type { Logger } from "../lib/logger.js";
import type { PushVerifier } from "../services/google/push-verifier.js";
import type { SyncService } from "../sync/service.js";
import { adminToken } from "./middleware/admin-token.js";
import { adminRoutes } from "./routes/admin.js";
import { healthRoutes } from "./routes/health.js";
import { pushRoutes } from "./routes/push.js";

export interface AppDeps {
  service: SyncService;
  verifier: PushVerifier;
  /** Empty string leaves the admin routes open */
  adminToken: string;
  logger: Logger;
}

export function createApp(deps: AppDeps): Hono {
  const app = new Hono();
  const { logger } = deps;

  // Middleware
  app.use("*", requestLogger((message, ...rest) => logger.debug({ request: rest.join(" ") }, message)));

  // Public routes (push carries its own origin check)
  app.route("/healthz", healthRoutes);
  app.route("/pubsub", pushRoutes(deps));

  // Protected routes
  app.use("/admin/*", adminToken(deps.adminToken));
  app.route("/admin", adminRoutes(deps.service));

  app.onError((error, c) => {
    if (error instanceof AuthRejectedError) {
      logger.warn({ path: c.req.path, reason: error.message }, "Request rejected");
      return c.json({ detail: "Unauthorized" }, 401);
    }
    if (error instanceof StateUnavailableError) {
      logger.error({ path: c.req.path, err: error }, "State store unavailable");
      return c.json({ detail: error.message }, 503);
    }
    if (error instanceof ZodError) {
      return c.json({ detail: "Invalid request", issues: error.issues }, 400);
    }
    logger.error({ path: c.req.path, err: error }, "Unhandled request error");
    return c.json({ detail: errorMessage(error) }, 500);
  });

  return app;
}
