import { Hono } from "hono";
import { AuthRejectedError, MalformedInputError, StateUnavailableError, errorMessage } from "../../lib/errors.js";
import type { Logger } from "../../lib/logger.js";
import type { PushVerifier } from "../../services/google/push-verifier.js";
import { decodeNotification } from "../../sync/push-handler.js";
import type { SyncService } from "../../sync/service.js";
import type { Notification } from "../../shared/types/sync.js";

export interface PushRouteDeps {
  service: SyncService;
  verifier: PushVerifier;
  logger: Logger;
}

export function pushRoutes({ service, verifier, logger }: PushRouteDeps) {
  const routes = new Hono();

  // POST /pubsub/push - Receive Gmail Pub/Sub push notifications
  routes.post("/push", async (c) => {
    await verifier.verify({
      authorization: c.req.header("Authorization"),
      token: c.req.query("token"),
    });

    let notification: Notification;
    try {
      notification = decodeNotification(await c.req.json());
    } catch (error) {
      // Acknowledge poison messages so Pub/Sub stops redelivering them
      const reason = error instanceof MalformedInputError ? error.message : `Invalid JSON body: ${errorMessage(error)}`;
      logger.warn({ reason }, "Push envelope rejected");
      return c.json({ ok: true, error: reason });
    }

    try {
      const result = await service.handlePush(notification);
      return c.json({ ok: true, ...result });
    } catch (error) {
      if (error instanceof StateUnavailableError || error instanceof AuthRejectedError) {
        throw error;
      }
      logger.error({ err: error, historyMarker: notification.historyMarker }, "Push processing failed");
      return c.json({ ok: true, retryable: true, error: errorMessage(error) });
    }
  });

  return routes;
}
