/**
 * @closegate/node: Entry point.
 *
 * Bootstraps the Hono app, loads config, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadCubeSnapshot, seedFromSnapshot } from "@closegate/cube";
import { FileLogSink, PinoLogSink } from "@closegate/audit";
import type { LogSink } from "@closegate/audit";
import {
  ConfigRoleDirectory,
  HttpEmailChannel,
  HttpWebhookChannel,
  LogEmailChannel,
  NotificationDispatcher,
} from "@closegate/notify";
import { loadConfig } from "./config.js";
import { createApp } from "./app.js";
import { CloseGateService } from "./services/close-gate-service.js";

// =============================================================================
// Bootstrap
// =============================================================================

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const snapshot =
    config.CUBE_SNAPSHOT_PATH !== undefined
      ? loadCubeSnapshot(config.CUBE_SNAPSHOT_PATH)
      : seedFromSnapshot({});
  logger.info(
    { snapshot: config.CUBE_SNAPSHOT_PATH ?? null, cells: snapshot.cube.size },
    "Cube loaded",
  );

  const email =
    config.MAIL_RELAY_URL !== undefined
      ? new HttpEmailChannel({ url: config.MAIL_RELAY_URL, apiKey: config.MAIL_RELAY_API_KEY })
      : new LogEmailChannel(logger.child({ component: "mail" }));
  if (config.MAIL_RELAY_URL === undefined) {
    logger.warn("No MAIL_RELAY_URL configured; emails are logged, not sent");
  }

  const notifier = new NotificationDispatcher({
    email,
    webhook: new HttpWebhookChannel(),
    directory: new ConfigRoleDirectory(snapshot.config),
    appName: config.APP_NAME,
    from: config.MAIL_FROM,
    attemptTimeoutMs: config.NOTIFY_ATTEMPT_TIMEOUT_MS,
    logger: logger.child({ component: "notify" }),
  });

  const auditSinks: LogSink[] = [new PinoLogSink(logger.child({ component: "audit" }))];
  if (config.AUDIT_LOG_PATH !== undefined) {
    auditSinks.push(new FileLogSink(config.AUDIT_LOG_PATH));
  }

  const service = new CloseGateService({
    repository: snapshot.cube,
    config: snapshot.config,
    entities: snapshot.entities,
    notifier,
    auditSinks,
    evaluationTimeoutMs: config.EVALUATION_TIMEOUT_MS,
    logger,
  });

  const { app } = createApp({
    service,
    logger: logger.child({ component: "http" }),
    onInternalError: (err, requestId) => {
      logger.error({ err, requestId }, "Unhandled request error");
    },
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info({ port: config.PORT, host: config.HOST }, "Close gate node started");

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close(() => {
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
