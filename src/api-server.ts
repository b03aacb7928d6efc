import "reflect-metadata";
import * as crypto from "crypto";
import type { Server } from "http";
import express, { NextFunction, Request, RequestHandler, Response } from "express";
import { DependencyContainer } from "tsyringe";
import { IWebhookIngestor } from "./services/webhook-ingestor.interface";
import { SyncScheduler } from "./services/sync-scheduler.service";
import { IPackageStore } from "./store/package-store.interface";
import { Logger } from "./utils/logger";

export interface WebhookServerOptions {
  token?: string;
}

// Constant-time comparison so the token cannot be guessed by timing
function tokensMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided, "utf8");
  const b = Buffer.from(expected, "utf8");
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}

/**
 * POST /webhook handler. Every authorized request is acknowledged with 200,
 * whether or not the package is tracked.
 */
export function createWebhookHandler(
  ingestor: IWebhookIngestor,
  logger: Logger,
  options: WebhookServerOptions = {},
): RequestHandler {
  return async (req: Request, res: Response) => {
    if (options.token) {
      const provided = req.header("x-webhook-token") ?? "";
      if (!tokensMatch(provided, options.token)) {
        logger.warn({ ip: req.ip }, "Webhook rejected: invalid or missing token");
        res.status(401).json({ success: false, error: "Unauthorized" });
        return;
      }
    }

    const result = await ingestor.handleWebhook(req.body);
    res.json({ success: true, trackingNumber: result.trackingNumber });
  };
}

export function createApp(
  ingestor: IWebhookIngestor,
  logger: Logger,
  options: WebhookServerOptions = {},
): express.Express {
  const app = express();
  const log = logger.child({ component: "api-server" });

  app.use(express.json({ limit: "1mb" }));

  app.post("/webhook", createWebhookHandler(ingestor, log, options));

  // Health check endpoint
  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  // Body parse failures on /webhook are acknowledged like any other bad payload
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (req.path === "/webhook") {
      log.warn({ err }, "Rejected unreadable webhook body");
      res.json({ success: true, trackingNumber: null });
      return;
    }

    log.error({ err, path: req.path }, "Request failed");
    res.status(500).json({ success: false, error: "Internal server error" });
  });

  return app;
}

/**
 * Starts the webhook server and, when configured, the sync scheduler.
 * Both are stopped and the store closed on SIGINT/SIGTERM.
 */
export function startServer(
  services: DependencyContainer,
  port: number,
  options: WebhookServerOptions = {},
): Promise<Server> {
  const logger = services.resolve<Logger>("Logger");
  const ingestor = services.resolve<IWebhookIngestor>("IWebhookIngestor");
  const scheduler = services.resolve(SyncScheduler);
  const store = services.resolve<IPackageStore>("IPackageStore");

  const app = createApp(ingestor, logger, options);

  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      logger.info({ port }, `Webhook server running on http://localhost:${port}`);
      logger.info(`Health check: http://localhost:${port}/health`);
      scheduler.start();
      resolve(server);
    });
    server.on("error", reject);

    const shutdown = (signal: string) => {
      logger.info({ signal }, "Shutting down webhook server");
      scheduler.stop();
      server.close(() => {
        store.close();
      });
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
  });
}
