import express, { type ErrorRequestHandler, type Express } from "express";
import type { Server } from "node:http";
import { loadConfig, type AppConfig } from "./config.ts";
import { AppError, StorageUnavailable, ValidationError } from "./errors.ts";
import { IngestionService } from "./ingestion.ts";
import { createLogger, logRequest, type Logger } from "./logging_utils.ts";
import { Metrics } from "./metrics.ts";
import { QueryService } from "./query_service.ts";
import { createRequestContext } from "./request_context.ts";
import { SignatureVerifier } from "./security.ts";
import { MessageStore } from "./storage.ts";

const MAX_WEBHOOK_BODY = "1mb";

export type AppDeps = {
  store: MessageStore;
  verifier: SignatureVerifier;
  metrics: Metrics;
  logger: Logger;
};

function searchParamsOf(originalUrl: string): URLSearchParams {
  return new URL(originalUrl, "http://localhost").searchParams;
}

function statusOf(err: unknown): number {
  if (err instanceof AppError) return err.status;
  // body-parser reports oversized or aborted bodies with an http status
  if (
    typeof err === "object" &&
    err !== null &&
    "status" in err &&
    typeof err.status === "number" &&
    err.status >= 400 &&
    err.status < 600
  ) {
    return err.status;
  }
  return 500;
}

export function createApp(deps: AppDeps): Express {
  const { store, verifier, metrics, logger } = deps;
  const ingestion = new IngestionService({ store, verifier, metrics });
  const queries = new QueryService(store);

  const app = express();
  app.disable("x-powered-by");

  app.use((req, res, next) => {
    const context = createRequestContext(logger);
    req.context = context;
    res.on("finish", () => {
      const latency = performance.now() - context.startedAt;
      metrics.recordHttpRequest(req.path, res.statusCode);
      metrics.recordLatency(latency);
      logRequest(context.log, {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        latency_ms: Math.round(latency * 100) / 100,
      });
    });
    next();
  });

  // Every content type is read as raw bytes so the signature covers exactly
  // what was sent. Encoded bodies are refused with 415, never inflated.
  app.post(
    "/webhook",
    express.raw({ type: () => true, limit: MAX_WEBHOOK_BODY, inflate: false }),
    (req, res) => {
      const rawBody = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
      ingestion.ingest({
        rawBody,
        signature: req.header("x-signature"),
        context: req.context,
      });
      res.status(200).json({ status: "ok" });
    }
  );

  app.get("/messages", (req, res) => {
    res.json(queries.listMessages(searchParamsOf(req.originalUrl)));
  });

  app.get("/stats", (_req, res) => {
    res.json(queries.stats());
  });

  app.get("/health/live", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get("/health/ready", (_req, res) => {
    if (!verifier.isConfigured) {
      res.status(503).json({ status: "not ready", reason: "WEBHOOK_SECRET not set" });
      return;
    }
    if (!store.isReady()) {
      res.status(503).json({ status: "not ready", reason: "database not ready" });
      return;
    }
    res.json({ status: "ready" });
  });

  app.get("/metrics", (_req, res) => {
    res.setHeader("Content-Type", "text/plain; version=0.0.4");
    res.send(metrics.render());
  });

  app.use((_req, res) => {
    res.status(404).json({ detail: "Not found" });
  });

  const errorHandler: ErrorRequestHandler = (err, req, res, _next) => {
    const status = statusOf(err);
    // Bodies refused by the parser never reach the ingestion service.
    if (req.method === "POST" && req.path === "/webhook" && !(err instanceof AppError)) {
      metrics.recordWebhookResult("validation_error");
      req.context.log.warn({ result: "validation_error", stage: "received", status }, "webhook body rejected");
    }
    if (status >= 500) {
      req.context.log.error({ err }, "request failed");
    }
    if (err instanceof ValidationError) {
      res.status(status).json({ detail: err.details });
      return;
    }
    if (err instanceof AppError) {
      res.status(status).json({ detail: err instanceof StorageUnavailable ? "storage unavailable" : err.message });
      return;
    }
    res.status(status).json({ detail: status >= 500 ? "internal server error" : "bad request" });
  };
  app.use(errorHandler);

  return app;
}

export type RunningServer = {
  server: Server;
  store: MessageStore;
  logger: Logger;
  stop(): Promise<void>;
};

/**
 * Fails before listening when the secret is missing or the schema cannot be
 * created, so the process never serves traffic in either state.
 */
export async function startServer(config: AppConfig = loadConfig()): Promise<RunningServer> {
  const logger = createLogger(config.logLevel);

  if (!config.webhookSecret) {
    logger.error("WEBHOOK_SECRET environment variable is required");
    throw new Error("WEBHOOK_SECRET environment variable is required");
  }

  const store = new MessageStore(config.databaseUrl);
  store.initSchema();
  logger.info({ database: store.path }, "database initialized");

  const app = createApp({
    store,
    verifier: new SignatureVerifier(config.webhookSecret),
    metrics: new Metrics(),
    logger,
  });

  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(config.port, () => resolve(listening));
    listening.once("error", reject);
  });
  logger.info({ event: "server_started", port: config.port, framework: "express" }, "server started");

  return {
    server,
    store,
    logger,
    stop() {
      return new Promise<void>((resolve, reject) => {
        server.close((err) => {
          store.close();
          if (err) {
            reject(err);
            return;
          }
          resolve();
        });
      });
    },
  };
}
