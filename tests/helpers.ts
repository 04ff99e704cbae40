import type { Server } from "node:http";
import type { Express } from "express";
import type { LogLevel } from "../app/config.ts";
import { createLogger, type Logger } from "../app/logging_utils.ts";
import type { WebhookMessage } from "../app/models.ts";
import { computeHmac } from "../app/security.ts";

export const SECRET = "test-secret";

export type LogLine = Record<string, unknown>;

export function captureLogger(level: LogLevel = "debug"): { logger: Logger; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const logger = createLogger(level, {
    write(msg: string) {
      lines.push(JSON.parse(msg));
    },
  });
  return { logger, lines };
}

export function message(overrides: Partial<WebhookMessage> = {}): WebhookMessage {
  return {
    message_id: "m1",
    from: "+919876543210",
    to: "+14155550100",
    ts: "2025-01-15T10:00:00Z",
    text: "Hello",
    ...overrides,
  };
}

export function signed(body: unknown, secret: string = SECRET): { raw: string; signature: string } {
  const raw = typeof body === "string" ? body : JSON.stringify(body);
  return { raw, signature: computeHmac(secret, raw) };
}

export async function listen(app: Express): Promise<{ server: Server; baseUrl: string }> {
  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
    listening.once("error", reject);
  });
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("server is not listening on a TCP port");
  }
  return { server, baseUrl: `http://127.0.0.1:${address.port}` };
}

export function close(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
