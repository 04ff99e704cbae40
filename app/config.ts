export type LogLevel = "debug" | "info" | "warn" | "error";

export type AppConfig = {
  databaseUrl: string;
  webhookSecret: string | null;
  logLevel: LogLevel;
  port: number;
};

const DEFAULT_DB_URL = "sqlite:////data/app.db";
const DEFAULT_PORT = 8000;
const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const databaseUrl = (env.DATABASE_URL ?? DEFAULT_DB_URL).trim();
  const secret = env.WEBHOOK_SECRET?.trim() ?? null;
  const rawLogLevel = (env.LOG_LEVEL ?? "info").trim().toLowerCase();
  const port = Number.parseInt(env.PORT ?? "", 10);

  return {
    databaseUrl: databaseUrl || DEFAULT_DB_URL,
    webhookSecret: secret && secret.length > 0 ? secret : null,
    logLevel: isLogLevel(rawLogLevel) ? rawLogLevel : "info",
    port: Number.isInteger(port) && port > 0 ? port : DEFAULT_PORT,
  };
}
