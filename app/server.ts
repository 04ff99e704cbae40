import { startServer } from "./main.ts";

async function main(): Promise<void> {
  const running = await startServer();

  const shutdown = async (signal: string) => {
    running.logger.info({ signal }, "shutting down");
    try {
      await running.stop();
      process.exit(0);
    } catch (err) {
      running.logger.error({ err }, "error during shutdown");
      process.exit(1);
    }
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  console.error("fatal startup error:", err);
  process.exit(1);
});
