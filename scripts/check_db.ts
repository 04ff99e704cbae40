import { loadConfig } from "../app/config.ts";
import { MessageStore } from "../app/storage.ts";

const url = process.env.DATABASE_URL || "sqlite:./data/app.db";
const store = new MessageStore(url);

try {
  store.initSchema();
  console.log("initSchema succeeded for:", url, "->", store.path);
  console.log(store.isReady() ? "DB ready" : "DB not ready");
  console.log("stats:", store.stats());
  if (!loadConfig().webhookSecret) {
    console.warn("WEBHOOK_SECRET is not set; the server would refuse to start");
  }
} catch (err) {
  console.error("initSchema failed:", err);
  process.exitCode = 1;
} finally {
  store.close();
}
