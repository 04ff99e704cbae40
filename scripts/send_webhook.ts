import { computeHmac } from "../app/security.ts";
import { isoSeconds } from "../app/logging_utils.ts";

const secret = process.env.WEBHOOK_SECRET || "test-secret";
const baseUrl = process.env.URL || "http://localhost:8000";

async function send(body: object): Promise<void> {
  const raw = JSON.stringify(body);

  const res = await fetch(`${baseUrl}/webhook`, {
    method: "POST",
    headers: {
      "Content-Type": "application/json",
      "X-Signature": computeHmac(secret, raw),
    },
    body: raw,
  });

  const text = await res.text();
  console.log(`POST ${res.status} ${res.statusText} -> ${text}`);
}

async function get(path: string): Promise<void> {
  const res = await fetch(`${baseUrl}${path}`);
  const text = await res.text();
  console.log(`GET ${path} -> ${res.status}\n${text}`);
}

async function main(): Promise<void> {
  const message = {
    message_id: "m-smoke-1",
    from: "+10000000001",
    to: "+10000000002",
    ts: isoSeconds(),
    text: "smoke test",
  };

  console.log("Sending first webhook (should create)");
  await send(message);

  console.log("Sending duplicate webhook (should be idempotent)");
  await send(message);

  await get("/messages?limit=10&offset=0");
  await get("/stats");
  await get("/health/ready");
  await get("/metrics");
}

main().catch((e: unknown) => {
  console.error(e);
  process.exit(1);
});
