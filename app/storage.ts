import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import { StorageUnavailable } from "./errors.ts";
import { isoSeconds } from "./logging_utils.ts";
import type { MessageRecord, WebhookMessage } from "./models.ts";

export const MEMORY_PATH = ":memory:";

const TOP_SENDERS_LIMIT = 10;

/**
 * Map a `DATABASE_URL` onto a SQLite file path.
 *
 * `sqlite:////data/app.db` is the absolute `/data/app.db`,
 * `sqlite:///data/app.db` the relative `data/app.db` and
 * `sqlite:./data/app.db` the relative `./data/app.db`.
 */
export function sqlitePathFromUrl(url: string): string {
  const trimmed = url.trim();
  if (!trimmed || trimmed === "sqlite://" || trimmed === "sqlite:///") return MEMORY_PATH;
  if (/:memory:?$/i.test(trimmed)) return MEMORY_PATH;

  if (trimmed.startsWith("sqlite:///")) return trimmed.slice("sqlite:///".length);
  if (trimmed.startsWith("sqlite:")) return trimmed.slice("sqlite:".length);
  return trimmed;
}

export type MessageFilters = {
  limit: number;
  offset: number;
  from?: string;
  since?: string;
  q?: string;
};

export type InsertOutcome = { outcome: "created" } | { outcome: "duplicate" };

export type SenderCount = { from: string; count: number };

export type MessageStats = {
  totalMessages: number;
  uniqueSenderCount: number;
  topSenders: SenderCount[];
  firstTs: string | null;
  lastTs: string | null;
};

type MessageRow = {
  message_id: string;
  from_msisdn: string;
  to_msisdn: string;
  ts: string;
  text: string | null;
};

type CountRow = { count: number };

/**
 * Durable table of messages keyed by `message_id`. The primary key is the
 * only duplicate check: a second insert of the same id is a no-op reported
 * as `duplicate`, even when it races with the first.
 */
export class MessageStore {
  readonly path: string;
  private db: Database.Database | null = null;

  constructor(databaseUrl: string) {
    this.path = sqlitePathFromUrl(databaseUrl);
  }

  initSchema(): void {
    try {
      const database = this.open();
      database.exec(`
        CREATE TABLE IF NOT EXISTS messages (
          message_id TEXT PRIMARY KEY,
          from_msisdn TEXT NOT NULL,
          to_msisdn TEXT NOT NULL,
          ts TEXT NOT NULL,
          text TEXT,
          created_at TEXT NOT NULL
        )
      `);
      database.exec("CREATE INDEX IF NOT EXISTS idx_messages_ts ON messages (ts, message_id)");
      database.exec("CREATE INDEX IF NOT EXISTS idx_messages_from ON messages (from_msisdn)");
    } catch (err) {
      throw new StorageUnavailable("schema initialization", err);
    }
  }

  insert(message: WebhookMessage): InsertOutcome {
    const database = this.connection("insert");
    try {
      const info = database
        .prepare<unknown[]>(
          `INSERT INTO messages (message_id, from_msisdn, to_msisdn, ts, text, created_at)
           VALUES (?, ?, ?, ?, ?, ?)
           ON CONFLICT(message_id) DO NOTHING`
        )
        .run(
          message.message_id,
          message.from,
          message.to,
          message.ts,
          message.text ?? null,
          isoSeconds()
        );
      return info.changes > 0 ? { outcome: "created" } : { outcome: "duplicate" };
    } catch (err) {
      throw new StorageUnavailable("insert", err);
    }
  }

  query(filters: MessageFilters): { data: MessageRecord[]; total: number } {
    const database = this.connection("query");
    const clauses: string[] = [];
    const params: unknown[] = [];

    if (filters.from) {
      clauses.push("from_msisdn = ?");
      params.push(filters.from);
    }
    if (filters.since) {
      clauses.push("ts >= ?");
      params.push(filters.since);
    }
    if (filters.q) {
      // instr() is a plain, case-sensitive substring match; LIKE would fold
      // ASCII case and treat % and _ as wildcards.
      clauses.push("instr(text, ?) > 0");
      params.push(filters.q);
    }

    const where = clauses.length ? `WHERE ${clauses.join(" AND ")}` : "";

    try {
      const rows = database
        .prepare<unknown[], MessageRow>(
          `SELECT message_id, from_msisdn, to_msisdn, ts, text
           FROM messages
           ${where}
           ORDER BY ts ASC, message_id ASC
           LIMIT ? OFFSET ?`
        )
        .all(...params, filters.limit, filters.offset);

      const totalRow = database
        .prepare<unknown[], CountRow>(`SELECT COUNT(*) AS count FROM messages ${where}`)
        .get(...params);

      return {
        data: rows.map((r) => ({
          message_id: r.message_id,
          from: r.from_msisdn,
          to: r.to_msisdn,
          ts: r.ts,
          text: r.text,
        })),
        total: totalRow?.count ?? 0,
      };
    } catch (err) {
      throw new StorageUnavailable("query", err);
    }
  }

  stats(): MessageStats {
    const database = this.connection("stats");
    try {
      const totals = database
        .prepare<[], { total: number; senders: number; first_ts: string | null; last_ts: string | null }>(
          `SELECT COUNT(*) AS total,
                  COUNT(DISTINCT from_msisdn) AS senders,
                  MIN(ts) AS first_ts,
                  MAX(ts) AS last_ts
           FROM messages`
        )
        .get();

      const topSenders = database
        .prepare<[number], { from_msisdn: string; count: number }>(
          `SELECT from_msisdn, COUNT(*) AS count
           FROM messages
           GROUP BY from_msisdn
           ORDER BY count DESC, from_msisdn ASC
           LIMIT ?`
        )
        .all(TOP_SENDERS_LIMIT);

      return {
        totalMessages: totals?.total ?? 0,
        uniqueSenderCount: totals?.senders ?? 0,
        topSenders: topSenders.map((r) => ({ from: r.from_msisdn, count: r.count })),
        firstTs: totals?.first_ts ?? null,
        lastTs: totals?.last_ts ?? null,
      };
    } catch (err) {
      throw new StorageUnavailable("stats", err);
    }
  }

  isReady(): boolean {
    if (!this.db) return false;
    try {
      const row = this.db
        .prepare<[], { name: string }>(
          "SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'messages'"
        )
        .get();
      return row !== undefined;
    } catch {
      return false;
    }
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  private open(): Database.Database {
    if (this.db) return this.db;

    if (this.path !== MEMORY_PATH) {
      const dir = path.dirname(this.path);
      if (dir && dir !== ".") fs.mkdirSync(dir, { recursive: true });
    }

    const database = new Database(this.path);
    if (this.path !== MEMORY_PATH) {
      database.pragma("journal_mode = WAL");
    }
    this.db = database;
    return database;
  }

  private connection(operation: string): Database.Database {
    if (!this.db) {
      throw new StorageUnavailable(operation, new Error("database is not open"));
    }
    return this.db;
  }
}
