import { z } from "zod";
import { ValidationError } from "./errors.ts";
import type { MessageRecord } from "./models.ts";
import type { MessageFilters, MessageStore } from "./storage.ts";

export const DEFAULT_LIMIT = 50;
export const MAX_LIMIT = 100;

const optionalFilter = z
  .string()
  .optional()
  .transform((value) => (value ? value : undefined));

// Plain decimal digits only: Number() would also take "1e2", "0x10" and
// padded values. Offsets stop at MAX_SAFE_INTEGER so SQLite binds an integer.
function integerParam(name: string, min: number, max: number, rangeMessage: string) {
  return z
    .string()
    .regex(/^-?\d+$/, `${name} must be an integer`)
    .transform(Number)
    .pipe(z.number().min(min, rangeMessage).max(max, rangeMessage))
    .optional();
}

export const messagesQuerySchema = z.object({
  limit: integerParam("limit", 1, MAX_LIMIT, `limit must be between 1 and ${MAX_LIMIT}`),
  offset: integerParam(
    "offset",
    0,
    Number.MAX_SAFE_INTEGER,
    `offset must be between 0 and ${Number.MAX_SAFE_INTEGER}`
  ),
  from: optionalFilter,
  since: optionalFilter,
  q: optionalFilter,
});

export type MessagesPage = {
  data: MessageRecord[];
  total: number;
  limit: number;
  offset: number;
};

export type StatsResponse = {
  total_messages: number;
  senders_count: number;
  messages_per_sender: { from: string; count: number }[];
  first_message_ts: string | null;
  last_message_ts: string | null;
};

/**
 * Reads `limit`, `offset`, `from`, `since` and `q`. Out-of-range paging is
 * rejected, never clamped; the filters are passed on as given.
 */
export function parseMessagesQuery(params: URLSearchParams): MessageFilters {
  const parsed = messagesQuerySchema.safeParse({
    limit: params.get("limit") ?? undefined,
    offset: params.get("offset") ?? undefined,
    from: params.get("from") ?? undefined,
    since: params.get("since") ?? undefined,
    q: params.get("q") ?? undefined,
  });
  if (!parsed.success) {
    throw new ValidationError(
      parsed.error.issues.map((issue) => ({
        field: issue.path.join("."),
        message: issue.message,
      }))
    );
  }
  const { limit, offset, from, since, q } = parsed.data;
  return { limit: limit ?? DEFAULT_LIMIT, offset: offset ?? 0, from, since, q };
}

export class QueryService {
  constructor(private readonly store: MessageStore) {}

  listMessages(params: URLSearchParams): MessagesPage {
    const filters = parseMessagesQuery(params);
    const { data, total } = this.store.query(filters);
    return { data, total, limit: filters.limit, offset: filters.offset };
  }

  stats(): StatsResponse {
    const stats = this.store.stats();
    return {
      total_messages: stats.totalMessages,
      senders_count: stats.uniqueSenderCount,
      messages_per_sender: stats.topSenders,
      first_message_ts: stats.firstTs,
      last_message_ts: stats.lastTs,
    };
  }
}
