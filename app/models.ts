import { TextDecoder } from "node:util";
import { z } from "zod";
import { ValidationError, type FieldIssue } from "./errors.ts";

export const MAX_TEXT_LENGTH = 4096;

export const ISO_UTC_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/;
export const E164_PATTERN = /^\+\d+$/;

export const isoUtcString = z
  .string()
  .regex(ISO_UTC_PATTERN, "ts must be ISO-8601 UTC: YYYY-MM-DDTHH:MM:SSZ");

export const phoneSchema = z
  .string()
  .regex(E164_PATTERN, "must start with + followed by digits");

// Length is counted in characters, so astral symbols count once.
const textSchema = z
  .string()
  .refine((value) => [...value].length <= MAX_TEXT_LENGTH, {
    message: `text must be at most ${MAX_TEXT_LENGTH} characters`,
  });

export const webhookMessageSchema = z.object({
  message_id: z.string().min(1, "message_id required"),
  from: phoneSchema,
  to: phoneSchema,
  ts: isoUtcString,
  text: textSchema.nullable().optional(),
});

export type WebhookMessage = z.infer<typeof webhookMessageSchema>;

const utf8 = new TextDecoder("utf-8", { fatal: true });

/** A message as the read endpoints expose it. */
export type MessageRecord = {
  message_id: string;
  from: string;
  to: string;
  ts: string;
  text: string | null;
};

function issuesOf(error: z.ZodError): FieldIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join(".") : "body",
    message: issue.message,
  }));
}

/**
 * Decode and check a webhook body. Every kind of failure, from broken JSON
 * to a bad timestamp, surfaces as a `ValidationError`.
 */
export function parseWebhookPayload(rawBody: Buffer | string): WebhookMessage {
  let text: string;
  try {
    text = typeof rawBody === "string" ? rawBody : utf8.decode(rawBody);
  } catch {
    throw new ValidationError([{ field: "body", message: "invalid utf-8" }]);
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    throw new ValidationError([{ field: "body", message: "invalid json" }]);
  }

  const parsed = webhookMessageSchema.safeParse(json);
  if (!parsed.success) {
    throw new ValidationError(issuesOf(parsed.error));
  }
  return parsed.data;
}
