import { AppError, AuthError, NotReadyError, StorageUnavailable, ValidationError } from "./errors.ts";
import type { Metrics } from "./metrics.ts";
import { parseWebhookPayload } from "./models.ts";
import type { RequestContext } from "./request_context.ts";
import type { SignatureVerifier } from "./security.ts";
import type { MessageStore } from "./storage.ts";

export type IngestionStage =
  | "received"
  | "signature_checked"
  | "validated"
  | "stored"
  | "responded";

export type WebhookOutcome =
  | "created"
  | "duplicate"
  | "invalid_signature"
  | "validation_error"
  | "secret_missing"
  | "storage_error";

export type IngestRequest = {
  rawBody: Buffer;
  signature: string | undefined;
  context: RequestContext;
};

export type IngestResult = {
  outcome: "created" | "duplicate";
  messageId: string;
};

export type IngestionDeps = {
  store: MessageStore;
  verifier: SignatureVerifier;
  metrics: Metrics;
};

function outcomeOf(err: unknown): WebhookOutcome {
  if (err instanceof AuthError) return "invalid_signature";
  if (err instanceof ValidationError) return "validation_error";
  if (err instanceof NotReadyError) return "secret_missing";
  return "storage_error";
}

/**
 * Runs one webhook delivery through verify, validate and store. Every call
 * writes exactly one log entry and one outcome count, including the calls
 * that end in an error; the error is then rethrown for the HTTP layer.
 */
export class IngestionService {
  private readonly store: MessageStore;
  private readonly verifier: SignatureVerifier;
  private readonly metrics: Metrics;

  constructor(deps: IngestionDeps) {
    this.store = deps.store;
    this.verifier = deps.verifier;
    this.metrics = deps.metrics;
  }

  ingest({ rawBody, signature, context }: IngestRequest): IngestResult {
    let stage: IngestionStage = "received";
    let messageId: string | undefined;

    try {
      if (!this.verifier.isConfigured) {
        throw new NotReadyError();
      }
      // Signature is checked on the untouched bytes, before any parsing.
      if (!this.verifier.verify(rawBody, signature)) {
        throw new AuthError();
      }
      stage = "signature_checked";

      const message = parseWebhookPayload(rawBody);
      messageId = message.message_id;
      stage = "validated";

      const { outcome } = this.store.insert(message);
      stage = "stored";

      this.metrics.recordWebhookResult(outcome);
      context.log.info(
        { message_id: messageId, dup: outcome === "duplicate", result: outcome, stage },
        `webhook processed: ${outcome}`
      );
      return { outcome, messageId };
    } catch (err) {
      const outcome = outcomeOf(err);
      this.metrics.recordWebhookResult(outcome);

      const fields = { message_id: messageId, result: outcome, stage };
      if (err instanceof StorageUnavailable || !(err instanceof AppError)) {
        context.log.error({ ...fields, err }, "webhook storage failure");
      } else if (err instanceof ValidationError) {
        context.log.warn({ ...fields, details: err.details }, "webhook validation failed");
      } else {
        context.log.warn(fields, err.message);
      }
      throw err;
    }
  }
}
