import { randomUUID } from "node:crypto";
import type { Logger } from "./logging_utils.ts";

/**
 * Per-request values handed down explicitly from the HTTP layer to every
 * call that logs.
 */
export type RequestContext = {
  requestId: string;
  log: Logger;
  startedAt: number;
};

export function createRequestContext(
  logger: Logger,
  requestId: string = randomUUID()
): RequestContext {
  return {
    requestId,
    log: logger.child({ request_id: requestId }),
    startedAt: performance.now(),
  };
}

declare global {
  namespace Express {
    interface Request {
      context: RequestContext;
    }
  }
}
