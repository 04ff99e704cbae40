import { createHmac, timingSafeEqual } from "node:crypto";

export function computeHmac(secret: string, body: string | Uint8Array): string {
  return createHmac("sha256", secret).update(body).digest("hex");
}

/**
 * Check a hex HMAC-SHA256 signature against the exact request bytes.
 * A missing secret or signature never verifies.
 */
export function isValidSignature(
  provided: string | null | undefined,
  secret: string | null,
  rawBody: string | Uint8Array
): boolean {
  if (!secret || !provided) return false;
  const expected = computeHmac(secret, rawBody);
  return timingSafeEqualHex(expected, provided);
}

function timingSafeEqualHex(expected: string, provided: string): boolean {
  const a = Buffer.from(expected, "utf8");
  const b = Buffer.from(provided, "utf8");
  if (a.length !== b.length) return false;
  return timingSafeEqual(a, b);
}

/** Holds the shared webhook secret for the life of the process. */
export class SignatureVerifier {
  constructor(private readonly secret: string | null) {}

  get isConfigured(): boolean {
    return this.secret !== null && this.secret.length > 0;
  }

  verify(rawBody: Uint8Array, provided: string | null | undefined): boolean {
    return isValidSignature(provided, this.secret, rawBody);
  }
}
