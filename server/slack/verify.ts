/**
 * Slack Signature Verification
 *
 * Purpose:
 * Verifies that incoming webhooks are genuinely from Slack using HMAC-SHA256
 * signature validation. Prevents replay attacks with timestamp checking.
 *
 * The HMAC is computed over the exact bytes received. Re-serializing a parsed
 * body changes whitespace and key order and breaks the comparison, so callers
 * must pass the raw buffer.
 *
 * Layer: Slack (security)
 */

import crypto from "crypto";
import { SLACK_CONSTANTS } from "../config/constants";

export interface VerifyOptions {
  /** Allowed clock skew in seconds, past or future. */
  toleranceSeconds?: number;
  /** Current time in milliseconds; defaults to Date.now(). */
  now?: number;
}

const INTEGER_PATTERN = /^-?\d+$/;

export function computeSlackSignature(timestamp: string, body: Buffer, secret: string | Buffer): string {
  const version = SLACK_CONSTANTS.SIGNATURE_VERSION;
  const hmac = crypto
    .createHmac("sha256", secret)
    .update(`${version}:${timestamp}:`)
    .update(body)
    .digest("hex");
  return `${version}=${hmac}`;
}

/**
 * Returns false for a malformed, stale or mismatched request; never throws.
 * Any false must be treated as "reject", not "retry".
 */
export function verifySlackSignature(
  timestamp: string | undefined,
  signature: string | undefined,
  body: Buffer,
  secret: string | Buffer,
  options: VerifyOptions = {},
): boolean {
  if (!timestamp || !signature || !INTEGER_PATTERN.test(timestamp)) {
    return false;
  }

  // Prevent replay attacks
  const toleranceSeconds = options.toleranceSeconds ?? SLACK_CONSTANTS.SIGNATURE_TOLERANCE_SECONDS;
  const nowSeconds = (options.now ?? Date.now()) / 1000;
  const ts = Number(timestamp);
  if (!Number.isSafeInteger(ts) || Math.abs(nowSeconds - ts) > toleranceSeconds) {
    return false;
  }

  const expected = Buffer.from(computeSlackSignature(timestamp, body, secret), "utf8");
  const provided = Buffer.from(signature, "utf8");

  // timingSafeEqual throws on length mismatch
  if (expected.length !== provided.length) {
    return false;
  }
  return crypto.timingSafeEqual(expected, provided);
}
