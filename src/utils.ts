import { createHash, randomBytes } from "node:crypto";
import { InvalidConfigurationError } from "./exceptions";

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export function md5Hex(value: string): string {
  return createHash("md5").update(value, "utf8").digest("hex");
}

/** Random url-safe string used as the request nonce */
export function makeNonce(bytes: number = 16): string {
  return randomBytes(bytes).toString("base64url");
}

/**
 * Signature expected by the Imou open API for every request
 */
export function signRequest(timestamp: number, nonce: string, appSecret: string): string {
  return md5Hex(`time:${timestamp},nonce:${nonce},appSecret:${appSecret}`);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse a timeout option that may come from a form as a string.
 * An empty string means "use the default".
 */
export function parseTimeout(value: number | string | null | undefined): number | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "number") {
    return value;
  }
  if (value.trim() === "") {
    return null;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidConfigurationError(`timeout '${value}' is not a positive number`);
  }
  return parsed;
}
