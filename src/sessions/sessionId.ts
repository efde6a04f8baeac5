import { randomBytes } from "node:crypto";
import { AppError } from "../utils/errors.js";

export const SESSION_ID_MAX_LENGTH = 64;
const SESSION_ID_BYTES = 32;
const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

/** 256 random bits, base64url encoded (43 characters). */
export function generateSessionId(): string {
  return randomBytes(SESSION_ID_BYTES).toString("base64url");
}

export function isValidSessionId(raw: unknown): raw is string {
  return (
    typeof raw === "string" &&
    raw.length > 0 &&
    raw.length <= SESSION_ID_MAX_LENGTH &&
    SESSION_ID_PATTERN.test(raw)
  );
}

export function assertValidSessionId(raw: unknown): string {
  if (!isValidSessionId(raw)) {
    throw new AppError("INVALID_IDENTIFIER", `Rejected session id ${JSON.stringify(raw)}`);
  }
  return raw;
}
