import crypto from "crypto";

export function generateRefreshToken(): string {
  return crypto.randomBytes(64).toString("hex");
}

export function generateVerificationToken(): string {
  return crypto.randomBytes(32).toString("hex");
}

// Only digests are persisted; raw tokens leave the server once.
export function hashToken(token: string): string {
  return crypto.createHash("sha256").update(token).digest("hex");
}
