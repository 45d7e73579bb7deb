export type ErrorCode =
  | "VALIDATION_FAILED"
  | "INVALID_AMOUNT"
  | "INVALID_CATEGORY"
  | "INVALID_TOKEN"
  | "EXPIRED_TOKEN"
  | "INVALID_CREDENTIALS"
  | "INVALID_SESSION"
  | "NOT_VERIFIED"
  | "FORBIDDEN"
  | "NOT_OWNER"
  | "NOT_FOUND"
  | "DUPLICATE_EMAIL"
  | "INTERNAL";

export class AppError extends Error {
  public readonly status: number;
  public readonly code: ErrorCode;
  public readonly details?: string[];

  constructor(status: number, code: ErrorCode, message: string, details?: string[]) {
    super(message);
    this.name = "AppError";
    this.status = status;
    this.code = code;
    this.details = details;
  }
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}

export const duplicateEmail = () =>
  new AppError(409, "DUPLICATE_EMAIL", "User already exists");

export const invalidToken = () =>
  new AppError(400, "INVALID_TOKEN", "Invalid verification token");

export const expiredToken = () =>
  new AppError(400, "EXPIRED_TOKEN", "Verification token has expired");

export const invalidCredentials = () =>
  new AppError(401, "INVALID_CREDENTIALS", "Invalid credentials");

export const notVerified = () =>
  new AppError(403, "NOT_VERIFIED", "Email not verified. Please verify your email first.");

export const invalidSession = (message = "Unauthorized") =>
  new AppError(401, "INVALID_SESSION", message);

export const forbidden = () => new AppError(403, "FORBIDDEN", "Forbidden");

export const notOwner = () =>
  new AppError(403, "NOT_OWNER", "Entry belongs to another user");

export const notFound = (what = "Resource") =>
  new AppError(404, "NOT_FOUND", `${what} not found`);

export const invalidAmount = (reason: string) =>
  new AppError(400, "INVALID_AMOUNT", reason);

export const invalidCategory = (categories: readonly string[]) =>
  new AppError(
    400,
    "INVALID_CATEGORY",
    `Category must be one of: ${categories.join(", ")}`,
  );

export const validationFailed = (details: string[]) =>
  new AppError(400, "VALIDATION_FAILED", "Validation failed", details);
