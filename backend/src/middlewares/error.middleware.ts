import type { Request, Response, NextFunction } from "express";

import { isAppError } from "../errors/app-error";

export interface ApiError {
  message: string;
  code: string;
  details?: string[];
}

export function notFoundHandler(_req: Request, res: Response<ApiError>) {
  res.status(404).json({ message: "Not found", code: "NOT_FOUND" });
}

function isMalformedJson(err: unknown): boolean {
  return (
    err instanceof SyntaxError &&
    "type" in err &&
    err.type === "entity.parse.failed"
  );
}

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response<ApiError>,
  _next: NextFunction,
) {
  if (isAppError(err)) {
    const body: ApiError = { message: err.message, code: err.code };
    if (err.details) body.details = err.details;

    if (err.status === 401) {
      res.setHeader("WWW-Authenticate", "Bearer");
    }

    res.status(err.status).json(body);
    return;
  }

  if (isMalformedJson(err)) {
    res.status(400).json({ message: "Malformed JSON body", code: "VALIDATION_FAILED" });
    return;
  }

  console.error(`Unhandled error on ${req.method} ${req.path}:`, err);
  res.status(500).json({ message: "Internal server error", code: "INTERNAL" });
}
