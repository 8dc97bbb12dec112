// backend/src/errors.ts
import type { Response } from "express";
import { ZodError } from "zod";
import type { Logger } from "./logging";
import { sanitizeError } from "./logging";

export class ApiError extends Error {
  status: number;
  details?: unknown;

  constructor(status: number, message: string, details?: unknown) {
    super(message);
    this.status = status;
    this.details = details;
  }
}

export function isApiErrorLike(error: unknown): error is ApiError {
  return error instanceof ApiError;
}

/**
 * Render an error as `{ ok: false, error, details? }`.
 * Unknown errors become a 500 with the fallback message.
 */
export function sendError(res: Response, error: unknown, fallbackMessage: string, log?: Logger) {
  if (isApiErrorLike(error)) {
    return res.status(error.status).json({
      ok: false,
      error: error.message,
      ...(error.details !== undefined ? { details: error.details } : {}),
    });
  }

  if (error instanceof ZodError) {
    return res.status(400).json({ ok: false, error: "Invalid request body", details: error.issues });
  }

  log?.error(fallbackMessage, { error: sanitizeError(error) });
  return res.status(500).json({
    ok: false,
    error: fallbackMessage,
    details: error instanceof Error ? error.message : String(error),
  });
}
