import type { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { DomainError, ValidationError } from "../errors";
import { log } from "../log";
import { formatZodIssues } from "../utils/validation";

export interface ErrorBody {
  message: string;
  code: string;
  errors?: string[];
  stack?: string;
}

export function toErrorResponse(err: unknown, exposeStack: boolean): { status: number; body: ErrorBody } {
  if (err instanceof DomainError) {
    const body: ErrorBody = { message: err.message, code: err.code };
    if (err instanceof ValidationError && err.details.length > 0) {
      body.errors = err.details;
    }
    return { status: err.status, body };
  }

  if (err instanceof ZodError) {
    return {
      status: 400,
      body: { message: "Invalid request", code: "INVALID_PARAMETERS", errors: formatZodIssues(err) },
    };
  }

  const body: ErrorBody = { message: "Internal Server Error", code: "INTERNAL_ERROR" };
  if (err instanceof Error) {
    body.message = err.message || body.message;
    if (exposeStack) {
      body.stack = err.stack;
    }
  }
  return { status: 500, body };
}

// Global error handler with detailed logging
export function createErrorHandler(options: { exposeStack: boolean }) {
  return (err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const { status, body } = toErrorResponse(err, options.exposeStack);

    if (status === 500) {
      log(`Error handling request: ${body.message}`);
      if (err instanceof Error && err.stack) {
        log(`Stack trace: ${err.stack}`);
      }
    }

    res.status(status).json(body);
  };
}
