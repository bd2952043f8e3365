import type { Request, Response, NextFunction } from "express";
import type { ZodTypeAny } from "zod";
import { formatZodIssues } from "../utils/validation";

/**
 * Validates `req.body` against `schema` and replaces it with the parsed value,
 * answering 400 with the collected messages when it does not match.
 */
export function validateBody(schema: ZodTypeAny) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body);

    if (!result.success) {
      const errors = formatZodIssues(result.error);
      console.log("[Validation] Rejected request body:", { path: req.path, errors });
      return res.status(400).json({
        message: "Invalid request body",
        code: "INVALID_PARAMETERS",
        errors,
      });
    }

    req.body = result.data;
    next();
  };
}

export function requireAuth(req: Request, res: Response, next: NextFunction) {
  if (!req.isAuthenticated()) {
    return res.status(401).json({
      message: "Authentication required",
      code: "AUTH_REQUIRED",
    });
  }
  next();
}
