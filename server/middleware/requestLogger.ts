import type { RequestHandler } from "express";
import { log } from "../log";

const MAX_LOG_LINE = 80;

export interface RequestLogEntry {
  method: string;
  path: string;
  status: number;
  durationMs: number;
  userId?: number;
  /** Body passed to res.json, if any. */
  json?: unknown;
  contentType?: string;
  contentLength?: number;
}

/** One line per API request; JSON bodies are inlined, other bodies are summarised by type and size. */
export function formatRequestLog(entry: RequestLogEntry): string {
  let line = `${entry.method} ${entry.path} ${entry.status} in ${entry.durationMs}ms`;
  if (entry.userId !== undefined) {
    line += ` [user ${entry.userId}]`;
  }

  if (entry.json !== undefined) {
    try {
      line += ` :: ${JSON.stringify(entry.json)}`;
    } catch (e) {
      line += ` :: [Error stringifying response: ${e}]`;
    }
  } else if (entry.contentType) {
    line += ` :: <${entry.contentType}${entry.contentLength !== undefined ? `, ${entry.contentLength} bytes` : ""}>`;
  }

  if (line.length > MAX_LOG_LINE) {
    line = line.slice(0, MAX_LOG_LINE - 1) + "…";
  }
  return line;
}

export function requestLogger(): RequestHandler {
  return (req, res, next) => {
    const start = Date.now();
    const path = req.path;
    let capturedJson: unknown = undefined;

    const originalJson = res.json;
    res.json = function (body) {
      capturedJson = body;
      return originalJson.call(res, body);
    };

    res.on("finish", () => {
      if (!path.startsWith("/api")) return;

      const contentType = res.getHeader("Content-Type");
      const contentLength = Number(res.getHeader("Content-Length"));
      log(
        formatRequestLog({
          method: req.method,
          path,
          status: res.statusCode,
          durationMs: Date.now() - start,
          userId: req.user?.id,
          json: capturedJson,
          contentType: typeof contentType === "string" ? contentType.split(";")[0] : undefined,
          contentLength: Number.isFinite(contentLength) ? contentLength : undefined,
        })
      );
    });

    next();
  };
}
