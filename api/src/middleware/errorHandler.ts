// Централизованная обработка ошибок
import type { Request, Response, NextFunction } from "express";
import { config } from "../config.js";

export class AppError extends Error {
  statusCode: number;
  isOperational: boolean;
  code: string | null;
  details: unknown;

  constructor(
    message: string,
    statusCode: number = 500,
    options?: { isOperational?: boolean; code?: string; details?: unknown }
  ) {
    super(message);
    this.statusCode = statusCode;
    this.isOperational = options?.isOperational ?? true;
    this.code = options?.code ?? null;
    this.details = options?.details ?? null;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Каталог площадок недоступен целиком. Ядро не ретраит —
 * ошибка уходит клиенту отдельным кодом, а не как "ошибка обработки".
 */
export class CatalogUnavailableError extends AppError {
  constructor(source: string, causeMessage?: string) {
    super("Facility catalog is unavailable", 503, {
      code: "catalog_unavailable",
      details: causeMessage ? { source, cause: causeMessage } : { source },
    });
    this.name = "CatalogUnavailableError";
  }
}

type RouteFn = (req: Request, res: Response, next: NextFunction) => unknown;

export const asyncHandler = (fn: RouteFn) => (req: Request, res: Response, next: NextFunction) => {
  Promise.resolve(fn(req, res, next)).catch(next);
};

// Ошибки body-parser приходят со своим status (400/413/415)
const CLIENT_ERROR_CODES: Record<number, { error: string; code: string }> = {
  400: { error: "Malformed request body", code: "invalid_body" },
  413: { error: "Payload too large", code: "payload_too_large" },
  415: { error: "Unsupported media type", code: "unsupported_media_type" },
};

function clientStatusOf(err: Error): number | undefined {
  const status =
    "status" in err && typeof err.status === "number"
      ? err.status
      : "statusCode" in err && typeof err.statusCode === "number"
        ? err.statusCode
        : undefined;
  return status !== undefined && status >= 400 && status < 500 ? status : undefined;
}

export const errorHandler = (err: Error, _req: Request, res: Response, next: NextFunction) => {
  if (res.headersSent) {
    return next(err);
  }

  const isDev = config.nodeEnv === "development";

  if (isDev) {
    console.error("Error:", err);
  } else {
    console.error("Error:", err.message);
  }

  if (err instanceof AppError) {
    // неоперационные ошибки наружу не раскрываем
    if (!err.isOperational && !isDev) {
      return res.status(500).json({ error: "Internal server error" });
    }
    const payload: Record<string, unknown> = {
      error: err.message,
    };
    if (err.code) payload.code = err.code;
    if (err.details) payload.details = err.details;
    if (isDev && err.stack) {
      payload.stack = err.stack;
    }
    return res.status(err.statusCode).json(payload);
  }

  // express.json() на кривом JSON
  if (err instanceof SyntaxError && "body" in err) {
    return res.status(400).json({ error: "Malformed JSON body", code: "invalid_json" });
  }

  const status = clientStatusOf(err);
  if (status !== undefined) {
    return res.status(status).json(CLIENT_ERROR_CODES[status] ?? { error: "Bad request", code: "bad_request" });
  }

  res.status(500).json({
    error: config.nodeEnv === "production" ? "Internal server error" : err.message,
    ...(isDev && { stack: err.stack }),
  });
};
