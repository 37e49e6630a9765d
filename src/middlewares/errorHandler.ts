import type { Request, Response, NextFunction } from "express";
import { MulterError } from "multer";
import { ZodError } from "zod";
import { HttpError, persistenceError, timeoutError } from "../utils/httpError";
import { isConnectionError, isTimeoutError } from "../utils/pgErrors";
import logger from "../utils/logger";

function toHttpError(err: unknown): HttpError | null {
  if (err instanceof HttpError) return err;
  if (err instanceof ZodError) {
    return new HttpError(400, "VALIDATION_ERROR", "Champs invalides.", err.flatten());
  }
  if (err instanceof MulterError) {
    const message = err.code === "LIMIT_FILE_SIZE" ? "Fichier trop volumineux" : err.message;
    return new HttpError(400, "VALIDATION_ERROR", message, { field: err.field ?? null });
  }
  if (isTimeoutError(err)) return timeoutError();
  if (isConnectionError(err)) return persistenceError();
  return null;
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const httpError = toHttpError(err);

  if (httpError) {
    if (httpError.status >= 500) {
      logger.error(`${req.method} ${req.originalUrl} -> ${httpError.code}`, err);
    }
    res.status(httpError.status).json({
      error: httpError.code,
      message: httpError.message,
      ...(httpError.details === undefined ? {} : { details: httpError.details }),
    });
    return;
  }

  logger.error("❌ Unhandled error:", {
    message: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
    method: req.method,
    path: req.path,
    requestId: req.requestId ?? null,
  });
  res.status(500).json({
    error: "INTERNAL_ERROR",
    message: "Erreur interne du serveur",
  });
}
