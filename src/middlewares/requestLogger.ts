import type { RequestHandler } from "express";
import logger from "../utils/logger";

export const requestLogger: RequestHandler = (req, res, next) => {
  const startedAt = Date.now();

  res.on("finish", () => {
    const payload = {
      type: "http_request",
      requestId: req.requestId ?? null,
      method: req.method,
      path: req.originalUrl,
      status: res.statusCode,
      durationMs: Date.now() - startedAt,
    };

    logger.info(JSON.stringify(payload));
  });

  next();
};
