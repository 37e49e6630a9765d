import type { RequestHandler } from "express";
import crypto from "node:crypto";

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

export const REQUEST_ID_HEADER = "X-Request-Id";

const SAFE_ID = /^[A-Za-z0-9._:-]{1,128}$/;

/** Reprend l'identifiant fourni par l'appelant s'il est sûr, sinon en génère un. */
export const requestIdMiddleware: RequestHandler = (req, res, next) => {
  const incoming = req.header(REQUEST_ID_HEADER)?.trim();
  req.requestId = incoming && SAFE_ID.test(incoming) ? incoming : crypto.randomUUID();
  res.setHeader(REQUEST_ID_HEADER, req.requestId);
  next();
};
