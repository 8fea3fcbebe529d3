/**
 * X-Request-ID handling: a caller's id is echoed back, otherwise one is
 * generated. Each request gets a child logger carrying the id.
 */

import { randomUUID } from "node:crypto";
import type { IncomingMessage, ServerResponse } from "node:http";
import type { NextFunction } from "express";
import { logger, type Logger } from "./logger.js";

export const REQUEST_ID_HEADER = "X-Request-ID";

const VALID_REQUEST_ID = /^[A-Za-z0-9._:-]{1,128}$/;

export function resolveRequestId(
  incoming: string | string[] | undefined,
  generate: () => string = randomUUID
): string {
  const value = Array.isArray(incoming) ? incoming[0] : incoming;
  return value && VALID_REQUEST_ID.test(value) ? value : generate();
}

const requestLoggers = new WeakMap<IncomingMessage, Logger>();

/** Logger bound to the request's id; the root logger outside a request. */
export function requestLogger(req: IncomingMessage): Logger {
  return requestLoggers.get(req) ?? logger;
}

export function requestId(req: IncomingMessage, res: ServerResponse, next: NextFunction): void {
  const id = resolveRequestId(req.headers["x-request-id"]);
  const log = logger.child({ requestId: id });
  requestLoggers.set(req, log);
  res.setHeader(REQUEST_ID_HEADER, id);
  res.on("finish", () => {
    log.debug({ method: req.method, path: req.url, status: res.statusCode }, "Request completed");
  });
  next();
}
