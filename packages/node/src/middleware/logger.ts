/**
 * Structured logging middleware.
 *
 * Gives each request a pino child logger carrying its request id,
 * and logs method, path, status and duration when it completes.
 */

import type { MiddlewareHandler } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "../types/api-contract.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
}

export function loggerMiddleware(logger: Logger): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();
    const requestId = c.get("requestId");
    c.set("logger", logger.child({ requestId }));

    await next();

    const entry: RequestLogEntry = {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
      requestId,
    };
    const level = entry.status >= 500 ? "error" : "info";
    logger[level](entry, `${entry.method} ${entry.path} ${String(entry.status)}`);
  };
}
