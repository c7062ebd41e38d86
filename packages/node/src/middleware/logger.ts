/**
 * Request logging middleware.
 *
 * Emits one structured entry per request through an injected log
 * function; main.ts routes it into the pino root logger. Entries carry
 * the route path only, never bodies, so secret keys in requests and
 * responses stay out of the log.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
  /** True when the idempotency layer answered from its cache */
  readonly replayed: boolean;
}

export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
  now: () => number = Date.now,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = now();

    await next();

    log({
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: now() - start,
      requestId: c.get("requestId"),
      replayed: c.res.headers.get("X-Idempotent-Replay") === "true",
    });
  };
}
