/**
 * Idempotency middleware.
 *
 * Remembers successful POSTs by Idempotency-Key so a client that lost
 * the response to a transfer can retry without a second ledger effect.
 *
 * Each record carries a fingerprint of the request (method, path, raw
 * body); a key reused for a different request is refused with 422
 * instead of replaying the earlier outcome. Routes whose responses hold
 * secret material mount the middleware with `retainResponse: false`:
 * only the fingerprint is kept, and a repeated key is answered 409
 * without a body.
 */

import { createHash } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Idempotency Store Interface
// =============================================================================

export interface StoredResponse {
  readonly status: 200 | 201;
  readonly body: string;
  readonly headers: Record<string, string>;
}

export interface IdempotencyEntry {
  readonly fingerprint: string;
  /** Absent for routes that must not retain their responses */
  readonly response?: StoredResponse | undefined;
}

export interface IdempotencyRecord extends IdempotencyEntry {
  readonly cachedAt: number;
}

export interface IdempotencyStore {
  get(key: string): IdempotencyRecord | undefined;
  /** Stores the entry, stamped with the store's own clock. */
  set(key: string, entry: IdempotencyEntry): void;
}

// =============================================================================
// In-Memory Store
// =============================================================================

export const DEFAULT_MAX_ENTRIES = 10_000;

/**
 * Map-backed store. Insertion order is expiry order, so each `set`
 * drops expired records from the front and then the oldest records
 * beyond `maxEntries`.
 */
export class InMemoryIdempotencyStore implements IdempotencyStore {
  private readonly _cache = new Map<string, IdempotencyRecord>();
  private readonly _ttlMs: number;
  private readonly _now: () => number;
  private readonly _maxEntries: number;

  constructor(
    ttlMs: number = 86400000,
    now: () => number = Date.now,
    maxEntries: number = DEFAULT_MAX_ENTRIES,
  ) {
    this._ttlMs = ttlMs;
    this._now = now;
    this._maxEntries = maxEntries;
  }

  get(key: string): IdempotencyRecord | undefined {
    const entry = this._cache.get(key);
    if (entry === undefined) {
      return undefined;
    }

    if (this.isExpired(entry, this._now())) {
      this._cache.delete(key);
      return undefined;
    }

    return entry;
  }

  set(key: string, entry: IdempotencyEntry): void {
    const now = this._now();
    this._cache.delete(key);
    this._cache.set(key, { ...entry, cachedAt: now });
    this.evict(now);
  }

  get size(): number {
    return this._cache.size;
  }

  clear(): void {
    this._cache.clear();
  }

  private isExpired(entry: IdempotencyRecord, now: number): boolean {
    return now - entry.cachedAt > this._ttlMs;
  }

  private evict(now: number): void {
    for (const [key, entry] of this._cache) {
      if (!this.isExpired(entry, now) && this._cache.size <= this._maxEntries) {
        break;
      }
      this._cache.delete(key);
    }
  }
}

// =============================================================================
// Middleware
// =============================================================================

export const IDEMPOTENCY_HEADER = "Idempotency-Key";

/** Response headers worth replaying; per-request ones are regenerated. */
const REPLAYED_HEADERS = new Set(["content-type"]);

export interface IdempotencyOptions {
  /** Keep response bodies for replay. Default: true */
  readonly retainResponse?: boolean | undefined;
}

export function fingerprintRequest(method: string, path: string, body: string): string {
  return createHash("sha256").update(`${method} ${path}\n${body}`).digest("hex");
}

function cacheableStatus(status: number): StoredResponse["status"] | undefined {
  return status === 200 || status === 201 ? status : undefined;
}

export function idempotencyMiddleware(
  store: IdempotencyStore,
  options: IdempotencyOptions = {},
): MiddlewareHandler<AppEnv> {
  const retainResponse = options.retainResponse !== false;

  return async (c, next) => {
    if (c.req.method !== "POST") {
      return next();
    }

    const idempotencyKey = c.req.header(IDEMPOTENCY_HEADER);
    if (idempotencyKey === undefined) {
      return next();
    }

    // Keys are scoped to the route they were first used on
    const scopedKey = `${c.req.path}:${idempotencyKey}`;
    const fingerprint = fingerprintRequest(c.req.method, c.req.path, await c.req.text());

    const cached = store.get(scopedKey);
    if (cached !== undefined) {
      if (cached.fingerprint !== fingerprint) {
        return c.json(
          createErrorEnvelope(
            "IDEMPOTENCY_KEY_REUSED",
            "Idempotency-Key was already used with a different request",
          ),
          422,
        );
      }

      if (cached.response === undefined) {
        return c.json(
          createErrorEnvelope(
            "IDEMPOTENCY_KEY_REUSED",
            "Idempotency-Key was already used; the original response is not retained",
          ),
          409,
        );
      }

      for (const [key, value] of Object.entries(cached.response.headers)) {
        c.header(key, value);
      }
      c.header("X-Idempotent-Replay", "true");
      return c.body(cached.response.body, cached.response.status);
    }

    await next();

    const status = cacheableStatus(c.res.status);
    if (status === undefined) {
      return;
    }

    if (!retainResponse) {
      store.set(scopedKey, { fingerprint });
      return;
    }

    const clonedRes = c.res.clone();
    const body = await clonedRes.text();
    const headers: Record<string, string> = {};
    clonedRes.headers.forEach((value, key) => {
      if (REPLAYED_HEADERS.has(key)) {
        headers[key] = value;
      }
    });

    store.set(scopedKey, { fingerprint, response: { status, body, headers } });
  };
}
