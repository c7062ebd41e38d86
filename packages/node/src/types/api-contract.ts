/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { WalletService } from "@walletd/wallet";

/**
 * Hono environment type for the wallet node.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** Wallet service shared by every request (set in createApp) */
    walletService: WalletService;
  };
}

/**
 * Environment of a handler that runs after `validateBody(schema)`.
 */
export interface ValidatedEnv<T> extends AppEnv {
  Variables: AppEnv["Variables"] & {
    /** Parsed request body (set by validate middleware) */
    validatedBody: T;
  };
}
