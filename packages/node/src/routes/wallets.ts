/**
 * Wallet routes.
 *
 * POST /api/v1/wallets/create       — Create, trust-enable and fund a wallet
 * GET  /api/v1/wallets/:public_key  — Account snapshot (or exists: false)
 * POST /api/v1/wallets/transfer     — Pay the designated asset
 *
 * Handlers only translate between snake_case DTOs and the wallet
 * service; every failure is a WalletError rendered by the error handler.
 *
 * Both POSTs honour Idempotency-Key. A transfer replays its stored
 * response; a creation is remembered by fingerprint only, since its
 * response carries the new secret key.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  TransferRequestSchema,
  toCreateWalletResponse,
  toTransferResponse,
  toWalletDetailsResponse,
} from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { idempotencyMiddleware } from "../middleware/idempotency.js";
import type { IdempotencyStore } from "../middleware/idempotency.js";

export function createWalletRoutes(idempotencyStore: IdempotencyStore): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // POST /api/v1/wallets/create
  routes.post(
    "/create",
    idempotencyMiddleware(idempotencyStore, { retainResponse: false }),
    async (c) => {
      const service = c.get("walletService");
      const result = await service.createWallet();
      return c.json(toCreateWalletResponse(result), 200);
    },
  );

  // POST /api/v1/wallets/transfer
  routes.post(
    "/transfer",
    idempotencyMiddleware(idempotencyStore),
    validateBody(TransferRequestSchema),
    async (c) => {
      const service = c.get("walletService");
      const body = c.get("validatedBody");

      const result = await service.transferFunds({
        fromSecret: body.from_secret_key,
        toAddress: body.to_public_key,
        amount: body.amount,
      });

      return c.json(toTransferResponse(result), 200);
    },
  );

  // GET /api/v1/wallets/:public_key
  routes.get("/:public_key", async (c) => {
    const service = c.get("walletService");
    const details = await service.getWalletDetails(c.req.param("public_key"));
    return c.json(toWalletDetailsResponse(details), 200);
  });

  return routes;
}
