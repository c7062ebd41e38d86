/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (ledger node reachable, funding account present)
 */

import { Hono } from "hono";
import { isWalletError } from "@walletd/wallet";
import type { WalletService } from "@walletd/wallet";
import type { AppEnv } from "../types/api-contract.js";

interface SubsystemStatus {
  readonly status: "ok" | "down";
  readonly detail?: string | undefined;
}

export function createHealthRoutes(walletService: WalletService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      network: walletService.network.name,
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", async (c) => {
    let ledger: SubsystemStatus;
    try {
      const funding = await walletService.getWalletDetails(walletService.fundingAddress);
      ledger = funding.exists
        ? { status: "ok" }
        : { status: "down", detail: "funding account does not exist" };
    } catch (err: unknown) {
      if (!isWalletError(err)) throw err;
      ledger = { status: "down", detail: err.code };
    }

    const ready = ledger.status === "ok";
    const body = {
      status: ready ? "ready" : "not_ready",
      network: walletService.network.name,
      subsystems: { ledger },
      timestamp: new Date().toISOString(),
    };

    return ready ? c.json(body, 200) : c.json(body, 503);
  });

  return routes;
}
