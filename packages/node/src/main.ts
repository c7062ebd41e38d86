/**
 * @walletd/node — Entry point.
 *
 * Loads config, wires the wallet core to Horizon, starts the HTTP
 * server, and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { HorizonLedgerNode, LedgerClient, WalletService } from "@walletd/wallet";
import { buildServiceConfig, loadConfig } from "./config.js";
import { createApp } from "./app.js";

// =============================================================================
// Bootstrap
// =============================================================================

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    redact: {
      paths: ["secret_key", "secretKey", "from_secret_key", "MASTER_SECRET_KEY"],
      censor: "[REDACTED]",
    },
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const serviceConfig = buildServiceConfig(config);
  const ledger = new LedgerClient(
    new HorizonLedgerNode({
      horizonUrl: serviceConfig.network.horizonUrl,
      allowHttp: config.HORIZON_ALLOW_HTTP,
    }),
    serviceConfig.network,
  );
  const walletService = new WalletService(serviceConfig, {
    ledger,
    logger: logger.child({ component: "wallet" }),
  });

  logger.info(
    {
      network: serviceConfig.network.name,
      horizonUrl: serviceConfig.network.horizonUrl,
      asset: `${serviceConfig.asset.code}:${serviceConfig.asset.issuer}`,
      fundingAccount: serviceConfig.fundingKey.address,
    },
    "Wallet service configured",
  );

  const { app } = createApp({
    walletService,
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    idempotencyTtlMs: config.IDEMPOTENCY_TTL_MS,
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info({ port: config.PORT, host: config.HOST }, "Wallet node started");

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close((err) => {
      if (err !== undefined) {
        logger.error({ err }, "Server close failed");
        process.exit(1);
      }
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
