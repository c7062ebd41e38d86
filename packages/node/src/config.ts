/**
 * @walletd/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod,
 * then resolves it into the read-only WalletServiceConfig the wallet core
 * runs on.
 */

import { z } from "zod";
import {
  KeyManager,
  USDC_ISSUERS,
  resolveNetwork,
  tryParseAmount,
} from "@walletd/wallet";
import type { FullKeypair, WalletServiceConfig } from "@walletd/wallet";

// =============================================================================
// Schema
// =============================================================================

const positiveAmount = (name: string) =>
  z.string().refine(
    (v) => {
      const stroops = tryParseAmount(v);
      return stroops !== undefined && stroops > 0n;
    },
    { message: `${name} must be a positive amount with at most 7 decimal places` },
  );

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Ledger network
  STELLAR_NETWORK: z.enum(["testnet", "public"]).default("testnet"),
  HORIZON_URL: z.string().url().optional(),
  HORIZON_ALLOW_HTTP: z
    .string()
    .transform((v) => v === "true")
    .default("false"),

  // Funding account
  MASTER_SECRET_KEY: z.string().min(1, "MASTER_SECRET_KEY is required"),

  // Designated asset
  ASSET_CODE: z
    .string()
    .regex(/^[A-Za-z0-9]{1,12}$/, "ASSET_CODE must be 1-12 alphanumeric characters")
    .default("USDC"),
  ASSET_ISSUER: z.string().optional(),

  // Wallet creation
  STARTING_BALANCE: positiveAmount("STARTING_BALANCE").default("2"),
  FUNDING_AMOUNT: positiveAmount("FUNDING_AMOUNT").default("100"),

  // Transactions
  BASE_FEE: z.coerce.number().int().min(100).default(100),
  TX_TIMEOUT_SECONDS: z.coerce.number().int().min(1).default(300),

  // Idempotency
  IDEMPOTENCY_TTL_MS: z.coerce.number().int().min(1000).default(86400000),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

// =============================================================================
// Service Config
// =============================================================================

/**
 * Resolve the network, funding key and designated asset.
 *
 * The issuer falls back to the well-known USDC issuer of the selected
 * network; any other asset code needs ASSET_ISSUER.
 *
 * @throws {Error} for an unparseable master key or issuer. The message
 *   never includes the key itself.
 */
export function buildServiceConfig(
  config: AppConfig,
  keys: KeyManager = new KeyManager(),
): WalletServiceConfig {
  const network = resolveNetwork(config.STELLAR_NETWORK, config.HORIZON_URL);

  let fundingKey: FullKeypair;
  try {
    fundingKey = keys.parseFull(config.MASTER_SECRET_KEY);
  } catch (err: unknown) {
    throw new Error("Invalid MASTER_SECRET_KEY: not a valid secret seed", { cause: err });
  }

  const issuer =
    config.ASSET_ISSUER ??
    (config.ASSET_CODE === "USDC" ? USDC_ISSUERS[config.STELLAR_NETWORK] : undefined);
  if (issuer === undefined) {
    throw new Error(`ASSET_ISSUER is required for asset code "${config.ASSET_CODE}"`);
  }
  try {
    keys.parseAddress(issuer);
  } catch (err: unknown) {
    throw new Error(`Invalid ASSET_ISSUER: "${issuer}"`, { cause: err });
  }

  const serviceConfig: WalletServiceConfig = {
    network,
    fundingKey,
    asset: { kind: "credit", code: config.ASSET_CODE, issuer },
    startingBalance: config.STARTING_BALANCE,
    fundingAmount: config.FUNDING_AMOUNT,
    baseFee: config.BASE_FEE,
    validityWindowSeconds: config.TX_TIMEOUT_SECONDS,
  };
  return Object.freeze(serviceConfig);
}
