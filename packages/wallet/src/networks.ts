/**
 * Network Definitions
 *
 * Well-known Stellar networks and the designated-asset defaults
 * for each of them.
 */

import { Networks } from "@stellar/stellar-sdk";
import type { NetworkContext, NetworkName } from "./types.js";

// =============================================================================
// Well-Known Networks
// =============================================================================

export const NETWORKS: Readonly<Record<NetworkName, NetworkContext>> = {
  testnet: {
    name: "testnet",
    passphrase: Networks.TESTNET,
    horizonUrl: "https://horizon-testnet.stellar.org",
  },
  public: {
    name: "public",
    passphrase: Networks.PUBLIC,
    horizonUrl: "https://horizon.stellar.org",
  },
};

/** Circle USDC issuers. */
export const USDC_ISSUERS: Readonly<Record<NetworkName, string>> = {
  testnet: "GBBD47IF6LWK7P7MDEVSCWR7DPUWV3NY3DTQEVFL4NAT4AQH3ZLLFLA5",
  public: "GA5ZSEJYB37JRC5AVCIA5MOP4RHTM335X2KGX3IHOJAPP5RE34K4KZVN",
};

/**
 * Resolve a network by name, optionally pointing it at a different
 * Horizon endpoint (self-hosted node, local quickstart).
 */
export function resolveNetwork(
  name: NetworkName,
  horizonUrl?: string,
): NetworkContext {
  const base = NETWORKS[name];
  if (horizonUrl === undefined || horizonUrl === "") {
    return base;
  }
  return { ...base, horizonUrl: horizonUrl.replace(/\/+$/, "") };
}

