/**
 * Ledger Node port.
 *
 * The two calls the wallet core makes against a Stellar ledger node,
 * expressed in Horizon's wire vocabulary. Failures are thrown in the
 * shapes the Stellar SDK produces (NetworkError family or an HTTP
 * client error carrying `response`); LedgerClient classifies them.
 *
 * Implementations:
 * - HorizonLedgerNode: a remote Horizon server over HTTP
 * - InMemoryLedgerNode: in-process simulation for tests and local runs
 */

import { Horizon } from "@stellar/stellar-sdk";
import type { Transaction } from "@stellar/stellar-sdk";

// =============================================================================
// Port
// =============================================================================

export interface NodeBalanceLine {
  readonly asset_type: string;
  readonly balance: string;
  readonly asset_code?: string | undefined;
  readonly asset_issuer?: string | undefined;
}

export interface NodeAccountRecord {
  readonly account_id: string;
  readonly sequence: string;
  readonly balances: readonly NodeBalanceLine[];
}

export interface NodeSubmitResponse {
  readonly hash: string;
  readonly ledger: number;
}

export interface LedgerNode {
  /** Throws a 404-shaped error when the account has never been created. */
  loadAccount(address: string): Promise<NodeAccountRecord>;
  submitTransaction(transaction: Transaction): Promise<NodeSubmitResponse>;
}

// =============================================================================
// Horizon
// =============================================================================

export interface HorizonNodeConfig {
  readonly horizonUrl: string;
  /** Permit plain-http endpoints (local quickstart). Default: false */
  readonly allowHttp?: boolean | undefined;
}

export class HorizonLedgerNode implements LedgerNode {
  private readonly server: Horizon.Server;

  constructor(config: HorizonNodeConfig) {
    this.server = new Horizon.Server(config.horizonUrl, {
      allowHttp: config.allowHttp ?? false,
    });
  }

  async loadAccount(address: string): Promise<NodeAccountRecord> {
    const account = await this.server.loadAccount(address);
    return {
      account_id: account.accountId(),
      sequence: account.sequenceNumber(),
      balances: account.balances.map(toNodeBalanceLine),
    };
  }

  async submitTransaction(transaction: Transaction): Promise<NodeSubmitResponse> {
    const response = await this.server.submitTransaction(transaction);
    return { hash: response.hash, ledger: response.ledger };
  }
}

function toNodeBalanceLine(line: Horizon.HorizonApi.BalanceLine): NodeBalanceLine {
  if ("asset_code" in line) {
    return {
      asset_type: line.asset_type,
      balance: line.balance,
      asset_code: line.asset_code,
      asset_issuer: line.asset_issuer,
    };
  }
  return { asset_type: line.asset_type, balance: line.balance };
}
