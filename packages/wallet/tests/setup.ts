/**
 * Shared test fixtures: an in-memory ledger seeded with an asset issuer
 * and a funded funding account, and a WalletService wired to it.
 */

import { Keypair } from "@stellar/stellar-sdk";
import { InMemoryLedgerNode } from "../src/in-memory-ledger-node.js";
import { FullKeypair } from "../src/keys.js";
import { LedgerClient } from "../src/ledger-client.js";
import { NETWORKS } from "../src/networks.js";
import { Signer } from "../src/signer.js";
import { TransactionBuilder } from "../src/transaction-builder.js";
import type { Account, CreditAsset, Operation, TransactionResult } from "../src/types.js";
import { WalletService } from "../src/wallet-service.js";
import type { WalletServiceConfig } from "../src/wallet-service.js";

/** 2023-11-14T22:13:20Z */
export const TEST_NOW_MS = 1_700_000_000_000;

export const TESTNET = NETWORKS.testnet;

export interface TestClock {
  now: number;
  advance(seconds: number): void;
}

export function createClock(start = TEST_NOW_MS): TestClock {
  const clock: TestClock = {
    now: start,
    advance(seconds: number) {
      clock.now += seconds * 1000;
    },
  };
  return clock;
}

export interface TestLedger {
  readonly clock: TestClock;
  readonly node: InMemoryLedgerNode;
  readonly client: LedgerClient;
  readonly builder: TransactionBuilder;
  readonly issuer: FullKeypair;
  readonly funder: FullKeypair;
  readonly asset: CreditAsset;
  readonly config: WalletServiceConfig;
  readonly service: WalletService;
}

export interface TestLedgerOptions {
  readonly funderXlm?: string;
  readonly funderUsdc?: string;
  readonly startingBalance?: string;
  readonly fundingAmount?: string;
}

/**
 * Issuer with 10000 XLM; funder with 10000 XLM and a USDC trustline
 * holding 1000000 USDC. Every component shares one fixed clock.
 */
export function createTestLedger(options: TestLedgerOptions = {}): TestLedger {
  const clock = createClock();
  const now = (): number => clock.now;

  const node = new InMemoryLedgerNode({ now });
  const issuer = new FullKeypair(Keypair.random());
  const funder = new FullKeypair(Keypair.random());
  const asset: CreditAsset = { kind: "credit", code: "USDC", issuer: issuer.address };

  node.seedAccount(issuer.address, "10000");
  node.seedAccount(funder.address, options.funderXlm ?? "10000");
  node.seedTrustline(funder.address, "USDC", issuer.address, options.funderUsdc ?? "1000000");

  const client = new LedgerClient(node, TESTNET, { now });
  const builder = new TransactionBuilder(TESTNET, { now });

  const config: WalletServiceConfig = {
    network: TESTNET,
    fundingKey: funder,
    asset,
    startingBalance: options.startingBalance ?? "2",
    fundingAmount: options.fundingAmount ?? "100",
    baseFee: 100,
    validityWindowSeconds: 300,
  };

  const service = new WalletService(config, { ledger: client, builder });

  return { clock, node, client, builder, issuer, funder, asset, config, service };
}

/**
 * Fetch a fresh snapshot for `source`, then build, sign and submit `ops`
 * through the ledger client.
 */
export async function submitOps(
  ledger: TestLedger,
  source: FullKeypair,
  ops: readonly Operation[],
  signers: readonly FullKeypair[] = [source],
  baseFee = 100,
): Promise<TransactionResult> {
  const account = await ledger.client.fetchAccount(source.address);
  const envelope = ledger.builder.build(account, ops, baseFee);
  const signed = new Signer().sign(envelope, TESTNET, ...signers);
  return ledger.client.submit(signed);
}

/** Balance of one asset on a loaded account, or undefined without a line. */
export function balanceOf(account: Account, code?: string): string | undefined {
  const line = account.balances.find((b) =>
    code === undefined ? b.assetType === "native" : b.assetCode === code,
  );
  return line?.amount;
}

/** Capture a rejected promise's reason for structured assertions. */
export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err: unknown) {
    return err;
  }
  throw new Error("Expected promise to reject");
}

/** Capture a synchronous throw for structured assertions. */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err: unknown) {
    return err;
  }
  throw new Error("Expected function to throw");
}
