import { describe, it, expect, beforeEach } from "vitest";
import { Keypair, NotFoundError } from "@stellar/stellar-sdk";
import { InMemoryLedgerNode } from "../src/in-memory-ledger-node.js";
import { FullKeypair, KeyManager } from "../src/keys.js";
import { LedgerClient } from "../src/ledger-client.js";
import { NETWORKS } from "../src/networks.js";
import { Signer } from "../src/signer.js";
import type { Operation } from "../src/types.js";
import {
  TESTNET,
  TEST_NOW_MS,
  balanceOf,
  createTestLedger,
  rejectionOf,
  submitOps,
} from "./setup.js";
import type { TestLedger } from "./setup.js";

const keys = new KeyManager();

let ledger: TestLedger;

beforeEach(() => {
  ledger = createTestLedger();
});

function usdcPayment(destination: string, amount: string): Operation {
  return { kind: "payment", destination, asset: ledger.asset, amount };
}

/** A seeded account holding XLM and, optionally, a USDC trustline. */
function seeded(xlm: string, usdc?: string): FullKeypair {
  const kp = keys.generate();
  ledger.node.seedAccount(kp.address, xlm);
  if (usdc !== undefined) {
    ledger.node.seedTrustline(kp.address, "USDC", ledger.issuer.address, usdc);
  }
  return kp;
}

// ─── Reads ───────────────────────────────────────────────────────────────

describe("InMemoryLedgerNode.loadAccount", () => {
  it("reports balances in Horizon format, trustlines before native", async () => {
    const record = await ledger.node.loadAccount(ledger.funder.address);
    expect(record).toEqual({
      account_id: ledger.funder.address,
      sequence: "0",
      balances: [
        {
          asset_type: "credit_alphanum4",
          balance: "1000000.0000000",
          asset_code: "USDC",
          asset_issuer: ledger.issuer.address,
        },
        { asset_type: "native", balance: "10000.0000000" },
      ],
    });
  });

  it("labels codes longer than four characters as alphanum12", async () => {
    const kp = keys.generate();
    ledger.node.seedAccount(kp.address, "5");
    ledger.node.seedTrustline(kp.address, "EURCOIN", ledger.issuer.address, "1");
    const record = await ledger.node.loadAccount(kp.address);
    expect(record.balances[0]?.asset_type).toBe("credit_alphanum12");
  });

  it("throws the SDK's NotFoundError for an unknown account", async () => {
    const err = await rejectionOf(ledger.node.loadAccount(Keypair.random().publicKey()));
    expect(err).toBeInstanceOf(NotFoundError);
  });

  it("fails every call while unavailable", async () => {
    ledger.node.setUnavailable(true);
    const err = await rejectionOf(ledger.node.loadAccount(ledger.funder.address));
    expect(err).toBeInstanceOf(Error);

    ledger.node.setUnavailable(false);
    await expect(ledger.node.loadAccount(ledger.funder.address)).resolves.toBeDefined();
  });

  it("refuses to seed a trustline on a missing account", () => {
    expect(() =>
      ledger.node.seedTrustline(Keypair.random().publicKey(), "USDC", ledger.issuer.address),
    ).toThrow(/does not exist/);
  });
});

// ─── Envelope validation ─────────────────────────────────────────────────

describe("InMemoryLedgerNode envelope validation", () => {
  it("rejects a stale sequence without consuming anything", async () => {
    const envelope = ledger.builder.build(
      { address: ledger.funder.address, sequence: "5", balances: [] },
      [usdcPayment(ledger.issuer.address, "1")],
    );
    const signed = new Signer().sign(envelope, TESTNET, ledger.funder);

    const err = await rejectionOf(ledger.client.submit(signed));

    expect(err).toMatchObject({
      code: "REJECTED",
      details: { resultCodes: { transaction: "tx_bad_seq" } },
    });
    const after = await ledger.client.fetchAccount(ledger.funder.address);
    expect(after.sequence).toBe("0");
    expect(balanceOf(after)).toBe("10000.0000000");
  });

  it("rejects a fee below 100 stroops per operation", async () => {
    const err = await rejectionOf(
      submitOps(ledger, ledger.funder, [usdcPayment(ledger.issuer.address, "1")], undefined, 50),
    );
    expect(err).toMatchObject({ details: { resultCodes: { transaction: "tx_insufficient_fee" } } });
  });

  it("rejects an envelope past its validity window", async () => {
    const account = await ledger.client.fetchAccount(ledger.funder.address);
    const envelope = ledger.builder.build(account, [usdcPayment(ledger.issuer.address, "1")]);
    const signed = new Signer().sign(envelope, TESTNET, ledger.funder);

    // The node's clock moves on; a client with a frozen clock still submits
    ledger.clock.advance(301);
    const frozenClient = new LedgerClient(ledger.node, TESTNET, { now: () => TEST_NOW_MS });
    const err = await rejectionOf(frozenClient.submit(signed));

    expect(err).toMatchObject({
      code: "REJECTED",
      details: { resultCodes: { transaction: "tx_too_late" } },
    });
  });

  it("rejects signatures made for another network", async () => {
    const account = await ledger.client.fetchAccount(ledger.funder.address);
    const envelope = ledger.builder.build(account, [usdcPayment(ledger.issuer.address, "1")]);
    const signed = new Signer().sign(envelope, NETWORKS.public, ledger.funder);

    const err = await rejectionOf(ledger.client.submit(signed));
    expect(err).toMatchObject({ details: { resultCodes: { transaction: "tx_bad_auth" } } });
  });

  it("requires a signature from every operation source", async () => {
    const fresh = keys.generate();
    const ops: Operation[] = [
      { kind: "createAccount", destination: fresh.address, startingBalance: "2" },
      { kind: "establishTrustline", asset: ledger.asset, source: fresh.address },
    ];
    const err = await rejectionOf(submitOps(ledger, ledger.funder, ops, [ledger.funder]));
    expect(err).toMatchObject({ details: { resultCodes: { transaction: "tx_bad_auth" } } });
  });

  it("rejects signatures from accounts the envelope does not involve", async () => {
    const bystander = keys.generate();
    const err = await rejectionOf(
      submitOps(ledger, ledger.funder, [usdcPayment(ledger.issuer.address, "1")], [
        ledger.funder,
        bystander,
      ]),
    );
    expect(err).toMatchObject({ details: { resultCodes: { transaction: "tx_bad_auth_extra" } } });
  });

  it("rejects an envelope from an account that does not exist", async () => {
    const ghost = keys.generate();
    const envelope = ledger.builder.build(
      { address: ghost.address, sequence: "0", balances: [] },
      [usdcPayment(ledger.issuer.address, "1")],
    );
    const signed = new Signer().sign(envelope, TESTNET, ghost);

    const err = await rejectionOf(ledger.client.submit(signed));
    expect(err).toMatchObject({
      details: { resultCodes: { transaction: "tx_no_source_account" } },
    });
  });
});

// ─── Operations ──────────────────────────────────────────────────────────

describe("InMemoryLedgerNode operations", () => {
  it("creates, trust-enables and funds an account in one ledger", async () => {
    const fresh = keys.generate();
    const result = await submitOps(
      ledger,
      ledger.funder,
      [
        { kind: "createAccount", destination: fresh.address, startingBalance: "2" },
        { kind: "establishTrustline", asset: ledger.asset, source: fresh.address },
        usdcPayment(fresh.address, "100"),
      ],
      [ledger.funder, fresh],
    );

    expect(result.ledger).toBe(2);
    expect(result.hash).toMatch(/^[0-9a-f]{64}$/);

    const account = await ledger.client.fetchAccount(fresh.address);
    expect(account.sequence).toBe("8589934592");
    expect(balanceOf(account)).toBe("2.0000000");
    expect(balanceOf(account, "USDC")).toBe("100.0000000");

    const funder = await ledger.client.fetchAccount(ledger.funder.address);
    expect(funder.sequence).toBe("1");
    expect(balanceOf(funder)).toBe("9997.9999700");
    expect(balanceOf(funder, "USDC")).toBe("999900.0000000");
  });

  it("consumes the fee and sequence when an operation fails", async () => {
    const stranger = seeded("5");

    const err = await rejectionOf(
      submitOps(ledger, ledger.funder, [usdcPayment(stranger.address, "5")]),
    );

    expect(err).toMatchObject({
      code: "REJECTED",
      message: "Transaction failed: tx_failed: op_no_trust",
      details: { resultCodes: { transaction: "tx_failed", operations: ["op_no_trust"] } },
    });
    const funder = await ledger.client.fetchAccount(ledger.funder.address);
    expect(funder.sequence).toBe("1");
    expect(balanceOf(funder)).toBe("9999.9999900");
    expect(balanceOf(funder, "USDC")).toBe("1000000.0000000");
  });

  it("applies nothing when a later operation fails", async () => {
    const fresh = keys.generate();
    const err = await rejectionOf(
      submitOps(
        ledger,
        ledger.funder,
        [
          { kind: "createAccount", destination: fresh.address, startingBalance: "2" },
          { kind: "establishTrustline", asset: ledger.asset, source: fresh.address },
          usdcPayment(fresh.address, "2000000"),
        ],
        [ledger.funder, fresh],
      ),
    );

    expect(err).toMatchObject({
      details: {
        resultCodes: {
          transaction: "tx_failed",
          operations: ["op_success", "op_success", "op_underfunded"],
        },
      },
    });
    await expect(ledger.client.fetchAccount(fresh.address)).rejects.toMatchObject({
      code: "NOT_FOUND",
    });
  });

  it("refuses a starting balance below two base reserves", async () => {
    const fresh = keys.generate();
    const err = await rejectionOf(
      submitOps(ledger, ledger.funder, [
        { kind: "createAccount", destination: fresh.address, startingBalance: "0.5" },
      ]),
    );
    expect(err).toMatchObject({
      details: { resultCodes: { operations: ["op_low_reserve"] } },
    });
  });

  it("refuses a trustline the account cannot reserve for", async () => {
    const fresh = keys.generate();
    const err = await rejectionOf(
      submitOps(
        ledger,
        ledger.funder,
        [
          { kind: "createAccount", destination: fresh.address, startingBalance: "1" },
          { kind: "establishTrustline", asset: ledger.asset, source: fresh.address },
        ],
        [ledger.funder, fresh],
      ),
    );
    expect(err).toMatchObject({
      details: { resultCodes: { operations: ["op_success", "op_low_reserve"] } },
    });
  });

  it("refuses to create an existing account", async () => {
    const err = await rejectionOf(
      submitOps(ledger, ledger.funder, [
        { kind: "createAccount", destination: ledger.issuer.address, startingBalance: "2" },
      ]),
    );
    expect(err).toMatchObject({
      details: { resultCodes: { operations: ["op_already_exists"] } },
    });
  });

  it("refuses payments the sender cannot cover", async () => {
    const poor = seeded("5", "0");
    const err = await rejectionOf(submitOps(ledger, poor, [usdcPayment(ledger.funder.address, "1")]));
    expect(err).toMatchObject({
      details: { resultCodes: { operations: ["op_underfunded"] } },
    });
  });

  it("refuses payments from an account without a trustline", async () => {
    const untrusted = seeded("5");
    const err = await rejectionOf(
      submitOps(ledger, untrusted, [usdcPayment(ledger.funder.address, "1")]),
    );
    expect(err).toMatchObject({
      details: { resultCodes: { operations: ["op_src_no_trust"] } },
    });
  });

  it("refuses payments to an account that does not exist", async () => {
    const err = await rejectionOf(
      submitOps(ledger, ledger.funder, [usdcPayment(Keypair.random().publicKey(), "1")]),
    );
    expect(err).toMatchObject({
      details: { resultCodes: { operations: ["op_no_destination"] } },
    });
  });

  it("lets the issuer mint into a trustline", async () => {
    await submitOps(ledger, ledger.issuer, [usdcPayment(ledger.funder.address, "50")]);
    const funder = await ledger.client.fetchAccount(ledger.funder.address);
    expect(balanceOf(funder, "USDC")).toBe("1000050.0000000");
  });

  it("moves native balances", async () => {
    const recipient = seeded("5");
    await submitOps(ledger, ledger.funder, [
      { kind: "payment", destination: recipient.address, asset: { kind: "native" }, amount: "3" },
    ]);
    const account = await ledger.client.fetchAccount(recipient.address);
    expect(balanceOf(account)).toBe("8.0000000");
  });

  it("verifies against its own passphrase", async () => {
    const publicNode = new InMemoryLedgerNode({
      passphrase: NETWORKS.public.passphrase,
      now: () => TEST_NOW_MS,
    });
    publicNode.seedAccount(ledger.funder.address, "100");
    publicNode.seedAccount(ledger.issuer.address, "100");
    publicNode.seedTrustline(ledger.funder.address, "USDC", ledger.issuer.address, "10");
    const client = new LedgerClient(publicNode, NETWORKS.public, { now: () => TEST_NOW_MS });

    const account = await client.fetchAccount(ledger.funder.address);
    const envelope = ledger.builder.build(account, [usdcPayment(ledger.issuer.address, "1")]);

    const testnetSigned = new Signer().sign(envelope, TESTNET, ledger.funder);
    await expect(client.submit(testnetSigned)).rejects.toMatchObject({
      details: { resultCodes: { transaction: "tx_bad_auth" } },
    });

    const publicSigned = new Signer().sign(envelope, NETWORKS.public, ledger.funder);
    await expect(client.submit(publicSigned)).resolves.toMatchObject({ ledger: 2 });
  });
});
