/**
 * In-memory ledger node.
 *
 * A deterministic, single-process stand-in for a Horizon server. It
 * enforces the subset of ledger rules the wallet relies on:
 *
 * - Time bounds (tx_too_early / tx_too_late)
 * - Source existence (tx_no_source_account)
 * - Sequence: envelope sequence must be account sequence + 1 (tx_bad_seq)
 * - Minimum fee: 100 stroops × operations (tx_insufficient_fee)
 * - Signatures: every envelope and operation source must sign the hash
 *   under this node's passphrase (tx_bad_auth / tx_bad_auth_extra)
 *
 * Operations apply atomically against a working copy. When one fails the
 * copy is discarded, but the fee and sequence are still consumed
 * (tx_failed), as on the real network.
 *
 * Failures are thrown as the SDK's NotFoundError / BadResponseError with
 * a Horizon problem body, so LedgerClient classifies them exactly as it
 * would a remote node's.
 */

import {
  Asset,
  BadResponseError,
  Keypair,
  Networks,
  NotFoundError,
  Transaction,
} from "@stellar/stellar-sdk";
import { formatAmount, tryParseAmount } from "./amount.js";
import type {
  LedgerNode,
  NodeAccountRecord,
  NodeBalanceLine,
  NodeSubmitResponse,
} from "./ledger-node.js";

/** Base reserve per ledger entry, in stroops (0.5 XLM). */
export const BASE_RESERVE = 5_000_000n;

const MIN_BASE_FEE = 100n;

// =============================================================================
// State
// =============================================================================

interface TrustlineState {
  readonly code: string;
  readonly issuer: string;
  balance: bigint;
}

interface AccountState {
  sequence: bigint;
  native: bigint;
  /** Keyed by "CODE:ISSUER" */
  readonly trustlines: Map<string, TrustlineState>;
}

function trustKey(code: string, issuer: string): string {
  return `${code}:${issuer}`;
}

function cloneAccounts(accounts: Map<string, AccountState>): Map<string, AccountState> {
  const copy = new Map<string, AccountState>();
  for (const [address, state] of accounts) {
    const trustlines = new Map<string, TrustlineState>();
    for (const [key, line] of state.trustlines) {
      trustlines.set(key, { ...line });
    }
    copy.set(address, { sequence: state.sequence, native: state.native, trustlines });
  }
  return copy;
}

/** Native balance the account must keep: (2 + subentries) × base reserve. */
function minimumBalance(state: AccountState): bigint {
  return (2n + BigInt(state.trustlines.size)) * BASE_RESERVE;
}

function toStroops(amount: string): bigint {
  const stroops = tryParseAmount(amount);
  if (stroops === undefined) {
    throw new RangeError(`Unrepresentable amount: ${amount}`);
  }
  return stroops;
}

// =============================================================================
// Horizon Problem Bodies
// =============================================================================

interface SubmissionProblem {
  readonly transaction: string;
  readonly operations?: readonly string[] | undefined;
}

function transactionFailed(problem: SubmissionProblem, envelopeXdr: string): BadResponseError {
  const resultCodes =
    problem.operations !== undefined
      ? { transaction: problem.transaction, operations: [...problem.operations] }
      : { transaction: problem.transaction };

  return new BadResponseError(
    "Transaction submission failed. Server responded: 400 Bad Request",
    {
      type: "https://stellar.org/horizon-errors/transaction_failed",
      title: "Transaction Failed",
      status: 400,
      detail:
        "The transaction failed when submitted to the stellar network. " +
        "The `extras.result_codes` field on this response contains further " +
        "details.",
      extras: { envelope_xdr: envelopeXdr, result_codes: resultCodes },
    },
  );
}

function resourceMissing(): NotFoundError {
  return new NotFoundError("Not Found", {
    type: "https://stellar.org/horizon-errors/not_found",
    title: "Resource Missing",
    status: 404,
    detail:
      "The resource at the url requested was not found. This usually " +
      "occurs for one of two reasons: The url requested is not valid, " +
      "or no data in our database could be found with the parameters provided.",
  });
}

class OperationFailure extends Error {
  constructor(readonly resultCode: string) {
    super(resultCode);
    this.name = "OperationFailure";
  }
}

// =============================================================================
// Node
// =============================================================================

export interface InMemoryLedgerNodeOptions {
  /** Network passphrase signatures are verified against. Default: testnet */
  readonly passphrase?: string | undefined;
  /** Clock in epoch milliseconds */
  readonly now?: (() => number) | undefined;
  /** Sequence of the first ledger this node closes. Default: 2 */
  readonly startLedger?: number | undefined;
}

export class InMemoryLedgerNode implements LedgerNode {
  readonly passphrase: string;
  private readonly now: () => number;
  private accounts = new Map<string, AccountState>();
  private ledger: number;
  private unavailable = false;

  constructor(options: InMemoryLedgerNodeOptions = {}) {
    this.passphrase = options.passphrase ?? Networks.TESTNET;
    this.now = options.now ?? Date.now;
    this.ledger = options.startLedger ?? 2;
  }

  // ===========================================================================
  // Seeding
  // ===========================================================================

  /** Create an account directly, bypassing transactions. */
  seedAccount(address: string, nativeBalance: string, sequence = "0"): void {
    this.accounts.set(address, {
      sequence: BigInt(sequence),
      native: toStroops(nativeBalance),
      trustlines: new Map(),
    });
  }

  /** Add (or overwrite) a trustline on an existing seeded account. */
  seedTrustline(address: string, code: string, issuer: string, balance = "0"): void {
    const account = this.accounts.get(address);
    if (account === undefined) {
      throw new Error(`Cannot seed trustline: account ${address} does not exist`);
    }
    account.trustlines.set(trustKey(code, issuer), {
      code,
      issuer,
      balance: toStroops(balance),
    });
  }

  /** Simulate a node that cannot be reached. */
  setUnavailable(unavailable: boolean): void {
    this.unavailable = unavailable;
  }

  /** Sequence of the last closed ledger. */
  get latestLedger(): number {
    return this.ledger - 1;
  }

  // ===========================================================================
  // LedgerNode
  // ===========================================================================

  async loadAccount(address: string): Promise<NodeAccountRecord> {
    this.assertReachable();

    const state = this.accounts.get(address);
    if (state === undefined) {
      throw resourceMissing();
    }

    const balances: NodeBalanceLine[] = [];
    for (const line of state.trustlines.values()) {
      balances.push({
        asset_type: line.code.length <= 4 ? "credit_alphanum4" : "credit_alphanum12",
        balance: formatAmount(line.balance),
        asset_code: line.code,
        asset_issuer: line.issuer,
      });
    }
    balances.push({ asset_type: "native", balance: formatAmount(state.native) });

    return {
      account_id: address,
      sequence: state.sequence.toString(),
      balances,
    };
  }

  async submitTransaction(transaction: Transaction): Promise<NodeSubmitResponse> {
    this.assertReachable();

    // Re-decode under this node's passphrase: a signature made for another
    // network does not verify against this hash.
    const envelopeXdr = transaction.toXDR();
    const tx = new Transaction(envelopeXdr, this.passphrase);
    const hash = tx.hash();

    const preflight = this.preflight(tx, hash);
    if (preflight !== undefined) {
      throw transactionFailed({ transaction: preflight }, envelopeXdr);
    }

    const source = this.requireAccount(tx.source);
    const fee = BigInt(tx.fee);
    const ledger = this.ledger;
    this.ledger += 1;

    // Fee and sequence are consumed whether or not the operations succeed
    source.native -= fee;
    source.sequence = BigInt(tx.sequence);

    const working = cloneAccounts(this.accounts);
    const opCodes: string[] = [];
    for (const op of tx.operations) {
      try {
        this.applyOperation(working, op, op.source ?? tx.source, ledger);
        opCodes.push("op_success");
      } catch (err: unknown) {
        if (err instanceof OperationFailure) {
          opCodes.push(err.resultCode);
          throw transactionFailed(
            { transaction: "tx_failed", operations: opCodes },
            envelopeXdr,
          );
        }
        throw err;
      }
    }

    this.accounts = working;
    return { hash: hash.toString("hex"), ledger };
  }

  // ===========================================================================
  // Validation
  // ===========================================================================

  private assertReachable(): void {
    if (this.unavailable) {
      throw new Error("connect ECONNREFUSED 127.0.0.1:8000");
    }
  }

  private requireAccount(address: string): AccountState {
    const state = this.accounts.get(address);
    if (state === undefined) {
      throw new Error(`Account ${address} vanished during submission`);
    }
    return state;
  }

  /** Returns a transaction result code when the envelope is invalid. */
  private preflight(tx: Transaction, hash: Buffer): string | undefined {
    const nowSeconds = Math.floor(this.now() / 1000);
    if (tx.timeBounds !== undefined) {
      const minTime = Number(tx.timeBounds.minTime);
      const maxTime = Number(tx.timeBounds.maxTime);
      if (nowSeconds < minTime) return "tx_too_early";
      if (maxTime !== 0 && nowSeconds > maxTime) return "tx_too_late";
    }

    if (tx.operations.length === 0) return "tx_missing_operation";

    const source = this.accounts.get(tx.source);
    if (source === undefined) return "tx_no_source_account";

    if (BigInt(tx.sequence) !== source.sequence + 1n) return "tx_bad_seq";

    const fee = BigInt(tx.fee);
    if (fee < MIN_BASE_FEE * BigInt(tx.operations.length)) {
      return "tx_insufficient_fee";
    }
    if (source.native - fee < minimumBalance(source)) {
      return "tx_insufficient_balance";
    }

    const required = new Set<string>([tx.source]);
    for (const op of tx.operations) {
      if (op.source !== undefined) required.add(op.source);
    }

    const used = new Set<number>();
    for (const address of required) {
      const keypair = Keypair.fromPublicKey(address);
      const hint = keypair.signatureHint();
      const index = tx.signatures.findIndex(
        (sig) => sig.hint().equals(hint) && keypair.verify(hash, sig.signature()),
      );
      if (index === -1) return "tx_bad_auth";
      used.add(index);
    }
    if (used.size !== tx.signatures.length) return "tx_bad_auth_extra";

    return undefined;
  }

  // ===========================================================================
  // Operations
  // ===========================================================================

  private applyOperation(
    accounts: Map<string, AccountState>,
    op: Transaction["operations"][number],
    sourceAddress: string,
    ledger: number,
  ): void {
    const source = accounts.get(sourceAddress);
    if (source === undefined) {
      throw new OperationFailure("op_no_source_account");
    }

    switch (op.type) {
      case "createAccount": {
        if (accounts.has(op.destination)) {
          throw new OperationFailure("op_already_exists");
        }
        const starting = toStroops(op.startingBalance);
        if (starting < 2n * BASE_RESERVE) {
          throw new OperationFailure("op_low_reserve");
        }
        if (source.native - starting < minimumBalance(source)) {
          throw new OperationFailure("op_underfunded");
        }
        source.native -= starting;
        accounts.set(op.destination, {
          sequence: BigInt(ledger) << 32n,
          native: starting,
          trustlines: new Map(),
        });
        return;
      }

      case "changeTrust": {
        if (!(op.line instanceof Asset) || op.line.isNative()) {
          throw new OperationFailure("op_malformed");
        }
        const code = op.line.getCode();
        const issuer = op.line.getIssuer();
        if (issuer === sourceAddress) {
          throw new OperationFailure("op_self_not_allowed");
        }
        if (!accounts.has(issuer)) {
          throw new OperationFailure("op_no_issuer");
        }
        const key = trustKey(code, issuer);
        if (source.trustlines.has(key)) return;
        if (source.native < minimumBalance(source) + BASE_RESERVE) {
          throw new OperationFailure("op_low_reserve");
        }
        source.trustlines.set(key, { code, issuer, balance: 0n });
        return;
      }

      case "payment": {
        const destination = accounts.get(op.destination);
        if (destination === undefined) {
          throw new OperationFailure("op_no_destination");
        }
        const amount = toStroops(op.amount);

        if (op.asset.isNative()) {
          if (source.native - amount < minimumBalance(source)) {
            throw new OperationFailure("op_underfunded");
          }
          source.native -= amount;
          destination.native += amount;
          return;
        }

        const code = op.asset.getCode();
        const issuer = op.asset.getIssuer();
        const key = trustKey(code, issuer);

        const sourceIsIssuer = sourceAddress === issuer;
        const destinationIsIssuer = op.destination === issuer;

        const sourceLine = source.trustlines.get(key);
        if (!sourceIsIssuer) {
          if (sourceLine === undefined) throw new OperationFailure("op_src_no_trust");
          if (sourceLine.balance < amount) throw new OperationFailure("op_underfunded");
        }

        const destinationLine = destination.trustlines.get(key);
        if (!destinationIsIssuer && destinationLine === undefined) {
          throw new OperationFailure("op_no_trust");
        }

        // Issuers mint on send and burn on receive
        if (sourceLine !== undefined && !sourceIsIssuer) sourceLine.balance -= amount;
        if (destinationLine !== undefined && !destinationIsIssuer) {
          destinationLine.balance += amount;
        }
        return;
      }

      default:
        throw new OperationFailure("op_not_supported");
    }
  }
}
