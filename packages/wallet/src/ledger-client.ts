/**
 * Ledger Client
 *
 * Reads account snapshots from and submits signed envelopes to a
 * ledger node, and classifies every node failure into the wallet
 * error taxonomy:
 *
 * | Node outcome                                  | WalletError   |
 * |-----------------------------------------------|---------------|
 * | 404 on account lookup                         | NOT_FOUND     |
 * | No response, transport error, 429, 5xx        | UNAVAILABLE   |
 * | Any other 4xx on submission                   | REJECTED      |
 * | Destination requires a memo (SEP-29 check)    | REJECTED      |
 *
 * REJECTED carries the node's detail text and result codes verbatim.
 * Nothing here retries: a rejected envelope must be rebuilt from a
 * fresh snapshot and re-signed, and an unavailable node may still
 * have applied the transaction.
 */

import {
  AccountRequiresMemoError,
  NetworkError,
  NotFoundError,
  Transaction,
} from "@stellar/stellar-sdk";
import { z } from "zod";
import type { LedgerNode, NodeAccountRecord } from "./ledger-node.js";
import type {
  Account,
  NetworkContext,
  ResultCodes,
  SignedEnvelope,
  TransactionResult,
} from "./types.js";
import { WalletError } from "./types.js";

// =============================================================================
// Node Problem Shapes
// =============================================================================

/** Horizon "problem" response body (RFC 7807 with Stellar extras). */
const ProblemSchema = z.object({
  status: z.number().optional(),
  title: z.string().optional(),
  detail: z.string().optional(),
  extras: z
    .object({
      result_codes: z
        .object({
          transaction: z.string().optional(),
          operations: z.array(z.string()).optional(),
        })
        .optional(),
    })
    .optional(),
});

type Problem = z.infer<typeof ProblemSchema>;

/** An HTTP response wrapper: `{ status, data }`. */
const HttpResponseSchema = z.object({
  status: z.number().optional(),
  data: ProblemSchema,
});

/** An HTTP client error: `{ response: { status, data } }`. */
const HttpErrorSchema = z.object({
  response: z.object({
    status: z.number(),
    data: ProblemSchema.optional(),
  }),
});

interface NodeFailure {
  readonly status?: number | undefined;
  readonly problem?: Problem | undefined;
}

function describeFailure(err: unknown): NodeFailure {
  if (err instanceof NetworkError) {
    const body: unknown = err.getResponse();

    const wrapped = HttpResponseSchema.safeParse(body);
    if (wrapped.success) {
      return {
        status: wrapped.data.status ?? wrapped.data.data.status,
        problem: wrapped.data.data,
      };
    }

    const problem = ProblemSchema.safeParse(body);
    if (problem.success) {
      return { status: problem.data.status, problem: problem.data };
    }
    return {};
  }

  const httpError = HttpErrorSchema.safeParse(err);
  if (httpError.success) {
    return {
      status: httpError.data.response.status,
      problem: httpError.data.response.data,
    };
  }

  return {};
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function isTransient(status: number | undefined): boolean {
  return status === undefined || status === 429 || status >= 500;
}

function toResultCodes(problem: Problem | undefined): ResultCodes | undefined {
  const codes = problem?.extras?.result_codes;
  if (codes === undefined) return undefined;
  return { transaction: codes.transaction, operations: codes.operations };
}

/**
 * Summarize result codes for a human: "tx_failed: op_underfunded".
 */
export function formatResultCodes(codes: ResultCodes | undefined): string | undefined {
  if (codes?.transaction === undefined) return undefined;
  const ops = (codes.operations ?? []).filter((c) => c !== "op_success");
  return ops.length > 0 ? `${codes.transaction}: ${ops.join(", ")}` : codes.transaction;
}

// =============================================================================
// Client
// =============================================================================

export interface LedgerClientOptions {
  /** Clock in epoch milliseconds (injectable for tests) */
  readonly now?: (() => number) | undefined;
}

export class LedgerClient {
  private readonly node: LedgerNode;
  private readonly network: NetworkContext;
  private readonly now: () => number;

  constructor(
    node: LedgerNode,
    network: NetworkContext,
    options: LedgerClientOptions = {},
  ) {
    this.node = node;
    this.network = network;
    this.now = options.now ?? Date.now;
  }

  /**
   * Fetch a fresh account snapshot.
   *
   * @throws {WalletError} NOT_FOUND if the account was never created
   * @throws {WalletError} UNAVAILABLE if the node cannot be reached
   */
  async fetchAccount(address: string): Promise<Account> {
    let record: NodeAccountRecord;
    try {
      record = await this.node.loadAccount(address);
    } catch (err: unknown) {
      throw this.classifyLookupFailure(address, err);
    }

    return {
      address: record.account_id,
      sequence: record.sequence,
      balances: record.balances.map((line) => ({
        assetType: line.asset_type,
        assetCode: line.asset_code,
        issuer: line.asset_issuer,
        amount: line.balance,
      })),
    };
  }

  /**
   * Submit a signed envelope exactly once.
   *
   * @throws {WalletError} REJECTED if the node refused the transaction
   *   or its validity window has already elapsed
   * @throws {WalletError} UNAVAILABLE if the outcome is unknown
   */
  async submit(envelope: SignedEnvelope): Promise<TransactionResult> {
    const nowSeconds = Math.floor(this.now() / 1000);
    const { maxTime } = envelope.timeBounds;
    if (maxTime !== 0 && nowSeconds > maxTime) {
      throw new WalletError(
        "REJECTED",
        "Transaction failed: validity window elapsed before submission",
        {
          detail: `Envelope expired at ${maxTime}, now ${nowSeconds}`,
          resultCodes: { transaction: "tx_too_late" },
        },
      );
    }

    let tx: Transaction;
    try {
      tx = new Transaction(envelope.xdr, this.network.passphrase);
    } catch (err: unknown) {
      throw new WalletError(
        "BUILD_ERROR",
        "Signed envelope XDR could not be decoded",
        undefined,
        { cause: err },
      );
    }

    try {
      const response = await this.node.submitTransaction(tx);
      return { hash: response.hash, ledger: response.ledger };
    } catch (err: unknown) {
      throw this.classifySubmitFailure(err);
    }
  }

  // ===========================================================================
  // Classification
  // ===========================================================================

  private classifyLookupFailure(address: string, err: unknown): WalletError {
    const { status, problem } = describeFailure(err);

    if (err instanceof NotFoundError || status === 404) {
      return new WalletError("NOT_FOUND", `Account ${address} does not exist`, {
        status: 404,
      });
    }

    if (isTransient(status)) {
      return new WalletError(
        "UNAVAILABLE",
        `Ledger node unavailable: ${errorMessage(err)}`,
        { status, detail: problem?.detail },
        { cause: err },
      );
    }

    return new WalletError(
      "REJECTED",
      `Account lookup refused: ${problem?.detail ?? errorMessage(err)}`,
      { status, detail: problem?.detail },
      { cause: err },
    );
  }

  private classifySubmitFailure(err: unknown): WalletError {
    // Raised before anything is sent; permanent until a memo is added
    if (err instanceof AccountRequiresMemoError) {
      return new WalletError(
        "REJECTED",
        "Transaction failed: destination account requires a memo",
        {
          detail: `Account ${err.accountId} requires a memo (operation ${err.operationIndex})`,
        },
        { cause: err },
      );
    }

    const { status, problem } = describeFailure(err);

    if (isTransient(status)) {
      return new WalletError(
        "UNAVAILABLE",
        `Failed to submit transaction: ${errorMessage(err)}`,
        { status, detail: problem?.detail },
        { cause: err },
      );
    }

    const resultCodes = toResultCodes(problem);
    const summary =
      formatResultCodes(resultCodes) ?? problem?.title ?? errorMessage(err);

    return new WalletError(
      "REJECTED",
      `Transaction failed: ${summary}`,
      { status, detail: problem?.detail, resultCodes },
      { cause: err },
    );
  }
}
