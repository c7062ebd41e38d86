/**
 * Wallet Service
 *
 * Orchestrates the three wallet use cases:
 *
 * 1. createWallet     — new keypair, funded and trusting the designated
 *                       asset, in one atomic three-operation envelope
 * 2. getWalletDetails — account snapshot, or a "does not exist" shape
 * 3. transferFunds    — one designated-asset payment signed by the sender
 *
 * Flow for writes: fetch snapshot → build → sign → submit → map result.
 * The service holds no mutable state and never retries; concurrent
 * writes from one account are serialized by the ledger's sequence check.
 */

import pino from "pino";
import type { Logger } from "pino";
import { parsePositiveAmount } from "./amount.js";
import { KeyManager } from "./keys.js";
import type { FullKeypair } from "./keys.js";
import type { LedgerClient } from "./ledger-client.js";
import { Signer } from "./signer.js";
import { TransactionBuilder } from "./transaction-builder.js";
import type {
  Account,
  Balance,
  CreditAsset,
  NetworkContext,
  Operation,
  SignedEnvelope,
  TransactionResult,
} from "./types.js";
import { WalletError, isWalletError } from "./types.js";

// =============================================================================
// Configuration
// =============================================================================

/**
 * Process-wide, read-only service configuration.
 * Built once at startup and passed by reference.
 */
export interface WalletServiceConfig {
  readonly network: NetworkContext;
  /** Account that pays for and funds every new wallet */
  readonly fundingKey: FullKeypair;
  /** The non-native asset every wallet trusts and transfers */
  readonly asset: CreditAsset;
  /** Native balance a new account is created with */
  readonly startingBalance: string;
  /** Designated-asset amount paid into a new account */
  readonly fundingAmount: string;
  /** Base fee per operation, in stroops */
  readonly baseFee: number;
  readonly validityWindowSeconds: number;
}

export interface WalletServiceDeps {
  readonly ledger: LedgerClient;
  readonly keys?: KeyManager | undefined;
  readonly builder?: TransactionBuilder | undefined;
  readonly signer?: Signer | undefined;
  readonly logger?: Logger | undefined;
}

// =============================================================================
// Results
// =============================================================================

export interface CreateWalletResult {
  readonly publicKey: string;
  readonly secretKey: string;
  readonly transactionHash: string;
  readonly message: string;
}

export interface WalletDetails {
  readonly publicKey: string;
  readonly exists: boolean;
  readonly balances: readonly Balance[];
  /** Decimal string; "0" for accounts that do not exist */
  readonly sequenceNumber: string;
}

export interface TransferRequest {
  readonly fromSecret: string;
  readonly toAddress: string;
  readonly amount: string;
}

export interface TransferResult {
  readonly transactionHash: string;
  readonly message: string;
}

// =============================================================================
// Service
// =============================================================================

export class WalletService {
  private readonly config: WalletServiceConfig;
  private readonly ledger: LedgerClient;
  private readonly keys: KeyManager;
  private readonly builder: TransactionBuilder;
  private readonly signer: Signer;
  private readonly logger: Logger;

  constructor(config: WalletServiceConfig, deps: WalletServiceDeps) {
    this.config = Object.freeze({ ...config });
    this.ledger = deps.ledger;
    this.keys = deps.keys ?? new KeyManager();
    this.builder = deps.builder ?? new TransactionBuilder(config.network);
    this.signer = deps.signer ?? new Signer();
    this.logger = deps.logger ?? pino({ enabled: false });
  }

  get network(): NetworkContext {
    return this.config.network;
  }

  get asset(): CreditAsset {
    return this.config.asset;
  }

  get fundingAddress(): string {
    return this.config.fundingKey.address;
  }

  /**
   * Create, trust-enable and fund a new account in one envelope.
   *
   * The envelope is signed by the funding account (debits) and by the
   * new account (its trustline). The secret key is returned here and
   * nowhere else.
   */
  async createWallet(): Promise<CreateWalletResult> {
    const wallet = this.keys.generate();
    const { fundingKey, asset } = this.config;

    const funding = await this.fetchFundingAccount();

    const operations: Operation[] = [
      {
        kind: "createAccount",
        destination: wallet.address,
        startingBalance: this.config.startingBalance,
      },
      { kind: "establishTrustline", asset, source: wallet.address },
      {
        kind: "payment",
        destination: wallet.address,
        asset,
        amount: this.config.fundingAmount,
      },
    ];

    const result = await this.buildSignSubmit(funding, operations, [
      fundingKey,
      wallet,
    ]);

    this.logger.info(
      { address: wallet.address, hash: result.hash, ledger: result.ledger },
      "Wallet created",
    );

    return {
      publicKey: wallet.address,
      secretKey: wallet.revealSecret(),
      transactionHash: result.hash,
      message: `Wallet created, trusted ${asset.code}, and funded successfully. Hash: ${result.hash}`,
    };
  }

  /**
   * Read an account. A never-created account is a normal answer,
   * not an error.
   *
   * @throws {WalletError} INVALID_KEY for a malformed address
   */
  async getWalletDetails(address: string): Promise<WalletDetails> {
    this.keys.parseAddress(address);

    let account: Account;
    try {
      account = await this.ledger.fetchAccount(address);
    } catch (err: unknown) {
      if (isWalletError(err, "NOT_FOUND")) {
        return { publicKey: address, exists: false, balances: [], sequenceNumber: "0" };
      }
      throw err;
    }

    return {
      publicKey: address,
      exists: true,
      balances: account.balances,
      sequenceNumber: account.sequence,
    };
  }

  /**
   * Pay the designated asset from the sender to the recipient.
   *
   * All three inputs are validated before any network call.
   *
   * @throws {WalletError} INVALID_KEY, INVALID_ADDRESS, INVALID_AMOUNT,
   *   NOT_FOUND (sender), REJECTED, UNAVAILABLE
   */
  async transferFunds(request: TransferRequest): Promise<TransferResult> {
    let sender: FullKeypair;
    try {
      sender = this.keys.parseFull(request.fromSecret);
    } catch (err: unknown) {
      throw new WalletError("INVALID_KEY", "Invalid sender secret key", undefined, {
        cause: err,
      });
    }

    try {
      this.keys.parseAddress(request.toAddress);
    } catch (err: unknown) {
      throw new WalletError(
        "INVALID_ADDRESS",
        "Invalid recipient public key",
        undefined,
        { cause: err },
      );
    }

    parsePositiveAmount(request.amount);

    const { asset } = this.config;
    const account = await this.ledger.fetchAccount(sender.address);

    const result = await this.buildSignSubmit(
      account,
      [
        {
          kind: "payment",
          destination: request.toAddress,
          asset,
          amount: request.amount,
        },
      ],
      [sender],
    );

    this.logger.info(
      {
        from: sender.address,
        to: request.toAddress,
        amount: request.amount,
        hash: result.hash,
      },
      "Transfer submitted",
    );

    return {
      transactionHash: result.hash,
      message: `${asset.code} transferred successfully`,
    };
  }

  // ===========================================================================
  // Private helpers
  // ===========================================================================

  /**
   * A missing funding account surfaces as INTERNAL_ERROR; its address
   * goes to the log only.
   */
  private async fetchFundingAccount(): Promise<Account> {
    const { address } = this.config.fundingKey;
    try {
      return await this.ledger.fetchAccount(address);
    } catch (err: unknown) {
      if (!isWalletError(err, "NOT_FOUND")) throw err;
      this.logger.error({ address }, "Funding account does not exist");
      throw new WalletError(
        "INTERNAL_ERROR",
        "Funding account is not available",
        undefined,
        { cause: err },
      );
    }
  }

  private async buildSignSubmit(
    source: Account,
    operations: readonly Operation[],
    signingKeys: readonly FullKeypair[],
  ): Promise<TransactionResult> {
    const envelope = this.builder.build(
      source,
      operations,
      this.config.baseFee,
      this.config.validityWindowSeconds,
    );
    const signed: SignedEnvelope = this.signer.sign(
      envelope,
      this.config.network,
      ...signingKeys,
    );

    try {
      return await this.ledger.submit(signed);
    } catch (err: unknown) {
      if (isWalletError(err)) {
        this.logger.warn(
          {
            code: err.code,
            source: source.address,
            sequence: signed.sequence,
            hash: signed.hash,
            resultCodes: err.details?.resultCodes,
          },
          "Transaction submission failed",
        );
      }
      throw err;
    }
  }
}
