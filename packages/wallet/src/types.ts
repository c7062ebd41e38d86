/**
 * @walletd/wallet domain types.
 *
 * Account snapshots, operations, transaction envelopes and the
 * error taxonomy shared by every component of the wallet core.
 */

// =============================================================================
// Network
// =============================================================================

export type NetworkName = "testnet" | "public";

/**
 * Network identity. The passphrase is mixed into every signature payload,
 * so signer and ledger node must agree on it.
 */
export interface NetworkContext {
  readonly name: NetworkName;
  readonly passphrase: string;
  readonly horizonUrl: string;
}

// =============================================================================
// Assets & Balances
// =============================================================================

export type AssetIdentity =
  | { readonly kind: "native" }
  | { readonly kind: "credit"; readonly code: string; readonly issuer: string };

export type CreditAsset = Extract<AssetIdentity, { kind: "credit" }>;

/** A single balance line as reported by the ledger node. */
export interface Balance {
  /** "native", "credit_alphanum4", "credit_alphanum12", ... */
  readonly assetType: string;
  readonly assetCode?: string | undefined;
  readonly issuer?: string | undefined;
  /** Fixed-precision decimal string, verbatim from the node */
  readonly amount: string;
}

// =============================================================================
// Account
// =============================================================================

/**
 * Transient account snapshot. Stale the moment another transaction
 * from the same account commits.
 */
export interface Account {
  readonly address: string;
  /** Signed 64-bit sequence number as a decimal string */
  readonly sequence: string;
  readonly balances: readonly Balance[];
}

// =============================================================================
// Operations
// =============================================================================

export interface CreateAccountOp {
  readonly kind: "createAccount";
  readonly destination: string;
  readonly startingBalance: string;
}

export interface EstablishTrustlineOp {
  readonly kind: "establishTrustline";
  readonly asset: CreditAsset;
  /** Account that will hold the trustline. Defaults to the envelope source. */
  readonly source?: string | undefined;
}

export interface PaymentOp {
  readonly kind: "payment";
  readonly destination: string;
  readonly asset: AssetIdentity;
  readonly amount: string;
}

export type Operation = CreateAccountOp | EstablishTrustlineOp | PaymentOp;

// =============================================================================
// Envelopes
// =============================================================================

export interface TimeBounds {
  /** Unix seconds */
  readonly minTime: number;
  /** Unix seconds; 0 means unbounded */
  readonly maxTime: number;
}

export interface UnsignedEnvelope {
  readonly source: string;
  /** Sequence number this envelope consumes (snapshot sequence + 1) */
  readonly sequence: string;
  readonly operations: readonly Operation[];
  /** Base fee per operation, in stroops */
  readonly baseFee: number;
  /** Total fee, in stroops */
  readonly fee: number;
  readonly timeBounds: TimeBounds;
  /** Base64 transaction envelope XDR */
  readonly xdr: string;
}

export interface SignedEnvelope extends UnsignedEnvelope {
  /** Hex transaction hash under the signing network */
  readonly hash: string;
  /** Addresses that contributed a signature, in signing order */
  readonly signers: readonly string[];
  readonly networkPassphrase: string;
}

export interface TransactionResult {
  readonly hash: string;
  readonly ledger: number;
}

// =============================================================================
// Error Types
// =============================================================================

/** Error codes for wallet operations. */
export type WalletErrorCode =
  | "INVALID_KEY"
  | "INVALID_ADDRESS"
  | "INVALID_AMOUNT"
  | "NOT_FOUND"
  | "UNAVAILABLE"
  | "REJECTED"
  | "BUILD_ERROR"
  | "INTERNAL_ERROR";

export interface ResultCodes {
  readonly transaction?: string | undefined;
  readonly operations?: readonly string[] | undefined;
}

export interface WalletErrorDetails {
  /** Verbatim detail text supplied by the ledger node */
  readonly detail?: string | undefined;
  readonly resultCodes?: ResultCodes | undefined;
  readonly status?: number | undefined;
}

/**
 * Structured error from the wallet core.
 * Callers branch on `code`; the message is for humans.
 */
export class WalletError extends Error {
  public readonly code: WalletErrorCode;
  public readonly details: WalletErrorDetails | undefined;

  constructor(
    code: WalletErrorCode,
    message: string,
    details?: WalletErrorDetails,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "WalletError";
    this.code = code;
    this.details = details;
  }
}

export function isWalletError(
  err: unknown,
  code?: WalletErrorCode,
): err is WalletError {
  if (!(err instanceof WalletError)) return false;
  return code === undefined || err.code === code;
}
