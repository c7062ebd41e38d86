/**
 * @walletd/wallet — Stellar wallet core.
 *
 * Key management, envelope assembly, multi-party signing and ledger
 * submission for a custodial-style wallet backend, plus the
 * WalletService that composes them into create / inspect / transfer.
 */

// Service
export { WalletService } from "./wallet-service.js";
export type {
  WalletServiceConfig,
  WalletServiceDeps,
  CreateWalletResult,
  WalletDetails,
  TransferRequest,
  TransferResult,
} from "./wallet-service.js";

// Components
export { KeyManager, AddressKeypair, FullKeypair } from "./keys.js";
export type { WalletKeypair } from "./keys.js";
export {
  TransactionBuilder,
  toStellarAsset,
  MIN_BASE_FEE,
  DEFAULT_VALIDITY_WINDOW_SECONDS,
  MAX_OPERATIONS,
} from "./transaction-builder.js";
export type { TransactionBuilderOptions } from "./transaction-builder.js";
export { Signer } from "./signer.js";
export { LedgerClient, formatResultCodes } from "./ledger-client.js";
export type { LedgerClientOptions } from "./ledger-client.js";

// Ledger nodes
export { HorizonLedgerNode } from "./ledger-node.js";
export type {
  LedgerNode,
  HorizonNodeConfig,
  NodeAccountRecord,
  NodeBalanceLine,
  NodeSubmitResponse,
} from "./ledger-node.js";
export { InMemoryLedgerNode, BASE_RESERVE } from "./in-memory-ledger-node.js";
export type { InMemoryLedgerNodeOptions } from "./in-memory-ledger-node.js";

// Networks & amounts
export { NETWORKS, USDC_ISSUERS, resolveNetwork } from "./networks.js";
export {
  AMOUNT_DECIMALS,
  MAX_STROOPS,
  tryParseAmount,
  parsePositiveAmount,
  formatAmount,
} from "./amount.js";

// Types
export type {
  NetworkName,
  NetworkContext,
  AssetIdentity,
  CreditAsset,
  Balance,
  Account,
  CreateAccountOp,
  EstablishTrustlineOp,
  PaymentOp,
  Operation,
  TimeBounds,
  UnsignedEnvelope,
  SignedEnvelope,
  TransactionResult,
  WalletErrorCode,
  ResultCodes,
  WalletErrorDetails,
} from "./types.js";
export { WalletError, isWalletError } from "./types.js";
