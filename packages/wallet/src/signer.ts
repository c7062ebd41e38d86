/**
 * Transaction Signer
 *
 * Adds one ed25519 signature per signing key to an envelope. The
 * signature payload is the transaction hash under a specific network
 * passphrase; an envelope signed for the wrong network still carries
 * well-formed signatures and is only refused by the ledger node at
 * submission (tx_bad_auth).
 *
 * Multi-party authorization: every account whose funds or state an
 * envelope touches must sign it. Account creation is signed by both
 * the funding account and the new account, whose trustline is
 * established in the same envelope.
 */

import { Transaction } from "@stellar/stellar-sdk";
import type { FullKeypair } from "./keys.js";
import type { NetworkContext, SignedEnvelope, UnsignedEnvelope } from "./types.js";
import { WalletError } from "./types.js";

export class Signer {
  /**
   * Sign an envelope with each distinct key, in the order given.
   *
   * @throws {WalletError} BUILD_ERROR if no keys are supplied or the
   *   envelope XDR cannot be decoded
   */
  sign(
    envelope: UnsignedEnvelope,
    network: NetworkContext,
    ...keys: readonly FullKeypair[]
  ): SignedEnvelope {
    if (keys.length === 0) {
      throw new WalletError("BUILD_ERROR", "At least one signing key is required");
    }

    let tx: Transaction;
    try {
      tx = new Transaction(envelope.xdr, network.passphrase);
    } catch (err: unknown) {
      throw new WalletError(
        "BUILD_ERROR",
        "Envelope XDR could not be decoded",
        undefined,
        { cause: err },
      );
    }

    const hash = tx.hash();
    const signers: string[] = [];

    for (const key of keys) {
      // A second signature from the same key is rejected by the network
      if (signers.includes(key.address)) continue;
      tx.signatures.push(key.signDecorated(hash));
      signers.push(key.address);
    }

    return {
      ...envelope,
      xdr: tx.toXDR(),
      hash: hash.toString("hex"),
      signers,
      networkPassphrase: network.passphrase,
    };
  }
}
