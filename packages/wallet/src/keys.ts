/**
 * Key Manager
 *
 * Generates and parses Stellar key material.
 *
 * Key capability is a two-variant sum type:
 * - AddressKeypair: public address only, cannot sign
 * - FullKeypair: carries the secret seed and can sign
 *
 * The secret seed of a FullKeypair lives in a private field. toJSON()
 * and toString() render the address only; `revealSecret()` is the
 * single accessor.
 */

import { Keypair, StrKey } from "@stellar/stellar-sdk";
import type { xdr } from "@stellar/stellar-sdk";
import { WalletError } from "./types.js";

// =============================================================================
// Keypair Variants
// =============================================================================

export class AddressKeypair {
  readonly kind = "address" as const;

  constructor(readonly address: string) {}

  toJSON(): { kind: "address"; address: string } {
    return { kind: this.kind, address: this.address };
  }

  toString(): string {
    return this.address;
  }
}

export class FullKeypair {
  readonly kind = "full" as const;
  readonly address: string;
  readonly #keypair: Keypair;

  constructor(keypair: Keypair) {
    if (!keypair.canSign()) {
      throw new WalletError("INVALID_KEY", "Keypair has no secret material");
    }
    this.#keypair = keypair;
    this.address = keypair.publicKey();
  }

  /** The "S..." encoded secret seed. Only the create-wallet result carries it. */
  revealSecret(): string {
    return this.#keypair.secret();
  }

  /** Sign a transaction hash, producing a hinted signature. */
  signDecorated(hash: Buffer): xdr.DecoratedSignature {
    return this.#keypair.signDecorated(hash);
  }

  toAddressKeypair(): AddressKeypair {
    return new AddressKeypair(this.address);
  }

  toJSON(): { kind: "full"; address: string } {
    return { kind: this.kind, address: this.address };
  }

  toString(): string {
    return this.address;
  }
}

export type WalletKeypair = AddressKeypair | FullKeypair;

// =============================================================================
// Key Manager
// =============================================================================

export class KeyManager {
  /**
   * Generate a fresh signing keypair from the platform CSPRNG.
   *
   * @throws {WalletError} INTERNAL_ERROR if the entropy source fails
   */
  generate(): FullKeypair {
    try {
      return new FullKeypair(Keypair.random());
    } catch (err: unknown) {
      throw new WalletError(
        "INTERNAL_ERROR",
        "Failed to generate keypair",
        undefined,
        { cause: err },
      );
    }
  }

  /**
   * Parse an "S..." secret seed.
   *
   * Every failure (encoding, length, checksum) is reported as the same
   * INVALID_KEY error.
   */
  parseFull(secret: string): FullKeypair {
    if (!StrKey.isValidEd25519SecretSeed(secret)) {
      throw new WalletError("INVALID_KEY", "Invalid secret key");
    }
    return new FullKeypair(Keypair.fromSecret(secret));
  }

  /**
   * Parse a "G..." account address. Validates encoding and checksum only;
   * whether the account exists on the ledger is not checked.
   */
  parseAddress(address: string): AddressKeypair {
    if (!StrKey.isValidEd25519PublicKey(address)) {
      throw new WalletError("INVALID_KEY", "Invalid public key format");
    }
    return new AddressKeypair(address);
  }
}
