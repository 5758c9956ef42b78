/**
 * @file src/wallet/types.ts
 * Shared types, interfaces, and error classes for the wallet module.
 * All other modules import from here — never the reverse.
 */

import type { PublicKey } from '@solana/web3.js';

// ── Credential Interface ──────────────────────────────────────────────────────

/**
 * An opaque signing credential. The only way to obtain one is via
 * createCredential() or loadCredential().
 *
 * SECURITY: The Keypair is held inside the factory closure and is inaccessible
 * through this interface. There is no accessor for the secret bytes.
 */
export interface Credential {
  /** The wallet's public key. Safe to log and share. */
  readonly publicKey: PublicKey;

  /** Ed25519 detached signature over `message`. */
  sign(message: Uint8Array): Uint8Array;

  /** Base58 public key — what JSON.stringify(credential) yields. */
  toJSON(): string;
  /** Base58 public key. */
  toString(): string;
}

/**
 * Where the wallet query gets its credential from.
 * `location` is what gets printed when loading fails.
 */
export interface CredentialSource {
  readonly location: string;
  load(): Credential;
}

// ── Error Classes ─────────────────────────────────────────────────────────────

export type WalletErrorCode =
  | 'KEYPAIR_NOT_FOUND'
  | 'INVALID_KEYPAIR'
  | 'KEYPAIR_EXISTS'
  | 'INVALID_CONFIG';

/**
 * Typed error thrown by all wallet module operations.
 * Always includes a machine-readable `code` for programmatic handling.
 */
export class WalletError extends Error {
  override readonly name = 'WalletError';

  constructor(
    public readonly code: WalletErrorCode,
    message: string,
    public override readonly cause?: unknown,
  ) {
    super(message);
    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, WalletError);
    }
  }
}

// ── Keypair file ──────────────────────────────────────────────────────────────

/**
 * On-disk format shared with the Solana CLI (`solana-keygen new`):
 * a JSON array of the 64 secret key bytes, [32-byte seed | 32-byte public key].
 */
export type KeypairFile = number[];
