/**
 * @file src/protocols/types.ts
 * Shared types for the read-only ledger client.
 */

import type { PublicKey } from '@solana/web3.js';

/** Most recent blockhash known to the endpoint at query time. */
export interface BlockReference {
  blockhash: string;
  lastValidBlockHeight: number;
}

/** One entry of an address's signature history, most recent first. */
export interface SignatureRecord {
  signature: string;
  slot: number;
  /** Transaction error as reported by the node, or null when it succeeded. */
  err: unknown;
  /** Unix seconds, when the node knows it. */
  blockTime: number | null;
}

export type RpcOperation = 'getBalance' | 'getLatestBlockReference' | 'getSignatureHistory';

/**
 * Every remote call resolves to one of these. Nothing is thrown across the
 * client boundary — the caller decides whether a failure ends the flow.
 */
export type RpcResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: RpcError };

export interface LedgerClient {
  readonly rpcUrl: string;
  getBalance(address: PublicKey): Promise<RpcResult<bigint>>;
  getLatestBlockReference(): Promise<RpcResult<BlockReference>>;
  getSignatureHistory(address: PublicKey, limit?: number): Promise<RpcResult<SignatureRecord[]>>;
}

export type RpcErrorCode =
  /** The node answered with a JSON-RPC error. */
  | 'RPC_ERROR'
  /** The request never got an answer (DNS, TLS, refused, reset…). */
  | 'NETWORK_ERROR';

export class RpcError extends Error {
  override readonly name = 'RpcError';
  constructor(
    public readonly code: RpcErrorCode,
    public readonly operation: RpcOperation,
    message: string,
    public override readonly cause?: unknown,
  ) {
    super(message);
    if (Error.captureStackTrace) Error.captureStackTrace(this, RpcError);
  }
}
