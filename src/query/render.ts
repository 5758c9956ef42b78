/**
 * @file src/query/render.ts
 * Pure line builders for the wallet query. Nothing here writes to a stream.
 */

import type { BlockReference, SignatureRecord } from '../protocols/types.js';

export const LAMPORTS_PER_SOL = 1_000_000_000n;
export const DEFAULT_SIGNATURE_LIMIT = 5;

export const NO_TRANSACTIONS_MESSAGE = 'No recent transactions found.';

/**
 * Lamports → SOL as an exact decimal string, trailing zeros dropped.
 * 2_500_000_000n → "2.5", 1n → "0.000000001".
 */
export function formatSol(lamports: bigint): string {
  const sign = lamports < 0n ? '-' : '';
  const abs = lamports < 0n ? -lamports : lamports;
  const whole = abs / LAMPORTS_PER_SOL;
  const frac = (abs % LAMPORTS_PER_SOL).toString().padStart(9, '0').replace(/0+$/, '');
  return frac ? `${sign}${whole}.${frac}` : `${sign}${whole}`;
}

export function renderPublicKey(publicKey: string): string {
  return `Wallet Public Key: ${publicKey}`;
}

export function renderBalance(lamports: bigint): string {
  return `Balance: ${formatSol(lamports)} SOL`;
}

export function renderBlockReference(ref: BlockReference): string {
  return `Recent blockhash: ${ref.blockhash}`;
}

/**
 * At most `limit` signatures, 1-based, in the order given (most recent first).
 */
export function renderSignatures(
  records: readonly SignatureRecord[],
  limit: number = DEFAULT_SIGNATURE_LIMIT,
): string[] {
  if (records.length === 0) return [NO_TRANSACTIONS_MESSAGE];
  return records
    .slice(0, limit)
    .map((record, i) => `${i + 1}. Signature: ${record.signature}`);
}
