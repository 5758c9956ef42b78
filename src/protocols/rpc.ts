/**
 * @file src/protocols/rpc.ts
 * Read-only on-chain helpers. No side effects, no signing, no wallet access.
 *
 * The Connection is built on the first call, so creating a client never
 * touches the network. One request per operation: no retries, no backoff,
 * and web3.js' own 429 retry loop is switched off.
 */

import {
  Connection,
  SolanaJSONRPCError,
  type Finality,
  type PublicKey,
} from '@solana/web3.js';
import {
  RpcError,
  type BlockReference,
  type LedgerClient,
  type RpcOperation,
  type RpcResult,
  type SignatureRecord,
} from './types.js';
import type { Logger } from '../logger/logger.js';

/** Every read, including signature history, is made at this level. */
const COMMITMENT: Finality = 'confirmed';

export interface LedgerClientOptions {
  logger: Logger;
}

export function createLedgerClient(rpcUrl: string, options: LedgerClientOptions): LedgerClient {
  const { logger } = options;
  let connection: Connection | undefined;

  function getConnection(): Connection {
    if (!connection) {
      connection = new Connection(rpcUrl, { commitment: COMMITMENT, disableRetryOnRateLimit: true });
    }
    return connection;
  }

  async function call<T>(
    operation: RpcOperation,
    fn: (conn: Connection) => Promise<T>,
  ): Promise<RpcResult<T>> {
    const startedAt = Date.now();
    try {
      const value = await fn(getConnection());
      logger.debug({ operation, durationMs: Date.now() - startedAt }, 'RPC call succeeded');
      return { ok: true, value };
    } catch (err) {
      const error = toRpcError(operation, err);
      logger.warn(
        { operation, code: error.code, durationMs: Date.now() - startedAt, err },
        'RPC call failed',
      );
      return { ok: false, error };
    }
  }

  return {
    rpcUrl,

    getBalance(address: PublicKey): Promise<RpcResult<bigint>> {
      return call('getBalance', async (conn) => BigInt(await conn.getBalance(address, COMMITMENT)));
    },

    getLatestBlockReference(): Promise<RpcResult<BlockReference>> {
      return call('getLatestBlockReference', async (conn) => {
        const { blockhash, lastValidBlockHeight } = await conn.getLatestBlockhash(COMMITMENT);
        return { blockhash, lastValidBlockHeight };
      });
    },

    getSignatureHistory(address: PublicKey, limit?: number): Promise<RpcResult<SignatureRecord[]>> {
      return call('getSignatureHistory', async (conn) => {
        const infos = await conn.getSignaturesForAddress(
          address,
          limit === undefined ? undefined : { limit },
          COMMITMENT,
        );
        return infos.map((info) => ({
          signature: info.signature,
          slot: info.slot,
          err: info.err,
          blockTime: info.blockTime ?? null,
        }));
      });
    },
  };
}

// ── Internals ─────────────────────────────────────────────────────────────────

function toRpcError(operation: RpcOperation, err: unknown): RpcError {
  if (err instanceof SolanaJSONRPCError) {
    return new RpcError('RPC_ERROR', operation, err.message, err);
  }
  const message = err instanceof Error ? err.message : String(err);
  return new RpcError('NETWORK_ERROR', operation, message, err);
}
