/**
 * @file src/protocols/index.ts
 * Entry point into the ledger client.
 *
 * Usage:
 *   const client = createLedgerClient(rpcUrl, { logger });
 *   const balance = await client.getBalance(pubkey);
 *   if (!balance.ok) console.log(balance.error.message);
 */

export { createLedgerClient } from './rpc.js';
export type { LedgerClientOptions } from './rpc.js';
export { RpcError } from './types.js';
export type {
  BlockReference,
  LedgerClient,
  RpcErrorCode,
  RpcOperation,
  RpcResult,
  SignatureRecord,
} from './types.js';
