/**
 * @file src/query/types.ts
 * Shared types for the wallet query flow and its capability wrapper.
 */

import type { BlockReference, LedgerClient, SignatureRecord } from '../protocols/types.js';
import type { CredentialSource } from '../wallet/types.js';
import type { Logger } from '../logger/logger.js';

export type WalletQueryStage = 'connect' | 'load-credential' | 'query' | 'render';

/**
 * What one run of the wallet query produced.
 * `balance` and `signatures` are null when that call failed but the flow went on.
 */
export type WalletQueryOutcome =
  | {
      status: 'completed';
      publicKey: string;
      balance: bigint | null;
      blockReference: BlockReference;
      signatures: SignatureRecord[] | null;
    }
  | {
      status: 'aborted';
      stage: Extract<WalletQueryStage, 'load-credential' | 'query'>;
      publicKey: string | null;
      reason: string;
    }
  | { status: 'disabled' };

export interface WalletQueryDeps {
  rpcUrl: string;
  credentials: CredentialSource;
  /** Builds the client for `rpcUrl`. Must not perform I/O. */
  connect: (rpcUrl: string) => LedgerClient;
  signatureLimit: number;
  logger: Logger;
}

/**
 * The wallet query as the shell sees it. Whether it is backed by RPC or
 * stubbed out is decided once at startup.
 */
export interface WalletQueryCapability {
  readonly enabled: boolean;
  run(): Promise<WalletQueryOutcome>;
}
