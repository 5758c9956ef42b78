/**
 * @file src/query/capability.ts
 *
 * Two interchangeable implementations of the wallet query, picked once at
 * startup from WALLET_QUERY_ENABLED. The shell's menu is the same either way.
 */

import { createLedgerClient } from '../protocols/index.js';
import { resolveCredentialSource } from '../wallet/index.js';
import { header, info, printLine } from '../cli/output.js';
import { runWalletQuery } from './flow.js';
import type { AppConfig } from '../config/env.js';
import type { Logger } from '../logger/logger.js';
import type { WalletQueryCapability, WalletQueryDeps, WalletQueryOutcome } from './types.js';

export class RpcWalletQuery implements WalletQueryCapability {
  readonly enabled = true;

  constructor(private readonly deps: WalletQueryDeps) {}

  run(): Promise<WalletQueryOutcome> {
    return runWalletQuery(this.deps);
  }
}

export class DisabledWalletQuery implements WalletQueryCapability {
  readonly enabled = false;

  async run(): Promise<WalletQueryOutcome> {
    header('Solana Wallet Query');
    printLine('Solana features are not enabled. To use Solana features:');
    info('Set WALLET_QUERY_ENABLED=true in your environment or .env file');
    info('Optionally point SOLANA_RPC_URL and KEYPAIR_PATH at your endpoint and wallet');
    return { status: 'disabled' };
  }
}

type CapabilityConfig = Pick<
  AppConfig,
  'walletQueryEnabled' | 'rpcUrl' | 'keypairPath' | 'secretKey' | 'signatureDisplayLimit'
>;

export function createWalletQueryCapability(
  config: CapabilityConfig,
  logger: Logger,
): WalletQueryCapability {
  if (!config.walletQueryEnabled) {
    logger.info('Wallet query disabled by configuration');
    return new DisabledWalletQuery();
  }

  return new RpcWalletQuery({
    rpcUrl: config.rpcUrl,
    credentials: resolveCredentialSource({
      keypairPath: config.keypairPath,
      secretKey: config.secretKey,
    }),
    connect: (rpcUrl) => createLedgerClient(rpcUrl, { logger }),
    signatureLimit: config.signatureDisplayLimit,
    logger,
  });
}
