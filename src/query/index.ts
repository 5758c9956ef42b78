/**
 * @file src/query/index.ts
 * Public API for the wallet query.
 */

export { runWalletQuery } from './flow.js';
export { RpcWalletQuery, DisabledWalletQuery, createWalletQueryCapability } from './capability.js';
export {
  formatSol,
  renderBalance,
  renderBlockReference,
  renderPublicKey,
  renderSignatures,
  NO_TRANSACTIONS_MESSAGE,
} from './render.js';
export type {
  WalletQueryCapability,
  WalletQueryDeps,
  WalletQueryOutcome,
  WalletQueryStage,
} from './types.js';
