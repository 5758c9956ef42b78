/**
 * @file src/query/flow.ts
 *
 * The wallet query: connect → load credential → query → render.
 *
 * Stages run strictly in order and never loop back. Remote calls are awaited
 * one at a time. Results are printed as they arrive, so whatever was fetched
 * before an abort has already been shown.
 *
 * Failure policy per call:
 *  - credential      aborts before any remote call
 *  - balance         printed, flow continues
 *  - blockhash       printed, flow aborts
 *  - signatures      printed, flow ends normally
 *
 * The balance/blockhash asymmetry is kept as-is; see DESIGN.md.
 */

import { header, failure, printLine, subheader, info, describeError } from '../cli/output.js';
import { createComponentLogger } from '../logger/logger.js';
import {
  renderBalance,
  renderBlockReference,
  renderPublicKey,
  renderSignatures,
} from './render.js';
import type { Credential } from '../wallet/types.js';
import type { WalletQueryDeps, WalletQueryOutcome, WalletQueryStage } from './types.js';

export async function runWalletQuery(deps: WalletQueryDeps): Promise<WalletQueryOutcome> {
  const logger = createComponentLogger(deps.logger, 'wallet-query');
  let stage: WalletQueryStage = 'connect';

  header('Solana Wallet Query');

  // ── connect ────────────────────────────────────────────────────────────────
  const client = deps.connect(deps.rpcUrl);
  logger.debug({ stage, rpcUrl: client.rpcUrl }, 'Ledger client ready');

  // ── load-credential ────────────────────────────────────────────────────────
  stage = 'load-credential';
  let credential: Credential;
  try {
    credential = deps.credentials.load();
  } catch (err) {
    logger.warn({ stage, location: deps.credentials.location, err }, 'Credential load failed');
    failure(`Failed to read keypair from ${deps.credentials.location}`);
    info(describeError(err));
    info("Make sure you've created a wallet using 'solana-keygen new' (or 'solana-basics-shell keygen')");
    return { status: 'aborted', stage: 'load-credential', publicKey: null, reason: describeError(err) };
  }

  const publicKey = credential.publicKey.toBase58();
  printLine(renderPublicKey(publicKey));

  // ── query + render ─────────────────────────────────────────────────────────
  stage = 'query';

  const balance = await client.getBalance(credential.publicKey);
  if (balance.ok) {
    printLine(renderBalance(balance.value));
  } else {
    failure(`Failed to get balance: ${describeError(balance.error)}`);
  }

  const latest = await client.getLatestBlockReference();
  if (!latest.ok) {
    failure(`Failed to get recent blockhash: ${describeError(latest.error)}`);
    return { status: 'aborted', stage: 'query', publicKey, reason: describeError(latest.error) };
  }
  printLine(renderBlockReference(latest.value));

  const history = await client.getSignatureHistory(credential.publicKey, deps.signatureLimit);

  stage = 'render';
  if (history.ok) {
    subheader('Recent Transactions:');
    for (const line of renderSignatures(history.value, deps.signatureLimit)) {
      printLine(line);
    }
  } else {
    failure(`Failed to get transaction history: ${describeError(history.error)}`);
  }

  logger.debug(
    { stage, balanceOk: balance.ok, signatureCount: history.ok ? history.value.length : null },
    'Wallet query completed',
  );

  return {
    status: 'completed',
    publicKey,
    balance: balance.ok ? balance.value : null,
    blockReference: latest.value,
    signatures: history.ok ? history.value : null,
  };
}
