/**
 * @file src/cli/commands/keygen.ts
 *
 *   solana-basics-shell keygen [--outfile <path>] [--force]
 *
 * Writes a fresh keypair in the Solana CLI format, which is what the wallet
 * query's "create a wallet first" hint asks for.
 */

import { Command } from 'commander';
import { Keypair } from '@solana/web3.js';
import { env } from '../../config/env.js';
import { writeKeypairFile, WalletError } from '../../wallet/index.js';
import { header, success, info, kv, errorAndExit, fatalError, printLine } from '../output.js';

export const keygenCommand = new Command('keygen')
  .description('Generate a new keypair file for the wallet query')
  .option('--outfile <path>', 'Where to write the keypair file', env.KEYPAIR_PATH)
  .option('--force', 'Overwrite an existing keypair file', false)
  .action((opts: { outfile: string; force: boolean }) => {
    header('Generating keypair');

    const keypair = Keypair.generate();
    let written: string;
    try {
      written = writeKeypairFile(keypair, opts.outfile, { overwrite: opts.force });
    } catch (err) {
      if (err instanceof WalletError && err.code === 'KEYPAIR_EXISTS') {
        errorAndExit(`${err.message}. Pass --force to replace it.`);
      }
      fatalError(err, 'keygen');
    }

    success(`Keypair saved to ${written}`);
    printLine('');
    kv([
      ['Public key', keypair.publicKey.toBase58()],
      ['File', written],
    ]);
    printLine('');
    info('Fund it on devnet with: solana airdrop 1 ' + keypair.publicKey.toBase58());
    info('The file is not encrypted. Keep it private.');
    printLine('');
  });
