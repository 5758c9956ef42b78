#!/usr/bin/env node
/**
 * @file src/cli/index.ts
 *
 * CLI entry point.
 *
 * Usage:
 *   solana-basics-shell                       # interactive menu
 *   solana-basics-shell --keypair ./id.json --url http://127.0.0.1:8899
 *   solana-basics-shell keygen --outfile ./id.json
 *
 * Run with:
 *   npx tsx src/cli/index.ts
 *   # or after build:
 *   node dist/cli/index.js
 */

import { Command, Option } from 'commander';
import { env, toAppConfig, LOG_LEVELS, type ConfigOverrides } from '../config/env.js';
import { startShell } from '../shell/index.js';
import { keygenCommand } from './commands/keygen.js';

const program = new Command()
  .name('solana-basics-shell')
  .description('TypeScript basics demo and read-only Solana wallet query')
  .version('1.0.0', '-v, --version', 'Print version number')
  .helpOption('-h, --help', 'Show help')
  .addOption(new Option('--keypair <path>', 'Keypair file (overrides KEYPAIR_PATH)'))
  .addOption(new Option('--url <rpcUrl>', 'RPC endpoint (overrides SOLANA_RPC_URL)'))
  .addOption(new Option('--log-level <level>', 'Log level (overrides LOG_LEVEL)').choices(LOG_LEVELS))
  // Surface errors instead of swallowing them
  .showHelpAfterError(true)
  .configureOutput({
    outputError: (str, write) => write(`\n\x1b[31m✗\x1b[0m ${str.trim()}\n\n`),
  })
  .action(async (opts: ConfigOverrides) => {
    const exit = await startShell(toAppConfig(env, opts));
    process.exitCode = exit.code;
  });

program.addCommand(keygenCommand);

program.parseAsync(process.argv).catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  process.stderr.write(`\n\x1b[31m✗ Fatal:\x1b[0m ${msg}\n\n`);
  process.exit(2);
});
