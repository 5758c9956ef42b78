/**
 * @file src/shell/shell.ts
 *
 * The interactive menu: print the options, read one line, dispatch on the
 * trimmed text, repeat. Option 3 is the only way out besides the input
 * stream ending or failing. No signal handling.
 *
 * An action that throws is reported and the menu comes back; the shell
 * itself only stops on exit, EOF or an input error.
 */

import { LineReader } from './line-reader.js';
import { diagnostic, failure, printLine, describeError } from '../cli/output.js';
import { createComponentLogger } from '../logger/logger.js';
import type { Logger } from '../logger/logger.js';
import type { WalletQueryCapability } from '../query/types.js';

export const MENU_LINES = [
  '',
  'Choose a demo:',
  '1. TypeScript Basics (variables, interfaces, unions, collections)',
  '2. Solana Interaction (wallet info, balance)',
  '3. Exit Program',
] as const;

export const PROMPT = 'Enter your choice (1-3): ';
export const GOODBYE_MESSAGE = 'Exiting program. Goodbye!';
export const INVALID_CHOICE_MESSAGE = 'Invalid choice. Please select 1, 2, or 3.';

export interface ShellActions {
  basicsDemo(): unknown;
  walletQuery: WalletQueryCapability;
}

export interface ShellOptions {
  logger: Logger;
  input?: NodeJS.ReadableStream;
}

export type ShellExit =
  | { reason: 'exit'; code: 0 }
  | { reason: 'eof'; code: 0 }
  | { reason: 'input-error'; code: 1 };

export class Shell {
  private readonly logger: Logger;
  private readonly input: NodeJS.ReadableStream;

  constructor(
    private readonly actions: ShellActions,
    options: ShellOptions,
  ) {
    this.logger = createComponentLogger(options.logger, 'shell');
    this.input = options.input ?? process.stdin;
  }

  /** Runs until the user exits or input ends. Never rejects. */
  async run(): Promise<ShellExit> {
    const reader = new LineReader(this.input);
    this.logger.debug({ walletQueryEnabled: this.actions.walletQuery.enabled }, 'Shell started');

    try {
      for (;;) {
        for (const line of MENU_LINES) printLine(line);
        printLine(PROMPT);

        const next = await reader.next();

        if (next.kind === 'eof') {
          diagnostic('Input stream closed. Exiting.');
          this.logger.info('Shell stopped: end of input');
          return { reason: 'eof', code: 0 };
        }

        if (next.kind === 'error') {
          diagnostic(`Failed to read input: ${describeError(next.error)}`);
          this.logger.error({ err: next.error }, 'Shell stopped: input stream failed');
          return { reason: 'input-error', code: 1 };
        }

        const choice = next.line.trim();
        this.logger.debug({ choice }, 'Menu choice');

        switch (choice) {
          case '1':
            await this.runAction('basics-demo', async () => { await this.actions.basicsDemo(); });
            break;
          case '2':
            await this.runAction('wallet-query', async () => { await this.actions.walletQuery.run(); });
            break;
          case '3':
            printLine(GOODBYE_MESSAGE);
            return { reason: 'exit', code: 0 };
          default:
            printLine(INVALID_CHOICE_MESSAGE);
        }
      }
    } finally {
      reader.close();
    }
  }

  private async runAction(name: string, action: () => Promise<void>): Promise<void> {
    try {
      await action();
    } catch (err) {
      this.logger.error({ action: name, err }, 'Menu action failed');
      failure(`${name} failed: ${describeError(err)}`);
    }
  }
}
