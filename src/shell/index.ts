/**
 * @file src/shell/index.ts
 * Wires configuration, logger and wallet query capability into a Shell.
 */

import { createLogger } from '../logger/index.js';
import { createWalletQueryCapability } from '../query/index.js';
import { runBasicsDemo } from '../demo/basics.js';
import { Shell } from './shell.js';
import type { AppConfig } from '../config/env.js';
import type { Logger } from '../logger/index.js';
import type { ShellExit } from './shell.js';

export interface StartShellOptions {
  input?: NodeJS.ReadableStream;
  logger?: Logger;
}

export function startShell(config: AppConfig, opts: StartShellOptions = {}): Promise<ShellExit> {
  const logger = opts.logger ?? createLogger({ level: config.logLevel, pretty: config.logPretty });

  logger.debug(
    { rpcUrl: config.rpcUrl, walletQueryEnabled: config.walletQueryEnabled, nodeEnv: config.nodeEnv },
    'Starting shell',
  );

  const shell = new Shell(
    {
      basicsDemo: runBasicsDemo,
      walletQuery: createWalletQueryCapability(config, logger),
    },
    { logger, input: opts.input },
  );

  return shell.run();
}

export { Shell, MENU_LINES, PROMPT, GOODBYE_MESSAGE, INVALID_CHOICE_MESSAGE } from './shell.js';
export type { ShellActions, ShellExit, ShellOptions } from './shell.js';
