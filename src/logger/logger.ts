/**
 * @file src/logger/logger.ts
 * Structured JSON logger wrapping pino.
 * Key-adjacent field names are redacted at the transport level as a last-resort guard.
 *
 * Stdout belongs to the interactive menu, so log lines go to stderr.
 */

import pino from 'pino';
import type { DestinationStream, Logger as PinoLogger } from 'pino';

// ── Redacted field names ──────────────────────────────────────────────────────
// These field names will never appear in log output — their values are replaced
// with '[REDACTED]'. The wallet module itself must never pass key material here.
const REDACTED_PATHS = [
  'secretKey',
  'secret_key',
  'privateKey',
  'private_key',
  'keypair',
  'seed',
  'mnemonic',
  'keyMaterial',
  'key_material',
  '*.secretKey',
  '*.privateKey',
  '*.keypair',
  '*.seed',
];

// ── Public logger type ────────────────────────────────────────────────────────

export type Logger = PinoLogger;

// ── Factory ───────────────────────────────────────────────────────────────────

export interface LoggerOptions {
  level?: string;
  /** Persistent fields bound to every log line from this logger. */
  bindings?: Record<string, string>;
  /** Whether to pretty-print (dev only). Ignored in production. */
  pretty?: boolean;
  /** Where JSON lines are written. Defaults to stderr. */
  destination?: DestinationStream;
}

/**
 * Creates a structured logger. Call once at startup and pass the instance
 * through the dependency tree.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { level = 'warn', bindings = {}, pretty = false } = options;

  const destination =
    options.destination ??
    (pretty && process.env['NODE_ENV'] !== 'production'
      ? pino.transport({ target: 'pino-pretty', options: { colorize: true, destination: 2 } })
      : pino.destination(2));

  return pino(
    {
      level,
      redact: {
        paths: REDACTED_PATHS,
        censor: '[REDACTED]',
      },
      serializers: {
        err: pino.stdSerializers.err,
        error: pino.stdSerializers.err,
      },
      base: {
        pid: process.pid,
        ...bindings,
      },
    },
    destination,
  );
}

/** Child logger tagging every line with the component that emitted it. */
export function createComponentLogger(parent: Logger, component: string): Logger {
  return parent.child({ component });
}
