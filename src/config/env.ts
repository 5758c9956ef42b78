/**
 * @file src/config/env.ts
 * Single source of truth for all environment-derived configuration.
 * Validates at import time — if a variable is malformed, the process exits
 * before the shell starts.
 */

import { z } from 'zod';
import { config as loadDotenv } from 'dotenv';
import { DEFAULT_KEYPAIR_PATH } from '../wallet/keystore.js';

loadDotenv();

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;
export const logLevelSchema = z.enum(LOG_LEVELS);
export type LogLevel = z.infer<typeof logLevelSchema>;

const booleanFlag = z
  .enum(['true', 'false'], {
    errorMap: () => ({ message: 'must be "true" or "false"' }),
  })
  .transform((v) => v === 'true');

const envSchema = z.object({
  // ── Solana Network ──────────────────────────────────────────────────────────
  SOLANA_RPC_URL: z
    .string()
    .url('SOLANA_RPC_URL must be a valid URL')
    .default('https://api.devnet.solana.com'),

  // ── Key Management ──────────────────────────────────────────────────────────
  KEYPAIR_PATH: z.string().min(1).default(DEFAULT_KEYPAIR_PATH),

  // Only honoured outside production
  WALLET_SECRET_KEY: z.string().min(1).optional(),

  // ── Wallet query ────────────────────────────────────────────────────────────
  WALLET_QUERY_ENABLED: booleanFlag.default('true'),

  SIGNATURE_DISPLAY_LIMIT: z.coerce
    .number()
    .int()
    .min(1, 'SIGNATURE_DISPLAY_LIMIT must be at least 1')
    .max(20, 'SIGNATURE_DISPLAY_LIMIT must be at most 20')
    .default(5),

  // ── Logging ─────────────────────────────────────────────────────────────────
  LOG_LEVEL: logLevelSchema.default('warn'),
  LOG_PRETTY: booleanFlag.default('false'),

  // ── Runtime ─────────────────────────────────────────────────────────────────
  NODE_ENV: z
    .enum(['development', 'test', 'production'])
    .default('development'),
});

export type Env = z.infer<typeof envSchema>;

export type EnvParseResult =
  | { ok: true; env: Env }
  | { ok: false; issues: string[] };

/** Validates a raw environment map without touching the process. */
export function parseEnv(source: NodeJS.ProcessEnv = process.env): EnvParseResult {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    return {
      ok: false,
      issues: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    };
  }

  const env = result.data;

  if (env.NODE_ENV === 'production' && env.WALLET_SECRET_KEY) {
    return {
      ok: false,
      issues: ['WALLET_SECRET_KEY: not allowed in production. Use a keypair file.'],
    };
  }

  return { ok: true, env };
}

function loadEnv(): Env {
  const result = parseEnv();

  if (!result.ok) {
    const issues = result.issues.map((i) => `  • ${i}`).join('\n');
    // Use process.stderr directly — logger isn't initialised yet
    process.stderr.write(
      `\n[solana-basics-shell] Environment validation failed:\n${issues}\n\n` +
        `  Copy .env.example to .env and fill in the required values.\n\n`,
    );
    process.exit(1);
  }

  return result.env;
}

export const env = loadEnv();

// ── Derived runtime config ────────────────────────────────────────────────────

export interface AppConfig {
  rpcUrl: string;
  keypairPath: string;
  /** Inline secret for development; takes precedence over keypairPath. */
  secretKey?: string;
  walletQueryEnabled: boolean;
  signatureDisplayLimit: number;
  logLevel: LogLevel;
  logPretty: boolean;
  nodeEnv: Env['NODE_ENV'];
}

/** Values supplied on the command line. Each one wins over its env variable. */
export interface ConfigOverrides {
  keypair?: string;
  url?: string;
  logLevel?: string;
}

const urlOverrideSchema = z.string().url('--url must be a valid URL');

/** Throws a plain Error carrying the first issue's message when an override is malformed. */
export function toAppConfig(source: Env, overrides: ConfigOverrides = {}): AppConfig {
  let rpcUrl = source.SOLANA_RPC_URL;
  if (overrides.url !== undefined) {
    const parsed = urlOverrideSchema.safeParse(overrides.url);
    if (!parsed.success) {
      throw new Error(parsed.error.issues[0]?.message ?? 'invalid --url');
    }
    rpcUrl = parsed.data;
  }

  const config: AppConfig = {
    rpcUrl,
    keypairPath: overrides.keypair ?? source.KEYPAIR_PATH,
    walletQueryEnabled: source.WALLET_QUERY_ENABLED,
    signatureDisplayLimit: source.SIGNATURE_DISPLAY_LIMIT,
    logLevel: logLevelSchema.parse(overrides.logLevel ?? source.LOG_LEVEL),
    logPretty: source.LOG_PRETTY,
    nodeEnv: source.NODE_ENV,
  };

  // An explicit --keypair means the file, not the inline dev secret
  if (source.WALLET_SECRET_KEY && overrides.keypair === undefined) {
    config.secretKey = source.WALLET_SECRET_KEY;
  }

  return config;
}
