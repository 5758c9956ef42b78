/**
 * @file src/wallet/keystore.ts
 *
 * Reads and writes the Solana CLI keypair file format: a plain JSON array of
 * the 64 secret key bytes. The file itself is not encrypted, so it is written
 * owner-only (0600) and never echoed anywhere.
 *
 * Every failure surfaces as a WalletError; callers decide whether to abort.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { Keypair } from '@solana/web3.js';
import { default as bs58 } from 'bs58';
import { z } from 'zod';
import { createCredential } from './credential.js';
import { WalletError, type Credential, type CredentialSource, type KeypairFile } from './types.js';

export const DEFAULT_KEYPAIR_PATH = '~/.config/solana/id.json';

const SECRET_KEY_LEN = 64;

const keypairFileSchema = z
  .array(z.number().int().min(0).max(255))
  .length(SECRET_KEY_LEN, `must contain exactly ${SECRET_KEY_LEN} bytes`);

// ── Paths ─────────────────────────────────────────────────────────────────────

/** Expands a leading `~` to the user's home directory. */
export function expandHome(filePath: string, home: string = os.homedir()): string {
  if (filePath === '~') return home;
  if (filePath.startsWith('~/')) return path.join(home, filePath.slice(2));
  return filePath;
}

// ── Loading ───────────────────────────────────────────────────────────────────

/**
 * Reads a keypair file and decodes it.
 * Throws WalletError('KEYPAIR_NOT_FOUND') if the file is missing and
 * WalletError('INVALID_KEYPAIR') for anything that does not decode.
 */
export function loadKeypairFile(keypairPath: string): Keypair {
  const resolved = expandHome(keypairPath);

  if (!fs.existsSync(resolved)) {
    throw new WalletError('KEYPAIR_NOT_FOUND', `Keypair file not found: ${resolved}`);
  }

  let raw: string;
  try {
    raw = fs.readFileSync(resolved, 'utf8');
  } catch (err) {
    throw new WalletError('INVALID_KEYPAIR', `Cannot read keypair file: ${resolved}`, err);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new WalletError('INVALID_KEYPAIR', `Keypair file is not valid JSON: ${resolved}`, err);
  }

  const bytes = keypairFileSchema.safeParse(parsed);
  if (!bytes.success) {
    const reason = bytes.error.issues[0]?.message ?? 'unexpected shape';
    throw new WalletError(
      'INVALID_KEYPAIR',
      `Keypair file is not a byte array (${reason}): ${resolved}`,
    );
  }

  return keypairFromBytes(Uint8Array.from(bytes.data));
}

/** Loads a keypair file straight into an opaque Credential. */
export function loadCredential(keypairPath: string): Credential {
  return createCredential(loadKeypairFile(keypairPath));
}

/**
 * Loads a Keypair from a base58-encoded secret key or a JSON byte array.
 *
 * ⚠️  FOR DEVELOPMENT AND CI USE ONLY.
 * This function is disabled when NODE_ENV === 'production'.
 */
export function loadFromEnv(secret: string): Keypair {
  if (process.env['NODE_ENV'] === 'production') {
    throw new WalletError(
      'INVALID_CONFIG',
      'loadFromEnv() is not available in production. Use a keypair file.',
    );
  }

  let secretKeyBytes: Uint8Array;
  try {
    secretKeyBytes = bs58.decode(secret);
  } catch (err) {
    // Try JSON byte array format as fallback
    const arr = safeJsonParse(secret);
    const bytes = keypairFileSchema.safeParse(arr);
    if (!bytes.success) {
      throw new WalletError(
        'INVALID_KEYPAIR',
        'WALLET_SECRET_KEY is not valid base58 or JSON byte array.',
        err,
      );
    }
    secretKeyBytes = Uint8Array.from(bytes.data);
  }

  if (secretKeyBytes.length !== SECRET_KEY_LEN) {
    throw new WalletError(
      'INVALID_KEYPAIR',
      `Secret key has length ${secretKeyBytes.length}. Expected ${SECRET_KEY_LEN} bytes.`,
    );
  }

  return keypairFromBytes(secretKeyBytes);
}

/**
 * Picks where the wallet query reads its credential from.
 * An inline secret wins over the file when one is configured.
 */
export function resolveCredentialSource(opts: {
  keypairPath: string;
  secretKey?: string | undefined;
}): CredentialSource {
  const { keypairPath, secretKey } = opts;

  if (secretKey) {
    return {
      location: 'WALLET_SECRET_KEY',
      load: () => createCredential(loadFromEnv(secretKey)),
    };
  }

  return {
    location: expandHome(keypairPath),
    load: () => loadCredential(keypairPath),
  };
}

// ── Writing ───────────────────────────────────────────────────────────────────

/**
 * Writes a keypair in the Solana CLI format and returns the resolved path.
 * Refuses to replace an existing file unless `overwrite` is set.
 */
export function writeKeypairFile(
  keypair: Keypair,
  outputPath: string,
  opts: { overwrite?: boolean } = {},
): string {
  const resolved = expandHome(outputPath);

  if (!opts.overwrite && fs.existsSync(resolved)) {
    throw new WalletError('KEYPAIR_EXISTS', `Refusing to overwrite existing keypair file: ${resolved}`);
  }

  fs.mkdirSync(path.dirname(resolved), { recursive: true });

  const contents: KeypairFile = Array.from(keypair.secretKey);
  fs.writeFileSync(resolved, JSON.stringify(contents), {
    mode: 0o600, // Owner read/write only
    encoding: 'utf8',
  });
  // mode is only applied on create
  fs.chmodSync(resolved, 0o600);

  return resolved;
}

/** Returns the base58 public key of a keypair file. */
export function getPublicKeyFromKeypairFile(keypairPath: string): string {
  return loadKeypairFile(keypairPath).publicKey.toBase58();
}

// ── Internals ─────────────────────────────────────────────────────────────────

function keypairFromBytes(secretKey: Uint8Array): Keypair {
  try {
    // Validates that the public half matches the seed
    return Keypair.fromSecretKey(secretKey);
  } catch (err) {
    throw new WalletError(
      'INVALID_KEYPAIR',
      'Secret key is invalid: public key does not match the private seed.',
      err,
    );
  }
}

function safeJsonParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
