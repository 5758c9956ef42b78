/**
 * Unit tests for src/query/capability.ts
 *
 * The enabled path runs against the real ledger client with Connection
 * stubbed on its prototype.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Connection, Keypair } from '@solana/web3.js';
import bs58 from 'bs58';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  createWalletQueryCapability,
  DisabledWalletQuery,
  RpcWalletQuery,
} from '../../../src/query/capability.js';
import { writeKeypairFile } from '../../../src/wallet/keystore.js';
import { createLogger } from '../../../src/logger/logger.js';
import { captureOutput, type CapturedOutput } from '../../helpers/capture.js';

const logger = createLogger({ level: 'silent' });

let tmpDir: string;
let out: CapturedOutput;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'basics-shell-cap-'));
  out = captureOutput();
});

afterEach(() => {
  vi.restoreAllMocks();
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function stubConnection() {
  return {
    getBalance: vi.spyOn(Connection.prototype, 'getBalance').mockResolvedValue(1_000_000_000),
    getLatestBlockhash: vi.spyOn(Connection.prototype, 'getLatestBlockhash').mockResolvedValue({
      blockhash: 'TestBlockhash1111',
      lastValidBlockHeight: 7,
    }),
    getSignaturesForAddress: vi
      .spyOn(Connection.prototype, 'getSignaturesForAddress')
      .mockResolvedValue([{ signature: 'sig-only', slot: 3, err: null, memo: null }]),
  };
}

function config(overrides: { walletQueryEnabled?: boolean; keypairPath?: string; secretKey?: string } = {}) {
  return {
    walletQueryEnabled: true,
    rpcUrl: 'http://127.0.0.1:8899',
    keypairPath: path.join(tmpDir, 'id.json'),
    signatureDisplayLimit: 3,
    ...overrides,
  };
}

describe('createWalletQueryCapability — disabled', () => {
  it('returns the stub when the query is switched off', () => {
    const cap = createWalletQueryCapability(config({ walletQueryEnabled: false }), logger);
    expect(cap).toBeInstanceOf(DisabledWalletQuery);
    expect(cap.enabled).toBe(false);
  });

  it('prints how to enable the query and makes no remote call', async () => {
    const rpc = stubConnection();
    const outcome = await createWalletQueryCapability(config({ walletQueryEnabled: false }), logger).run();

    expect(outcome).toEqual({ status: 'disabled' });
    expect(out.lines()).toContain('Solana features are not enabled. To use Solana features:');
    expect(out.lines()).toContain('  · Set WALLET_QUERY_ENABLED=true in your environment or .env file');
    expect(rpc.getBalance).not.toHaveBeenCalled();
  });
});

describe('createWalletQueryCapability — enabled', () => {
  it('returns the RPC-backed query', () => {
    const cap = createWalletQueryCapability(config(), logger);
    expect(cap).toBeInstanceOf(RpcWalletQuery);
    expect(cap.enabled).toBe(true);
  });

  it('a missing keypair file aborts before any remote call', async () => {
    const rpc = stubConnection();
    const missing = path.join(tmpDir, 'missing.json');
    const outcome = await createWalletQueryCapability(config({ keypairPath: missing }), logger).run();

    expect(outcome.status).toBe('aborted');
    expect(out.lines()).toContain(`✗ Failed to read keypair from ${missing}`);
    expect(rpc.getBalance).not.toHaveBeenCalled();
    expect(rpc.getLatestBlockhash).not.toHaveBeenCalled();
    expect(rpc.getSignaturesForAddress).not.toHaveBeenCalled();
  });

  it('queries the wallet stored in the keypair file', async () => {
    const rpc = stubConnection();
    const keypair = Keypair.generate();
    const keypairPath = writeKeypairFile(keypair, path.join(tmpDir, 'id.json'));

    const outcome = await createWalletQueryCapability(config({ keypairPath }), logger).run();

    expect(outcome.status).toBe('completed');
    expect(rpc.getBalance).toHaveBeenCalledWith(keypair.publicKey, 'confirmed');
    expect(rpc.getSignaturesForAddress).toHaveBeenCalledWith(keypair.publicKey, { limit: 3 }, 'confirmed');

    const lines = out.lines();
    expect(lines).toContain(`Wallet Public Key: ${keypair.publicKey.toBase58()}`);
    expect(lines).toContain('Balance: 1 SOL');
    expect(lines).toContain('Recent blockhash: TestBlockhash1111');
    expect(lines).toContain('1. Signature: sig-only');
  });

  it('uses an inline secret key when one is configured', async () => {
    const rpc = stubConnection();
    const keypair = Keypair.generate();

    const outcome = await createWalletQueryCapability(
      config({ secretKey: bs58.encode(keypair.secretKey) }),
      logger,
    ).run();

    expect(outcome.status === 'completed' && outcome.publicKey).toBe(keypair.publicKey.toBase58());
    expect(rpc.getBalance).toHaveBeenCalledWith(keypair.publicKey, 'confirmed');
  });
});
