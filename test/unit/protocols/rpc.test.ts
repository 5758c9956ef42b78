/**
 * Unit tests for src/protocols/rpc.ts
 *
 * Connection methods are stubbed on the prototype, so no request is sent.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { Connection, Keypair, SolanaJSONRPCError } from '@solana/web3.js';
import { createLedgerClient } from '../../../src/protocols/rpc.js';
import { createLogger } from '../../../src/logger/logger.js';

const RPC_URL = 'http://127.0.0.1:8899';
const address = Keypair.generate().publicKey;

function makeClient() {
  const lines: string[] = [];
  const logger = createLogger({
    level: 'debug',
    destination: { write: (s: string) => { lines.push(s); } },
  });
  return { client: createLedgerClient(RPC_URL, { logger }), lines };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('createLedgerClient', () => {
  it('exposes the endpoint and performs no call on creation', () => {
    const getBalance = vi.spyOn(Connection.prototype, 'getBalance');
    const { client } = makeClient();
    expect(client.rpcUrl).toBe(RPC_URL);
    expect(getBalance).not.toHaveBeenCalled();
  });
});

describe('commitment', () => {
  it('all three reads use the same confirmed level', async () => {
    const balance = vi.spyOn(Connection.prototype, 'getBalance').mockResolvedValue(0);
    const latest = vi.spyOn(Connection.prototype, 'getLatestBlockhash').mockResolvedValue({
      blockhash: 'TestBlockhash1111',
      lastValidBlockHeight: 1,
    });
    const history = vi.spyOn(Connection.prototype, 'getSignaturesForAddress').mockResolvedValue([]);
    const { client } = makeClient();

    await client.getBalance(address);
    await client.getLatestBlockReference();
    await client.getSignatureHistory(address, 5);

    expect(balance.mock.calls[0]?.[1]).toBe('confirmed');
    expect(latest.mock.calls[0]?.[0]).toBe('confirmed');
    expect(history.mock.calls[0]?.[2]).toBe('confirmed');
  });
});

describe('getBalance', () => {
  it('returns lamports as a bigint at confirmed commitment', async () => {
    const spy = vi.spyOn(Connection.prototype, 'getBalance').mockResolvedValue(2_500_000_000);
    const { client } = makeClient();

    const result = await client.getBalance(address);

    expect(result).toEqual({ ok: true, value: 2_500_000_000n });
    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy).toHaveBeenCalledWith(address, 'confirmed');
  });

  it('maps a JSON-RPC error to RPC_ERROR', async () => {
    vi.spyOn(Connection.prototype, 'getBalance').mockRejectedValue(
      new SolanaJSONRPCError({ code: -32602, message: 'Invalid param: WrongSize' }),
    );
    const { client } = makeClient();

    const result = await client.getBalance(address);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('RPC_ERROR');
    expect(result.error.operation).toBe('getBalance');
    expect(result.error.message).toBe('Invalid param: WrongSize');
    expect(result.error.cause).toBeInstanceOf(SolanaJSONRPCError);
  });

  it('maps a transport failure to NETWORK_ERROR', async () => {
    vi.spyOn(Connection.prototype, 'getBalance').mockRejectedValue(new TypeError('fetch failed'));
    const { client } = makeClient();

    const result = await client.getBalance(address);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('NETWORK_ERROR');
    expect(result.error.message).toBe('fetch failed');
  });

  it('maps a non-Error rejection to NETWORK_ERROR', async () => {
    vi.spyOn(Connection.prototype, 'getBalance').mockRejectedValue('socket hang up');
    const { client } = makeClient();

    const result = await client.getBalance(address);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('socket hang up');
  });

  it('makes exactly one request on failure', async () => {
    const spy = vi.spyOn(Connection.prototype, 'getBalance').mockRejectedValue(new Error('boom'));
    const { client } = makeClient();
    await client.getBalance(address);
    expect(spy).toHaveBeenCalledTimes(1);
  });

  it('logs failures with the operation and code', async () => {
    vi.spyOn(Connection.prototype, 'getBalance').mockRejectedValue(new TypeError('fetch failed'));
    const { client, lines } = makeClient();
    await client.getBalance(address);

    const failed = lines.find((l) => l.includes('"msg":"RPC call failed"'));
    expect(failed).toBeDefined();
    expect(failed).toContain('"operation":"getBalance"');
    expect(failed).toContain('"code":"NETWORK_ERROR"');
  });
});

describe('getLatestBlockReference', () => {
  it('returns the blockhash and last valid height', async () => {
    const spy = vi.spyOn(Connection.prototype, 'getLatestBlockhash').mockResolvedValue({
      blockhash: 'TestBlockhash1111',
      lastValidBlockHeight: 321,
    });
    const { client } = makeClient();

    const result = await client.getLatestBlockReference();

    expect(result).toEqual({
      ok: true,
      value: { blockhash: 'TestBlockhash1111', lastValidBlockHeight: 321 },
    });
    expect(spy).toHaveBeenCalledWith('confirmed');
  });

  it('reports failures as getLatestBlockReference', async () => {
    vi.spyOn(Connection.prototype, 'getLatestBlockhash').mockRejectedValue(new Error('ECONNRESET'));
    const { client } = makeClient();

    const result = await client.getLatestBlockReference();

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.operation).toBe('getLatestBlockReference');
    expect(result.error.message).toBe('ECONNRESET');
  });
});

describe('getSignatureHistory', () => {
  it('passes the limit through and maps each record', async () => {
    const spy = vi.spyOn(Connection.prototype, 'getSignaturesForAddress').mockResolvedValue([
      { signature: 'sig-a', slot: 20, err: null, memo: null, blockTime: 1_700_000_000 },
      { signature: 'sig-b', slot: 19, err: 'InstructionError', memo: null },
    ]);
    const { client } = makeClient();

    const result = await client.getSignatureHistory(address, 5);

    expect(spy).toHaveBeenCalledWith(address, { limit: 5 }, 'confirmed');
    expect(result).toEqual({
      ok: true,
      value: [
        { signature: 'sig-a', slot: 20, err: null, blockTime: 1_700_000_000 },
        { signature: 'sig-b', slot: 19, err: 'InstructionError', blockTime: null },
      ],
    });
  });

  it('leaves the limit to the node when none is given', async () => {
    const spy = vi.spyOn(Connection.prototype, 'getSignaturesForAddress').mockResolvedValue([]);
    const { client } = makeClient();

    const result = await client.getSignatureHistory(address);

    expect(spy).toHaveBeenCalledWith(address, undefined, 'confirmed');
    expect(result).toEqual({ ok: true, value: [] });
  });
});
