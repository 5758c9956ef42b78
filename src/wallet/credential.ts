/**
 * @file src/wallet/credential.ts
 *
 * The Credential factory.
 *
 * SECURITY INVARIANT: The `keypair` parameter is captured in the factory
 * function's closure. It is NEVER assigned to a property of the returned object
 * and NEVER logged. toJSON(), toString() and the Node inspect hook all return
 * the public key only, so printing or serialising a credential is safe.
 */

import type { Keypair, PublicKey } from '@solana/web3.js';
import nacl from 'tweetnacl';
import type { Credential } from './types.js';

const INSPECT_CUSTOM = Symbol.for('nodejs.util.inspect.custom');

/**
 * Wraps a Keypair. The caller should drop its own reference afterwards.
 */
export function createCredential(keypair: Keypair): Credential {
  const publicKey = keypair.publicKey;
  const base58 = publicKey.toBase58();

  const credential: Credential = {
    get publicKey(): PublicKey {
      return publicKey;
    },

    sign(message: Uint8Array): Uint8Array {
      return nacl.sign.detached(message, keypair.secretKey);
    },

    toJSON: (): string => base58,
    toString: (): string => base58,
  };

  Object.defineProperty(credential, INSPECT_CUSTOM, {
    value: (): string => `Credential(${base58})`,
    enumerable: false,
  });

  return Object.freeze(credential);
}
