/**
 * @file src/wallet/index.ts
 * Public API for the wallet module. Import from here, not from individual files.
 */

export { createCredential } from './credential.js';
export {
  DEFAULT_KEYPAIR_PATH,
  expandHome,
  loadKeypairFile,
  loadCredential,
  loadFromEnv,
  resolveCredentialSource,
  writeKeypairFile,
  getPublicKeyFromKeypairFile,
} from './keystore.js';
export { WalletError } from './types.js';
export type { Credential, CredentialSource, KeypairFile, WalletErrorCode } from './types.js';
