export type { EncryptionBackend } from './backend.js';

export {
  type EncryptionKeypair,
  NACL_SCHEME,
  NaclBackend,
  generateEncryptionKeypair,
  encryptionKeyToHex,
  hexToEncryptionKey,
  sealMessage,
  openSealedMessage,
  armor,
  dearmor,
} from './nacl-backend.js';

export {
  type GpgBackendOptions,
  type GpgRunResult,
  type GpgRunner,
  GpgBackend,
  PGP_SCHEME,
  spawnGpg,
  splitKeyBlocks,
} from './gpg-backend.js';

export {
  type RandomSource,
  secureRandomBytes,
  secureRandomSource,
  sequenceRandomSource,
} from './secure-random.js';
