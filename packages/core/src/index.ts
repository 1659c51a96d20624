export const CYPHERPUNK_VERSION = '0.1.0';

export { CAPABILITIES, isCapability } from './types/index.js';
export type {
  Capability,
  ChainSpec,
  CopyFailure,
  EncryptedLayer,
  Envelope,
  Header,
  OuterMessage,
  RemailerRecord,
  RemailerStats,
  ResolvedChain,
  RouteOutcome,
  RoutingResult,
} from './types/index.js';

export { RemailerError, isRemailerError, toRemailerError } from './errors/index.js';
export type { RemailerErrorCode } from './errors/index.js';

// Directory (remailer records, rlist.txt statistics)
export { RemailerDirectory, parseRemailerList, parseLatency, capabilitiesFromOptions } from './directory/index.js';
export type { RemailerDirectoryOptions, RemailerList, RemailerListing } from './directory/index.js';

// Chain resolution and redundancy
export {
  DEFAULT_MAX_CHAIN_LENGTH,
  WILDCARD,
  acceptedCapabilities,
  canServe,
  isWildcard,
  requiredCapability,
  resolveChain,
  route,
} from './routing/index.js';
export type { ChainResolverOptions, MultiplexerEvents, RouteOptions } from './routing/index.js';

// Per-hop envelopes
export {
  ANON_TO,
  ENCRYPTED,
  LATENT_TIME,
  PASTING_MARKER,
  ROUTING_MARKER,
  buildEnvelope,
  encryptedBlock,
  formatHeader,
  parseHeader,
  parseNativeBlock,
  renderNativeBlock,
  serializeEnvelope,
  serializeLayer,
  splitHeader,
  validateHeader,
} from './envelope/index.js';
export type { EnvelopeOptions, HopRoute } from './envelope/index.js';

export { encryptChain } from './onion/index.js';
export type { EncryptChainOptions } from './onion/index.js';

export {
  OUTPUT_FORMATS,
  encodeHeaderValue,
  fileNameFor,
  formatResult,
  isOutputFormat,
  outerBlock,
  toEml,
  toMailto,
} from './output/index.js';
export type { FormatOptions, OutputFormat } from './output/index.js';

// Encryption backends
export {
  GpgBackend,
  NACL_SCHEME,
  NaclBackend,
  PGP_SCHEME,
  armor,
  dearmor,
  encryptionKeyToHex,
  generateEncryptionKeypair,
  hexToEncryptionKey,
  openSealedMessage,
  sealMessage,
  secureRandomBytes,
  secureRandomSource,
  sequenceRandomSource,
  spawnGpg,
  splitKeyBlocks,
} from './crypto/index.js';
export type {
  EncryptionBackend,
  EncryptionKeypair,
  GpgBackendOptions,
  GpgRunResult,
  GpgRunner,
  RandomSource,
} from './crypto/index.js';
