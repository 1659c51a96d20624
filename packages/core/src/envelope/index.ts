export {
  ANON_TO,
  ENCRYPTED,
  LATENT_TIME,
  PASTING_MARKER,
  ROUTING_MARKER,
  buildEnvelope,
  encryptedBlock,
  serializeEnvelope,
  serializeLayer,
} from './envelope-builder.js';
export type { EnvelopeOptions, HopRoute } from './envelope-builder.js';
export { formatHeader, parseHeader, splitHeader, validateHeader } from './headers.js';
export { parseNativeBlock, renderNativeBlock } from './native-block.js';
