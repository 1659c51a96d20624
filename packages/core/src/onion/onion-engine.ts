/**
 * Onion encryption across a resolved chain.
 *
 * Layers are sealed innermost first: the final hop's envelope wraps the
 * message, every earlier hop's envelope wraps the previous layer. The fold
 * carries the last sealed layer forward, so layer N+1 always exists before
 * the envelope of layer N is built.
 */

import type { EncryptionBackend } from '../crypto/index.js';
import { type EnvelopeOptions, ENCRYPTED, buildEnvelope, serializeEnvelope, serializeLayer } from '../envelope/index.js';
import { RemailerError } from '../errors/index.js';
import type { EncryptedLayer, Envelope, OuterMessage, RemailerRecord, ResolvedChain } from '../types/index.js';

export interface EncryptChainOptions extends EnvelopeOptions {
  /** Checked before every layer; aborting stops the chain with ABORTED */
  signal?: AbortSignal;
}

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder();

async function sealEnvelope(
  envelope: Envelope,
  target: RemailerRecord,
  backend: EncryptionBackend,
  signal?: AbortSignal,
): Promise<EncryptedLayer> {
  if (signal?.aborted) {
    throw new RemailerError('ABORTED', `Aborted before encrypting to ${target.name}`, { hop: target.name });
  }

  let ciphertext: Uint8Array;
  try {
    ciphertext = await backend.encrypt(textEncoder.encode(serializeEnvelope(envelope)), target.publicKey);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new RemailerError('BACKEND_FAILURE', `Encryption to ${target.name} failed: ${reason}`, { hop: target.name }, { cause: error });
  }
  return { ciphertext, target, scheme: backend.scheme };
}

/**
 * Seal `message` for every hop of `chain`.
 *
 * @returns The outer message to hand to the first hop
 * @throws RemailerError EMPTY_CHAIN, INVALID_HEADER, BACKEND_FAILURE, ABORTED,
 *   or CAPABILITY_MISMATCH when headers are pasted by a final hop that cannot
 */
export async function encryptChain(
  chain: ResolvedChain,
  message: string,
  backend: EncryptionBackend,
  options: EncryptChainOptions,
): Promise<OuterMessage> {
  const finalHop = chain[chain.length - 1];
  if (!finalHop) {
    throw new RemailerError('EMPTY_CHAIN', 'Cannot encrypt for an empty chain');
  }

  const innermost = buildEnvelope(message, { kind: 'final', hop: finalHop }, options);

  const outermost = await chain
    .slice(0, -1)
    .reduceRight<Promise<EncryptedLayer>>(async (pending, hop) => {
      const inner = await pending;
      const envelope = buildEnvelope(serializeLayer(inner), { kind: 'forward', hop, next: inner.target }, options);
      return sealEnvelope(envelope, hop, backend, options.signal);
    }, sealEnvelope(innermost, finalHop, backend, options.signal));

  return {
    to: outermost.target.address,
    headers: [{ name: ENCRYPTED, value: outermost.scheme }],
    ciphertext: textDecoder.decode(outermost.ciphertext),
  };
}
