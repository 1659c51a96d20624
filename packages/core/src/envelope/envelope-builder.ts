/**
 * Per-hop cleartext blocks in the Type I ("Cypherpunk") remailer format.
 *
 * A hop decrypts a block like:
 *
 *   ::
 *   Anon-To: <where to forward>
 *   Latent-Time: +1:00
 *
 *   ##
 *   Subject: pasted into the delivered mail (final hop only)
 *
 *   <body>
 *
 * For every hop but the last, <body> is the next layer's encrypted block, so a
 * hop learns its own instructions and the next address, nothing more.
 */

import { RemailerError } from '../errors/index.js';
import type { EncryptedLayer, Envelope, Header, RemailerRecord } from '../types/index.js';
import { formatHeader, validateHeader } from './headers.js';

export const ROUTING_MARKER = '::';
export const PASTING_MARKER = '##';
export const ANON_TO = 'Anon-To';
export const ENCRYPTED = 'Encrypted';
export const LATENT_TIME = 'Latent-Time';

const LATENCY_VALUE = /^\+?\d{1,2}:[0-5]\dr?$/;

const textDecoder = new TextDecoder();

export type HopRoute =
  /** `hop` delivers to the end recipient */
  | { kind: 'final'; hop: RemailerRecord }
  /** `hop` forwards to `next` */
  | { kind: 'forward'; hop: RemailerRecord; next: RemailerRecord };

export interface EnvelopeOptions {
  /** End recipient, taken as an opaque address */
  recipient: string;
  /** Headers pasted into the delivered mail (`Subject` and similar) */
  headers?: readonly Header[];
  /** `Latent-Time` value such as `+1:30` or `+0:45r`, for hops that honour it */
  latency?: string;
}

export function buildEnvelope(innerPayload: string, route: HopRoute, options: EnvelopeOptions): Envelope {
  const routingHeaders: Header[] = [];
  if (options.latency !== undefined) {
    if (!LATENCY_VALUE.test(options.latency)) {
      throw new RemailerError('INVALID_HEADER', `Invalid ${LATENT_TIME} value "${options.latency}"`, {
        header: LATENT_TIME,
      });
    }
    if (route.hop.capabilities.has('latent-time')) {
      routingHeaders.push({ name: LATENT_TIME, value: options.latency });
    }
  }

  if (route.kind === 'forward') {
    return {
      recipientDirective: route.next.address,
      routingHeaders,
      pastedHeaders: [],
      body: innerPayload,
    };
  }

  const pastedHeaders = (options.headers ?? []).map(validateHeader);
  if (pastedHeaders.length > 0 && !route.hop.capabilities.has('header-pasting')) {
    throw new RemailerError(
      'CAPABILITY_MISMATCH',
      `Remailer "${route.hop.name}" cannot paste headers into the delivered mail`,
      { name: route.hop.name, capability: 'header-pasting' },
    );
  }

  return {
    recipientDirective: checkDirective(options.recipient),
    routingHeaders,
    pastedHeaders,
    body: innerPayload,
  };
}

function checkDirective(address: string): string {
  if (address.trim() === '' || /[\r\n]/.test(address)) {
    throw new RemailerError('INVALID_HEADER', `Invalid ${ANON_TO} address "${address}"`, { header: ANON_TO });
  }
  return address.trim();
}

export function serializeEnvelope(envelope: Envelope): string {
  const lines = [
    ROUTING_MARKER,
    formatHeader({ name: ANON_TO, value: envelope.recipientDirective }),
    ...envelope.routingHeaders.map(formatHeader),
    '',
  ];
  if (envelope.pastedHeaders.length > 0) {
    lines.push(PASTING_MARKER, ...envelope.pastedHeaders.map(formatHeader), '');
  }
  return `${lines.join('\n')}\n${envelope.body}`;
}

/** `::` / `Encrypted: <scheme>` / blank line / ciphertext */
export function encryptedBlock(headers: readonly Header[], ciphertext: string): string {
  return [ROUTING_MARKER, ...headers.map(formatHeader), '', ciphertext].join('\n');
}

export function serializeLayer(layer: EncryptedLayer): string {
  return encryptedBlock([{ name: ENCRYPTED, value: layer.scheme }], textDecoder.decode(layer.ciphertext));
}
