import { RemailerError } from '../errors/index.js';
import type { Header, OuterMessage } from '../types/index.js';
import { ANON_TO, ROUTING_MARKER, encryptedBlock } from './envelope-builder.js';
import { formatHeader, splitHeader } from './headers.js';

/**
 * Native rendering of an outer message: a routing section naming the first
 * hop, then the encrypted section the first hop decrypts.
 *
 *   ::
 *   Anon-To: <first hop>
 *
 *   ::
 *   Encrypted: PGP
 *
 *   -----BEGIN PGP MESSAGE-----
 */
export function renderNativeBlock(message: OuterMessage): string {
  const routing = [ROUTING_MARKER, formatHeader({ name: ANON_TO, value: message.to }), '', ''].join('\n');
  return routing + encryptedBlock(message.headers, message.ciphertext);
}

/**
 * Read a native block back into the outer message it was rendered from.
 *
 * @throws RemailerError MALFORMED_BLOCK
 */
export function parseNativeBlock(text: string): OuterMessage {
  const lines = text.replace(/\r\n/g, '\n').split('\n');
  let index = 0;

  const readSection = (label: string): Header[] => {
    if (lines[index] !== ROUTING_MARKER) {
      throw malformed(`Expected "${ROUTING_MARKER}" to open the ${label} section at line ${index + 1}`);
    }
    index++;
    const headers: Header[] = [];
    for (; index < lines.length && lines[index] !== ''; index++) {
      const header = splitHeader(lines[index] ?? '');
      if (!header) throw malformed(`Invalid header at line ${index + 1}`);
      headers.push(header);
    }
    if (index >= lines.length) {
      throw malformed(`The ${label} section is not terminated by a blank line`);
    }
    index++;
    return headers;
  };

  const routing = readSection('routing');
  const headers = readSection('encrypted');
  const anonTo = routing.find((header) => header.name.toLowerCase() === ANON_TO.toLowerCase());
  if (!anonTo) {
    throw malformed(`The routing section has no ${ANON_TO} header`);
  }

  return { to: anonTo.value, headers, ciphertext: lines.slice(index).join('\n') };
}

function malformed(message: string): RemailerError {
  return new RemailerError('MALFORMED_BLOCK', message);
}
