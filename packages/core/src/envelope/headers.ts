import { RemailerError } from '../errors/index.js';
import type { Header } from '../types/index.js';

/** Printable ASCII except space and colon */
const FIELD_NAME = /^[!-9;-~]+$/;

export function splitHeader(line: string): Header | null {
  const colon = line.indexOf(':');
  if (colon <= 0) return null;
  const name = line.slice(0, colon).trim();
  if (!FIELD_NAME.test(name)) return null;
  return { name, value: line.slice(colon + 1).trim() };
}

/**
 * Parse a `Name: value` string, as given on the command line
 *
 * @throws RemailerError INVALID_HEADER
 */
export function parseHeader(line: string): Header {
  const header = splitHeader(line);
  if (!header) {
    throw new RemailerError('INVALID_HEADER', `Not a "Name: value" header: "${line}"`, { header: line });
  }
  return validateHeader(header);
}

/**
 * @throws RemailerError INVALID_HEADER when the header could inject extra lines
 */
export function validateHeader(header: Header): Header {
  if (!FIELD_NAME.test(header.name) || /[\r\n]/.test(header.value)) {
    throw new RemailerError('INVALID_HEADER', `Invalid header "${header.name}"`, { header: header.name });
  }
  return header;
}

export function formatHeader(header: Header): string {
  return `${header.name}: ${header.value}`;
}
