/**
 * Wire representations of a routed copy. All three carry the same encrypted
 * block; only the wrapping differs. Formatting never touches the backend.
 */

import { encryptedBlock, formatHeader, renderNativeBlock, validateHeader } from '../envelope/index.js';
import { RemailerError } from '../errors/index.js';
import type { OuterMessage, RoutingResult } from '../types/index.js';

export const OUTPUT_FORMATS = ['native', 'mailto', 'eml'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

const FILE_EXTENSIONS: Record<OutputFormat, string> = {
  native: 'txt',
  mailto: 'url',
  eml: 'eml',
};

export interface FormatOptions {
  /** Subject of the mail carrying the copy to the first hop */
  subject?: string;
}

export function isOutputFormat(value: string): value is OutputFormat {
  return (OUTPUT_FORMATS as readonly string[]).includes(value);
}

/** The block the first hop decrypts, as carried in a mail body */
export function outerBlock(message: OuterMessage): string {
  return encryptedBlock(message.headers, message.ciphertext);
}

/** UTF-8 bytes per encoded-word, keeping each word within 75 characters */
const ENCODED_WORD_BYTES = 45;

/**
 * RFC 2047 `B` encoding for header values outside printable ASCII, folded
 * into several encoded-words when long.
 */
export function encodeHeaderValue(value: string): string {
  if (/^[\x20-\x7e]*$/.test(value)) return value;

  const chunks: string[] = [];
  let chunk = '';
  for (const char of value) {
    if (chunk !== '' && Buffer.byteLength(chunk + char, 'utf-8') > ENCODED_WORD_BYTES) {
      chunks.push(chunk);
      chunk = '';
    }
    chunk += char;
  }
  chunks.push(chunk);
  return chunks.map((part) => `=?UTF-8?B?${Buffer.from(part, 'utf-8').toString('base64')}?=`).join('\n ');
}

/**
 * `mailto:` URI for a mail client's compose action. The address keeps its `@`
 * but is otherwise escaped like the query, so it cannot add fields of its
 * own; newlines in the body become `%0A`.
 */
export function toMailto(message: OuterMessage, options: FormatOptions = {}): string {
  const address = encodeURIComponent(message.to).replace(/%40/g, '@');
  let uri = `mailto:${address}?body=${encodeURIComponent(outerBlock(message))}`;
  if (options.subject !== undefined) {
    uri += `&subject=${encodeURIComponent(options.subject)}`;
  }
  return uri;
}

export function toEml(message: OuterMessage, options: FormatOptions = {}): string {
  const headers = [{ name: 'To', value: message.to }];
  if (options.subject !== undefined) {
    const subject = validateHeader({ name: 'Subject', value: options.subject });
    headers.push({ name: subject.name, value: encodeHeaderValue(subject.value) });
  }
  headers.push(
    { name: 'MIME-Version', value: '1.0' },
    { name: 'Content-Type', value: 'text/plain; charset=us-ascii' },
    { name: 'Content-Transfer-Encoding', value: '7bit' },
  );
  return `${headers.map(formatHeader).join('\n')}\n\n${outerBlock(message)}`;
}

/**
 * @throws RemailerError UNSUPPORTED_FORMAT for unknown kinds
 */
export function formatResult(result: RoutingResult, kind: string, options: FormatOptions = {}): string {
  if (!isOutputFormat(kind)) {
    throw new RemailerError('UNSUPPORTED_FORMAT', `Unsupported output format "${kind}"`, {
      format: kind,
      supported: [...OUTPUT_FORMATS],
    });
  }

  switch (kind) {
    case 'native':
      return renderNativeBlock(result.payload);
    case 'mailto':
      return toMailto(result.payload, options);
    case 'eml':
      return toEml(result.payload, options);
  }
}

export function fileNameFor(result: RoutingResult, kind: OutputFormat): string {
  return `message-${result.copy + 1}.${FILE_EXTENSIONS[kind]}`;
}
