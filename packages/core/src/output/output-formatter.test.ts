import { describe, expect, it } from 'vitest';
import { parseNativeBlock } from '../envelope/index.js';
import { captureError } from '../testing/capture-error.js';
import type { RemailerRecord, RoutingResult } from '../types/index.js';
import {
  encodeHeaderValue,
  fileNameFor,
  formatResult,
  isOutputFormat,
  outerBlock,
  toEml,
  toMailto,
} from './output-formatter.js';

const paranoia: RemailerRecord = {
  name: 'paranoia',
  address: 'remailer@paranoia.example',
  publicKey: 'key-paranoia',
  capabilities: new Set(['middle-hop', 'final-delivery']),
};

const CIPHERTEXT = '-----BEGIN PGP MESSAGE-----\n\nhQEMA+x/1\n-----END PGP MESSAGE-----\n';

const RESULT: RoutingResult = {
  copy: 1,
  chain: [paranoia],
  payload: {
    to: 'remailer@paranoia.example',
    headers: [{ name: 'Encrypted', value: 'PGP' }],
    ciphertext: CIPHERTEXT,
  },
};

const BLOCK = `::\nEncrypted: PGP\n\n${CIPHERTEXT}`;

describe('formatResult', () => {
  it('renders the native block with routing and encrypted sections', () => {
    expect(formatResult(RESULT, 'native')).toBe(`::\nAnon-To: remailer@paranoia.example\n\n${BLOCK}`);
  });

  it('round-trips the native block to the same headers and ciphertext', () => {
    expect(parseNativeBlock(formatResult(RESULT, 'native'))).toEqual(RESULT.payload);
  });

  it('renders a mailto URI with the escaped block', () => {
    expect(formatResult(RESULT, 'mailto')).toBe(
      'mailto:remailer@paranoia.example?body=%3A%3A%0AEncrypted%3A%20PGP%0A%0A-----BEGIN%20PGP%20MESSAGE-----%0A%0AhQEMA%2Bx%2F1%0A-----END%20PGP%20MESSAGE-----%0A',
    );
  });

  it('renders an email message around the block', () => {
    expect(formatResult(RESULT, 'eml', { subject: 'hello' })).toBe(
      [
        'To: remailer@paranoia.example',
        'Subject: hello',
        'MIME-Version: 1.0',
        'Content-Type: text/plain; charset=us-ascii',
        'Content-Transfer-Encoding: 7bit',
        '',
        BLOCK,
      ].join('\n'),
    );
  });

  it('carries the same encrypted block in every format', () => {
    const block = outerBlock(RESULT.payload);
    expect(formatResult(RESULT, 'native').endsWith(block)).toBe(true);
    expect(formatResult(RESULT, 'eml').endsWith(block)).toBe(true);
    expect(decodeURIComponent(formatResult(RESULT, 'mailto').split('?body=')[1] ?? '')).toBe(block);
  });

  it('fails with UNSUPPORTED_FORMAT for unknown kinds', () => {
    expect(captureError(() => formatResult(RESULT, 'pdf'))).toMatchObject({
      code: 'UNSUPPORTED_FORMAT',
      context: { format: 'pdf', supported: ['native', 'mailto', 'eml'] },
    });
  });
});

describe('toMailto', () => {
  it('appends an escaped subject', () => {
    expect(toMailto({ to: 'a@b.example', headers: [], ciphertext: 'x' }, { subject: 'hi there' })).toBe(
      'mailto:a@b.example?body=%3A%3A%0A%0Ax&subject=hi%20there',
    );
  });

  it('escapes an address that would add its own query fields', () => {
    const uri = toMailto({ to: 'x?cc=eve@evil.example&bcc=y', headers: [], ciphertext: 'x' });
    expect(uri).toBe('mailto:x%3Fcc%3Deve@evil.example%26bcc%3Dy?body=%3A%3A%0A%0Ax');
    expect(uri.split('?')).toHaveLength(2);
  });
});

describe('toEml', () => {
  it('omits the subject when none is given', () => {
    expect(toEml({ to: 'a@b.example', headers: [{ name: 'Encrypted', value: 'PGP' }], ciphertext: 'x' })).toBe(
      'To: a@b.example\nMIME-Version: 1.0\nContent-Type: text/plain; charset=us-ascii\nContent-Transfer-Encoding: 7bit\n\n::\nEncrypted: PGP\n\nx',
    );
  });

  it('encodes a subject outside ASCII as UTF-8', () => {
    const eml = toEml({ to: 'a@b.example', headers: [], ciphertext: 'x' }, { subject: 'Grüße' });
    expect(eml.split('\n')[1]).toBe('Subject: =?UTF-8?B?R3LDvMOfZQ==?=');
    expect(eml).toContain('Content-Type: text/plain; charset=us-ascii\n');
  });

  it('rejects subjects with line breaks', () => {
    expect(captureError(() => toEml(RESULT.payload, { subject: 'a\nBcc: x@y' }))).toMatchObject({
      code: 'INVALID_HEADER',
    });
  });
});

describe('encodeHeaderValue', () => {
  it('leaves printable ASCII alone', () => {
    expect(encodeHeaderValue('plain subject')).toBe('plain subject');
  });

  it('folds long values into several encoded-words', () => {
    expect(encodeHeaderValue('ü'.repeat(30))).toBe(
      '=?UTF-8?B?w7zDvMO8w7zDvMO8w7zDvMO8w7zDvMO8w7zDvMO8w7zDvMO8w7zDvMO8w7w=?=\n =?UTF-8?B?w7zDvMO8w7zDvMO8w7zDvA==?=',
    );
  });
});

describe('isOutputFormat', () => {
  it('accepts the three known formats', () => {
    expect(['native', 'mailto', 'eml', 'html'].filter(isOutputFormat)).toEqual(['native', 'mailto', 'eml']);
  });
});

describe('fileNameFor', () => {
  it('numbers copies from one', () => {
    expect(fileNameFor(RESULT, 'native')).toBe('message-2.txt');
    expect(fileNameFor(RESULT, 'mailto')).toBe('message-2.url');
    expect(fileNameFor({ ...RESULT, copy: 0 }, 'eml')).toBe('message-1.eml');
  });
});
