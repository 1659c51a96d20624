import { describe, expect, it } from 'vitest';
import { captureError } from '../testing/capture-error.js';
import type { OuterMessage } from '../types/index.js';
import { parseNativeBlock, renderNativeBlock } from './native-block.js';

const MESSAGE: OuterMessage = {
  to: 'remailer@paranoia.example',
  headers: [{ name: 'Encrypted', value: 'PGP' }],
  ciphertext: '-----BEGIN PGP MESSAGE-----\n\nhQEMA\n\n=abcd\n-----END PGP MESSAGE-----\n',
};

describe('renderNativeBlock', () => {
  it('writes the routing section before the encrypted section', () => {
    expect(renderNativeBlock(MESSAGE)).toBe(
      '::\nAnon-To: remailer@paranoia.example\n\n::\nEncrypted: PGP\n\n-----BEGIN PGP MESSAGE-----\n\nhQEMA\n\n=abcd\n-----END PGP MESSAGE-----\n',
    );
  });
});

describe('parseNativeBlock', () => {
  it('recovers the outer headers and the exact ciphertext', () => {
    expect(parseNativeBlock(renderNativeBlock(MESSAGE))).toEqual(MESSAGE);
  });

  it('accepts CRLF line endings', () => {
    const text = renderNativeBlock(MESSAGE).replace(/\n/g, '\r\n');
    expect(parseNativeBlock(text)).toEqual(MESSAGE);
  });

  it('rejects text without a routing marker', () => {
    expect(captureError(() => parseNativeBlock('Encrypted: PGP\n\nx'))).toMatchObject({
      code: 'MALFORMED_BLOCK',
      message: 'Expected "::" to open the routing section at line 1',
    });
  });

  it('rejects a missing encrypted section', () => {
    expect(captureError(() => parseNativeBlock('::\nAnon-To: a@b\n\nplain body'))).toMatchObject({
      code: 'MALFORMED_BLOCK',
      message: 'Expected "::" to open the encrypted section at line 4',
    });
  });

  it('rejects an unterminated section', () => {
    expect(captureError(() => parseNativeBlock('::\nAnon-To: a@b'))).toMatchObject({
      code: 'MALFORMED_BLOCK',
      message: 'The routing section is not terminated by a blank line',
    });
  });

  it('rejects a routing section without Anon-To', () => {
    expect(captureError(() => parseNativeBlock('::\nLatent-Time: +1:00\n\n::\nEncrypted: PGP\n\nx'))).toMatchObject({
      code: 'MALFORMED_BLOCK',
      message: 'The routing section has no Anon-To header',
    });
  });

  it('rejects garbage header lines', () => {
    expect(captureError(() => parseNativeBlock('::\nnot a header\n\n'))).toMatchObject({
      code: 'MALFORMED_BLOCK',
      message: 'Invalid header at line 2',
    });
  });
});
